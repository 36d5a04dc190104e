import OpenAI from 'openai';

export function createOpenAiClient(apiKey: string): OpenAI {
    // Retries stay off: a failed call aborts the request's pipeline.
    return new OpenAI({ apiKey, maxRetries: 0 });
}
