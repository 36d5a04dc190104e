import type { Env, ModelSelection } from '../../config/env';
import { configError } from '../../domain/errors';
import type { Embedder, TextGenerator } from '../../domain/ai/interfaces';
import { createOpenAiClient } from './openai/client';
import { OpenAiTextGenerator } from './openai/openai-text-generator';
import { OpenAiEmbedder } from './openai/openai-embedder';
import { createGeminiClient } from './gemini/client';
import { GeminiTextGenerator } from './gemini/gemini-text-generator';
import { GeminiEmbedder } from './gemini/gemini-embedder';

export interface AiProviderBundle {
    generator: TextGenerator;
    embedder: Embedder;
}

export function createAiProvider(env: Env, models: ModelSelection): AiProviderBundle {
    if (env.AI_PROVIDER === 'gemini') {
        if (!env.GEMINI_API_KEY) throw configError('GEMINI_API_KEY is not set');
        const client = createGeminiClient(env.GEMINI_API_KEY);
        return {
            generator: new GeminiTextGenerator(client),
            embedder: new GeminiEmbedder(client, models.embedding),
        };
    }

    if (!env.OPENAI_API_KEY) throw configError('OPENAI_API_KEY is not set');
    const client = createOpenAiClient(env.OPENAI_API_KEY);
    return {
        generator: new OpenAiTextGenerator(client),
        embedder: new OpenAiEmbedder(client, models.embedding),
    };
}
