import type { GenerationConfig, GoogleGenerativeAI, Part } from '@google/generative-ai';
import type { GenerationParams } from '../../../domain/ai/generation-params';
import type { GenerationRequest, GenerationResponse, TextGenerator } from '../../../domain/ai/interfaces';
import { wrapProviderError } from '../upstream-error';

/**
 * Gemini has no reasoning-effort or verbosity controls, so only the token
 * budget, temperature and JSON mode carry over.
 */
export function toGeminiConfig(params: GenerationParams): GenerationConfig {
    return {
        ...(params.maxOutputTokens !== undefined ? { maxOutputTokens: params.maxOutputTokens } : {}),
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
        ...(params.text?.format === 'json_object' ? { responseMimeType: 'application/json' } : {}),
    };
}

export class GeminiTextGenerator implements TextGenerator {
    readonly provider = 'gemini';

    constructor(private readonly client: GoogleGenerativeAI) { }

    async generate(request: GenerationRequest): Promise<GenerationResponse> {
        const model = this.client.getGenerativeModel({ model: request.model });

        const parts: Part[] = [{ text: request.instruction }];
        if (request.content) {
            parts.push({ text: request.content });
        }
        if (request.image) {
            parts.push({
                inlineData: {
                    mimeType: request.image.mimeType,
                    data: request.image.base64,
                },
            });
        }

        try {
            const result = await model.generateContent({
                contents: [{ role: 'user', parts }],
                generationConfig: toGeminiConfig(request.params),
            });

            const usage = result.response.usageMetadata;
            return {
                outputText: result.response.text(),
                usage: usage
                    ? {
                        input_tokens: usage.promptTokenCount,
                        output_tokens: usage.candidatesTokenCount,
                        total_tokens: usage.totalTokenCount,
                    }
                    : undefined,
                reasoningSummary: [],
            };
        } catch (error) {
            throw wrapProviderError('Gemini', 'generateContent', error);
        }
    }
}
