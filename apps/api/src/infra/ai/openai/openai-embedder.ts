import type OpenAI from 'openai';
import type { Embedder } from '../../../domain/ai/interfaces';
import { wrapProviderError } from '../upstream-error';

export interface OpenAiEmbeddingsApi {
    embeddings: {
        create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
    };
}

export class OpenAiEmbedder implements Embedder {
    constructor(
        private readonly client: OpenAiEmbeddingsApi,
        readonly model: string,
        private readonly batchSize = 64
    ) { }

    async embed(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];

        for (let offset = 0; offset < texts.length; offset += this.batchSize) {
            const batch = texts.slice(offset, offset + this.batchSize);
            let response: OpenAI.CreateEmbeddingResponse;
            try {
                response = await this.client.embeddings.create({ model: this.model, input: batch });
            } catch (error) {
                throw wrapProviderError('OpenAI', 'embeddings.create', error);
            }

            const ordered = [...response.data].sort((a, b) => a.index - b.index);
            vectors.push(...ordered.map((item) => item.embedding));
        }

        return vectors;
    }
}
