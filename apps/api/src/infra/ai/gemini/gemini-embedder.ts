import type { GoogleGenerativeAI } from '@google/generative-ai';
import type { Embedder } from '../../../domain/ai/interfaces';
import { wrapProviderError } from '../upstream-error';

// batchEmbedContents accepts at most 100 requests per call.
const MAX_BATCH = 100;

export class GeminiEmbedder implements Embedder {
    constructor(
        private readonly client: GoogleGenerativeAI,
        readonly model: string
    ) { }

    async embed(texts: string[]): Promise<number[][]> {
        const embeddingModel = this.client.getGenerativeModel({ model: this.model });
        const vectors: number[][] = [];

        for (let offset = 0; offset < texts.length; offset += MAX_BATCH) {
            const batch = texts.slice(offset, offset + MAX_BATCH);
            try {
                const response = await embeddingModel.batchEmbedContents({
                    requests: batch.map((text) => ({
                        content: { role: 'user', parts: [{ text }] },
                    })),
                });
                vectors.push(...response.embeddings.map((embedding) => embedding.values));
            } catch (error) {
                throw wrapProviderError('Gemini', 'batchEmbedContents', error);
            }
        }

        return vectors;
    }
}
