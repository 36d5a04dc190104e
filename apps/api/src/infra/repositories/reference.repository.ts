import type { Collection } from 'mongodb';
import { z } from 'zod';
import type { Logger } from '../../config/logger';
import type { Embedder } from '../../domain/ai/interfaces';
import { upstreamError } from '../../domain/errors';
import type { ReferenceEntry, RetrievalResult, SeedReport } from '../../domain/reference';

export interface ReferenceDocument {
    _id: string;
    title: string;
    price_jpy: number;
    source: string;
    body: string;
    embedding: number[];
    embeddingModel: string;
    createdAt: Date;
}

const ReferenceDocumentSchema = z.object({
    _id: z.string(),
    title: z.string(),
    price_jpy: z.number(),
    source: z.string(),
    body: z.string(),
    embedding: z.array(z.number()).min(1),
    embeddingModel: z.string(),
});

export type ReferenceCollection = Pick<Collection<ReferenceDocument>, 'find' | 'bulkWrite'>;

interface IndexedEntry {
    entry: ReferenceEntry;
    vector: number[];
    norm: number;
}

function norm(vector: number[]): number {
    return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

function cosine(a: IndexedEntry, query: number[], queryNorm: number): number {
    if (a.norm === 0 || queryNorm === 0 || a.vector.length !== query.length) return 0;

    let dot = 0;
    for (let i = 0; i < query.length; i++) {
        dot += a.vector[i] * query[i];
    }
    return dot / (a.norm * queryNorm);
}

export function embeddingText(entry: Pick<ReferenceEntry, 'title' | 'body'>): string {
    return entry.body ? `${entry.title}\n${entry.body}` : entry.title;
}

/**
 * Similarity index over the reference corpus. Vectors live in MongoDB;
 * queries run against an in-memory snapshot that is swapped in only after
 * a seed has fully completed.
 */
export class ReferenceRepository {
    private snapshot: IndexedEntry[] | null = null;

    constructor(
        private readonly collection: ReferenceCollection,
        private readonly embedder: Embedder,
        private readonly logger?: Logger
    ) { }

    isReady(): boolean {
        return this.snapshot !== null;
    }

    size(): number {
        return this.snapshot?.length ?? 0;
    }

    /**
     * Embeds and stores entries that are not in the collection yet, or that
     * were embedded by another model, then loads the whole collection.
     * Re-seeding the same corpus with the same model writes nothing.
     */
    async seed(entries: ReferenceEntry[]): Promise<SeedReport> {
        const unique = new Map<string, ReferenceEntry>();
        for (const entry of entries) {
            if (!unique.has(entry.id)) unique.set(entry.id, entry);
        }
        const ids = [...unique.keys()];

        const existing = ids.length
            ? await this.collection.find({ _id: { $in: ids } }, { projection: { _id: 1, embeddingModel: 1 } }).toArray()
            : [];
        const storedModel = new Map(existing.map((doc) => [doc._id, doc.embeddingModel]));
        const missing = [...unique.values()].filter((entry) => storedModel.get(entry.id) !== this.embedder.model);
        const refreshed = missing.filter((entry) => storedModel.has(entry.id)).length;

        if (missing.length > 0) {
            const vectors = await this.embedder.embed(missing.map(embeddingText));
            if (vectors.length !== missing.length) {
                throw upstreamError(`Embedding call returned ${vectors.length} vectors for ${missing.length} inputs`);
            }

            const createdAt = new Date();
            await this.collection.bulkWrite(
                missing.map((entry, i) => ({
                    updateOne: {
                        filter: { _id: entry.id },
                        // Stale vectors are overwritten in place
                        update: {
                            $set: {
                                title: entry.title,
                                price_jpy: entry.price_jpy,
                                source: entry.source,
                                body: entry.body,
                                embedding: vectors[i],
                                embeddingModel: this.embedder.model,
                            },
                            $setOnInsert: { createdAt },
                        },
                        upsert: true,
                    },
                })),
                { ordered: false }
            );
        }

        await this.reload();

        const report: SeedReport = {
            total: unique.size,
            inserted: missing.length - refreshed,
            refreshed,
            skipped: unique.size - missing.length,
        };
        this.logger?.info({ ...report, indexed: this.size() }, '[ReferenceRepository] Seed completed');
        return report;
    }

    /**
     * Top-k entries by cosine similarity, most similar first. Equal scores
     * are ordered by id.
     */
    async query(text: string, k: number): Promise<RetrievalResult[]> {
        const snapshot = this.snapshot;
        if (!snapshot) {
            throw new Error('Reference store queried before seeding completed');
        }
        if (k <= 0 || snapshot.length === 0) return [];

        const [vector] = await this.embedder.embed([text]);
        if (!vector) {
            throw upstreamError('Embedding call returned no vector for the query');
        }
        const queryNorm = norm(vector);

        return snapshot
            .map((indexed) => ({ entry: indexed.entry, score: cosine(indexed, vector, queryNorm) }))
            .sort((a, b) => {
                if (b.score !== a.score) return b.score - a.score;
                return a.entry.id.localeCompare(b.entry.id);
            })
            .slice(0, k);
    }

    private async reload(): Promise<void> {
        const docs = await this.collection.find({}).toArray();
        const indexed: IndexedEntry[] = [];

        for (const doc of docs) {
            const result = ReferenceDocumentSchema.safeParse(doc);
            if (!result.success) {
                this.logger?.warn(
                    { id: doc._id, issues: result.error.format() },
                    '[ReferenceRepository] Discarding invalid reference document'
                );
                continue;
            }

            const { _id, embedding, embeddingModel, ...fields } = result.data;
            // Vectors from another model share no space with the query vector
            if (embeddingModel !== this.embedder.model) {
                this.logger?.warn(
                    { id: _id, embeddingModel, expected: this.embedder.model },
                    '[ReferenceRepository] Skipping reference embedded by another model'
                );
                continue;
            }

            indexed.push({
                entry: { id: _id, ...fields },
                vector: embedding,
                norm: norm(embedding),
            });
        }

        this.snapshot = indexed;
    }
}
