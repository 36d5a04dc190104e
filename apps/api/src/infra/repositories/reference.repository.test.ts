import { describe, it, expect, vi, beforeEach } from 'vitest';
import { embeddingText, type ReferenceCollection, type ReferenceDocument, ReferenceRepository } from './reference.repository';
import type { Embedder } from '../../domain/ai/interfaces';
import type { ReferenceEntry } from '../../domain/reference';

type StoredDocument = Omit<ReferenceDocument, 'embedding'> & { embedding: unknown };

interface UpsertOperation {
    updateOne: {
        filter: { _id: string };
        update: {
            $set: Omit<ReferenceDocument, '_id' | 'createdAt'>;
            $setOnInsert: Pick<ReferenceDocument, 'createdAt'>;
        };
    };
}

/** In-process stand-in for the two collection calls the repository makes. */
function createFakeCollection(initial: StoredDocument[] = []) {
    const documents = new Map<string, StoredDocument>(initial.map((doc) => [doc._id, doc]));

    const find = vi.fn((filter: { _id?: { $in: string[] } }) => ({
        toArray: async () => {
            const wanted = filter._id?.$in;
            return [...documents.values()].filter((doc) => !wanted || wanted.includes(doc._id));
        },
    }));
    const bulkWrite = vi.fn(async (operations: UpsertOperation[]) => {
        for (const { updateOne } of operations) {
            const { $set, $setOnInsert } = updateOne.update;
            const current = documents.get(updateOne.filter._id);
            documents.set(
                updateOne.filter._id,
                current ? { ...current, ...$set } : { _id: updateOne.filter._id, ...$set, ...$setOnInsert }
            );
        }
        return {};
    });

    return {
        documents,
        find,
        bulkWrite,
        collection: { find, bulkWrite } as unknown as ReferenceCollection,
    };
}

// Vectors keyed by the text the repository embeds
const VECTORS: Record<string, number[]> = {
    'Fender Stratocaster\nalder body': [1, 0, 0],
    'Fender Telecaster\nash body': [0.8, 0.6, 0],
    'Yamaha FG830\nspruce top': [0, 1, 0],
    'Squier Stratocaster': [1, 0, 0],
    'query: strat': [1, 0, 0],
    'query: acoustic': [0, 1, 0],
};

const mockEmbed = vi.fn(async (texts: string[]) => texts.map((text) => VECTORS[text] ?? [0, 0, 1]));
const embedder: Embedder = { model: 'fake-embedding', embed: mockEmbed };

const entries: ReferenceEntry[] = [
    { id: 'strat', title: 'Fender Stratocaster', price_jpy: 110000, source: 'shop-a', body: 'alder body' },
    { id: 'tele', title: 'Fender Telecaster', price_jpy: 95000, source: 'shop-b', body: 'ash body' },
    { id: 'fg830', title: 'Yamaha FG830', price_jpy: 30000, source: 'shop-a', body: 'spruce top' },
];

describe('ReferenceRepository', () => {
    let fake: ReturnType<typeof createFakeCollection>;
    let repository: ReferenceRepository;

    beforeEach(() => {
        vi.clearAllMocks();
        fake = createFakeCollection();
        repository = new ReferenceRepository(fake.collection, embedder);
    });

    it('should refuse queries before seeding completes', async () => {
        expect(repository.isReady()).toBe(false);
        await expect(repository.query('query: strat', 2)).rejects.toThrow('Reference store queried before seeding completed');
    });

    it('should embed and store every new entry', async () => {
        const report = await repository.seed(entries);

        expect(report).toEqual({ total: 3, inserted: 3, refreshed: 0, skipped: 0 });
        expect(repository.isReady()).toBe(true);
        expect(repository.size()).toBe(3);
        expect(mockEmbed).toHaveBeenCalledWith([
            'Fender Stratocaster\nalder body',
            'Fender Telecaster\nash body',
            'Yamaha FG830\nspruce top',
        ]);
        expect(fake.documents.get('tele')).toMatchObject({
            title: 'Fender Telecaster',
            price_jpy: 95000,
            embedding: [0.8, 0.6, 0],
            embeddingModel: 'fake-embedding',
        });
    });

    it('should not re-embed or duplicate entries on a second seed', async () => {
        await repository.seed(entries);
        mockEmbed.mockClear();

        const report = await new ReferenceRepository(fake.collection, embedder).seed(entries);

        expect(report).toEqual({ total: 3, inserted: 0, refreshed: 0, skipped: 3 });
        expect(mockEmbed).not.toHaveBeenCalled();
        expect(fake.documents.size).toBe(3);
    });

    it('should re-embed entries stored under another embedding model', async () => {
        await repository.seed(entries);
        const createdAt = fake.documents.get('strat')?.createdAt;

        // A two-dimensional model that only knows acoustic instruments
        const otherEmbedder: Embedder = {
            model: 'other-embedding',
            embed: vi.fn(async (texts: string[]) => texts.map((text) => (text.includes('FG830') || text === 'acoustic' ? [0, 1] : [1, 0]))),
        };
        const switched = new ReferenceRepository(fake.collection, otherEmbedder);

        const report = await switched.seed(entries);
        const results = await switched.query('acoustic', 1);

        expect(report).toEqual({ total: 3, inserted: 0, refreshed: 3, skipped: 0 });
        expect(results.map((result) => result.entry.id)).toEqual(['fg830']);
        expect(results[0].score).toBeCloseTo(1);
        expect(fake.documents.get('strat')).toMatchObject({ embedding: [1, 0], embeddingModel: 'other-embedding', createdAt });
    });

    it('should leave out stored references embedded by another model', async () => {
        fake = createFakeCollection([{
            _id: 'retired',
            title: 'Retired listing',
            price_jpy: 1000,
            source: 'shop-z',
            body: '',
            embedding: [1, 0, 0],
            embeddingModel: 'older-embedding',
            createdAt: new Date(),
        }]);
        const warn = vi.fn();
        repository = new ReferenceRepository(fake.collection, embedder, { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() });

        await repository.seed(entries);
        const results = await repository.query('query: strat', 10);

        expect(results.map((result) => result.entry.id)).not.toContain('retired');
        expect(repository.size()).toBe(3);
        expect(warn).toHaveBeenCalledWith(
            { id: 'retired', embeddingModel: 'older-embedding', expected: 'fake-embedding' },
            '[ReferenceRepository] Skipping reference embedded by another model'
        );
    });

    it('should collapse duplicate ids within one corpus', async () => {
        const report = await repository.seed([entries[0], { ...entries[0], title: 'Changed title' }]);

        expect(report).toEqual({ total: 1, inserted: 1, refreshed: 0, skipped: 0 });
        expect(fake.documents.get('strat')?.title).toBe('Fender Stratocaster');
    });

    it('should return the k most similar entries, best first', async () => {
        await repository.seed(entries);

        const results = await repository.query('query: strat', 2);

        expect(results.map((result) => result.entry.id)).toEqual(['strat', 'tele']);
        expect(results[0].score).toBeCloseTo(1);
        expect(results[1].score).toBeCloseTo(0.8);
        expect(results[0].entry).toEqual(entries[0]);
    });

    it('should break score ties by id', async () => {
        await repository.seed([
            ...entries,
            { id: 'squier', title: 'Squier Stratocaster', price_jpy: 25000, source: 'shop-c', body: '' },
        ]);

        const results = await repository.query('query: strat', 2);

        expect(results.map((result) => result.entry.id)).toEqual(['squier', 'strat']);
    });

    it('should return everything when k exceeds the corpus', async () => {
        await repository.seed(entries);

        const results = await repository.query('query: acoustic', 10);

        expect(results).toHaveLength(3);
        expect(results[0].entry.id).toBe('fg830');
    });

    it('should return nothing for k of zero without embedding the query', async () => {
        await repository.seed(entries);
        mockEmbed.mockClear();

        expect(await repository.query('query: strat', 0)).toEqual([]);
        expect(mockEmbed).not.toHaveBeenCalled();
    });

    it('should discard stored documents that fail validation', async () => {
        fake = createFakeCollection([{
            _id: 'broken',
            title: 'Broken record',
            price_jpy: 1,
            source: 'x',
            body: '',
            embedding: 'not-a-vector',
            embeddingModel: 'fake-embedding',
            createdAt: new Date(),
        }]);
        const warn = vi.fn();
        repository = new ReferenceRepository(fake.collection, embedder, { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() });

        await repository.seed(entries);

        expect(repository.size()).toBe(3);
        expect(warn).toHaveBeenCalledWith(
            expect.objectContaining({ id: 'broken' }),
            '[ReferenceRepository] Discarding invalid reference document'
        );
    });
});

describe('embeddingText', () => {
    it('should join title and body, or use the title alone', () => {
        expect(embeddingText({ title: 'Korg minilogue', body: 'four voices' })).toBe('Korg minilogue\nfour voices');
        expect(embeddingText({ title: 'Korg minilogue', body: '' })).toBe('Korg minilogue');
    });
});
