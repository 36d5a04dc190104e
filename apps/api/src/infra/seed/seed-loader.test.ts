import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadSeedCorpus, parseSeedCorpus, referenceId } from './seed-loader';
import { PipelineErrorCode } from '../../domain/errors';

describe('parseSeedCorpus', () => {
    it('should map records to entries and skip blank lines', () => {
        const contents = [
            '{"id": "ref-1", "title": "Yamaha YAS-62", "price_jpy": 180000, "source": "shop-a", "text": "Alto sax, lacquer worn."}',
            '',
            '   ',
            '{"title": "Korg minilogue", "price_jpy": 38000}',
        ].join('\n');

        const entries = parseSeedCorpus(contents);

        expect(entries).toHaveLength(2);
        expect(entries[0]).toEqual({
            id: 'ref-1',
            title: 'Yamaha YAS-62',
            price_jpy: 180000,
            source: 'shop-a',
            body: 'Alto sax, lacquer worn.',
        });
        expect(entries[1]).toMatchObject({ title: 'Korg minilogue', source: 'unknown', body: '' });
        expect(entries[1].id).toMatch(/^[0-9a-f]{32}$/);
    });

    it('should name the line that is not JSON', () => {
        expect(() => parseSeedCorpus('{"title": "A", "price_jpy": 1}\n{oops', 'seed.jsonl'))
            .toThrow('seed.jsonl line 2 is not valid JSON');
    });

    it('should name the invalid fields', () => {
        try {
            parseSeedCorpus('{"title": "", "price_jpy": -5}');
            expect.unreachable();
        } catch (error) {
            expect(error).toMatchObject({
                code: PipelineErrorCode.CONFIG_ERROR,
                message: 'seed corpus line 1 is invalid (title, price_jpy)',
            });
        }
    });
});

describe('referenceId', () => {
    const record = { title: 'Martin D-28', price_jpy: 250000, source: 'shop-b', text: 'Spruce top' };

    it('should prefer the explicit id', () => {
        expect(referenceId({ ...record, id: 'martin' })).toBe('martin');
    });

    it('should hash content to a stable id', () => {
        expect(referenceId(record)).toBe(referenceId({ ...record }));
        expect(referenceId(record)).not.toBe(referenceId({ ...record, price_jpy: 240000 }));
    });
});

describe('loadSeedCorpus', () => {
    it('should load the bundled corpus', async () => {
        const entries = await loadSeedCorpus(path.resolve(__dirname, '../../../data/seed.jsonl'));

        expect(entries).toHaveLength(12);
        expect(new Set(entries.map((entry) => entry.id)).size).toBe(12);
    });

    it('should report a missing file as a configuration error', async () => {
        await expect(loadSeedCorpus('/nonexistent/seed.jsonl')).rejects.toMatchObject({
            code: PipelineErrorCode.CONFIG_ERROR,
            message: 'Cannot read seed corpus at /nonexistent/seed.jsonl',
        });
    });
});
