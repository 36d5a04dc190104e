import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { configError } from '../../domain/errors';
import { type ReferenceEntry, type ReferenceRecord, ReferenceRecordSchema } from '../../domain/reference';

/**
 * Stable identity of a corpus record: its explicit id, or a content hash
 * so that re-seeding an unchanged line maps onto the same document.
 */
export function referenceId(record: ReferenceRecord): string {
    if (record.id) return record.id;

    return createHash('sha256')
        .update([record.source, record.title, String(record.price_jpy), record.text].join('\u0000'))
        .digest('hex')
        .substring(0, 32);
}

export function toReferenceEntry(record: ReferenceRecord): ReferenceEntry {
    return {
        id: referenceId(record),
        title: record.title,
        price_jpy: record.price_jpy,
        source: record.source,
        body: record.text,
    };
}

/** Parses a JSONL corpus; blank lines are skipped, anything else must validate. */
export function parseSeedCorpus(contents: string, origin = 'seed corpus'): ReferenceEntry[] {
    const entries: ReferenceEntry[] = [];

    contents.split(/\r?\n/).forEach((line, index) => {
        if (!line.trim()) return;

        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch (error) {
            throw configError(`${origin} line ${index + 1} is not valid JSON`, error);
        }

        const result = ReferenceRecordSchema.safeParse(raw);
        if (!result.success) {
            const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
            throw configError(`${origin} line ${index + 1} is invalid (${fields})`, result.error.format());
        }
        entries.push(toReferenceEntry(result.data));
    });

    return entries;
}

export async function loadSeedCorpus(path: string): Promise<ReferenceEntry[]> {
    let contents: string;
    try {
        contents = await fs.readFile(path, 'utf8');
    } catch (error) {
        throw configError(`Cannot read seed corpus at ${path}`, error);
    }
    return parseSeedCorpus(contents, path);
}
