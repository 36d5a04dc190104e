import { z } from 'zod';

/** One line of the seed corpus. */
export const ReferenceRecordSchema = z.object({
    id: z.string().min(1).optional(),
    title: z.string().min(1),
    price_jpy: z.number().int().min(0),
    source: z.string().default('unknown'),
    text: z.string().default(''),
});

export type ReferenceRecord = z.infer<typeof ReferenceRecordSchema>;

export interface ReferenceEntry {
    id: string;
    title: string;
    price_jpy: number;
    source: string;
    body: string;
}

export interface RetrievalResult {
    entry: ReferenceEntry;
    score: number;
}

export interface SeedReport {
    total: number;
    inserted: number;
    /** Stored under another embedding model and embedded again. */
    refreshed: number;
    skipped: number;
}

export interface ReferenceSearch {
    query(text: string, k: number): Promise<RetrievalResult[]>;
}
