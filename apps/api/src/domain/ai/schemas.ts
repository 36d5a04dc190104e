import { z } from 'zod';

// Models sometimes emit null for fields they could not read off the photo.
const text = () => z.string().nullish().transform((value) => value ?? '');
const textList = () => z.array(z.string()).nullish().transform((value) => value ?? []);

export const InstrumentDescriptionSchema = z.object({
    category: text(),
    brand: text(),
    model: text(),
    year: z.union([z.string(), z.number().int()])
        .nullish()
        .transform((value) => (value === null || value === undefined ? null : String(value))),
    condition: text(),
    materials: textList(),
    features: textList(),
    notes: text(),
});

export type InstrumentDescription = z.infer<typeof InstrumentDescriptionSchema>;

const jpy = z.number().int().min(0);

export const ValuationResultSchema = z.object({
    price_jpy: jpy,
    range_jpy: z.tuple([jpy, jpy]).refine(([low, high]) => low <= high, {
        message: 'range_jpy must be ordered low to high',
    }),
    confidence: z.number().min(0).max(1),
    rationale: z.string(),
    evidence: z.array(z.string()),
});

export type ValuationResult = z.infer<typeof ValuationResultSchema>;

export function rangeBracketsPrice(result: ValuationResult): boolean {
    const [low, high] = result.range_jpy;
    return low <= result.price_jpy && result.price_jpy <= high;
}

export interface GenerationUsage {
    input_tokens: number;
    output_tokens: number;
    total_tokens: number;
}
