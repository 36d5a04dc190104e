import type { InstrumentDescription } from '../ai/schemas';

/**
 * Flattens a description into the retrieval query, one labeled line per
 * non-empty field, in a fixed order.
 */
export function buildQueryText(description: InstrumentDescription): string {
    const fields: Array<[string, string]> = [
        ['category', description.category],
        ['brand', description.brand],
        ['model', description.model],
        ['year', description.year ?? ''],
        ['condition', description.condition],
        ['materials', description.materials.join(', ')],
        ['features', description.features.join(', ')],
        ['notes', description.notes],
    ];

    return fields
        .filter(([, value]) => value.trim().length > 0)
        .map(([label, value]) => `${label}: ${value}`)
        .join('\n');
}
