import type { RetrievalResult } from '../reference';

export const NO_REFERENCES = '(no references found)';

export function snippet(body: string, maxChars: number): string {
    const collapsed = body.replace(/\s+/g, ' ').trim();
    // Count code points so a surrogate pair is never split
    const chars = Array.from(collapsed);
    if (chars.length <= maxChars) return collapsed;
    return `${chars.slice(0, maxChars).join('').trimEnd()}…`;
}

export function buildContext(results: RetrievalResult[], snippetChars = 300): string {
    if (results.length === 0) return NO_REFERENCES;

    return results
        .map(({ entry }) =>
            `- ${entry.title} | price_jpy: ${entry.price_jpy} | source: ${entry.source}\n  ${snippet(entry.body, snippetChars)}`
        )
        .join('\n');
}
