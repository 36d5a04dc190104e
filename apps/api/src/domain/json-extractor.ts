import { parseError } from './errors';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Returns [start, end) of the first balanced `{...}` span, or null.
 * Braces inside double-quoted strings (escapes included) are ignored.
 */
export function findJsonObjectSpan(text: string): [number, number] | null {
    const start = text.indexOf('{');
    if (start < 0) return null;

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let index = start; index < text.length; index++) {
        const char = text[index];

        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === '{') {
            depth++;
        } else if (char === '}') {
            depth--;
            if (depth === 0) return [start, index + 1];
        }
    }

    return null;
}

/**
 * Pulls a single JSON object out of model output that may be wrapped in
 * prose or code fences.
 */
export function extractJsonObject(text: string): JsonObject {
    const stripped = text.trim();
    if (!stripped) {
        throw parseError('Empty response');
    }

    const whole = tryParse(stripped);
    if (isJsonObject(whole)) return whole;

    const span = findJsonObjectSpan(stripped);
    if (!span) {
        throw parseError('No JSON object found in response');
    }

    const candidate = stripped.slice(span[0], span[1]);
    let parsed: unknown;
    try {
        parsed = JSON.parse(candidate);
    } catch (error) {
        throw parseError('Response contains malformed JSON', error);
    }

    if (!isJsonObject(parsed)) {
        throw parseError('No JSON object found in response');
    }
    return parsed;
}
