import { configError } from '../errors';

export const REASONING_EFFORTS = ['none', 'minimal', 'low', 'medium', 'high', 'xhigh'] as const;
export const REASONING_SUMMARIES = ['auto', 'concise', 'detailed'] as const;
export const TEXT_VERBOSITIES = ['low', 'medium', 'high'] as const;

export type ReasoningEffort = typeof REASONING_EFFORTS[number];
export type ReasoningSummary = typeof REASONING_SUMMARIES[number];
export type TextVerbosity = typeof TEXT_VERBOSITIES[number];

// Model families that run a hidden reasoning phase and reject `temperature`.
const REASONING_MODEL_PREFIXES = ['gpt-5', 'o'] as const;

/**
 * Generation knobs as configured. Enumerated values are kept raw so that
 * `.env` entries such as `low # fast` are normalised in one place.
 */
export interface GenerationOptions {
    maxOutputTokens?: number;
    temperature?: number;
    reasoningEffort?: string;
    reasoningSummary?: string;
    textVerbosity?: string;
    forceJsonMode: boolean;
}

export interface GenerationParams {
    maxOutputTokens?: number;
    temperature?: number;
    reasoning?: {
        effort?: ReasoningEffort;
        summary?: ReasoningSummary;
    };
    text?: {
        verbosity?: TextVerbosity;
        format?: 'json_object';
    };
}

export function stripInlineComment(value: string): string {
    return value.split('#', 1)[0].trim();
}

export function supportsReasoning(model: string): boolean {
    const normalized = model.trim().toLowerCase();
    return REASONING_MODEL_PREFIXES.some((prefix) => normalized.startsWith(prefix));
}

function normalizeChoice<T extends string>(
    raw: string | undefined,
    allowed: readonly T[],
    settingName: string
): T | undefined {
    if (raw === undefined) return undefined;

    const normalized = stripInlineComment(raw).toLowerCase();
    if (!normalized) return undefined;

    const match = allowed.find((choice) => choice === normalized);
    if (!match) {
        throw configError(`${settingName} must be one of ${[...allowed].sort().join(', ')}`);
    }
    return match;
}

/**
 * Builds the provider-neutral parameter set for one generation call,
 * dropping whatever the target model family does not accept.
 */
export function buildGenerationParams(model: string, options: GenerationOptions): GenerationParams {
    const params: GenerationParams = {};
    const reasoningModel = supportsReasoning(model);

    if (options.maxOutputTokens !== undefined) {
        params.maxOutputTokens = options.maxOutputTokens;
    }

    if (options.temperature !== undefined && !reasoningModel) {
        params.temperature = options.temperature;
    }

    if (reasoningModel) {
        const effort = normalizeChoice(options.reasoningEffort, REASONING_EFFORTS, 'AI_REASONING_EFFORT');
        const summary = normalizeChoice(options.reasoningSummary, REASONING_SUMMARIES, 'AI_REASONING_SUMMARY');

        if (effort || summary) {
            params.reasoning = {
                ...(effort ? { effort } : {}),
                ...(summary ? { summary } : {}),
            };
        }
    }

    const verbosity = normalizeChoice(options.textVerbosity, TEXT_VERBOSITIES, 'AI_TEXT_VERBOSITY');
    if (verbosity || options.forceJsonMode) {
        params.text = {
            ...(verbosity ? { verbosity } : {}),
            ...(options.forceJsonMode ? { format: 'json_object' as const } : {}),
        };
    }

    return params;
}
