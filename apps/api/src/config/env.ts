import { z } from 'zod';
import path from 'path';
import { configError } from '../domain/errors';
import type { GenerationOptions } from '../domain/ai/generation-params';

export const AI_PROVIDERS = ['openai', 'gemini'] as const;
export type AiProvider = typeof AI_PROVIDERS[number];

const PROVIDER_MODEL_DEFAULTS: Record<AiProvider, { vision: string; valuation: string; embedding: string }> = {
    openai: { vision: 'gpt-4o-mini', valuation: 'gpt-4o-mini', embedding: 'text-embedding-3-large' },
    gemini: { vision: 'gemini-2.5-flash', valuation: 'gemini-2.5-flash', embedding: 'text-embedding-004' },
};

const DEFAULT_SEED_PATH = path.resolve(__dirname, '../../data/seed.jsonl');

// Blank entries in .env count as unset.
const blankToUndefined = (val: unknown) => (typeof val === 'string' && val.trim() === '' ? undefined : val);

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());
const optionalInt = z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional());
const flag = (fallback: boolean) => z.preprocess(
    blankToUndefined,
    z.enum(['true', 'false', '1', '0']).optional().transform((val) => (val === undefined ? fallback : val === 'true' || val === '1'))
);

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    PORT: z.preprocess((val) => Number(val), z.number()).default(4000),
    HOST: z.string().default('0.0.0.0'),
    CORS_ORIGIN: z.string().default('http://localhost:5173'),
    MAX_UPLOAD_BYTES: z.preprocess((val) => Number(val), z.number()).default(10485760), // 10MB
    ADMIN_TOKEN: z.string().min(1).default('debug-secret'),
    MONGO_URI: z.string().url().default('mongodb://localhost:27017/instrument_valuation'),
    REFERENCE_COLLECTION: z.string().min(1).default('references'),
    SEED_PATH: z.string().default(DEFAULT_SEED_PATH),
    // AI provider & models
    AI_PROVIDER: z.enum(AI_PROVIDERS).default('openai'),
    OPENAI_API_KEY: optionalString,
    GEMINI_API_KEY: optionalString,
    VISION_MODEL: optionalString,
    VALUATION_MODEL: optionalString,
    EMBEDDING_MODEL: optionalString,
    // Generation knobs, validated per model by the request builder
    AI_MAX_OUTPUT_TOKENS: optionalInt,
    AI_TEMPERATURE: optionalNumber,
    AI_REASONING_EFFORT: optionalString,
    AI_REASONING_SUMMARY: optionalString.default('auto'),
    AI_TEXT_VERBOSITY: optionalString,
    AI_JSON_MODE: flag(true),
    // Retrieval
    RAG_TOP_K: z.preprocess((val) => Number(val), z.number().int().min(1).max(50)).default(4),
    REFERENCE_SNIPPET_CHARS: z.preprocess((val) => Number(val), z.number().int().min(20).max(2000)).default(300),
}).superRefine((val, ctx) => {
    const keyName = val.AI_PROVIDER === 'openai' ? 'OPENAI_API_KEY' : 'GEMINI_API_KEY';
    if (val.NODE_ENV !== 'test' && !val[keyName]) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [keyName],
            message: `${keyName} is required when AI_PROVIDER=${val.AI_PROVIDER}`,
        });
    }
});

export type Env = z.infer<typeof envSchema>;

export interface ModelSelection {
    vision: string;
    valuation: string;
    embedding: string;
}

/**
 * Parses the process environment once. Throws a CONFIG_ERROR listing every
 * invalid key instead of exiting, so callers decide how to fail.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw configError(`Invalid environment variables: ${details}`, result.error.format());
    }

    return result.data;
}

export function resolveModels(env: Env): ModelSelection {
    const defaults = PROVIDER_MODEL_DEFAULTS[env.AI_PROVIDER];
    return {
        vision: env.VISION_MODEL ?? defaults.vision,
        valuation: env.VALUATION_MODEL ?? defaults.valuation,
        embedding: env.EMBEDDING_MODEL ?? defaults.embedding,
    };
}

export function generationOptionsFromEnv(env: Env): GenerationOptions {
    return {
        maxOutputTokens: env.AI_MAX_OUTPUT_TOKENS,
        temperature: env.AI_TEMPERATURE,
        reasoningEffort: env.AI_REASONING_EFFORT,
        reasoningSummary: env.AI_REASONING_SUMMARY,
        textVerbosity: env.AI_TEXT_VERBOSITY,
        forceJsonMode: env.AI_JSON_MODE,
    };
}
