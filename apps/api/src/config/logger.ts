import type { FastifyServerOptions } from 'fastify';
import type { Env } from './env';

/**
 * Structured logger the services depend on. Fastify's pino instance
 * satisfies it, and so does `console` in scripts.
 */
export interface Logger {
    debug(obj: object, msg?: string): void;
    info(obj: object, msg?: string): void;
    warn(obj: object, msg?: string): void;
    error(obj: object, msg?: string): void;
}

const REDACTED_HEADERS = ['req.headers["x-admin-token"]', 'req.headers.authorization'];

export function buildLoggerOptions(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL'>): FastifyServerOptions['logger'] {
    if (env.NODE_ENV === 'test') return false;

    if (env.NODE_ENV === 'production') {
        return { level: env.LOG_LEVEL, redact: REDACTED_HEADERS };
    }

    return {
        level: env.LOG_LEVEL,
        transport: {
            target: 'pino-pretty',
            options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
            },
        },
        redact: REDACTED_HEADERS,
    };
}
