export enum PipelineErrorCode {
    BAD_INPUT = 'BAD_INPUT',
    PARSE_ERROR = 'PARSE_ERROR',
    CONFIG_ERROR = 'CONFIG_ERROR',
    UPSTREAM_ERROR = 'UPSTREAM_ERROR',
}

export class PipelineError extends Error {
    constructor(
        public readonly code: PipelineErrorCode,
        message: string,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

export const badInput = (message: string, originalError?: unknown) =>
    new PipelineError(PipelineErrorCode.BAD_INPUT, message, originalError);

export const parseError = (message: string, originalError?: unknown) =>
    new PipelineError(PipelineErrorCode.PARSE_ERROR, message, originalError);

export const configError = (message: string, originalError?: unknown) =>
    new PipelineError(PipelineErrorCode.CONFIG_ERROR, message, originalError);

export const upstreamError = (message: string, originalError?: unknown) =>
    new PipelineError(PipelineErrorCode.UPSTREAM_ERROR, message, originalError);

/**
 * Rejected-request failures whose message is safe to show the caller.
 * Everything else is reported with a generic message.
 */
export function isClientVisible(error: unknown): error is PipelineError {
    return error instanceof PipelineError
        && (error.code === PipelineErrorCode.BAD_INPUT || error.code === PipelineErrorCode.PARSE_ERROR);
}
