import { PipelineError, PipelineErrorCode, isClientVisible } from '../../domain/errors';

export interface ErrorBody {
    code: string;
    message: string;
    details?: unknown;
}

export interface Envelope<T> {
    data: T | null;
    error: ErrorBody | null;
    meta: { requestId: string } & Record<string, unknown>;
}

export function ok<T>(requestId: string, data: T, meta: Record<string, unknown> = {}): Envelope<T> {
    return { data, error: null, meta: { requestId, ...meta } };
}

export function fail(requestId: string, error: ErrorBody): Envelope<never> {
    return { data: null, error, meta: { requestId } };
}

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
    [PipelineErrorCode.BAD_INPUT]: 400,
    [PipelineErrorCode.PARSE_ERROR]: 502,
    [PipelineErrorCode.CONFIG_ERROR]: 500,
    [PipelineErrorCode.UPSTREAM_ERROR]: 502,
};

/**
 * Status and caller-facing body for a failed pipeline run. Only rejected
 * requests keep their message; anything else gets `failureMessage`.
 */
export function pipelineFailure(error: unknown, failureMessage: string): { status: number; body: ErrorBody } {
    if (isClientVisible(error)) {
        return { status: STATUS_BY_CODE[error.code], body: { code: error.code, message: error.message } };
    }
    if (error instanceof PipelineError) {
        return { status: STATUS_BY_CODE[error.code], body: { code: error.code, message: failureMessage } };
    }
    return { status: 500, body: { code: 'INTERNAL_SERVER_ERROR', message: failureMessage } };
}
