import { PipelineError, upstreamError } from '../../domain/errors';

function readStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * Normalises anything an SDK throws into an UPSTREAM_ERROR, keeping the
 * original for server-side logs.
 */
export function wrapProviderError(provider: string, operation: string, error: unknown): PipelineError {
    if (error instanceof PipelineError) return error;

    const status = readStatus(error);
    const message = error instanceof Error ? error.message : String(error);
    const statusSuffix = status !== undefined ? ` (HTTP ${status})` : '';

    return upstreamError(`${provider} ${operation} failed${statusSuffix}: ${message}`, error);
}
