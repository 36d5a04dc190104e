import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { PipelineError } from '../../domain/errors';
import { fail, pipelineFailure } from './responses';

/**
 * Last-resort handler for errors that escape a controller: framework
 * validation, oversized uploads and anything unexpected.
 */
export function buildErrorHandler(isProduction: boolean) {
    return (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
        request.log.error({ requestId: request.id, err: error }, 'Unhandled request error');

        const requestId = request.id;

        if (error instanceof PipelineError) {
            const { status, body } = pipelineFailure(error, 'Request failed');
            return reply.code(status).send(fail(requestId, body));
        }

        // Handle validation errors (Fastify standard)
        if (error.validation) {
            return reply.code(400).send(fail(requestId, {
                code: 'VALIDATION_ERROR',
                message: 'Validation failed',
                details: error.validation,
            }));
        }

        // Client errors raised by plugins (413 file too large, 415, ...) keep their message
        const status = error.statusCode ?? 500;
        if (status < 500) {
            return reply.code(status).send(fail(requestId, {
                code: error.code || 'BAD_REQUEST',
                message: error.message,
            }));
        }

        // Default sanitized handler for internal errors
        return reply.code(status).send(fail(requestId, {
            code: 'INTERNAL_SERVER_ERROR',
            message: isProduction ? 'Internal Server Error' : error.message,
            details: isProduction ? null : { stack: error.stack },
        }));
    };
}
