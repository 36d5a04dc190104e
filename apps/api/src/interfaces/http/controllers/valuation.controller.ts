import type { FastifyReply, FastifyRequest } from 'fastify';
import { type InstrumentDescription, InstrumentDescriptionSchema } from '../../../domain/ai/schemas';
import type { ValuationService } from '../../../services/valuation.service';
import { logPipelineFailure, streamPipeline, toSseStream } from '../../../services/pipeline-stream';
import type { TelemetryService } from '../../../services/telemetry.service';
import { fail, ok, pipelineFailure } from '../responses';
import { SSE_HEADERS } from './description.controller';

export const VALUATION_FAILURE_MESSAGE = 'Valuation request failed';

export class ValuationController {
    constructor(
        private readonly valuationService: ValuationService,
        private readonly telemetryService: TelemetryService
    ) { }

    private parseBody(request: FastifyRequest, reply: FastifyReply): InstrumentDescription | null {
        const parsed = InstrumentDescriptionSchema.safeParse(request.body);
        if (!parsed.success) {
            reply.code(400).send(fail(request.id, {
                code: 'VALIDATION_ERROR',
                message: 'Invalid instrument description',
                details: parsed.error.format(),
            }));
            return null;
        }
        return parsed.data;
    }

    async estimate(request: FastifyRequest, reply: FastifyReply) {
        const requestId = request.id;
        const description = this.parseBody(request, reply);
        if (!description) return reply;

        const startedAt = Date.now();
        try {
            const valuation = await this.valuationService.estimate(description, { requestId });
            this.telemetryService.recordRun({ requestId, phase: 'rag', mode: 'sync', durationMs: Date.now() - startedAt });
            return reply.code(200).send(ok(requestId, valuation));
        } catch (error) {
            this.telemetryService.recordRun(
                { requestId, phase: 'rag', mode: 'sync', durationMs: Date.now() - startedAt },
                error
            );
            logPipelineFailure(request.log, error, 'rag', requestId);

            const { status, body } = pipelineFailure(error, VALUATION_FAILURE_MESSAGE);
            return reply.code(status).send(fail(requestId, body));
        }
    }

    async estimateStream(request: FastifyRequest, reply: FastifyReply) {
        const requestId = request.id;
        const description = this.parseBody(request, reply);
        if (!description) return reply;

        const events = streamPipeline(
            'rag',
            (narrator) => this.valuationService.estimate(description, { narrator, requestId }),
            {
                requestId,
                logger: request.log,
                failureMessage: VALUATION_FAILURE_MESSAGE,
                onSettled: (outcome) => this.telemetryService.recordRun(
                    { requestId, phase: 'rag', mode: 'stream', durationMs: outcome.durationMs },
                    outcome.status === 'error' ? outcome.error : undefined
                ),
            }
        );

        return reply.code(200).headers(SSE_HEADERS).send(toSseStream(events));
    }
}
