import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ReferenceRepository } from '../../../infra/repositories/reference.repository';
import type { TelemetryService } from '../../../services/telemetry.service';
import { ok } from '../responses';

export type ReferenceStoreStatus = Pick<ReferenceRepository, 'isReady' | 'size'>;

export class AdminController {
    constructor(
        private readonly telemetryService: TelemetryService,
        private readonly references: ReferenceStoreStatus
    ) { }

    /**
     * Recent pipeline runs, newest first (last 50 executions)
     */
    async getTelemetry(request: FastifyRequest, reply: FastifyReply) {
        const events = this.telemetryService.getEvents();
        return reply.send(ok(request.id, events, { count: events.length }));
    }

    async getReferenceStatus(request: FastifyRequest, reply: FastifyReply) {
        return reply.send(ok(request.id, {
            ready: this.references.isReady(),
            size: this.references.size(),
        }));
    }
}
