import type { FastifyPluginAsync } from 'fastify';
import type { TelemetryService } from '../../../services/telemetry.service';
import { AdminController, type ReferenceStoreStatus } from '../controllers/admin.controller';
import { fail } from '../responses';
import { AdminHeadersSchema } from '../schemas/admin.schemas';

export interface AdminRoutesOptions {
    adminToken: string;
    telemetryService: TelemetryService;
    references: ReferenceStoreStatus;
}

export const adminRoutes: FastifyPluginAsync<AdminRoutesOptions> = async (server, options) => {
    const controller = new AdminController(options.telemetryService, options.references);

    server.addHook('preHandler', async (request, reply) => {
        const headers = AdminHeadersSchema.safeParse(request.headers);
        if (!headers.success || headers.data['x-admin-token'] !== options.adminToken) {
            return reply.code(403).send(fail(request.id, {
                code: 'FORBIDDEN',
                message: 'Admin access only',
            }));
        }
    });

    server.get('/telemetry', (req, res) => controller.getTelemetry(req, res));
    server.get('/references', (req, res) => controller.getReferenceStatus(req, res));
};
