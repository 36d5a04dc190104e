import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import type { Env } from './config/env';
import type { DescriptionService } from './services/description.service';
import type { ValuationService } from './services/valuation.service';
import type { TelemetryService } from './services/telemetry.service';
import type { ReferenceStoreStatus } from './interfaces/http/controllers/admin.controller';
import { buildErrorHandler } from './interfaces/http/error-handler';
import { ok } from './interfaces/http/responses';
import { pipelineRoutes } from './interfaces/http/routes/pipeline.routes';
import { adminRoutes } from './interfaces/http/routes/admin.routes';

export type AppSettings = Pick<Env, 'NODE_ENV' | 'CORS_ORIGIN' | 'MAX_UPLOAD_BYTES' | 'ADMIN_TOKEN'>;

export interface AppDependencies {
    descriptionService: DescriptionService;
    valuationService: ValuationService;
    telemetryService: TelemetryService;
    references: ReferenceStoreStatus;
}

/**
 * Assembles the HTTP surface without listening, so tests can drive it
 * through `inject`. Dependencies are built against the server's logger.
 */
export async function buildApp(
    settings: AppSettings,
    createDependencies: (logger: FastifyBaseLogger) => AppDependencies,
    options: FastifyServerOptions = {}
): Promise<FastifyInstance> {
    const server = Fastify(options);
    const deps = createDependencies(server.log);

    // Middleware
    await server.register(cors, {
        origin: settings.CORS_ORIGIN,
    });

    await server.register(multipart, {
        limits: {
            fileSize: settings.MAX_UPLOAD_BYTES,
            files: 4,
        },
    });

    await server.register(rateLimit, {
        max: 100,
        timeWindow: '1 minute',
        // Thrown into the error handler, which wraps it in the envelope
        errorResponseBuilder: (_request, context) => ({
            statusCode: context.statusCode,
            code: 'RATE_LIMIT_EXCEEDED',
            message: `Too many requests. Please try again in ${context.after}.`,
        }),
    });

    server.setErrorHandler(buildErrorHandler(settings.NODE_ENV === 'production'));

    // Routes
    server.get('/health', async (request) => {
        return ok(request.id, {
            status: 'OK',
            referencesReady: deps.references.isReady(),
            timestamp: new Date().toISOString(),
        });
    });

    await server.register(pipelineRoutes, {
        prefix: '/api',
        descriptionService: deps.descriptionService,
        valuationService: deps.valuationService,
        telemetryService: deps.telemetryService,
    });
    await server.register(adminRoutes, {
        prefix: '/api/admin',
        adminToken: settings.ADMIN_TOKEN,
        telemetryService: deps.telemetryService,
        references: deps.references,
    });

    return server;
}
