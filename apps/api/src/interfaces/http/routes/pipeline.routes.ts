import type { FastifyPluginAsync } from 'fastify';
import type { DescriptionService } from '../../../services/description.service';
import type { TelemetryService } from '../../../services/telemetry.service';
import type { ValuationService } from '../../../services/valuation.service';
import { DescriptionController } from '../controllers/description.controller';
import { ValuationController } from '../controllers/valuation.controller';

export interface PipelineRoutesOptions {
    descriptionService: DescriptionService;
    valuationService: ValuationService;
    telemetryService: TelemetryService;
}

export const pipelineRoutes: FastifyPluginAsync<PipelineRoutesOptions> = async (server, options) => {
    const description = new DescriptionController(options.descriptionService, options.telemetryService);
    const valuation = new ValuationController(options.valuationService, options.telemetryService);

    server.post('/describe', (req, res) => description.describe(req, res));
    server.post('/describe/stream', (req, res) => description.describeStream(req, res));
    server.post('/estimate', (req, res) => valuation.estimate(req, res));
    server.post('/estimate/stream', (req, res) => valuation.estimateStream(req, res));
};
