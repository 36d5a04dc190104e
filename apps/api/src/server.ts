import 'dotenv/config';
import { buildApp } from './app';
import { generationOptionsFromEnv, loadEnv, resolveModels } from './config/env';
import { buildLoggerOptions } from './config/logger';
import { buildGenerationParams } from './domain/ai/generation-params';
import { createAiProvider } from './infra/ai/provider';
import { connectToDatabase, createDatabase, disconnectFromDatabase } from './infra/db';
import { ReferenceRepository } from './infra/repositories/reference.repository';
import { loadSeedCorpus } from './infra/seed/seed-loader';
import { DescriptionService } from './services/description.service';
import { TelemetryService } from './services/telemetry.service';
import { ValuationService } from './services/valuation.service';

async function bootstrap() {
    const env = loadEnv();
    const models = resolveModels(env);
    const generation = generationOptionsFromEnv(env);

    // Fail before listening if a knob does not fit the configured models
    buildGenerationParams(models.vision, generation);
    buildGenerationParams(models.valuation, generation);

    const { generator, embedder } = createAiProvider(env, models);
    const telemetryService = new TelemetryService();

    const database = createDatabase(env.MONGO_URI);
    const wiring: { references?: ReferenceRepository } = {};

    const server = await buildApp(env, (logger) => {
        const repository = new ReferenceRepository(database.db.collection(env.REFERENCE_COLLECTION), embedder, logger);
        wiring.references = repository;
        return {
            descriptionService: new DescriptionService(generator, { model: models.vision, generation }, logger),
            valuationService: new ValuationService(
                generator,
                repository,
                { model: models.valuation, generation, topK: env.RAG_TOP_K, snippetChars: env.REFERENCE_SNIPPET_CHARS },
                logger
            ),
            telemetryService,
            references: repository,
        };
    }, { logger: buildLoggerOptions(env) });

    try {
        // Infrastructure
        await connectToDatabase(database, server.log);

        if (!wiring.references) throw new Error('Reference repository was not created');
        const corpus = await loadSeedCorpus(env.SEED_PATH);
        await wiring.references.seed(corpus);

        await server.listen({ port: env.PORT, host: env.HOST });
        server.log.info({ provider: env.AI_PROVIDER, models }, `API listening on http://${env.HOST}:${env.PORT}`);

        // Graceful Shutdown
        const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
        signals.forEach((signal) => {
            process.once(signal, () => {
                server.log.info({ signal }, 'Closing server');
                server.close()
                    .then(() => disconnectFromDatabase(database, server.log))
                    .then(() => process.exit(0))
                    .catch((error: unknown) => {
                        server.log.error({ err: error }, 'Shutdown failed');
                        process.exit(1);
                    });
            });
        });
    } catch (err) {
        server.log.error({ err }, 'Startup failed');
        process.exit(1);
    }
}

bootstrap().catch((err: unknown) => {
    console.error('[server] Failed to start', err);
    process.exit(1);
});
