import 'dotenv/config';
import { loadEnv, resolveModels } from '../src/config/env';
import { createAiProvider } from '../src/infra/ai/provider';
import { connectToDatabase, createDatabase, disconnectFromDatabase } from '../src/infra/db';
import { ReferenceRepository } from '../src/infra/repositories/reference.repository';
import { loadSeedCorpus } from '../src/infra/seed/seed-loader';

/**
 * Embeds the seed corpus into MongoDB ahead of a deploy. The server seeds on
 * startup too; running this first keeps the first boot fast.
 *
 * Usage: npm run seed --workspace apps/api [-- <path to .jsonl>]
 */
async function main() {
    const env = loadEnv();
    const models = resolveModels(env);
    const { embedder } = createAiProvider(env, models);

    const seedPath = process.argv[2] ?? env.SEED_PATH;
    const corpus = await loadSeedCorpus(seedPath);
    console.log(`📚 Loaded ${corpus.length} references from ${seedPath}`);

    const database = createDatabase(env.MONGO_URI);
    await connectToDatabase(database, console);

    try {
        const repository = new ReferenceRepository(database.db.collection(env.REFERENCE_COLLECTION), embedder, console);
        const report = await repository.seed(corpus);
        console.log(`✅ Seeded with ${embedder.model}: ${report.inserted} inserted, ${report.refreshed} re-embedded, ${report.skipped} already present`);
    } finally {
        await disconnectFromDatabase(database, console);
    }
}

main().catch((error: unknown) => {
    console.error('❌ Seeding failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
