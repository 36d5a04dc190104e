import fs from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';
import { generationOptionsFromEnv, loadEnv, resolveModels } from '../apps/api/src/config/env';
import { createAiProvider } from '../apps/api/src/infra/ai/provider';
import { DescriptionService } from '../apps/api/src/services/description.service';
import { PhaseNarrator } from '../apps/api/src/services/pipeline-events';

dotenv.config({ path: path.join(__dirname, '../.env') });

const MIME_BY_EXTENSION: Record<string, string> = {
    '.png': 'image/png',
    '.webp': 'image/webp',
    '.gif': 'image/gif',
};

async function main() {
    const imagePath = process.argv[2];

    if (!imagePath) {
        console.error('Please provide an image path: tsx scripts/describe-image.ts <path>');
        process.exit(1);
    }

    const env = loadEnv();
    const models = resolveModels(env);
    const { generator } = createAiProvider(env, models);
    const service = new DescriptionService(generator, { model: models.vision, generation: generationOptionsFromEnv(env) }, console);

    const bytes = fs.readFileSync(imagePath);
    const mimeType = MIME_BY_EXTENSION[path.extname(imagePath).toLowerCase()] ?? 'image/jpeg';

    // Print the narration as it happens
    const narrator = new PhaseNarrator('vision', {
        emit: (event) => console.log(`[${event.event}]`, JSON.stringify(event.data)),
    });

    console.log(`🔍 Describing ${imagePath} with ${env.AI_PROVIDER}/${models.vision}...`);

    const start = Date.now();
    const description = await service.describe({ bytes, mimeType }, { narrator, requestId: 'cli-describe' });

    console.log('✅ Description:');
    console.log(JSON.stringify(description, null, 2));
    console.log(`\n⏱️ Duration: ${Date.now() - start}ms`);
}

main().catch((error: unknown) => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
});
