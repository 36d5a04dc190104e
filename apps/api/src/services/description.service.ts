import type { Logger } from '../config/logger';
import { buildGenerationParams, type GenerationOptions } from '../domain/ai/generation-params';
import type { EncodedImage, TextGenerator } from '../domain/ai/interfaces';
import { type InstrumentDescription, InstrumentDescriptionSchema } from '../domain/ai/schemas';
import { badInput, parseError } from '../domain/errors';
import { extractJsonObject } from '../domain/json-extractor';
import { DESCRIPTION_PROMPT } from '../infra/ai/prompts/description-v1';
import { narrateGeneration, PhaseNarrator } from './pipeline-events';

export interface ImageUpload {
    bytes: Buffer;
    mimeType: string;
}

export interface StageModelSettings {
    model: string;
    generation: GenerationOptions;
}

export interface StageRunOptions {
    narrator?: PhaseNarrator;
    requestId?: string;
}

export function validateUpload(upload: ImageUpload): void {
    if (!upload.mimeType.toLowerCase().startsWith('image/')) {
        throw badInput('Unsupported file type');
    }
    if (upload.bytes.length === 0) {
        throw badInput('Empty image upload');
    }
}

export function encodeImage(bytes: Buffer, mimeType: string): EncodedImage {
    const base64 = bytes.toString('base64');
    return { mimeType, base64, dataUrl: `data:${mimeType};base64,${base64}` };
}

export function parseDescription(outputText: string): InstrumentDescription {
    const validated = InstrumentDescriptionSchema.safeParse(extractJsonObject(outputText));
    if (!validated.success) {
        const fields = validated.error.issues.map((issue) => issue.path.join('.')).join(', ');
        throw parseError(`Description output failed validation (${fields})`, validated.error.format());
    }
    return validated.data;
}

/**
 * Stage 1: photo → structured instrument description via one vision call.
 */
export class DescriptionService {
    constructor(
        private readonly generator: TextGenerator,
        private readonly settings: StageModelSettings,
        private readonly logger?: Logger
    ) { }

    async describe(upload: ImageUpload, options: StageRunOptions = {}): Promise<InstrumentDescription> {
        const narrator = options.narrator ?? new PhaseNarrator('vision');
        const { model } = this.settings;

        narrator.log('vision.upload_received', { bytes: upload.bytes.length, mimeType: upload.mimeType });
        await narrator.step(() => validateUpload(upload));

        const image = await narrator.step(() => encodeImage(upload.bytes, upload.mimeType));
        narrator.log('vision.image_encoded');

        narrator.log('vision.request_sent', { model });
        const response = await narrator.step(() => this.generator.generate({
            model,
            params: buildGenerationParams(model, this.settings.generation),
            instruction: DESCRIPTION_PROMPT,
            image,
            requestId: options.requestId,
        }));
        narrateGeneration(narrator, response);
        this.logger?.debug(
            { requestId: options.requestId, model, provider: this.generator.provider, usage: response.usage },
            '[DescriptionService] Vision call completed'
        );

        const description = await narrator.step(() => parseDescription(response.outputText));
        narrator.log('vision.response_parsed');
        return description;
    }
}
