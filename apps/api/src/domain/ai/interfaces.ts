import type { GenerationParams } from './generation-params';
import type { GenerationUsage } from './schemas';

export interface EncodedImage {
    mimeType: string;
    base64: string;
    dataUrl: string;
}

export interface GenerationRequest {
    model: string;
    params: GenerationParams;
    instruction: string;
    /** Target/context block sent after the instruction. */
    content?: string;
    image?: EncodedImage;
    requestId?: string;
}

/**
 * Provider response reduced to what the pipeline reads, extracted once at
 * the adapter boundary.
 */
export interface GenerationResponse {
    outputText: string;
    usage?: GenerationUsage;
    reasoningSummary: string[];
}

export interface TextGenerator {
    readonly provider: string;
    generate(request: GenerationRequest): Promise<GenerationResponse>;
}

export interface Embedder {
    readonly model: string;
    embed(texts: string[]): Promise<number[][]>;
}
