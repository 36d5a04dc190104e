import type OpenAI from 'openai';
import type { GenerationParams } from '../../../domain/ai/generation-params';
import type {
    GenerationRequest,
    GenerationResponse,
    TextGenerator,
} from '../../../domain/ai/interfaces';
import { wrapProviderError } from '../upstream-error';

type ResponseCreateBody = OpenAI.Responses.ResponseCreateParamsNonStreaming;

/** The slice of the SDK client this adapter calls. */
export interface OpenAiResponsesApi {
    responses: {
        create(body: ResponseCreateBody): Promise<OpenAI.Responses.Response>;
    };
}

function toTextConfig(text: NonNullable<GenerationParams['text']>): OpenAI.Responses.ResponseTextConfig {
    return {
        ...(text.verbosity ? { verbosity: text.verbosity } : {}),
        ...(text.format === 'json_object' ? { format: { type: 'json_object' as const } } : {}),
    };
}

export function buildResponsesBody(request: GenerationRequest): ResponseCreateBody {
    const content: OpenAI.Responses.ResponseInputMessageContentList = [
        { type: 'input_text', text: request.instruction },
    ];
    if (request.content) {
        content.push({ type: 'input_text', text: request.content });
    }
    if (request.image) {
        content.push({ type: 'input_image', image_url: request.image.dataUrl, detail: 'auto' });
    }

    const { params } = request;
    return {
        model: request.model,
        input: [{ role: 'user', content }],
        ...(params.maxOutputTokens !== undefined ? { max_output_tokens: params.maxOutputTokens } : {}),
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
        ...(params.reasoning ? { reasoning: { ...params.reasoning } } : {}),
        ...(params.text ? { text: toTextConfig(params.text) } : {}),
    };
}

export function splitSummaryLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

export function adaptResponse(response: OpenAI.Responses.Response): GenerationResponse {
    const reasoningSummary = response.output.flatMap((item) =>
        item.type === 'reasoning'
            ? item.summary.flatMap((part) => splitSummaryLines(part.text))
            : []
    );

    return {
        outputText: response.output_text,
        usage: response.usage
            ? {
                input_tokens: response.usage.input_tokens,
                output_tokens: response.usage.output_tokens,
                total_tokens: response.usage.total_tokens,
            }
            : undefined,
        reasoningSummary,
    };
}

export class OpenAiTextGenerator implements TextGenerator {
    readonly provider = 'openai';

    constructor(private readonly client: OpenAiResponsesApi) { }

    async generate(request: GenerationRequest): Promise<GenerationResponse> {
        let response: OpenAI.Responses.Response;
        try {
            response = await this.client.responses.create(buildResponsesBody(request));
        } catch (error) {
            throw wrapProviderError('OpenAI', 'responses.create', error);
        }
        return adaptResponse(response);
    }
}
