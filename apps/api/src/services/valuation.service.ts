import type { Logger } from '../config/logger';
import { buildGenerationParams } from '../domain/ai/generation-params';
import type { TextGenerator } from '../domain/ai/interfaces';
import {
    type InstrumentDescription,
    rangeBracketsPrice,
    type ValuationResult,
    ValuationResultSchema,
} from '../domain/ai/schemas';
import { badInput, parseError } from '../domain/errors';
import { extractJsonObject } from '../domain/json-extractor';
import type { ReferenceSearch } from '../domain/reference';
import { buildContext } from '../domain/valuation/context-builder';
import { buildQueryText } from '../domain/valuation/query-builder';
import { buildValuationInput, VALUATION_PROMPT } from '../infra/ai/prompts/valuation-v1';
import type { StageModelSettings, StageRunOptions } from './description.service';
import { narrateGeneration, PhaseNarrator } from './pipeline-events';

export interface ValuationSettings extends StageModelSettings {
    topK: number;
    snippetChars: number;
}

export function parseValuation(outputText: string): ValuationResult {
    const validated = ValuationResultSchema.safeParse(extractJsonObject(outputText));
    if (!validated.success) {
        const fields = validated.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
        throw parseError(`Valuation output failed validation (${fields})`, validated.error.format());
    }
    return validated.data;
}

/**
 * Stage 2: description → similar references → price estimate via one text call.
 */
export class ValuationService {
    constructor(
        private readonly generator: TextGenerator,
        private readonly references: ReferenceSearch,
        private readonly settings: ValuationSettings,
        private readonly logger?: Logger
    ) { }

    async estimate(description: InstrumentDescription, options: StageRunOptions = {}): Promise<ValuationResult> {
        const narrator = options.narrator ?? new PhaseNarrator('rag');
        const { model, topK, snippetChars } = this.settings;

        narrator.log('rag.query_build');
        const queryText = await narrator.step(() => {
            const text = buildQueryText(description);
            if (!text) throw badInput('Description is empty');
            return text;
        });

        narrator.log('rag.retrieve_start');
        const references = await narrator.step(() => this.references.query(queryText, topK));
        narrator.log('rag.retrieve_done', { count: references.length });

        narrator.log('rag.context_build');
        const context = await narrator.step(() => buildContext(references, snippetChars));

        narrator.log('rag.request_sent', { model });
        const result = await narrator.step(async () => {
            const response = await this.generator.generate({
                model,
                params: buildGenerationParams(model, this.settings.generation),
                instruction: VALUATION_PROMPT,
                content: buildValuationInput(queryText, context),
                requestId: options.requestId,
            });
            narrateGeneration(narrator, response);
            return parseValuation(response.outputText);
        });

        // Bracketing is asked of the model, not enforced.
        if (!rangeBracketsPrice(result)) {
            narrator.log('rag.range_unbracketed', { price_jpy: result.price_jpy, range_jpy: result.range_jpy });
            this.logger?.warn(
                { requestId: options.requestId, price_jpy: result.price_jpy, range_jpy: result.range_jpy },
                '[ValuationService] Estimated price falls outside its own range'
            );
        }

        narrator.log('rag.response_parsed');
        this.logger?.info(
            { requestId: options.requestId, references: references.length, price_jpy: result.price_jpy, confidence: result.confidence },
            '[ValuationService] Valuation completed'
        );
        return result;
    }
}
