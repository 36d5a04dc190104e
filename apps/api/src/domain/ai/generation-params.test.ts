import { describe, it, expect } from 'vitest';
import {
    buildGenerationParams,
    type GenerationOptions,
    stripInlineComment,
    supportsReasoning,
} from './generation-params';
import { PipelineError, PipelineErrorCode } from '../errors';

const base: GenerationOptions = { forceJsonMode: false };

describe('supportsReasoning', () => {
    it.each([
        ['gpt-5-mini', true],
        ['GPT-5', true],
        ['o3-mini', true],
        ['o4-mini', true],
        ['gpt-4o-mini', false],
        ['gemini-2.5-flash', false],
    ])('%s -> %s', (model, expected) => {
        expect(supportsReasoning(model)).toBe(expected);
    });
});

describe('stripInlineComment', () => {
    it('should drop everything after #', () => {
        expect(stripInlineComment('low   # fast and cheap')).toBe('low');
        expect(stripInlineComment('  medium ')).toBe('medium');
        expect(stripInlineComment('# only a comment')).toBe('');
    });
});

describe('buildGenerationParams', () => {
    it('should return an empty set when nothing is configured', () => {
        expect(buildGenerationParams('gpt-4o-mini', base)).toEqual({});
    });

    it('should keep temperature for non-reasoning models', () => {
        expect(buildGenerationParams('gpt-4o-mini', { ...base, temperature: 0.2, maxOutputTokens: 800 })).toEqual({
            maxOutputTokens: 800,
            temperature: 0.2,
        });
    });

    it('should drop temperature and add reasoning for reasoning models', () => {
        const params = buildGenerationParams('gpt-5-mini', {
            ...base,
            temperature: 0.2,
            reasoningEffort: 'Low # keep it quick',
            reasoningSummary: 'auto',
        });

        expect(params).toEqual({ reasoning: { effort: 'low', summary: 'auto' } });
    });

    it('should omit reasoning for models that have none, even when configured', () => {
        const params = buildGenerationParams('gpt-4o-mini', { ...base, reasoningEffort: 'high', reasoningSummary: 'auto' });
        expect(params.reasoning).toBeUndefined();
    });

    it('should treat a comment-only value as unset', () => {
        const params = buildGenerationParams('o3-mini', { ...base, reasoningEffort: '# default', reasoningSummary: '' });
        expect(params.reasoning).toBeUndefined();
    });

    it('should request JSON output and verbosity in the text block', () => {
        expect(buildGenerationParams('gpt-4o-mini', { ...base, forceJsonMode: true, textVerbosity: 'HIGH' })).toEqual({
            text: { verbosity: 'high', format: 'json_object' },
        });
    });

    it('should name the setting and list allowed values when a value is unknown', () => {
        let caught: unknown;
        try {
            buildGenerationParams('gpt-5', { ...base, reasoningEffort: 'extreme' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(PipelineError);
        expect((caught as PipelineError).code).toBe(PipelineErrorCode.CONFIG_ERROR);
        expect((caught as PipelineError).message).toBe(
            'AI_REASONING_EFFORT must be one of high, low, medium, minimal, none, xhigh'
        );
    });

    it('should validate verbosity for every model', () => {
        expect(() => buildGenerationParams('gemini-2.5-flash', { ...base, textVerbosity: 'loud' }))
            .toThrow('AI_TEXT_VERBOSITY must be one of high, low, medium');
    });
});
