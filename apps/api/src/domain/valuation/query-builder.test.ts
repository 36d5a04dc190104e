import { describe, it, expect } from 'vitest';
import { buildQueryText } from './query-builder';
import { InstrumentDescriptionSchema } from '../ai/schemas';

describe('buildQueryText', () => {
    it('should emit one labeled line per non-empty field in fixed order', () => {
        const description = InstrumentDescriptionSchema.parse({
            category: 'electric guitar',
            brand: 'Fender',
            model: 'Stratocaster',
            year: 1996,
            condition: 'good',
            materials: ['alder', 'maple'],
            features: [],
            notes: '',
        });

        expect(buildQueryText(description)).toBe([
            'category: electric guitar',
            'brand: Fender',
            'model: Stratocaster',
            'year: 1996',
            'condition: good',
            'materials: alder, maple',
        ].join('\n'));
    });

    it('should skip whitespace-only values', () => {
        const description = InstrumentDescriptionSchema.parse({ brand: '   ', model: 'FG830', notes: 'small ding on the back' });
        expect(buildQueryText(description)).toBe('model: FG830\nnotes: small ding on the back');
    });

    it('should return an empty string for an empty description', () => {
        expect(buildQueryText(InstrumentDescriptionSchema.parse({}))).toBe('');
    });
});
