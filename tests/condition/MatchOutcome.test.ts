import { describe, it, expect } from 'vitest';
import {
    EMPTY_METADATA, UNDETERMINED, UNMATCHED, conjoin, matched, negate,
} from '../../src/condition/MatchOutcome.js';

describe('MatchOutcome', () => {
    describe('conjoin()', () => {
        it('should let unmatched dominate', () => {
            expect(conjoin(UNMATCHED, UNDETERMINED)).toBe(UNMATCHED);
            expect(conjoin(UNDETERMINED, UNMATCHED)).toBe(UNMATCHED);
            expect(conjoin(matched({ id: 1 }), UNMATCHED)).toBe(UNMATCHED);
        });

        it('should stay undetermined unless something rejects', () => {
            expect(conjoin(matched({ id: 1 }), UNDETERMINED)).toBe(UNDETERMINED);
            expect(conjoin(UNDETERMINED, UNDETERMINED)).toBe(UNDETERMINED);
        });

        it('should merge metadata of two matches', () => {
            expect(conjoin(matched({ a: 1 }), matched({ b: 'x' }))).toEqual(matched({ a: 1, b: 'x' }));
        });

        it('should return the side with metadata when the other has none', () => {
            const left = matched({ a: 1 });
            expect(conjoin(left, matched())).toBe(left);
            expect(conjoin(matched(EMPTY_METADATA), left)).toBe(left);
        });
    });

    describe('negate()', () => {
        it('should swap matched and unmatched', () => {
            expect(negate(matched({ a: 1 }))).toBe(UNMATCHED);
            expect(negate(UNMATCHED)).toEqual({ status: 'matched', metadata: {} });
        });

        it('should keep undetermined', () => {
            expect(negate(UNDETERMINED)).toBe(UNDETERMINED);
        });
    });
});
