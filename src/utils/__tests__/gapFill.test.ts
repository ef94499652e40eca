import { describe, it, expect } from 'vitest';
import { fillGaps } from '../gapFill';
import { EmptyMatchError } from '../../errors';

describe('fillGaps', () => {
    it('interpolates interior holes linearly', () => {
        expect(fillGaps([2, null, null, 8])).toEqual([2, 4, 6, 8]);
    });

    it('holds the nearest value over leading and trailing holes', () => {
        expect(fillGaps([null, null, 3, null, 7, null])).toEqual([3, 3, 3, 5, 7, 7]);
    });

    it('leaves a fully resolved path unchanged', () => {
        expect(fillGaps([4, 1, 9])).toEqual([4, 1, 9]);
    });

    it('fills every column when only one is resolved', () => {
        expect(fillGaps([null, 6, null])).toEqual([6, 6, 6]);
    });

    it('produces a linear progression across a long run', () => {
        const filled = fillGaps([10, null, null, null, null, 0]);
        expect(filled).toEqual([10, 8, 6, 4, 2, 0]);
        expect(filled.every(v => v !== null)).toBe(true);
    });

    it('fails when nothing is resolved', () => {
        expect(() => fillGaps([null, null])).toThrow(EmptyMatchError);
        expect(() => fillGaps([])).toThrow(EmptyMatchError);
    });
});
