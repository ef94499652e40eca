import { describe, it, expect } from 'vitest';
import { buildMedianPath, countHoles, median } from '../medianPath';

describe('median', () => {
    it('does not depend on input order', () => {
        expect(median([9, 2, 5])).toBe(5);
        expect(median([5, 9, 2])).toBe(5);
        expect(median([2, 5, 9])).toBe(5);
    });

    it('averages the two middle values of an even set', () => {
        expect(median([1, 10, 4, 6])).toBe(5);
        expect(median([3, 4])).toBe(3.5);
    });

    it('ignores a stray outlier that would drag the mean', () => {
        expect(median([40, 41, 42, 0])).toBe(40.5);
        expect(median([40, 41, 42, 43, 0])).toBe(41);
    });

    it('does not reorder its argument', () => {
        const values = [3, 1, 2];
        median(values);
        expect(values).toEqual([3, 1, 2]);
    });
});

describe('buildMedianPath', () => {
    it('resolves each column to a whole row and marks empty columns as holes', () => {
        expect(buildMedianPath([[2, 5, 9], [], [6, 8], [3, 4]])).toEqual([5, null, 7, 4]);
    });

    it('counts holes', () => {
        expect(countHoles([1, null, null, 4])).toBe(2);
    });
});
