import { describe, it, expect } from 'vitest';
import { movingAverage, resolveSmoothing, savitzkyGolay, savitzkyGolayWeights, smoothPath } from '../smoothing';
import { DEFAULT_MOVING_AVERAGE, DEFAULT_SAVITZKY_GOLAY } from '../../config';

describe('movingAverage', () => {
    it('spreads a single spike over the window', () => {
        expect(movingAverage([0, 0, 0, 10, 0, 0, 0], 5)).toEqual([0, 0, 2, 2, 2, 0, 0]);
    });

    it('keeps the input length for every window width', () => {
        const input = [5, 1, 4, 1, 5, 9, 2, 6];
        for (const window of [1, 3, 5, 7, 9, 15]) {
            expect(movingAverage(input, window)).toHaveLength(input.length);
        }
        expect(movingAverage([42], 5)).toEqual([42]);
    });

    it('leaves a straight line in place, edges included', () => {
        const line = [1, 3, 5, 7, 9, 11];
        movingAverage(line, 5).forEach((v, i) => expect(v).toBeCloseTo(line[i]));
    });

    it('rejects even or non-positive windows', () => {
        expect(() => movingAverage([1, 2, 3], 4)).toThrow(RangeError);
        expect(() => movingAverage([1, 2, 3], 0)).toThrow(RangeError);
    });
});

describe('savitzkyGolay', () => {
    it('derives the textbook 5-point quadratic weights', () => {
        const weights = savitzkyGolayWeights(2, 2);
        expect(weights).not.toBeNull();
        [-3, 12, 17, 12, -3].forEach((w, i) => expect(weights![i]).toBeCloseTo(w / 35));
    });

    it('reproduces a quadratic exactly where the window fits', () => {
        const quad = Array.from({ length: 15 }, (_, k) => k * k - 3 * k);
        const out = savitzkyGolay(quad, 11, 2);
        expect(out).toHaveLength(quad.length);
        out.forEach((v, i) => expect(v).toBeCloseTo(quad[i], 6));
    });

    it('damps an isolated spike', () => {
        const input = [0, 0, 0, 0, 0, 0, 35, 0, 0, 0, 0, 0, 0];
        const out = savitzkyGolay(input, 5, 2);
        expect(out[6]).toBeCloseTo(17);
        expect(out[0]).toBe(0);
    });
});

describe('smoothPath', () => {
    it('returns an unchanged copy when disabled', () => {
        const rows = [3, 1, 2];
        const out = smoothPath(rows, null);
        expect(out).toEqual(rows);
        expect(out).not.toBe(rows);
    });

    it('resolves the caller flag to default options', () => {
        expect(resolveSmoothing(undefined)).toBeNull();
        expect(resolveSmoothing(false)).toBeNull();
        expect(resolveSmoothing(true)).toEqual(DEFAULT_MOVING_AVERAGE);
        expect(resolveSmoothing(DEFAULT_SAVITZKY_GOLAY)).toBe(DEFAULT_SAVITZKY_GOLAY);
    });

    it('dispatches on the filter kind', () => {
        const rows = [0, 0, 0, 10, 0, 0, 0];
        expect(smoothPath(rows, DEFAULT_MOVING_AVERAGE)).toEqual([0, 0, 2, 2, 2, 0, 0]);
        expect(smoothPath(rows, { kind: 'savitzky-golay', window: 5 })).toHaveLength(7);
    });
});
