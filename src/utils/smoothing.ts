import type { SmoothingOptions } from '../types';
import { DEFAULT_SMOOTHING } from '../config';
import { solveLinearSystem } from './matrix';

const assertWindow = (window: number) => {
    if (!Number.isInteger(window) || window < 1 || window % 2 === 0) {
        throw new RangeError(`Smoothing window must be a positive odd integer, got ${window}`);
    }
};

// Half-width of the centered window that fits at index i
const halfWidthAt = (i: number, n: number, half: number) => Math.min(half, i, n - 1 - i);

export const movingAverage = (values: readonly number[], window: number): number[] => {
    assertWindow(window);
    const half = window >> 1;
    const n = values.length;

    return values.map((_, i) => {
        const h = halfWidthAt(i, n, half);
        let sum = 0;
        for (let k = i - h; k <= i + h; k++) sum += values[k];
        return sum / (2 * h + 1);
    });
};

/**
 * Convolution weights of a centered least-squares polynomial fit over
 * offsets -half..half, evaluated at offset 0.
 */
export const savitzkyGolayWeights = (half: number, polyOrder: number): number[] | null => {
    const terms = polyOrder + 1;
    const normal: number[][] = [];
    for (let r = 0; r < terms; r++) {
        const row: number[] = [];
        for (let c = 0; c < terms; c++) {
            let s = 0;
            for (let k = -half; k <= half; k++) s += Math.pow(k, r + c);
            row.push(s);
        }
        normal.push(row);
    }

    const unit = new Array<number>(terms).fill(0);
    unit[0] = 1;
    const w = solveLinearSystem(normal, unit);
    if (!w) return null;

    const weights: number[] = [];
    for (let k = -half; k <= half; k++) {
        weights.push(w.reduce((acc, wj, j) => acc + wj * Math.pow(k, j), 0));
    }
    return weights;
};

export const savitzkyGolay = (values: readonly number[], window: number, polyOrder: number = 2): number[] => {
    assertWindow(window);
    if (!Number.isInteger(polyOrder) || polyOrder < 0) {
        throw new RangeError(`Polynomial order must be a non-negative integer, got ${polyOrder}`);
    }
    const half = window >> 1;
    const n = values.length;
    const cache = new Map<number, number[] | null>();

    return values.map((v, i) => {
        const h = halfWidthAt(i, n, half);
        // Too few samples to constrain the fit
        if (2 * h + 1 < polyOrder + 2) return v;

        let weights = cache.get(h);
        if (weights === undefined) {
            weights = savitzkyGolayWeights(h, polyOrder);
            cache.set(h, weights);
        }
        if (!weights) return v;

        let sum = 0;
        for (let k = -h; k <= h; k++) sum += weights[k + h] * values[i + k];
        return sum;
    });
};

export const resolveSmoothing = (smoothing: boolean | SmoothingOptions | undefined): SmoothingOptions | null => {
    if (smoothing === undefined || smoothing === false) return null;
    return smoothing === true ? DEFAULT_SMOOTHING : smoothing;
};

/**
 * Low-pass filters a filled pixel path. The window shrinks symmetrically near
 * the ends, so output length always equals input length and the end samples
 * pass through.
 */
export const smoothPath = (rows: readonly number[], options: SmoothingOptions | null): number[] => {
    if (!options) return [...rows];
    if (options.kind === 'savitzky-golay') {
        return savitzkyGolay(rows, options.window, options.polyOrder ?? 2);
    }
    return movingAverage(rows, options.window);
};
