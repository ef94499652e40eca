import type { RawPath } from '../types';

export const median = (values: readonly number[]): number => {
    if (values.length === 0) return NaN;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = sorted.length >> 1;
    return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
};

/**
 * Reduces each column's matched rows to one representative row.
 * Even-sized sets average the two middle rows and round to the nearest row
 * (x.5 goes to the lower one on screen, i.e. the larger index).
 */
export const buildMedianPath = (columns: readonly (readonly number[])[]): RawPath =>
    columns.map(rows => (rows.length === 0 ? null : Math.round(median(rows))));

export const countHoles = (raw: RawPath): number => raw.filter(r => r === null).length;
