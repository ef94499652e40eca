import type { RawPath } from '../types';
import { EmptyMatchError } from '../errors';

/**
 * Fills hole columns: interior runs are interpolated linearly between the
 * resolved rows on either side, leading and trailing runs hold the nearest
 * resolved row.
 */
export const fillGaps = (raw: RawPath): number[] => {
    const anchors: { col: number; row: number }[] = [];
    raw.forEach((row, col) => {
        if (row !== null) anchors.push({ col, row });
    });

    if (anchors.length === 0) {
        throw new EmptyMatchError({ columns: raw.length });
    }

    const out = new Array<number>(raw.length);
    const first = anchors[0];
    const last = anchors[anchors.length - 1];

    for (let i = 0; i <= first.col; i++) out[i] = first.row;
    for (let i = last.col; i < raw.length; i++) out[i] = last.row;

    for (let k = 0; k < anchors.length - 1; k++) {
        const a = anchors[k];
        const b = anchors[k + 1];
        out[a.col] = a.row;
        for (let i = a.col + 1; i < b.col; i++) {
            out[i] = a.row + ((b.row - a.row) * (i - a.col)) / (b.col - a.col);
        }
    }

    return out;
};
