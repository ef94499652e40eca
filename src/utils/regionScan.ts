import type { Bounds, ColorSpec, PixelGrid } from '../types';
import { BoundsError } from '../errors';
import { assertPixelGrid, assertTolerance, isColorMatch } from './colorMatch';
import { cleanMask } from './maskCleanup';

export const createBounds = (rowA: number, rowB: number, sort: boolean = false): Bounds => {
    const upperRow = sort ? Math.min(rowA, rowB) : rowA;
    const lowerRow = sort ? Math.max(rowA, rowB) : rowB;
    if (!(upperRow < lowerRow)) {
        throw new BoundsError(upperRow, lowerRow);
    }
    return { upperRow, lowerRow };
};

// Inclusive row range actually scanned, clamped to the image
export const resolveRowRange = (height: number, bounds?: Bounds | null): { top: number; bottom: number } => {
    if (!bounds) return { top: 0, bottom: height - 1 };
    if (!(bounds.upperRow < bounds.lowerRow)) {
        throw new BoundsError(bounds.upperRow, bounds.lowerRow);
    }
    return {
        top: Math.max(0, Math.ceil(bounds.upperRow)),
        bottom: Math.min(height - 1, Math.floor(bounds.lowerRow)),
    };
};

export type ScanOptions = {
    cleanMask?: boolean;
};

/**
 * Collects, for every column of the image, the rows inside the bounds whose
 * pixel matches the color spec. Rows come out ascending. With `cleanMask` the
 * in-region match mask has its enclosed holes filled and is then closed with a
 * 5x5 square before the rows are read back.
 */
export const scanRegion = (
    grid: PixelGrid,
    spec: ColorSpec,
    bounds?: Bounds | null,
    options: ScanOptions = {}
): number[][] => {
    assertPixelGrid(grid);
    assertTolerance(spec.tolerance);

    const { width, height, data } = grid;
    const channels = grid.channels ?? 4;
    const { top, bottom } = resolveRowRange(height, bounds);
    const regionHeight = Math.max(0, bottom - top + 1);

    let mask: Uint8Array = new Uint8Array(width * regionHeight);
    for (let y = 0; y < regionHeight; y++) {
        for (let x = 0; x < width; x++) {
            const idx = ((y + top) * width + x) * channels;
            if (isColorMatch({ r: data[idx], g: data[idx + 1], b: data[idx + 2] }, spec)) {
                mask[y * width + x] = 1;
            }
        }
    }
    if (options.cleanMask) {
        mask = cleanMask(mask, width, regionHeight);
    }

    const columns: number[][] = [];
    for (let x = 0; x < width; x++) {
        const rows: number[] = [];
        for (let y = 0; y < regionHeight; y++) {
            if (mask[y * width + x]) rows.push(y + top);
        }
        columns.push(rows);
    }

    return columns;
};

export const countMatches = (columns: number[][]): number =>
    columns.reduce((sum, rows) => sum + rows.length, 0);
