import type { PixelGrid, Rgb } from '../types';

export const WHITE: Rgb = { r: 255, g: 255, b: 255 };
export const RED: Rgb = { r: 220, g: 30, b: 40 };

// RGBA grid filled with `background`, then each [col, row, color] painted
export const makeGrid = (
    width: number,
    height: number,
    paint: [number, number, Rgb][] = [],
    background: Rgb = WHITE
): PixelGrid => {
    const data = new Uint8ClampedArray(width * height * 4);
    for (let i = 0; i < width * height; i++) {
        data[i * 4] = background.r;
        data[i * 4 + 1] = background.g;
        data[i * 4 + 2] = background.b;
        data[i * 4 + 3] = 255;
    }
    for (const [col, row, c] of paint) {
        const idx = (row * width + col) * 4;
        data[idx] = c.r;
        data[idx + 1] = c.g;
        data[idx + 2] = c.b;
    }
    return { width, height, data };
};

// Column c painted at row c, optionally leaving some columns empty
export const diagonalGrid = (size: number, skipColumns: number[] = []): PixelGrid =>
    makeGrid(
        size,
        size,
        Array.from({ length: size }, (_, c) => c)
            .filter(c => !skipColumns.includes(c))
            .map((c): [number, number, Rgb] => [c, c, RED])
    );
