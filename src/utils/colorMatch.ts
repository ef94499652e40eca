import type { ColorSpec, PixelGrid, Rgb } from '../types';

const channelsOf = (grid: PixelGrid) => grid.channels ?? 4;

export const assertPixelGrid = (grid: PixelGrid): void => {
    if (!Number.isInteger(grid.width) || !Number.isInteger(grid.height) || grid.width < 0 || grid.height < 0) {
        throw new RangeError(`Invalid image size ${grid.width}x${grid.height}`);
    }
    const expected = grid.width * grid.height * channelsOf(grid);
    if (grid.data.length !== expected) {
        throw new RangeError(`Pixel buffer holds ${grid.data.length} bytes, expected ${expected}`);
    }
};

export const assertTolerance = (tolerance: number): void => {
    if (!Number.isFinite(tolerance) || tolerance < 0) {
        throw new RangeError('Tolerance must be a non-negative number');
    }
};

export const readPixel = (grid: PixelGrid, col: number, row: number): Rgb | null => {
    if (col < 0 || col >= grid.width || row < 0 || row >= grid.height) return null;
    const idx = (row * grid.width + col) * channelsOf(grid);
    return { r: grid.data[idx], g: grid.data[idx + 1], b: grid.data[idx + 2] };
};

// Largest per-channel difference
export const colorDistance = (a: Rgb, b: Rgb): number =>
    Math.max(Math.abs(a.r - b.r), Math.abs(a.g - b.g), Math.abs(a.b - b.b));

export const isColorMatch = (pixel: Rgb, spec: ColorSpec): boolean =>
    colorDistance(pixel, spec.target) <= spec.tolerance;

export const parseHexColor = (hex: string): Rgb => {
    const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim());
    if (!match) throw new RangeError(`Not a #rrggbb color: '${hex}'`);
    return {
        r: parseInt(match[1], 16),
        g: parseInt(match[2], 16),
        b: parseInt(match[3], 16),
    };
};

export const rgbToHex = ({ r, g, b }: Rgb): string =>
    `#${[r, g, b].map(c => c.toString(16).padStart(2, '0')).join('')}`;
