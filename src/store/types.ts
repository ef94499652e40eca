import type { StateCreator } from 'zustand/vanilla';
import type {
    Bounds,
    CalendarDate,
    CalibrationPair,
    DigitizeResult,
    PixelGrid,
    Rgb,
    YScale,
} from '../types';

export type { Bounds, CalendarDate, CalibrationPair, DigitizeResult, PixelGrid, Rgb, YScale };

export type AxisId = 'X' | 'Y';

export type AnchorSlot = 0 | 1;

// PICKING_1 / PICKING_2 name the slot the next click writes
export type CalibrationPhase = 'PICKING_1' | 'PICKING_2' | 'CONFIRMED';

export type AxisSnapshot<T> = {
    phase: CalibrationPhase;
    clicks: [number | null, number | null];
    clickCounter: number;
    confirmed: CalibrationPair<T> | null;
};

export type AxisSession<T> = AxisSnapshot<T> & {
    values: [T | null, T | null];
    undoStack: AxisSnapshot<T>[];
};

export type SelectionSnapshot = {
    color: Rgb | null;
    boundClicks: number[];
    bounds: Bounds | null;
};

export interface SelectionSlice extends SelectionSnapshot {
    tolerance: number;
    smoothing: boolean;
    yScale: YScale;
    selectionHistory: SelectionSnapshot[];
    pickColor: (grid: PixelGrid, col: number, row: number) => boolean;
    setTolerance: (tolerance: number) => void;
    addBoundClick: (row: number) => void;
    clearBounds: () => void;
    undoSelection: () => void;
    setSmoothing: (enabled: boolean) => void;
    setYScale: (scale: YScale) => void;
}

export interface CalibrationSlice {
    yAxis: AxisSession<number>;
    xAxis: AxisSession<CalendarDate>;
    clickAnchor: (axis: AxisId, px: number) => void;
    setYValue: (slot: AnchorSlot, val: number) => void;
    setXDate: (slot: AnchorSlot, date: CalendarDate) => void;
    undoAnchor: (axis: AxisId) => void;
    confirmAxis: (axis: AxisId) => void;
    resetAxis: (axis: AxisId) => void;
}

export interface ExtractionSlice {
    lastResult: DigitizeResult | null;
    lastError: string | null;
    runExtraction: (grid: PixelGrid) => DigitizeResult;
    exportCsv: (delimiter?: string) => string | null;
}

export type StoreState = SelectionSlice & CalibrationSlice & ExtractionSlice;

export type StoreSlice<T> = StateCreator<StoreState, [], [], T>;
