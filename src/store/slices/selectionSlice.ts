import type { StoreSlice, SelectionSlice, SelectionSnapshot, StoreState } from '../types';
import { DEFAULT_TOLERANCE } from '../../config';
import { assertTolerance, readPixel, rgbToHex } from '../../utils/colorMatch';
import { createBounds } from '../../utils/regionScan';
import { buildYAxisMap } from '../../utils/math';
import { createLogger } from '../../utils/logger';

const logger = createLogger('store:selection');

const snapshot = (state: StoreState): SelectionSnapshot => ({
    color: state.color,
    boundClicks: state.boundClicks,
    bounds: state.bounds,
});

const pushHistory = (state: StoreState) => [...state.selectionHistory, snapshot(state)];

export const createSelectionSlice: StoreSlice<SelectionSlice> = (set, get) => ({
    color: null,
    boundClicks: [],
    bounds: null,
    tolerance: DEFAULT_TOLERANCE,
    smoothing: false,
    yScale: 'linear',
    selectionHistory: [],

    pickColor: (grid, col, row) => {
        const pixel = readPixel(grid, Math.round(col), Math.round(row));
        if (!pixel) return false;
        set(state => ({ color: pixel, selectionHistory: pushHistory(state) }));
        logger.debug('Picked color', { hex: rgbToHex(pixel), col, row });
        return true;
    },

    setTolerance: (tolerance) => {
        assertTolerance(tolerance);
        set({ tolerance });
    },

    addBoundClick: (row) => {
        const { boundClicks } = get();
        if (boundClicks.length >= 2) {
            logger.debug('Both bounds already set; clear or undo first');
            return;
        }
        // Throws BoundsError before anything is recorded
        const bounds = boundClicks.length === 1 ? createBounds(boundClicks[0], row, true) : null;
        set(state => ({
            boundClicks: [...state.boundClicks, row],
            bounds,
            selectionHistory: pushHistory(state),
        }));
    },

    clearBounds: () => set(state => ({
        boundClicks: [],
        bounds: null,
        selectionHistory: pushHistory(state),
    })),

    undoSelection: () => set(state => {
        if (state.selectionHistory.length === 0) return {};
        const previous = state.selectionHistory[state.selectionHistory.length - 1];
        return { ...previous, selectionHistory: state.selectionHistory.slice(0, -1) };
    }),

    setSmoothing: (enabled) => set({ smoothing: enabled }),

    // A confirmed Y pair must still map under the new scale; on failure the old scale stays
    setYScale: (scale) => {
        const { yAxis } = get();
        if (yAxis.confirmed) buildYAxisMap(yAxis.confirmed, scale);
        set({ yScale: scale });
    },
});
