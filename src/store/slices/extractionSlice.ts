import type { StoreSlice, ExtractionSlice } from '../types';
import type { CalibrationRequest } from '../../types';
import { digitizeChart } from '../../digitizer';
import { DigitizerError } from '../../errors';
import { generateTableData } from '../../utils/export';
import { createLogger } from '../../utils/logger';

const logger = createLogger('store:extraction');

export const createExtractionSlice: StoreSlice<ExtractionSlice> = (set, get) => ({
    lastResult: null,
    lastError: null,

    runExtraction: (grid) => {
        const state = get();
        try {
            if (!state.color) {
                throw new DigitizerError('Pick a target color first');
            }
            if (state.boundClicks.length === 1) {
                throw new DigitizerError('Click a second bound, or undo the first to scan the full height');
            }

            const { yAxis, xAxis } = state;
            const calibration: CalibrationRequest | null = yAxis.confirmed && xAxis.confirmed
                ? { y: yAxis.confirmed, yScale: state.yScale, x: xAxis.confirmed }
                : null;

            const result = digitizeChart(grid, {
                color: { target: state.color, tolerance: state.tolerance },
                bounds: state.bounds,
                smoothing: state.smoothing,
                calibration,
            });
            set({ lastResult: result, lastError: null });
            return result;
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            logger.warn('Extraction failed', { error: message });
            set({ lastResult: null, lastError: message });
            throw e;
        }
    },

    exportCsv: (delimiter) => {
        const series = get().lastResult?.series;
        return series ? generateTableData(series, delimiter) : null;
    },
});
