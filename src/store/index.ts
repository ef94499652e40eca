import { createStore } from 'zustand/vanilla';
import type { StoreState } from './types';
import { createSelectionSlice } from './slices/selectionSlice';
import { createCalibrationSlice } from './slices/calibrationSlice';
import { createExtractionSlice } from './slices/extractionSlice';

// One store per image being digitized
export const createDigitizerStore = () => createStore<StoreState>()((...a) => ({
    ...createSelectionSlice(...a),
    ...createCalibrationSlice(...a),
    ...createExtractionSlice(...a),
}));

export type DigitizerStore = ReturnType<typeof createDigitizerStore>;

export * from './types';
