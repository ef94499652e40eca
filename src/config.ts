/**
 * Default extraction settings
 * @module config
 */

import type { SmoothingOptions } from './types';

export const DEFAULT_TOLERANCE = 15;

export const DEFAULT_MOVING_AVERAGE: SmoothingOptions = {
  kind: 'moving-average',
  window: 5,
};

export const DEFAULT_SAVITZKY_GOLAY: SmoothingOptions = {
  kind: 'savitzky-golay',
  window: 11,
  polyOrder: 2,
};

// Used when a caller passes `smoothing: true`
export const DEFAULT_SMOOTHING = DEFAULT_MOVING_AVERAGE;

// Decimal places kept in calibrated values
export const DEFAULT_VALUE_PRECISION = 4;

export const DATE_FORMATS = ['YYYY-MM-DD', 'YYYY-MM', 'YYYY/MM/DD', 'YYYY/MM'] as const;

export const CSV_HEADER = ['date', 'value'] as const;
