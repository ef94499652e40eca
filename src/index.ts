export * from './types';
export * from './errors';
export * from './config';
export { extractPixelPath, buildCalibration, calibratePath, digitizeChart } from './digitizer';
export { isColorMatch, colorDistance, parseHexColor, rgbToHex, readPixel } from './utils/colorMatch';
export { scanRegion, createBounds, countMatches } from './utils/regionScan';
export { median, buildMedianPath } from './utils/medianPath';
export { fillGaps } from './utils/gapFill';
export { smoothPath, movingAverage, savitzkyGolay } from './utils/smoothing';
export {
  calculateCalibration,
  buildXAxisMap,
  buildYAxisMap,
  pixelToValue,
  valueToPixel,
  pixelToDate,
  pixelToData,
  dataToPixel,
} from './utils/math';
export { parseDate, toDayOrdinal, fromDayOrdinal, formatDate } from './utils/dates';
export { generateTableData } from './utils/export';
export { createLogger, setLogLevel, configureLogger, LogLevel } from './utils/logger';
export type { Logger, LogEntry, LogLevelName } from './utils/logger';
export { createDigitizerStore } from './store';
export type { DigitizerStore, StoreState, AxisId, AnchorSlot, CalibrationPhase, AxisSession } from './store';
