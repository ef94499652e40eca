/**
 * Extraction-and-calibration engine.
 *
 * image + color + bounds -> per-column matches -> median path with holes
 * -> filled path -> (smoothed path) -> calibrated (date, value) series.
 *
 * Every function here is synchronous and keeps no state between calls.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AxisCalibration,
  CalibrateOptions,
  CalibratedSeries,
  CalibrationRequest,
  DigitizeRequest,
  DigitizeResult,
  ExtractionOptions,
  PixelGrid,
  PixelPath,
} from './types';
import { DEFAULT_VALUE_PRECISION } from './config';
import { EmptyMatchError } from './errors';
import { countMatches, resolveRowRange, scanRegion } from './utils/regionScan';
import { buildMedianPath, countHoles } from './utils/medianPath';
import { fillGaps } from './utils/gapFill';
import { resolveSmoothing, smoothPath } from './utils/smoothing';
import { buildXAxisMap, buildYAxisMap, pixelToDate, pixelToValue, roundTo } from './utils/math';
import { createLogger, type Logger, type LoggerWithContext } from './utils/logger';

const logger = createLogger('digitizer');

type StageLogger = Logger | LoggerWithContext;

export const extractPixelPath = (
  grid: PixelGrid,
  options: ExtractionOptions,
  log: StageLogger = logger
): PixelPath => {
  const matches = scanRegion(grid, options.color, options.bounds, { cleanMask: options.cleanMask });
  const matched = countMatches(matches);
  log.debug('Scanned region', { columns: matches.length, matched, cleanMask: options.cleanMask === true });

  if (matched === 0) {
    const { top, bottom } = resolveRowRange(grid.height, options.bounds);
    throw new EmptyMatchError({ width: grid.width, top, bottom, tolerance: options.color.tolerance });
  }

  const raw = buildMedianPath(matches);
  const holeCount = countHoles(raw);
  const filled = fillGaps(raw);
  log.debug('Filled holes', { holeCount });

  const smoothing = resolveSmoothing(options.smoothing);
  const rows = smoothPath(filled, smoothing);
  if (smoothing) log.debug('Smoothed path', { kind: smoothing.kind, window: smoothing.window });

  return {
    columns: raw.map((_, col) => col),
    rows,
    raw,
    holeCount,
  };
};

export const buildCalibration = (request: CalibrationRequest): AxisCalibration => ({
  yMap: buildYAxisMap(request.y, request.yScale ?? 'linear'),
  xMap: buildXAxisMap(request.x),
});

export const calibratePath = (
  path: PixelPath,
  calibration: AxisCalibration,
  options: CalibrateOptions = {}
): CalibratedSeries => {
  const precision = options.valuePrecision === undefined ? DEFAULT_VALUE_PRECISION : options.valuePrecision;
  return path.columns.map((column, i) => ({
    column,
    row: path.rows[i],
    date: pixelToDate(column, calibration.xMap),
    value: roundTo(pixelToValue(path.rows[i], calibration.yMap), precision),
  }));
};

/**
 * Runs one full extraction. Calibration, when requested, is validated before
 * any pixel is scanned; without it the result carries only the pixel path.
 */
export const digitizeChart = (grid: PixelGrid, request: DigitizeRequest): DigitizeResult => {
  const runId = uuidv4();
  const log = logger.withContext({ runId });

  const calibration = request.calibration ? buildCalibration(request.calibration) : null;
  const path = extractPixelPath(grid, request, log);
  const series = calibration
    ? calibratePath(path, calibration, { valuePrecision: request.valuePrecision })
    : null;

  log.info('Extraction complete', {
    columns: path.columns.length,
    holes: path.holeCount,
    calibrated: series !== null,
  });

  return { runId, path, series };
};
