import type { AxisMap, CalendarDate, CalibrationPair, YScale } from '../types';
import { CalibrationError } from '../errors';
import { formatDate, fromDayOrdinal, toDayOrdinal } from './dates';

export const calculateCalibration = (
  p1px: number,
  p1val: number,
  p2px: number,
  p2val: number,
  isLog: boolean
) => {
  if (
    !Number.isFinite(p1px) ||
    !Number.isFinite(p1val) ||
    !Number.isFinite(p2px) ||
    !Number.isFinite(p2val)
  ) {
    throw new CalibrationError('Calibration parameters must be finite numbers');
  }

  if (p1px === p2px) {
    throw new CalibrationError('Calibration points share the same pixel coordinate', null, { px: p1px });
  }

  let v1 = p1val;
  let v2 = p2val;

  if (isLog) {
    if (v1 <= 0 || v2 <= 0) throw new CalibrationError('Log scale requires positive values');
    v1 = Math.log10(v1);
    v2 = Math.log10(v2);
  }

  const slope = (v2 - v1) / (p2px - p1px);
  const intercept = v1 - slope * p1px;

  if (!Number.isFinite(slope) || !Number.isFinite(intercept)) {
    throw new CalibrationError('Calibration resulted in infinite slope/intercept');
  }

  return { slope, intercept };
};

// Re-raises with the axis named so the caller knows which anchors to fix
const forAxis = <T>(axis: 'X' | 'Y', build: () => T): T => {
  try {
    return build();
  } catch (e) {
    if (e instanceof CalibrationError && e.axis === null) {
      throw new CalibrationError(e.message, axis, e.details);
    }
    throw e;
  }
};

const requireTwo = <T>(axis: 'X' | 'Y', pair: CalibrationPair<T>) => {
  if (pair.length < 2) {
    throw new CalibrationError(`Two calibration points are required, got ${pair.length}`, axis);
  }
  return [pair[0], pair[1]] as const;
};

export const buildYAxisMap = (pair: CalibrationPair<number>, scale: YScale = 'linear'): AxisMap =>
  forAxis('Y', () => {
    const [p1, p2] = requireTwo('Y', pair);
    const isLog = scale === 'log';
    return { isLog, ...calculateCalibration(p1.px, p1.val, p2.px, p2.val, isLog) };
  });

// Maps pixel column to UTC day ordinal
export const buildXAxisMap = (pair: CalibrationPair<CalendarDate>): AxisMap =>
  forAxis('X', () => {
    const [p1, p2] = requireTwo('X', pair);
    return {
      isLog: false,
      ...calculateCalibration(p1.px, toDayOrdinal(p1.val), p2.px, toDayOrdinal(p2.val), false),
    };
  });

export const pixelToValue = (px: number, axis: AxisMap): number => {
  const v = axis.slope * px + axis.intercept;
  return axis.isLog ? Math.pow(10, v) : v;
};

export const valueToPixel = (val: number, axis: AxisMap): number | null => {
  let v = val;
  if (axis.isLog) {
    if (v <= 0) return null; // Cannot map <= 0 on log scale
    v = Math.log10(v);
  }
  return (v - axis.intercept) / axis.slope;
};

export const pixelToDate = (px: number, axis: AxisMap): string =>
  formatDate(fromDayOrdinal(pixelToValue(px, axis)));

export const pixelToData = (px: number, py: number, xAxis: AxisMap, yAxis: AxisMap) => ({
  x: pixelToValue(px, xAxis),
  y: pixelToValue(py, yAxis),
});

export const dataToPixel = (dataX: number, dataY: number, xAxis: AxisMap, yAxis: AxisMap) => {
  const x = valueToPixel(dataX, xAxis);
  const y = valueToPixel(dataY, yAxis);
  if (x === null || y === null) return null;
  return { x, y };
};

export const roundTo = (value: number, precision: number | null): number => {
  if (precision === null) return value;
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
};
