export type Rgb = { r: number; g: number; b: number };

// Decoded raster, row-major. channels defaults to 4 (RGBA, same layout as a canvas ImageData).
export type PixelGrid = {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
  channels?: 3 | 4;
};

export type ColorSpec = {
  target: Rgb;
  tolerance: number; // Per-channel, in 0..255 units
};

export type Bounds = {
  upperRow: number; // Inclusive
  lowerRow: number; // Inclusive
};

export type YScale = 'linear' | 'log';

export type CalendarDate = Date | string;

export type AxisAnchor<T> = {
  px: number; // Pixel row for Y, pixel column for X
  val: T;
};

export type CalibrationPair<T> = readonly AxisAnchor<T>[];

// Two-anchor map from pixel to value space. For log axes the line lives in log10 space.
export type AxisMap = {
  isLog: boolean;
  slope: number;
  intercept: number;
};

export type AxisCalibration = {
  xMap: AxisMap; // Pixel column -> UTC day ordinal
  yMap: AxisMap; // Pixel row -> value
};

// One entry per image column; null marks a hole.
export type RawPath = (number | null)[];

export type PixelPath = {
  columns: number[];
  rows: number[];
  raw: RawPath;
  holeCount: number;
};

export type SmoothingKind = 'moving-average' | 'savitzky-golay';

export type SmoothingOptions = {
  kind: SmoothingKind;
  window: number; // Odd
  polyOrder?: number; // Savitzky-Golay only
};

export type ExtractionOptions = {
  color: ColorSpec;
  bounds?: Bounds | null;
  smoothing?: boolean | SmoothingOptions;
  cleanMask?: boolean; // Fill enclosed holes and close small gaps before taking medians
};

export type CalibrationRequest = {
  y: CalibrationPair<number>;
  yScale?: YScale;
  x: CalibrationPair<CalendarDate>;
};

export type CalibratedSample = {
  column: number;
  row: number;
  date: string; // YYYY-MM-DD
  value: number;
};

export type CalibratedSeries = CalibratedSample[];

export type CalibrateOptions = {
  valuePrecision?: number | null; // Decimal places kept; null keeps full precision
};

export type DigitizeRequest = ExtractionOptions & CalibrateOptions & {
  calibration?: CalibrationRequest | null;
};

export type DigitizeResult = {
  runId: string;
  path: PixelPath;
  series: CalibratedSeries | null;
};
