/**
 * Error taxonomy of the extraction engine.
 *
 * Every failure is local to one call; callers recover by adjusting inputs
 * (tolerance, bounds, anchors) and running again.
 */

export class DigitizerError extends Error {
  constructor(
    message: string,
    public details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'DigitizerError';
  }
}

/**
 * No pixel in the scan range matched the target color.
 */
export class EmptyMatchError extends DigitizerError {
  constructor(details: Record<string, unknown> = {}) {
    super('No pixels matched the target color. Try a larger tolerance or a different color.', details);
    this.name = 'EmptyMatchError';
  }
}

/**
 * An axis could not be calibrated from the anchors supplied.
 */
export class CalibrationError extends DigitizerError {
  constructor(
    message: string,
    public axis: 'X' | 'Y' | null = null,
    details: Record<string, unknown> = {}
  ) {
    super(axis ? `${axis} axis: ${message}` : message, details);
    this.name = 'CalibrationError';
  }
}

/**
 * Upper bound not strictly above the lower bound.
 */
export class BoundsError extends DigitizerError {
  constructor(upperRow: number, lowerRow: number) {
    super(`Upper bound (row ${upperRow}) must be above lower bound (row ${lowerRow})`, { upperRow, lowerRow });
    this.name = 'BoundsError';
  }
}
