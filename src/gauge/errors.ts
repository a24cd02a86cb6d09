/**
 * Gauge error taxonomy
 *
 * Every failure carries a stable `code` and the values needed to
 * diagnose it without re-running.
 *
 * @module gauge/errors
 */

export type GaugeErrorCode =
  | 'PARSE_ERROR'
  | 'NO_TRANSITION_FOUND'
  | 'OUT_OF_CALIBRATION_RANGE'
  | 'ACQUISITION_ERROR'
  | 'PREPROCESSING_ERROR'
  | 'CALIBRATION_FILE_ERROR';

/**
 * Base class for all gauge failures
 */
export class GaugeError extends Error {
  constructor(
    message: string,
    public readonly code: GaugeErrorCode,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'GaugeError';
  }
}

/**
 * A brightness dump line did not match the expected pattern
 */
export class ParseError extends GaugeError {
  constructor(
    message: string,
    public readonly lineNumber: number,
    public readonly line: string
  ) {
    super(`Line ${lineNumber}: ${message}: "${line}"`, 'PARSE_ERROR', { lineNumber, line });
    this.name = 'ParseError';
  }
}

export type NoTransitionReason = 'no-bright-region' | 'no-zero-run';

/**
 * The liquid edge could not be found in the profile
 */
export class NoTransitionFoundError extends GaugeError {
  constructor(
    public readonly reason: NoTransitionReason,
    public readonly profileLength: number,
    public readonly searchStart?: number
  ) {
    const detail =
      reason === 'no-bright-region'
        ? 'no sample exceeds the bright threshold'
        : `no zero run after row ${searchStart}`;
    super(`No transition found: ${detail}`, 'NO_TRANSITION_FOUND', {
      reason,
      profileLength,
      searchStart,
    });
    this.name = 'NoTransitionFoundError';
  }
}

export type OutOfRangeReason = 'insufficient-points' | 'below-range' | 'above-range';

/**
 * The detected pixel cannot be bracketed by the calibration table
 */
export class OutOfCalibrationRangeError extends GaugeError {
  constructor(
    public readonly reason: OutOfRangeReason,
    public readonly detectedPixel: number | undefined,
    public readonly span: { min: number; max: number } | undefined
  ) {
    const detail =
      reason === 'insufficient-points'
        ? 'calibration needs at least two points'
        : `pixel ${detectedPixel} is outside the calibrated span [${span?.min}, ${span?.max}]`;
    super(`Out of calibration range: ${detail}`, 'OUT_OF_CALIBRATION_RANGE', {
      reason,
      detectedPixel,
      span,
    });
    this.name = 'OutOfCalibrationRangeError';
  }
}

/**
 * The camera snapshot could not be fetched
 */
export class AcquisitionError extends GaugeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'ACQUISITION_ERROR', context);
    this.name = 'AcquisitionError';
  }
}

/**
 * The external image tool failed
 */
export class PreprocessingError extends GaugeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PREPROCESSING_ERROR', context);
    this.name = 'PreprocessingError';
  }
}

/**
 * The calibration file is unreadable or holds non-numeric entries
 */
export class CalibrationFileError extends GaugeError {
  constructor(message: string, public readonly path: string, context: Record<string, unknown> = {}) {
    super(`${path}: ${message}`, 'CALIBRATION_FILE_ERROR', { path, ...context });
    this.name = 'CalibrationFileError';
  }
}
