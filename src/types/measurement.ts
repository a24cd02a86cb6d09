/**
 * Measurement types
 * @module types/measurement
 */

/**
 * Per-row brightness samples of the preprocessed strip.
 * Index 0 is the top row of the cropped strip.
 */
export type BrightnessProfile = readonly number[];

/**
 * Physical unit (e.g. cm) to pixel offset in the strip.
 * Storage order carries no meaning.
 */
export type CalibrationMapping = ReadonlyMap<number, number>;

/**
 * One calibration entry
 */
export interface CalibrationPoint {
  /** Physical height, in the calibration's unit */
  unit: number;
  /** Pixel offset from the top of the strip */
  pixel: number;
}

/**
 * Result of converting a detected pixel into physical units
 */
export interface InterpolationResult {
  /** Level in the calibration's unit */
  level: number;

  /** Volume in liters */
  volume: number;

  /** Last calibration point (ascending unit order) with a smaller offset */
  before: CalibrationPoint;

  /** First calibration point (ascending unit order) with a larger offset */
  after: CalibrationPoint;

  /** Interpolation weight applied to the before/after span */
  fraction: number;
}

/**
 * Emitted measurement record. Field names are part of the log format.
 */
export interface MeasurementDocument {
  /** ISO-8601 UTC, millisecond precision */
  readonly timestamp: string;
  readonly level_cm: number;
  readonly level_liter: number;
  readonly level_pixel: number;
}

/**
 * Everything a single pipeline run produced
 */
export interface GaugeReading {
  document: MeasurementDocument;
  profileLength: number;
  interpolation: InterpolationResult;
}
