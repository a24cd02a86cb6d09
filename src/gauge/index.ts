/**
 * Level detection core
 * @module gauge
 */

export { parseBrightnessDump } from './profile-parser';
export { TransitionLocator, locateTransition } from './transition-locator';
export type { TransitionLocatorOptions } from './transition-locator';
export { CalibrationInterpolator, sortCalibration } from './calibration-interpolator';
export type { CalibrationInterpolatorOptions } from './calibration-interpolator';
export { buildMeasurementDocument, toLogLine, toSnapshot } from './measurement-document';
export type { MeasurementInput } from './measurement-document';
export { LevelGauge } from './level-gauge';
export type { LevelGaugeOptions } from './level-gauge';
export {
  GaugeError,
  ParseError,
  NoTransitionFoundError,
  OutOfCalibrationRangeError,
  AcquisitionError,
  PreprocessingError,
  CalibrationFileError,
} from './errors';
export type { GaugeErrorCode, NoTransitionReason, OutOfRangeReason } from './errors';
