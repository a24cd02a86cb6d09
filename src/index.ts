/**
 * tank-gauge
 *
 * Reads a liquid tank's fill level from a webcam still of a calibrated
 * sight glass: locates the liquid surface in an edge-detected brightness
 * profile and converts the row to height and volume with a site
 * calibration table.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

export type {
  BrightnessProfile,
  CalibrationMapping,
  CalibrationPoint,
  InterpolationResult,
  MeasurementDocument,
  GaugeReading,
  GaugeConfig,
  StripGeometry,
  PreprocessConfig,
  CameraConfig,
  RunConfig,
} from './types';

export * from './gauge';
export * from './io';
export * from './config';
export { runMeasurement } from './measure-run';
export type { MeasureRunOptions } from './measure-run';
export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  ValidationError,
  type LoggerConfig,
  type LogEntry,
  type LogLevelName,
} from './utils';
