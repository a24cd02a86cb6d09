/**
 * Tank gauge type definitions
 *
 * @module types
 */

export type {
  BrightnessProfile,
  CalibrationMapping,
  CalibrationPoint,
  InterpolationResult,
  MeasurementDocument,
  GaugeReading,
} from './measurement';

export type {
  GaugeConfig,
  StripGeometry,
  PreprocessConfig,
  CameraConfig,
  RunConfig,
} from './config';
