/**
 * External collaborators: calibration files, camera, ImageMagick, output
 * @module io
 */

export {
  loadCalibrationFile,
  parseCalibration,
  detectCalibrationFormat,
} from './calibration-loader';
export type { CalibrationFormat } from './calibration-loader';
export { CameraClient } from './camera-client';
export type { CameraClientOptions, Snapshot } from './camera-client';
export { StripPreprocessor, execCommand } from './strip-preprocessor';
export type { CommandRunner, CommandOutput, StripPreprocessorOptions } from './strip-preprocessor';
export { drawLevelLine, renderConfirmationImage, writeConfirmationImage } from './confirmation-image';
export type { LineGeometry } from './confirmation-image';
export { appendMeasurement, writeSnapshot } from './measurement-writer';
