/**
 * Configuration types
 * @module types/config
 */

import type { CalibrationMapping } from './measurement';
import type { LogLevelName } from '../utils/logger';

/**
 * Tunables of the level detection core
 */
export interface GaugeConfig {
  /** Brightness a sample must exceed before the transition search starts */
  brightThreshold: number;

  /** Number of consecutive zero samples that make a transition */
  zeroRunLength: number;

  /** Liters per calibration unit */
  litersPerUnit: number;

  /** Unit to pixel offset table */
  calibration: CalibrationMapping;
}

/**
 * Position of the measurement strip inside the camera image
 */
export interface StripGeometry {
  /** Left edge of the strip in pixels */
  stripOffset: number;

  /** Strip width in pixels */
  stripWidth: number;

  /** Height of the camera image in pixels */
  imageHeight: number;
}

/**
 * Image preprocessing settings
 */
export interface PreprocessConfig extends StripGeometry {
  /** Edge detection radius passed to ImageMagick */
  edge: number;

  /** ImageMagick executable */
  convertCommand: string;
}

/**
 * Network camera access
 */
export interface CameraConfig {
  host: string;
  username: string;
  password: string;
}

/**
 * Fully resolved settings for one CLI run
 */
export interface RunConfig {
  gauge: Omit<GaugeConfig, 'calibration'>;
  preprocess: PreprocessConfig;

  /** Absent when measuring an existing dump */
  camera?: CameraConfig;

  /** Calibration file */
  mappingPath: string;

  /** Existing brightness dump to measure instead of fetching a snapshot */
  dumpPath?: string;

  /** Append-only measurement log */
  output?: string;

  /** Pretty-printed snapshot of the latest measurement */
  snapshot?: string;

  /** Annotated PNG showing the detected level */
  confirmationImage?: string;

  /** Keep the temporary brightness dump on disk */
  keepDumpFile: boolean;

  logLevel: LogLevelName;

  /** Write log entries as JSON lines */
  logJson: boolean;

  /** Prefix human-readable log lines with a timestamp */
  logTimestamps: boolean;
}
