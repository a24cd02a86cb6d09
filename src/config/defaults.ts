/**
 * Default configuration values
 * @module config/defaults
 */

import type { GaugeConfig, PreprocessConfig } from '../types';

/**
 * Core detection defaults
 */
export const DEFAULT_GAUGE_CONFIG: Required<Omit<GaugeConfig, 'calibration'>> = {
  brightThreshold: 100,
  zeroRunLength: 3,
  litersPerUnit: 35.37,
};

/**
 * Strip position and preprocessing defaults for a 640x480 camera
 */
export const DEFAULT_PREPROCESS_CONFIG: PreprocessConfig = {
  stripOffset: 236,
  stripWidth: 60,
  imageHeight: 480,
  edge: 20,
  convertCommand: 'convert',
};

/**
 * Environment variables read at startup
 */
export const ENV_VARS = {
  logLevel: 'LOG_LEVEL',
  cameraPassword: 'CAMERA_PASSWORD',
} as const;

/**
 * Process exit codes by failure kind
 */
export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  PARSE_ERROR: 2,
  NO_TRANSITION_FOUND: 3,
  OUT_OF_CALIBRATION_RANGE: 4,
  IO_ERROR: 5,
} as const;

/**
 * Confirmation line color (RGB)
 */
export const CONFIRMATION_LINE_COLOR: readonly [number, number, number] = [255, 0, 0];
