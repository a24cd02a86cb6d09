/**
 * Measurement Document Builder
 * @module gauge/measurement-document
 */

import type { MeasurementDocument } from '../types';
import { round } from '../utils/math';
import { ValidationError } from '../utils/validation';

export interface MeasurementInput {
  /** Level in calibration units (cm) */
  level: number;

  /** Volume in liters */
  volume: number;

  /** Detected surface row */
  pixel: number;

  /** When the source image was captured */
  capturedAt: Date;
}

/**
 * Build the frozen record emitted for one run. Level and volume are
 * rounded to one decimal.
 */
export function buildMeasurementDocument(input: MeasurementInput): MeasurementDocument {
  if (Number.isNaN(input.capturedAt.getTime())) {
    throw new ValidationError('must be a valid date', 'capturedAt', input.capturedAt);
  }

  return Object.freeze({
    timestamp: input.capturedAt.toISOString(),
    level_cm: round(input.level, 1),
    level_liter: round(input.volume, 1),
    level_pixel: input.pixel,
  });
}

/**
 * Single-line JSON record for the append-only log
 */
export function toLogLine(doc: MeasurementDocument): string {
  return JSON.stringify(doc);
}

/**
 * Pretty-printed JSON for the standalone snapshot file
 */
export function toSnapshot(doc: MeasurementDocument, indent: number = 2): string {
  return JSON.stringify(doc, null, indent);
}
