/**
 * Calibration Interpolator
 *
 * Converts a strip pixel offset into a physical level by linear
 * interpolation between two calibration points.
 *
 * Bracket selection walks the points in ascending offset order: `before`
 * is the LAST point seen with a smaller offset and `after` the FIRST
 * point seen with a larger one, so the pixel always sits between two
 * adjacent calibration marks.
 *
 * The table is assumed to map higher levels to smaller offsets (the
 * camera looks down the strip). Nothing checks this; an inconsistent
 * table gives a wrong level, not an error.
 *
 * @module gauge/calibration-interpolator
 */

import type { CalibrationMapping, CalibrationPoint, InterpolationResult } from '../types';
import { DEFAULT_GAUGE_CONFIG } from '../config/defaults';
import { createSilentLogger, type Logger } from '../utils/logger';
import { lerp } from '../utils/math';
import { validateFiniteNumber, validatePositiveNumber } from '../utils/validation';
import { OutOfCalibrationRangeError } from './errors';

export interface CalibrationInterpolatorOptions {
  /** Liters per calibration unit (default: 35.37) */
  litersPerUnit?: number;

  logger?: Logger;
}

/**
 * Calibration points in ascending pixel offset order
 */
export function sortCalibration(mapping: CalibrationMapping): CalibrationPoint[] {
  return Array.from(mapping, ([unit, pixel]) => ({ unit, pixel })).sort((a, b) => a.pixel - b.pixel);
}

export class CalibrationInterpolator {
  private readonly points: readonly CalibrationPoint[];
  private readonly litersPerUnit: number;
  private readonly logger: Logger;

  /**
   * @throws OutOfCalibrationRangeError when fewer than two distinct
   * offsets are available to bracket anything
   */
  constructor(mapping: CalibrationMapping, options: CalibrationInterpolatorOptions = {}) {
    const distinctOffsets = new Set(mapping.values());
    if (distinctOffsets.size < 2) {
      throw new OutOfCalibrationRangeError('insufficient-points', undefined, undefined);
    }

    this.points = Object.freeze(sortCalibration(mapping));
    this.litersPerUnit = validatePositiveNumber(
      options.litersPerUnit ?? DEFAULT_GAUGE_CONFIG.litersPerUnit,
      'litersPerUnit'
    );
    this.logger = options.logger ?? createSilentLogger('calibration-interpolator');
  }

  /**
   * Smallest and largest calibrated pixel offset
   */
  get span(): { min: number; max: number } {
    const offsets = this.points.map(p => p.pixel);
    return { min: Math.min(...offsets), max: Math.max(...offsets) };
  }

  /**
   * @throws OutOfCalibrationRangeError when the pixel lies outside the span
   */
  interpolate(pixel: number): InterpolationResult {
    validateFiniteNumber(pixel, 'detectedPixel');

    // An exact hit is its own bracket
    const exact = this.points.find(p => p.pixel === pixel);
    if (exact) {
      this.logger.debug('Pixel matches calibration point', { unit: exact.unit, pixel });
      return this.toResult(exact, exact, 1);
    }

    let before: CalibrationPoint | undefined;
    let after: CalibrationPoint | undefined;

    for (const point of this.points) {
      this.logger.debug('Testing calibration point', { unit: point.unit, pixel: point.pixel });
      if (point.pixel < pixel) {
        before = point;
      }
      if (!after && point.pixel > pixel) {
        after = point;
      }
    }

    if (!before) {
      throw new OutOfCalibrationRangeError('below-range', pixel, this.span);
    }
    if (!after) {
      throw new OutOfCalibrationRangeError('above-range', pixel, this.span);
    }

    this.logger.debug('Bracket chosen', { before, after });

    const fraction = 1 - (pixel - after.pixel) / (before.pixel - after.pixel);
    this.logger.debug('Fraction', { fraction: fraction.toFixed(2) });

    return this.toResult(before, after, fraction);
  }

  private toResult(
    before: CalibrationPoint,
    after: CalibrationPoint,
    fraction: number
  ): InterpolationResult {
    const level = lerp(before.unit, after.unit, fraction);
    return {
      level,
      volume: level * this.litersPerUnit,
      before: { ...before },
      after: { ...after },
      fraction,
    };
  }
}
