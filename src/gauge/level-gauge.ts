/**
 * Level Gauge
 *
 * Runs one measurement: parse, locate, interpolate, build. Strictly
 * sequential; every stage failure aborts the run with a GaugeError.
 *
 * @module gauge/level-gauge
 */

import type { BrightnessProfile, GaugeConfig, GaugeReading } from '../types';
import { createSilentLogger, type Logger } from '../utils/logger';
import { parseBrightnessDump } from './profile-parser';
import { TransitionLocator } from './transition-locator';
import { CalibrationInterpolator } from './calibration-interpolator';
import { buildMeasurementDocument } from './measurement-document';

export interface LevelGaugeOptions extends Partial<Omit<GaugeConfig, 'calibration'>> {
  calibration: GaugeConfig['calibration'];
  logger?: Logger;
}

export class LevelGauge {
  private readonly locator: TransitionLocator;
  private readonly interpolator: CalibrationInterpolator;
  private readonly logger: Logger;

  constructor(options: LevelGaugeOptions) {
    this.logger = options.logger ?? createSilentLogger('gauge');
    this.locator = new TransitionLocator({
      brightThreshold: options.brightThreshold,
      zeroRunLength: options.zeroRunLength,
      logger: this.logger.child('locator'),
    });
    this.interpolator = new CalibrationInterpolator(options.calibration, {
      litersPerUnit: options.litersPerUnit,
      logger: this.logger.child('calibration'),
    });
  }

  /**
   * Measure from a raw brightness dump
   */
  measure(dump: string, capturedAt: Date = new Date()): GaugeReading {
    const profile = parseBrightnessDump(dump);
    this.logger.debug('Parsed brightness dump', { rows: profile.length });
    return this.measureProfile(profile, capturedAt);
  }

  /**
   * Measure from an already parsed profile
   */
  measureProfile(profile: BrightnessProfile, capturedAt: Date = new Date()): GaugeReading {
    const pixel = this.locator.locate(profile);
    const interpolation = this.interpolator.interpolate(pixel);

    this.logger.info('Level measured', {
      pixel,
      levelCm: interpolation.level.toFixed(2),
      levelLiter: interpolation.volume.toFixed(2),
    });

    const document = buildMeasurementDocument({
      level: interpolation.level,
      volume: interpolation.volume,
      pixel,
      capturedAt,
    });

    return { document, profileLength: profile.length, interpolation };
  }
}
