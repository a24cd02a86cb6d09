/**
 * Transition Locator
 *
 * Finds the liquid surface in an edge-detected brightness profile.
 * Rows above the first bright sample are background and are never
 * considered. After that, the surface is the first row that starts a
 * run of `zeroRunLength` true-black samples.
 *
 * @module gauge/transition-locator
 */

import type { BrightnessProfile } from '../types';
import { DEFAULT_GAUGE_CONFIG } from '../config/defaults';
import { createSilentLogger, type Logger } from '../utils/logger';
import { validateFiniteNumber, validateInteger } from '../utils/validation';
import { NoTransitionFoundError } from './errors';

export interface TransitionLocatorOptions {
  /** A sample must exceed this to open the search region (default: 100) */
  brightThreshold?: number;

  /** Consecutive zero samples required (default: 3) */
  zeroRunLength?: number;

  logger?: Logger;
}

export class TransitionLocator {
  private readonly brightThreshold: number;
  private readonly zeroRunLength: number;
  private readonly logger: Logger;

  constructor(options: TransitionLocatorOptions = {}) {
    this.brightThreshold = validateFiniteNumber(
      options.brightThreshold ?? DEFAULT_GAUGE_CONFIG.brightThreshold,
      'brightThreshold'
    );
    this.zeroRunLength = validateInteger(
      options.zeroRunLength ?? DEFAULT_GAUGE_CONFIG.zeroRunLength,
      'zeroRunLength',
      1
    );
    this.logger = options.logger ?? createSilentLogger('transition-locator');
  }

  /**
   * Return the 0-based row of the liquid surface.
   *
   * @throws NoTransitionFoundError when the profile never turns bright or
   * no qualifying zero run follows
   */
  locate(profile: BrightnessProfile): number {
    const searchStart = profile.findIndex(sample => sample > this.brightThreshold);
    if (searchStart === -1) {
      throw new NoTransitionFoundError('no-bright-region', profile.length);
    }
    this.logger.debug('Search starts', { row: searchStart, brightness: profile[searchStart] });

    for (let row = searchStart; row + this.zeroRunLength <= profile.length; row++) {
      if (this.isZeroRun(profile, row)) {
        this.logger.debug('Line found', { row, zeroRunLength: this.zeroRunLength });
        return row;
      }
    }

    throw new NoTransitionFoundError('no-zero-run', profile.length, searchStart);
  }

  private isZeroRun(profile: BrightnessProfile, start: number): boolean {
    for (let i = start; i < start + this.zeroRunLength; i++) {
      if (profile[i] !== 0) return false;
    }
    return true;
  }
}

/**
 * Locate the transition with a throwaway locator
 */
export function locateTransition(
  profile: BrightnessProfile,
  options: TransitionLocatorOptions = {}
): number {
  return new TransitionLocator(options).locate(profile);
}
