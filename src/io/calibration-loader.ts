/**
 * Calibration Loader
 *
 * Site calibration files map a height in cm to the strip row where that
 * height sits, e.g. in YAML:
 *
 *   0: 412
 *   50: 268
 *   100: 131
 *
 * `.json` files are read as JSON, anything else as YAML.
 *
 * @module io/calibration-loader
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import type { CalibrationMapping } from '../types';
import { CalibrationFileError } from '../gauge/errors';

export type CalibrationFormat = 'json' | 'yaml';

export function detectCalibrationFormat(path: string): CalibrationFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
}

function toNumber(raw: unknown): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && raw.trim() !== '') return Number(raw);
  return NaN;
}

/**
 * Parse calibration text into a unit to pixel mapping
 *
 * @param source - Used in error messages only
 */
export function parseCalibration(
  text: string,
  format: CalibrationFormat,
  source: string = '<calibration>'
): CalibrationMapping {
  let data: unknown;
  try {
    data = format === 'json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CalibrationFileError(`invalid ${format}: ${reason}`, source);
  }

  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new CalibrationFileError('expected a mapping of unit to pixel offset', source);
  }

  const mapping = new Map<number, number>();
  for (const [key, value] of Object.entries(data)) {
    const unit = toNumber(key);
    const pixel = toNumber(value);
    if (!Number.isFinite(unit)) {
      throw new CalibrationFileError(`unit "${key}" is not a number`, source, { key });
    }
    if (!Number.isFinite(pixel)) {
      throw new CalibrationFileError(`pixel offset for ${key} is not a number`, source, { key, value });
    }
    mapping.set(unit, pixel);
  }

  return mapping;
}

/**
 * Read and parse a calibration file
 */
export async function loadCalibrationFile(path: string): Promise<CalibrationMapping> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CalibrationFileError(`cannot read file: ${reason}`, path);
  }
  return parseCalibration(text, detectCalibrationFormat(path), path);
}
