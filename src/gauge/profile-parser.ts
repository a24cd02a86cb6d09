/**
 * Brightness Profile Parser
 *
 * Reads the ImageMagick `txt:` enumeration of a one pixel wide strip:
 *
 *   # ImageMagick pixel enumeration: 1,480,65535,gray
 *   0,0: ( 29, 29, 29)  #1D1D1D  gray(29,29,29)
 *   0,1: (  0,  0,  0)  #000000  gray(0,0,0)
 *
 * Only the first channel is kept; the strip is grayscale.
 *
 * @module gauge/profile-parser
 */

import type { BrightnessProfile } from '../types';
import { ParseError } from './errors';

const DATA_LINE = /^0,(\d+):\s*\(\s*(\d+)\s*,/;

/**
 * Parse a brightness dump into a profile, one sample per data line.
 *
 * @throws ParseError on a missing header, an unrecognized line, or a row
 * index that does not follow the previous one
 */
export function parseBrightnessDump(text: string): BrightnessProfile {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  if (lines.length === 0) {
    throw new ParseError('missing header line', 1, '');
  }

  const samples: number[] = [];

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;
    const match = DATA_LINE.exec(line);

    if (!match) {
      throw new ParseError('unrecognized brightness line', lineNumber, line);
    }

    const row = Number(match[1]);
    if (row !== samples.length) {
      throw new ParseError(`expected row ${samples.length}, found row ${row}`, lineNumber, line);
    }

    samples.push(Number(match[2]));
  }

  return Object.freeze(samples);
}
