/**
 * Brightness dump parser tests
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parseBrightnessDump } from '../../../src/gauge/profile-parser';
import { ParseError } from '../../../src/gauge/errors';
import { captureError } from '../../helpers/capture-error';

const HEADER = '# ImageMagick pixel enumeration: 1,4,255,gray';

function dump(...lines: string[]): string {
  return [HEADER, ...lines].join('\n');
}

describe('parseBrightnessDump', () => {
  it('should read the first channel of each data line in order', () => {
    const text = dump(
      '0,0: ( 29, 29, 29)  #1D1D1D  gray(29,29,29)',
      '0,1: (255,255,255)  #FFFFFF  gray(255,255,255)',
      '0,2: (  0,  0,  0)  #000000  gray(0,0,0)'
    );

    expect(parseBrightnessDump(text)).toEqual([29, 255, 0]);
  });

  it('should take the first channel when channels differ', () => {
    expect(parseBrightnessDump(dump('0,0: ( 40, 10, 90)'))).toEqual([40]);
  });

  it('should ignore the trailing newline', () => {
    expect(parseBrightnessDump(`${dump('0,0: (7,7,7)')}\n`)).toEqual([7]);
  });

  it('should accept CRLF line endings', () => {
    const text = [HEADER, '0,0: (1,1,1)', '0,1: (2,2,2)', ''].join('\r\n');
    expect(parseBrightnessDump(text)).toEqual([1, 2]);
  });

  it('should return an empty profile for a header-only dump', () => {
    expect(parseBrightnessDump(`${HEADER}\n`)).toEqual([]);
  });

  it('should return a frozen profile', () => {
    expect(Object.isFrozen(parseBrightnessDump(dump('0,0: (1,1,1)')))).toBe(true);
  });

  it('should parse the fixture dump', () => {
    const text = readFileSync(join(__dirname, '../../fixtures/strip.txt'), 'utf-8');
    const profile = parseBrightnessDump(text);

    expect(profile).toHaveLength(20);
    expect(profile.slice(5, 8)).toEqual([180, 220, 140]);
    expect(profile.slice(11, 14)).toEqual([0, 0, 0]);
  });

  describe('errors', () => {
    it('should reject empty input as a missing header', () => {
      expect(() => parseBrightnessDump('')).toThrow(ParseError);
      expect(() => parseBrightnessDump('')).toThrow('Line 1: missing header line');
    });

    it('should name the offending line', () => {
      const text = dump('0,0: (5,5,5)', 'garbage here');

      const error = captureError(() => parseBrightnessDump(text));

      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.lineNumber).toBe(3);
      expect(error.line).toBe('garbage here');
      expect(error.code).toBe('PARSE_ERROR');
      expect(error.message).toBe('Line 3: unrecognized brightness line: "garbage here"');
    });

    it('should reject lines from another column', () => {
      expect(() => parseBrightnessDump(dump('1,0: (5,5,5)'))).toThrow('unrecognized brightness line');
    });

    it('should reject a blank line inside the data', () => {
      expect(() => parseBrightnessDump(dump('0,0: (5,5,5)', '', '0,1: (5,5,5)'))).toThrow(ParseError);
    });

    it('should reject rows out of sequence', () => {
      const text = dump('0,0: (5,5,5)', '0,2: (6,6,6)');
      expect(() => parseBrightnessDump(text)).toThrow('Line 3: expected row 1, found row 2');
    });
  });
});
