/**
 * Confirmation Image
 *
 * Marks the detected level on the camera image so a person can check
 * the reading at a glance.
 *
 * @module io/confirmation-image
 */

import { readFile, writeFile } from 'fs/promises';
import { PNG } from 'pngjs';
import type { StripGeometry } from '../types';
import { CONFIRMATION_LINE_COLOR } from '../config/defaults';

export type LineGeometry = Pick<StripGeometry, 'stripOffset' | 'stripWidth'>;

/**
 * Paint a horizontal line across the strip at `row`, clipped to the
 * image. Returns the number of pixels painted.
 */
export function drawLevelLine(
  png: PNG,
  geometry: LineGeometry,
  row: number,
  color: readonly [number, number, number] = CONFIRMATION_LINE_COLOR
): number {
  const y = Math.round(row);
  if (y < 0 || y >= png.height) return 0;

  const startX = Math.max(0, geometry.stripOffset);
  const endX = Math.min(png.width - 1, geometry.stripOffset + geometry.stripWidth);

  let painted = 0;
  for (let x = startX; x <= endX; x++) {
    const idx = (png.width * y + x) << 2;
    png.data[idx] = color[0];
    png.data[idx + 1] = color[1];
    png.data[idx + 2] = color[2];
    png.data[idx + 3] = 255;
    painted++;
  }
  return painted;
}

/**
 * Decode a PNG, mark the level and re-encode it
 */
export function renderConfirmationImage(source: Buffer, geometry: LineGeometry, row: number): Buffer {
  const png = PNG.sync.read(source);
  drawLevelLine(png, geometry, row);
  return PNG.sync.write(png);
}

export async function writeConfirmationImage(
  sourcePath: string,
  targetPath: string,
  geometry: LineGeometry,
  row: number
): Promise<void> {
  const source = await readFile(sourcePath);
  await writeFile(targetPath, renderConfirmationImage(source, geometry, row));
}
