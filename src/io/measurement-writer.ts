/**
 * Measurement Writer
 * @module io/measurement-writer
 */

import { appendFile, mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { MeasurementDocument } from '../types';
import { toLogLine, toSnapshot } from '../gauge/measurement-document';

/**
 * Append one JSON line to the measurement log
 */
export async function appendMeasurement(path: string, doc: MeasurementDocument): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `${toLogLine(doc)}\n`, 'utf-8');
}

/**
 * Replace the snapshot file with the latest measurement
 */
export async function writeSnapshot(path: string, doc: MeasurementDocument): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${toSnapshot(doc)}\n`, 'utf-8');
}
