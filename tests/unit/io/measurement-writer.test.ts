/**
 * Measurement writer tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { appendMeasurement, writeSnapshot } from '../../../src/io/measurement-writer';
import { buildMeasurementDocument } from '../../../src/gauge/measurement-document';

const FIRST = buildMeasurementDocument({
  level: 50.04,
  volume: 1768.51,
  pixel: 200,
  capturedAt: new Date('2026-01-15T07:45:12.345Z'),
});
const SECOND = buildMeasurementDocument({
  level: 49.5,
  volume: 1750.8,
  pixel: 201,
  capturedAt: new Date('2026-01-15T08:45:12.000Z'),
});

describe('measurement writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tank-gauge-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should append one line per measurement', async () => {
    const path = join(dir, 'level.log');
    await writeFile(path, '{"timestamp":"earlier"}\n');

    await appendMeasurement(path, FIRST);
    await appendMeasurement(path, SECOND);

    expect(await readFile(path, 'utf-8')).toBe(
      '{"timestamp":"earlier"}\n' +
        '{"timestamp":"2026-01-15T07:45:12.345Z","level_cm":50,"level_liter":1768.5,"level_pixel":200}\n' +
        '{"timestamp":"2026-01-15T08:45:12.000Z","level_cm":49.5,"level_liter":1750.8,"level_pixel":201}\n'
    );
  });

  it('should create missing parent directories', async () => {
    const path = join(dir, 'logs', 'tank', 'level.log');
    await appendMeasurement(path, FIRST);
    expect((await readFile(path, 'utf-8')).split('\n')).toHaveLength(2);
  });

  it('should replace the snapshot with the latest measurement', async () => {
    const path = join(dir, 'latest.json');

    await writeSnapshot(path, FIRST);
    await writeSnapshot(path, SECOND);

    const text = await readFile(path, 'utf-8');
    expect(JSON.parse(text)).toEqual({
      timestamp: '2026-01-15T08:45:12.000Z',
      level_cm: 49.5,
      level_liter: 1750.8,
      level_pixel: 201,
    });
    expect(text.startsWith('{\n  "timestamp"')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
  });
});
