/**
 * Measurement run
 *
 * One complete invocation: load calibration, obtain a brightness dump
 * (from the camera or from disk), measure, and persist the result.
 *
 * @module measure-run
 */

import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CameraConfig, GaugeReading, RunConfig } from './types';
import { LevelGauge } from './gauge/level-gauge';
import { loadCalibrationFile } from './io/calibration-loader';
import { CameraClient } from './io/camera-client';
import { StripPreprocessor, type CommandRunner } from './io/strip-preprocessor';
import { writeConfirmationImage } from './io/confirmation-image';
import { appendMeasurement, writeSnapshot } from './io/measurement-writer';
import { createSilentLogger, type Logger } from './utils/logger';

export interface MeasureRunOptions {
  logger?: Logger;

  /** Passed to the camera client */
  fetch?: typeof fetch;

  /** Passed to the strip preprocessor */
  runner?: CommandRunner;

  now?: () => Date;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runMeasurement(
  config: RunConfig,
  options: MeasureRunOptions = {}
): Promise<GaugeReading> {
  const logger = options.logger ?? createSilentLogger('run');
  const now = options.now ?? (() => new Date());

  const calibration = await loadCalibrationFile(config.mappingPath);
  logger.debug('Calibration loaded', { path: config.mappingPath, points: calibration.size });

  const gauge = new LevelGauge({ ...config.gauge, calibration, logger: logger.child('gauge') });

  let reading: GaugeReading;
  if (config.dumpPath !== undefined) {
    if (config.confirmationImage) {
      logger.warn('No camera image when measuring a dump; skipping confirmation image');
    }
    const dump = await readFile(config.dumpPath, 'utf-8');
    reading = gauge.measure(dump, now());
  } else if (config.camera) {
    reading = await measureFromCamera(config, config.camera, gauge, logger, options, now);
  } else {
    throw new Error('Either a camera or a dump file is required');
  }

  if (config.output) {
    logger.debug('Appending to measurement log', { path: config.output });
    await appendMeasurement(config.output, reading.document);
  }
  if (config.snapshot) {
    logger.debug('Writing snapshot', { path: config.snapshot });
    await writeSnapshot(config.snapshot, reading.document);
  }

  return reading;
}

async function measureFromCamera(
  config: RunConfig,
  camera: CameraConfig,
  gauge: LevelGauge,
  logger: Logger,
  options: MeasureRunOptions,
  now: () => Date
): Promise<GaugeReading> {
  const client = new CameraClient(camera, { fetch: options.fetch, now, logger: logger.child('camera') });
  const preprocessor = new StripPreprocessor(config.preprocess, {
    runner: options.runner,
    logger: logger.child('preprocessor'),
  });

  const workDir = await mkdtemp(join(tmpdir(), 'tank-gauge-'));
  const imagePath = join(workDir, 'snapshot.jpg');
  const dumpPath = join(workDir, 'strip.txt');

  try {
    const snapshot = await client.fetchSnapshot();
    await writeFile(imagePath, snapshot.image);
    logger.debug('Saved image', { path: imagePath });

    await preprocessor.createDump(imagePath, dumpPath);
    const reading = gauge.measure(await readFile(dumpPath, 'utf-8'), snapshot.capturedAt);

    if (config.confirmationImage) {
      const pngPath = join(workDir, 'snapshot.png');
      try {
        await preprocessor.convertToPng(imagePath, pngPath);
        await writeConfirmationImage(pngPath, config.confirmationImage, config.preprocess, reading.document.level_pixel);
        logger.debug('Wrote confirmation image', { path: config.confirmationImage });
      } catch (error) {
        logger.error('Confirmation image failed', asError(error), { path: config.confirmationImage });
      }
    }

    return reading;
  } finally {
    if (config.keepDumpFile) {
      logger.info('Kept brightness dump', { path: dumpPath });
    } else {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
