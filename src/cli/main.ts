/**
 * tank-gauge command line
 *
 * Prints the measurement record on stdout; logs go to stderr.
 *
 * @module cli/main
 */

import { EXIT_CODES } from '../config/defaults';
import { USAGE, resolveRunConfig, wantsHelp } from '../config/run-config';
import { GaugeError } from '../gauge/errors';
import { toLogLine } from '../gauge/measurement-document';
import { runMeasurement } from '../measure-run';
import type { RunConfig } from '../types';
import {
  createLogger,
  parseLogLevel,
  renderLogEntry,
  type LogEntry,
  type LoggerConfig,
} from '../utils/logger';
import { ValidationError } from '../utils/validation';

/**
 * Output handler that writes entries to stderr in the configured format
 */
export function stderrOutput(
  format: Pick<LoggerConfig, 'jsonOutput' | 'includeTimestamp'>
): (entry: LogEntry) => void {
  return entry => {
    process.stderr.write(`${renderLogEntry(entry, format)}\n`);
    if (!format.jsonOutput && entry.error?.stack) {
      process.stderr.write(`${entry.error.stack}\n`);
    }
  };
}

export function exitCodeFor(error: unknown): number {
  if (!(error instanceof GaugeError)) return EXIT_CODES.FAILURE;

  switch (error.code) {
    case 'PARSE_ERROR':
      return EXIT_CODES.PARSE_ERROR;
    case 'NO_TRANSITION_FOUND':
      return EXIT_CODES.NO_TRANSITION_FOUND;
    case 'OUT_OF_CALIBRATION_RANGE':
      return EXIT_CODES.OUT_OF_CALIBRATION_RANGE;
    case 'ACQUISITION_ERROR':
    case 'PREPROCESSING_ERROR':
    case 'CALIBRATION_FILE_ERROR':
      return EXIT_CODES.IO_ERROR;
  }
}

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  if (wantsHelp(argv)) {
    process.stdout.write(USAGE);
    return EXIT_CODES.OK;
  }

  let config: RunConfig;
  try {
    config = resolveRunConfig(argv, env);
  } catch (error) {
    if (error instanceof ValidationError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return EXIT_CODES.FAILURE;
    }
    throw error;
  }

  const format = { jsonOutput: config.logJson, includeTimestamp: config.logTimestamps };
  const logger = createLogger('tank-gauge', {
    minLevel: parseLogLevel(config.logLevel),
    ...format,
    outputHandler: stderrOutput(format),
  });

  try {
    const reading = await runMeasurement(config, { logger });
    process.stdout.write(`${toLogLine(reading.document)}\n`);
    return EXIT_CODES.OK;
  } catch (error) {
    if (error instanceof GaugeError) {
      logger.error(error.message, undefined, error.context);
    } else {
      logger.error('Measurement failed', error instanceof Error ? error : new Error(String(error)));
    }
    return exitCodeFor(error);
  }
}
