/**
 * Run configuration
 *
 * Resolves command-line flags and environment into a {@link RunConfig}.
 * Flags win over environment, environment over defaults.
 *
 * @module config/run-config
 */

import { parseArgs } from 'util';
import type { CameraConfig, RunConfig } from '../types';
import { DEFAULT_GAUGE_CONFIG, DEFAULT_PREPROCESS_CONFIG, ENV_VARS } from './defaults';
import { getLevelName, parseLogLevel } from '../utils/logger';
import {
  ValidationError,
  parseNumber,
  validateFiniteNumber,
  validateInteger,
  validatePositiveNumber,
} from '../utils/validation';

export const CLI_OPTIONS = {
  host: { type: 'string' },
  username: { type: 'string' },
  password: { type: 'string' },
  mapping: { type: 'string' },
  dump: { type: 'string' },
  loglevel: { type: 'string' },
  'log-json': { type: 'boolean' },
  'no-log-timestamps': { type: 'boolean' },
  'strip-width': { type: 'string' },
  'strip-offset': { type: 'string' },
  'image-height': { type: 'string' },
  edge: { type: 'string' },
  'bright-threshold': { type: 'string' },
  'zero-run-length': { type: 'string' },
  'liter-per-cm': { type: 'string' },
  'convert-command': { type: 'string' },
  'confirmation-image': { type: 'string' },
  'keep-txt-file': { type: 'boolean' },
  output: { type: 'string' },
  snapshot: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

export const USAGE = `Usage: tank-gauge --mapping <file> (--host <host> --username <user> --password <pass> | --dump <file>) [options]

Measure a tank level from a calibrated sight-glass camera image.

Required:
  --mapping <file>             Calibration file (YAML or .json), cm -> pixel row
  --host <host>                Camera host (not needed with --dump)
  --username <user>            Camera user
  --password <pass>            Camera password (or ${ENV_VARS.cameraPassword})

Input:
  --dump <file>                Measure an existing brightness dump instead

Detection:
  --bright-threshold <n>       Brightness that opens the search (default ${DEFAULT_GAUGE_CONFIG.brightThreshold})
  --zero-run-length <n>        Zero samples that make the surface (default ${DEFAULT_GAUGE_CONFIG.zeroRunLength})
  --liter-per-cm <n>           Liters per cm (default ${DEFAULT_GAUGE_CONFIG.litersPerUnit})

Strip:
  --strip-offset <px>          Strip left edge (default ${DEFAULT_PREPROCESS_CONFIG.stripOffset})
  --strip-width <px>           Strip width (default ${DEFAULT_PREPROCESS_CONFIG.stripWidth})
  --image-height <px>          Image height (default ${DEFAULT_PREPROCESS_CONFIG.imageHeight})
  --edge <n>                   Edge detection radius (default ${DEFAULT_PREPROCESS_CONFIG.edge})
  --convert-command <cmd>      ImageMagick executable (default ${DEFAULT_PREPROCESS_CONFIG.convertCommand})

Output:
  --output <file>              Append the JSON record to this log
  --snapshot <file>            Write the JSON record, pretty-printed, to this file
  --confirmation-image <file>  Write a PNG with the detected level marked
  --keep-txt-file              Keep the temporary brightness dump
  --loglevel <level>           debug, info, warn, error or silent (or ${ENV_VARS.logLevel})
  --log-json                   Write log entries to stderr as JSON lines
  --no-log-timestamps          Leave timestamps off human-readable log lines
  -h, --help                   Show this help
`;

/**
 * True when the arguments ask for help
 */
export function wantsHelp(argv: readonly string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function parseCliArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: CLI_OPTIONS, strict: true, allowPositionals: false });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(reason, 'arguments', argv.join(' '));
  }
}

function optionalNumber(raw: string | undefined, name: string): number | undefined {
  return raw === undefined ? undefined : parseNumber(raw, name);
}

function required(value: string | undefined, name: string): string {
  if (value === undefined || value.trim() === '') {
    throw new ValidationError('is required', name, value);
  }
  return value;
}

export function resolveRunConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const { values } = parseCliArgs(argv);

  const mappingPath = required(values.mapping, 'mapping');
  const dumpPath = values.dump;

  let camera: CameraConfig | undefined;
  if (dumpPath === undefined) {
    camera = {
      host: required(values.host, 'host'),
      username: required(values.username, 'username'),
      password: required(values.password ?? env[ENV_VARS.cameraPassword], 'password'),
    };
  }

  const gauge = {
    brightThreshold: validateFiniteNumber(
      optionalNumber(values['bright-threshold'], 'bright-threshold') ?? DEFAULT_GAUGE_CONFIG.brightThreshold,
      'bright-threshold'
    ),
    zeroRunLength: validateInteger(
      optionalNumber(values['zero-run-length'], 'zero-run-length') ?? DEFAULT_GAUGE_CONFIG.zeroRunLength,
      'zero-run-length',
      1
    ),
    litersPerUnit: validatePositiveNumber(
      optionalNumber(values['liter-per-cm'], 'liter-per-cm') ?? DEFAULT_GAUGE_CONFIG.litersPerUnit,
      'liter-per-cm'
    ),
  };

  const preprocess = {
    stripOffset: validateInteger(
      optionalNumber(values['strip-offset'], 'strip-offset') ?? DEFAULT_PREPROCESS_CONFIG.stripOffset,
      'strip-offset',
      0
    ),
    stripWidth: validateInteger(
      optionalNumber(values['strip-width'], 'strip-width') ?? DEFAULT_PREPROCESS_CONFIG.stripWidth,
      'strip-width',
      1
    ),
    imageHeight: validateInteger(
      optionalNumber(values['image-height'], 'image-height') ?? DEFAULT_PREPROCESS_CONFIG.imageHeight,
      'image-height',
      1
    ),
    edge: validateInteger(optionalNumber(values.edge, 'edge') ?? DEFAULT_PREPROCESS_CONFIG.edge, 'edge', 1),
    convertCommand: values['convert-command'] ?? DEFAULT_PREPROCESS_CONFIG.convertCommand,
  };

  return {
    gauge,
    preprocess,
    camera,
    mappingPath,
    dumpPath,
    output: values.output,
    snapshot: values.snapshot,
    confirmationImage: values['confirmation-image'],
    keepDumpFile: values['keep-txt-file'] ?? false,
    logLevel: getLevelName(parseLogLevel(values.loglevel ?? env[ENV_VARS.logLevel])),
    logJson: values['log-json'] ?? false,
    logTimestamps: !(values['no-log-timestamps'] ?? false),
  };
}
