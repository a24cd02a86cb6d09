/**
 * Utility exports
 * @module utils
 */

export { lerp, round } from './math';

export {
  ValidationError,
  validateFiniteNumber,
  validatePositiveNumber,
  validateInteger,
  parseNumber,
} from './validation';

export {
  Logger,
  LoggerWithContext,
  LogLevel,
  DEFAULT_LOGGER_CONFIG,
  createLogger,
  createSilentLogger,
  parseLogLevel,
  getLevelName,
  formatLogEntry,
  renderLogEntry,
  type LogEntry,
  type LoggerConfig,
  type LogLevelName,
} from './logger';
