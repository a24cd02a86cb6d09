/**
 * Structured Logging Utility
 *
 * Module-scoped loggers with levels, structured context and an
 * optional JSON line format. There is no process-wide configuration:
 * the entry point builds one {@link LoggerConfig} and hands loggers
 * down to the components it constructs.
 *
 * @module utils/logger
 */

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Log level string representations
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure
 */
export interface LogEntry {
  /** Timestamp in ISO format */
  timestamp: string;

  level: LogLevelName;

  /** Module/component name */
  module: string;

  message: string;

  /** Additional context data */
  context?: Record<string, unknown>;

  error?: Error;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;

  /** Emit one JSON object per entry */
  jsonOutput?: boolean;

  /** Include timestamps in human-readable output */
  includeTimestamp?: boolean;

  /** Custom output handler (default: console) */
  outputHandler?: (entry: LogEntry) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  jsonOutput: false,
  includeTimestamp: true,
};

/**
 * Parse log level from string. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.INFO;

  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'none':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Get log level name from enum
 */
export function getLevelName(level: LogLevel): LogLevelName {
  switch (level) {
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.SILENT:
      return 'silent';
    default:
      return 'info';
  }
}

/**
 * Format log entry for console output
 */
export function formatLogEntry(entry: LogEntry, includeTimestamp: boolean = true): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`);
  parts.push(`[${entry.module}]`);
  parts.push(entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

/**
 * Render an entry the way `config` asks: one JSON object, or the
 * human-readable line
 */
export function renderLogEntry(
  entry: LogEntry,
  config: Pick<LoggerConfig, 'jsonOutput' | 'includeTimestamp'>
): string {
  return config.jsonOutput
    ? JSON.stringify(entry)
    : formatLogEntry(entry, config.includeTimestamp ?? true);
}

function consoleOutput(entry: LogEntry, config: LoggerConfig): void {
  const output = renderLogEntry(entry, config);

  switch (entry.level) {
    case 'error':
      console.error(output);
      if (entry.error) {
        console.error(entry.error);
      }
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

/**
 * Module-specific logger instance
 */
export class Logger {
  private module: string;
  private config: LoggerConfig;

  constructor(module: string, config?: Partial<LoggerConfig>) {
    this.module = module;
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: getLevelName(level),
      module: this.module,
      message,
      context,
      error,
    };

    if (this.config.outputHandler) {
      this.config.outputHandler(entry);
    } else {
      consoleOutput(entry, this.config);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Create a child logger sharing this logger's configuration
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.config);
  }

  /**
   * Create a logger that adds fixed context to every entry
   */
  withContext(fixedContext: Record<string, unknown>): LoggerWithContext {
    return new LoggerWithContext(this, fixedContext);
  }
}

/**
 * Logger with fixed context that's included in every log
 */
export class LoggerWithContext {
  private logger: Logger;
  private fixedContext: Record<string, unknown>;

  constructor(logger: Logger, fixedContext: Record<string, unknown>) {
    this.logger = logger;
    this.fixedContext = fixedContext;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(message, { ...this.fixedContext, ...context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(message, { ...this.fixedContext, ...context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, { ...this.fixedContext, ...context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(message, error, { ...this.fixedContext, ...context });
  }
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(module, config);
}

/**
 * Create a silent logger (components fall back to this)
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}
