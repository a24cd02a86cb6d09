/**
 * Tests for structured logging utility
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  Logger,
  LogLevel,
  type LogEntry,
  createLogger,
  createSilentLogger,
  formatLogEntry,
  getLevelName,
  parseLogLevel,
  renderLogEntry,
} from '../../../src/utils/logger';

describe('Logger', () => {
  let consoleLogSpy: MockInstance<Parameters<typeof console.log>, void>;
  let consoleWarnSpy: MockInstance<Parameters<typeof console.log>, void>;
  let consoleErrorSpy: MockInstance<Parameters<typeof console.log>, void>;
  let consoleDebugSpy: MockInstance<Parameters<typeof console.log>, void>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleDebugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createLogger', () => {
    it('should include module name and timestamp', () => {
      createLogger('camera').info('Snapshot received');

      const output = String(consoleLogSpy.mock.calls[0][0]);
      expect(output).toContain('[camera]');
      expect(output).toContain('Snapshot received');
      expect(output).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\]/);
    });

    it('should default to INFO', () => {
      const logger = createLogger('test');
      logger.debug('hidden');
      logger.info('shown');

      expect(consoleDebugSpy).not.toHaveBeenCalled();
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('Log Levels', () => {
    it('should route each level to its console method', () => {
      const logger = createLogger('test', { minLevel: LogLevel.DEBUG });
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(String(consoleDebugSpy.mock.calls[0][0])).toContain('[DEBUG]');
      expect(String(consoleLogSpy.mock.calls[0][0])).toContain('[INFO]');
      expect(String(consoleWarnSpy.mock.calls[0][0])).toContain('[WARN]');
      expect(String(consoleErrorSpy.mock.calls[0][0])).toContain('[ERROR]');
    });

    it('should log error with Error object', () => {
      const error = new Error('Test error');
      createLogger('test').error('Something failed', error);

      expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
      expect(consoleErrorSpy).toHaveBeenCalledWith(error);
    });

    it('should only log errors when level is ERROR', () => {
      const logger = createLogger('test', { minLevel: LogLevel.ERROR });

      logger.debug('No');
      logger.info('No');
      logger.warn('No');
      logger.error('Yes');

      expect(consoleDebugSpy).not.toHaveBeenCalled();
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('independent configuration', () => {
    it('should not let one logger change another', () => {
      const verbose = createLogger('verbose', { minLevel: LogLevel.DEBUG });
      const quiet = createLogger('quiet', { minLevel: LogLevel.WARN });

      verbose.debug('from verbose');
      quiet.debug('from quiet');

      expect(consoleDebugSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleDebugSpy.mock.calls[0][0])).toContain('from verbose');
    });
  });

  describe('Context', () => {
    it('should append context as JSON', () => {
      const logger = new Logger('test', { includeTimestamp: false });
      logger.info('Bracket chosen', { before: 25, after: 0 });

      expect(consoleLogSpy).toHaveBeenCalledWith('[INFO] [test] Bracket chosen {"before":25,"after":0}');
    });
  });

  describe('Child Loggers', () => {
    it('should combine module names and keep the parent level', () => {
      const handler = vi.fn<[LogEntry], void>();
      const child = createLogger('gauge', { minLevel: LogLevel.DEBUG, outputHandler: handler }).child('locator');

      child.debug('Line found');

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0][0].module).toBe('gauge:locator');
    });
  });

  describe('Logger with Fixed Context', () => {
    it('should merge fixed context with log-specific context', () => {
      const handler = vi.fn<[LogEntry], void>();
      const logger = createLogger('test', { outputHandler: handler }).withContext({ host: 'camera.local' });

      logger.info('Message', { bytes: 1024 });
      logger.warn('Other');

      expect(handler.mock.calls[0][0].context).toEqual({ host: 'camera.local', bytes: 1024 });
      expect(handler.mock.calls[1][0].context).toEqual({ host: 'camera.local' });
    });
  });

  describe('createSilentLogger', () => {
    it('should create a logger that outputs nothing', () => {
      const logger = createSilentLogger('test');

      logger.debug('No');
      logger.info('No');
      logger.warn('No');
      logger.error('No');

      expect(consoleDebugSpy).not.toHaveBeenCalled();
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });

  describe('output options', () => {
    it('should allow JSON output format', () => {
      createLogger('test', { jsonOutput: true }).info('Test message');

      const parsed: LogEntry = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(parsed.message).toBe('Test message');
      expect(parsed.level).toBe('info');
      expect(parsed.module).toBe('test');
    });

    it('should support custom output handler', () => {
      const handler = vi.fn<[LogEntry], void>();
      createLogger('test', { outputHandler: handler }).info('Custom output');

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0][0].message).toBe('Custom output');
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });
});

describe('formatLogEntry', () => {
  const entry: LogEntry = {
    timestamp: '2026-01-01T00:00:00.000Z',
    level: 'warn',
    module: 'run',
    message: 'Skipping',
  };

  it('should format with timestamp', () => {
    expect(formatLogEntry(entry)).toBe('[2026-01-01T00:00:00.000Z] [WARN] [run] Skipping');
  });

  it('should omit the timestamp on request', () => {
    expect(formatLogEntry(entry, false)).toBe('[WARN] [run] Skipping');
  });

  it('should leave out empty context', () => {
    expect(formatLogEntry({ ...entry, context: {} }, false)).toBe('[WARN] [run] Skipping');
  });
});

describe('renderLogEntry', () => {
  const entry: LogEntry = {
    timestamp: '2026-01-01T00:00:00.000Z',
    level: 'info',
    module: 'run',
    message: 'Level measured',
    context: { pixel: 11 },
  };

  it('should render one JSON object when jsonOutput is set', () => {
    expect(renderLogEntry(entry, { jsonOutput: true })).toBe(
      '{"timestamp":"2026-01-01T00:00:00.000Z","level":"info","module":"run","message":"Level measured","context":{"pixel":11}}'
    );
  });

  it('should honour includeTimestamp for text output', () => {
    expect(renderLogEntry(entry, { includeTimestamp: false })).toBe('[INFO] [run] Level measured {"pixel":11}');
    expect(renderLogEntry(entry, {})).toBe(
      '[2026-01-01T00:00:00.000Z] [INFO] [run] Level measured {"pixel":11}'
    );
  });
});

describe('parseLogLevel', () => {
  it('should accept level names case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('Debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
  });

  it('should handle aliases', () => {
    expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
    expect(parseLogLevel('none')).toBe(LogLevel.SILENT);
  });

  it('should fall back to INFO', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });

  it('should round-trip through getLevelName', () => {
    expect(getLevelName(parseLogLevel('silent'))).toBe('silent');
  });
});
