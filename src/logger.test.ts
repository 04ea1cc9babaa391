import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { AppError, handleError, isLogLevel, Logger } from './logger.js';
import { makeTempDir } from '../tests/helpers.js';

describe('Logger', () => {
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Console Output', () => {
    it('routes levels to the matching console method', () => {
      const logger = new Logger({ minLevel: 'debug' });

      logger.debug('debugging');
      logger.info('informing');
      logger.warn('warning');
      logger.error('failing');

      expect(logSpy).toHaveBeenCalledTimes(2);
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('tags messages with their context', () => {
      const logger = new Logger();
      logger.info('Applying 3 revisions', undefined, 'ReplayEngine');

      expect(String(logSpy.mock.calls[0][0])).toContain('INFO  [ReplayEngine] Applying 3 revisions');
    });

    it('drops entries below the minimum level', () => {
      const logger = new Logger({ minLevel: 'warn' });
      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');

      expect(logSpy).not.toHaveBeenCalled();
      expect(logger.getCounts()).toEqual({ debug: 0, info: 0, warn: 1, error: 0 });
    });

    it('changes level at runtime', () => {
      const logger = new Logger({ minLevel: 'error' });
      logger.setMinLevel('debug');
      logger.debug('now visible');

      expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it('stays quiet when silent', () => {
      const logger = new Logger({ silent: true });
      logger.error('quiet failure');

      expect(errorSpy).not.toHaveBeenCalled();
      expect(logger.getCounts().error).toBe(1);
    });
  });

  describe('File Sink', () => {
    it('appends plain lines with data and errors', () => {
      const filePath = join(makeTempDir('logger'), 'logs', 'download.log');
      const logger = new Logger({ filePath, silent: true });

      logger.info('first', { batch: 1 });
      logger.error('second', new Error('boom'), 'Retry');

      const lines = readFileSync(filePath, 'utf-8').split('\n');
      expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INFO  first$/);
      expect(lines[1]).toBe('  {');
      expect(lines[2]).toBe('    "batch": 1');
      expect(lines[3]).toBe('  }');
      expect(lines[4]).toMatch(/ERROR \[Retry\] second$/);
      expect(lines[5]).toBe('  Error: boom');
    });
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe('AppError', () => {
  it('carries a code and context', () => {
    const error = new AppError('bad hash', 'HASH_MISMATCH', { path: '/a' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AppError');
    expect(error.code).toBe('HASH_MISMATCH');
    expect(error.context).toEqual({ path: '/a' });
  });

  it('defaults to UNKNOWN_ERROR', () => {
    expect(new AppError('something').code).toBe('UNKNOWN_ERROR');
  });
});

describe('handleError', () => {
  const logger = new Logger({ silent: true });

  it('returns application errors unchanged', () => {
    const error = new AppError('no tree', 'TREE_NOT_EMPTY');
    expect(handleError(error, logger)).toBe(error);
  });

  it('wraps plain errors and other values', () => {
    expect(handleError(new Error('disk full'), logger)).toMatchObject({ code: 'UNKNOWN_ERROR', message: 'disk full' });
    expect(handleError('interrupted', logger)).toMatchObject({ code: 'UNKNOWN_ERROR', message: 'interrupted' });
  });
});
