/**
 * Leveled console logging with an optional append-only log file
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  /** Plain-text copy of every emitted line is appended here */
  filePath?: string;
  /** Suppresses console output; the file sink still receives entries */
  silent?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

const CONSOLE_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};
const RESET = '\x1b[0m';

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.log(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

export class Logger {
  private minLevel: LogLevel;
  private filePath?: string;
  private silent: boolean;
  private counts: Record<LogLevel, number> = { debug: 0, info: 0, warn: 0, error: 0 };

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.filePath = options.filePath;
    this.silent = options.silent ?? false;

    if (this.filePath) {
      mkdirSync(dirname(this.filePath), { recursive: true });
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}] ` : '';

    let message = `${timestamp} ${level} ${context}${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.counts[entry.level]++;
    const formatted = this.formatMessage(entry);

    if (this.filePath) {
      appendFileSync(this.filePath, formatted + '\n', 'utf-8');
    }

    if (!this.silent) {
      CONSOLE_WRITERS[entry.level](`${CONSOLE_COLORS[entry.level]}${formatted}${RESET}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, context });
  }

  /**
   * Number of entries emitted at each level since construction
   */
  getCounts(): Record<LogLevel, number> {
    return { ...this.counts };
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

export type ErrorCode =
  | 'HASH_MISMATCH'
  | 'MISSING_FIELD'
  | 'UNSUPPORTED_EVENT'
  | 'TREE_NOT_EMPTY'
  | 'INVALID_CONFIG'
  | 'INVALID_TIMESTAMP'
  | 'INVALID_PATH'
  | 'DOWNLOAD_FAILED'
  | 'UNKNOWN_ERROR';

/**
 * Fatal application error; anything that reaches the replay coordinator stops the run
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = 'UNKNOWN_ERROR',
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Normalise and log an error that is about to end the process
 */
export function handleError(error: unknown, logger: Logger, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(`${error.code}: ${error.message}`, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'UNKNOWN_ERROR');
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR');
  logger.error(String(error), undefined, context);
  return appError;
}
