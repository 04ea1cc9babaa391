/**
 * Timestamp parsing plus the day and snapshot keys derived from event times.
 * All calendar fields are read in UTC: the event log records server time in UTC.
 */

import { AppError } from './logger.js';

// 2021-03-04T05:06:07.891Z, 2021-03-04 05:06:07.891234, 2021-03-04 05:06:07
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]00:?00)?$/;

export function parseTimestamp(value: unknown): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new AppError('Invalid date value', 'INVALID_TIMESTAMP');
    }
    return value;
  }

  if (typeof value !== 'string') {
    throw new AppError(`Cannot parse timestamp ${String(value)}`, 'INVALID_TIMESTAMP', { value: String(value) });
  }

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new AppError(`Cannot parse timestamp "${value}"`, 'INVALID_TIMESTAMP', { value });
  }

  const [, year, month, day, hours, minutes, seconds, fraction = '0'] = match;
  const milliseconds = Number(fraction.padEnd(3, '0').slice(0, 3));
  const date = new Date(Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds),
    milliseconds
  ));

  if (Number.isNaN(date.getTime()) || date.getUTCDate() !== Number(day)) {
    throw new AppError(`Cannot parse timestamp "${value}"`, 'INVALID_TIMESTAMP', { value });
  }
  return date;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function dayKey(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * {prefix}_{YYYYMMDD_HHMMSS}_{mmm}
 */
export function snapshotName(prefix: string, date: Date): string {
  const datePart = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const timePart = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${prefix}_${datePart}_${timePart}_${pad(date.getUTCMilliseconds(), 3)}`;
}
