/**
 * Retry-forever wrapper for remote calls
 */

import pRetry, { AbortError } from 'p-retry';
import type { Logger } from './logger.js';

export interface RetryPolicy {
  /** Fixed pause between attempts */
  backoffMs: number;
  isRetriable: (error: unknown) => boolean;
}

export const DEFAULT_BACKOFF_MS = 10_000;

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENETDOWN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

// FetchError also covers bodies cut short mid-transfer ("Premature close")
const TRANSIENT_ERROR_NAMES = new Set(['FetchError', 'AbortError', 'TimeoutError']);

function readProperty(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined;
}

/**
 * Network timeouts, dropped connections and server-side 5xx/429 responses
 */
export function isTransientNetworkError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }

  const name = readProperty(error, 'name');
  if (typeof name === 'string' && TRANSIENT_ERROR_NAMES.has(name)) {
    return true;
  }

  const status = readProperty(error, 'status');
  if (typeof status === 'number' && (status >= 500 || status === 429)) {
    return true;
  }

  // undici wraps the socket error in `cause`
  const cause = readProperty(error, 'cause');
  return cause !== undefined && cause !== error && isTransientNetworkError(cause);
}

export function defaultRetryPolicy(backoffMs: number = DEFAULT_BACKOFF_MS): RetryPolicy {
  return { backoffMs, isRetriable: isTransientNetworkError };
}

/**
 * Run `operation` until it succeeds or fails with a non-retriable error.
 * There is no attempt cap and no jitter.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  label: string
): Promise<T> {
  return pRetry(
    async () => {
      try {
        return await operation();
      } catch (error) {
        if (policy.isRetriable(error)) {
          // p-retry gives up on a TypeError it does not recognise as a network error
          throw error instanceof Error && !(error instanceof TypeError)
            ? error
            : new Error(String(error), { cause: error });
        }
        throw new AbortError(error instanceof Error ? error : new Error(String(error)));
      }
    },
    {
      retries: 0,
      forever: true,
      factor: 1,
      minTimeout: policy.backoffMs,
      maxTimeout: policy.backoffMs,
      randomize: false,
      onFailedAttempt: error => {
        logger.error(
          `Network error during ${label} (attempt ${error.attemptNumber}), retrying in ${policy.backoffMs}ms`,
          error,
          'retry'
        );
      },
    }
  );
}
