import { setTimeout as delay } from 'node:timers/promises';
import type pino from 'pino';
import { LlmError, SearchError } from '@newscheck/shared/src/utils/errors.js';

const DEFAULT_BASE_DELAY_MS = 1000;

const TRANSIENT_PATTERNS = [
  '429',
  'rate limit',
  'too many requests',
  '500',
  '502',
  '503',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'econnreset',
  'etimedout',
  'timeout',
  'network',
  'socket hang up',
  'econnrefused',
];

export interface RetryOptions {
  readonly maxRetries: number;
  readonly baseDelayMs?: number;
  readonly signal?: AbortSignal;
  readonly operation: string;
  readonly log: pino.Logger;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof LlmError || error instanceof SearchError) {
    return error.isTransient;
  }

  if (!(error instanceof Error)) {
    return false;
  }

  if (error.name === 'AbortError') {
    return false;
  }

  const statusCode =
    'status' in error && typeof error.status === 'number'
      ? error.status
      : 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : undefined;

  if (statusCode !== undefined) {
    return statusCode === 429 || statusCode >= 500;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

export function computeBackoffMs(attempt: number, baseDelayMs = DEFAULT_BASE_DELAY_MS): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

/** Retries `fn` on transient errors with exponential backoff; other errors are rethrown at once. */
export async function retryTransient<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs = DEFAULT_BASE_DELAY_MS, signal, operation, log } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (signal?.aborted || attempt >= maxRetries || !isTransientError(error)) {
        throw error;
      }

      log.warn(
        {
          attempt: attempt + 1,
          maxRetries,
          error: error instanceof Error ? error.message : String(error),
        },
        `Transient ${operation} error, retrying`,
      );

      await delay(computeBackoffMs(attempt, baseDelayMs), undefined, { signal });
    }
  }
}
