/**
 * Retry Infrastructure - bounded retries with fixed or exponential delay
 *
 * Features:
 * - Configurable attempt count and delays (fixed delay with multiplier 1)
 * - Jitter support
 * - Custom retry predicates per error type
 * - Per-attempt timeout
 * - onRetry callbacks for observability
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('retry');

// =============================================================================
// TYPES
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts, first one included (default: 3) */
  maxAttempts?: number;
  /** Minimum delay in ms (default: 1000) */
  minDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Jitter factor 0-1 (default: 0) */
  jitter?: number;
  /** Backoff multiplier; 1 gives a fixed delay (default: 2) */
  backoffMultiplier?: number;
  /** Custom predicate to determine if error is retryable */
  retryPredicate?: (error: Error, attempt: number) => boolean;
  /** Callback on each failed attempt */
  onRetry?: (info: RetryInfo) => void;
  /** Timeout per attempt in ms */
  timeout?: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delay: number;
  error: Error;
  willRetry: boolean;
}

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * An error that should be retried.
 */
export class RetryableError extends Error {
  readonly retryable: boolean = true;

  constructor(message: string) {
    super(message);
    this.name = 'RetryableError';
  }
}

/**
 * A transient/network error. Retryable by default.
 */
export class TransientError extends RetryableError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'TransientError';
    this.statusCode = statusCode;
  }
}

/**
 * An error that should NOT be retried (4xx client errors, validation errors).
 */
export class NonRetryableError extends Error {
  readonly retryable: boolean = false;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'NonRetryableError';
    this.statusCode = statusCode;
  }
}

// =============================================================================
// TRANSIENT ERROR DETECTION
// =============================================================================

/** Common transient error message patterns */
const TRANSIENT_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'econnaborted',
  'epipe',
  'enetunreach',
  'ehostunreach',
  'socket hang up',
  'network error',
  'fetch failed',
  'connection reset',
  'service unavailable',
  'bad gateway',
  'gateway timeout',
  'request timeout',
];

/**
 * Detect transient/network errors that are safe to retry.
 */
export function isTransientError(err: Error): boolean {
  if (err instanceof RetryableError || err instanceof NonRetryableError) {
    return err.retryable;
  }

  if (err.name === 'AbortError' || err.name === 'TimeoutError') {
    return true;
  }

  const message = err.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => message.includes(p))) {
    return true;
  }

  return /\b(status\s*[:=]?\s*|http\s+)(429|50[0-4])\b/i.test(err.message);
}

/**
 * Map an HTTP status to the matching error class.
 */
export function errorForStatus(status: number, body: string): Error {
  const message = `HTTP ${status}: ${body.slice(0, 500)}`;
  if (status === 429 || (status >= 500 && status <= 504)) {
    return new TransientError(message, status);
  }
  return new NonRetryableError(message, status);
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

/**
 * Calculate delay with exponential backoff and jitter.
 */
export function calculateDelay(
  attempt: number,
  config: Required<Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'jitter' | 'backoffMultiplier'>>
): number {
  const exponentialDelay = config.minDelay * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);

  const jitterRange = cappedDelay * config.jitter;
  const jitterValue = (Math.random() * 2 - 1) * jitterRange;

  return Math.round(Math.max(0, cappedDelay + jitterValue));
}

/**
 * Sleep for specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// withRetry - GENERIC RETRY WRAPPER
// =============================================================================

/**
 * Execute a function with automatic retry on transient errors.
 *
 * @example
 * ```ts
 * const sid = await withRetry(() => createCall(params), {
 *   maxAttempts: 3,
 *   minDelay: 5000,
 *   backoffMultiplier: 1,
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    minDelay = 1000,
    maxDelay = 30000,
    jitter = 0,
    backoffMultiplier = 2,
    retryPredicate = isTransientError,
    onRetry,
    timeout,
    sleep: wait = sleep,
  } = options;

  let lastError: Error = new Error('withRetry called with maxAttempts < 1');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      if (timeout) {
        return await withTimeout(fn(), timeout);
      }
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < maxAttempts && retryPredicate(lastError, attempt);
      const delay = calculateDelay(attempt, { minDelay, maxDelay, jitter, backoffMultiplier });

      onRetry?.({ attempt, maxAttempts, delay, error: lastError, willRetry });

      logger.debug(
        { attempt, maxAttempts, delay, willRetry, error: lastError.message },
        'Retry attempt'
      );

      if (!willRetry) {
        break;
      }

      await wait(delay);
    }
  }

  throw lastError;
}

// =============================================================================
// withTimeout - PROMISE TIMEOUT WRAPPER
// =============================================================================

/**
 * Wrap a promise with a timeout. Rejects with TransientError if the
 * operation does not complete within `timeoutMs` milliseconds.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TransientError(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}
