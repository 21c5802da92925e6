/**
 * Retry utility with exponential backoff and jitter
 */

import { RUNTIME_DEFAULTS } from '../config/defaults.js';
import { InferenceError, PersonaRuntimeError, RateLimitedError } from '../errors/index.js';
import { createLogger } from './logger.js';

const logger = createLogger('Retry');

export interface RetryOptions {
  /**
   * Maximum number of retry attempts AFTER the initial attempt.
   * Total attempts = 1 (initial) + maxRetries.
   *
   * @default 3
   */
  maxRetries: number;

  /**
   * Initial delay in milliseconds
   * @default 1000
   */
  baseDelay: number;

  /**
   * Maximum backoff delay in milliseconds
   * @default 30000
   */
  maxDelay: number;

  /**
   * Longest wait honoured for a rate limit's `retryAfterMs`; longer
   * requests are waited out for this long, then retried
   * @default 120000
   */
  maxRetryAfter: number;

  /**
   * Exponential backoff factor
   * @default 2
   */
  backoffFactor: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: RUNTIME_DEFAULTS.MAX_RETRIES,
  baseDelay: RUNTIME_DEFAULTS.BASE_DELAY_MS,
  maxDelay: RUNTIME_DEFAULTS.MAX_DELAY_MS,
  maxRetryAfter: RUNTIME_DEFAULTS.MAX_RETRY_AFTER_MS,
  backoffFactor: RUNTIME_DEFAULTS.BACKOFF_FACTOR,
};

/**
 * Calculate delay with exponential backoff and jitter
 *
 * The effective delay range for each attempt:
 * - Attempt 0: [0.5 * baseDelay, baseDelay]
 * - Attempt N: [0.5 * d, d] where d = min(baseDelay * backoffFactor^N, maxDelay)
 */
export function calculateDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
  backoffFactor: number
): number {
  const exponentialDelay = baseDelay * Math.pow(backoffFactor, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);

  // Always wait at least half the calculated delay
  const minDelay = cappedDelay * 0.5;
  const jitter = Math.random() * (cappedDelay - minDelay);

  return minDelay + jitter;
}

/**
 * Check if an error should be retried
 *
 * Only runtime errors flagged `retryable` are retried; anything else
 * (programming errors, unknown failures) surfaces immediately.
 */
function isRetryableError(error: unknown): boolean {
  return error instanceof PersonaRuntimeError && error.retryable;
}

/**
 * Delay before the next attempt
 */
function nextDelay(error: unknown, attempt: number, opts: RetryOptions): number {
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, opts.maxRetryAfter);
  }
  return calculateDelay(attempt, opts.baseDelay, opts.maxDelay, opts.backoffFactor);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic
 *
 * @param fn - The async function to execute; receives the zero-based attempt number
 * @param options - Retry options (see {@link RetryOptions})
 * @returns Promise that resolves with the function result
 * @throws The last error once it is not retryable or retries are exhausted.
 *   Inference errors carry the number of retries performed in `retryCount`.
 *
 * @example
 * ```typescript
 * // Will attempt up to 6 times (1 initial + 5 retries)
 * const result = await withRetry(
 *   async () => await backend.complete(request, signal),
 *   { maxRetries: 5, baseDelay: 2000 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>
): Promise<T> {
  const opts: RetryOptions = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };

  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error) || attempt >= opts.maxRetries) {
        if (error instanceof InferenceError) {
          error.retryCount = attempt;
        }
        throw error;
      }

      const delay = nextDelay(error, attempt, opts);
      logger.debug(
        {
          attempt: attempt + 1,
          maxRetries: opts.maxRetries,
          delayMs: Math.round(delay),
          error: error instanceof Error ? error.message : String(error),
        },
        'Retry attempt'
      );

      await sleep(delay);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}
