/**
 * Backend Error Converter - Maps SDK errors onto inference error kinds
 *
 * The OpenAI and Anthropic SDKs throw errors carrying an HTTP `status`,
 * response `headers` and class names such as RateLimitError or
 * APIConnectionError. Those are classified by status first, then by name,
 * then by message patterns.
 */

import {
  BackendUnavailableError,
  InferenceError,
  InferenceTimeoutError,
  InvalidParamsError,
  RateLimitedError,
} from '../errors/index.js';

/**
 * Error pattern definition
 */
interface ErrorPattern {
  /** Check if the error matches this pattern */
  matches: (error: unknown) => boolean;
  /** Convert the error to an inference error */
  convert: (error: unknown, provider: string) => InferenceError;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Helper to extract error message from unknown error
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function getCause(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Helper to get HTTP status from error object
 */
function getStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const status = error.status ?? error.statusCode;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Names an error goes by: its `name` and its class name
 *
 * SDK error classes do not always set `name`, so the constructor name is
 * checked as well.
 */
function getErrorNames(error: unknown): string[] {
  if (!isRecord(error)) return [];
  const names: string[] = [];
  if (typeof error.name === 'string') names.push(error.name);
  if (error instanceof Error && error.constructor.name !== error.name) {
    names.push(error.constructor.name);
  }
  return names;
}

function hasName(error: unknown, ...candidates: string[]): boolean {
  const names = getErrorNames(error);
  return candidates.some((candidate) => names.includes(candidate));
}

function statusIn(error: unknown, ...codes: number[]): boolean {
  const status = getStatus(error);
  return status !== undefined && codes.includes(status);
}

function isRateLimitMessage(message: string): boolean {
  const rateLimitPatterns = [/rate.?limit/i, /too.?many.?requests/i, /throttl/i, /overloaded/i];
  return rateLimitPatterns.some((pattern) => pattern.test(message));
}

function isNetworkMessage(message: string): boolean {
  const networkPatterns = [
    /network/i,
    /connection/i,
    /ECONNREFUSED/i,
    /ENOTFOUND/i,
    /ECONNRESET/i,
    /EAI_AGAIN/i,
    /fetch failed/i,
    /socket/i,
  ];
  return networkPatterns.some((pattern) => pattern.test(message));
}

function isTimeoutMessage(message: string): boolean {
  const timeoutPatterns = [/timeout/i, /timed.?out/i, /deadline/i, /ETIMEDOUT/i];
  return timeoutPatterns.some((pattern) => pattern.test(message));
}

// ============================================
// Retry-After
// ============================================

/**
 * Parse a Retry-After header value (delay in seconds or an HTTP-date)
 *
 * @returns Delay in milliseconds, or undefined when the value is unusable
 */
export function parseRetryAfter(
  value: string | undefined | null,
  now: () => number = Date.now
): number | undefined {
  if (value == null || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();

  const seconds = Number(trimmed);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds * 1000);
  }

  const dateMs = Date.parse(trimmed);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - now();
    return delayMs > 0 ? Math.ceil(delayMs) : 0;
  }

  return undefined;
}

/**
 * Read a header from either a fetch `Headers` instance or a plain record
 */
function getHeaderValue(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }

  if (isRecord(headers)) {
    for (const key of Object.keys(headers)) {
      if (key.toLowerCase() === name) {
        const value = headers[key];
        return typeof value === 'string' ? value : undefined;
      }
    }
  }

  return undefined;
}

/**
 * Delay requested by the backend on a rate-limited response
 *
 * `retry-after-ms` (sent by OpenAI-compatible endpoints) takes precedence
 * over the standard `retry-after`.
 */
export function extractRetryAfterMs(error: unknown, now: () => number = Date.now): number | undefined {
  if (!isRecord(error)) return undefined;
  const headers = error.headers;

  const msValue = getHeaderValue(headers, 'retry-after-ms');
  if (msValue !== undefined) {
    const ms = Number(msValue.trim());
    if (Number.isFinite(ms) && ms >= 0) {
      return Math.ceil(ms);
    }
  }

  return parseRetryAfter(getHeaderValue(headers, 'retry-after'), now);
}

// ============================================
// Patterns
// ============================================

/**
 * Ordered classification rules; the first match wins
 */
const patterns: ErrorPattern[] = [
  {
    matches: (error) =>
      hasName(error, 'AbortError', 'APIConnectionTimeoutError', 'TimeoutError') || statusIn(error, 408),
    convert: (error, provider) =>
      new InferenceTimeoutError(getErrorMessage(error), { provider, cause: getCause(error) }),
  },
  {
    matches: (error) => hasName(error, 'RateLimitError') || statusIn(error, 429),
    convert: (error, provider) =>
      new RateLimitedError(getErrorMessage(error), {
        provider,
        retryAfterMs: extractRetryAfterMs(error),
        cause: getCause(error),
      }),
  },
  {
    matches: (error) =>
      hasName(error, 'AuthenticationError', 'PermissionDeniedError') || statusIn(error, 401, 403),
    convert: (error, provider) =>
      new InvalidParamsError(`Authentication failed: ${getErrorMessage(error)}`, {
        code: 'BACKEND_AUTH_FAILED',
        provider,
        cause: getCause(error),
      }),
  },
  {
    matches: (error) =>
      hasName(error, 'BadRequestError', 'NotFoundError', 'UnprocessableEntityError') ||
      statusIn(error, 400, 404, 422),
    convert: (error, provider) =>
      new InvalidParamsError(getErrorMessage(error), { provider, cause: getCause(error) }),
  },
  {
    matches: (error) => {
      const status = getStatus(error);
      return hasName(error, 'InternalServerError') || (status !== undefined && status >= 500 && status < 600);
    },
    convert: (error, provider) => {
      const status = getStatus(error);
      const message = getErrorMessage(error);
      return new BackendUnavailableError(status ? `Server error (${status}): ${message}` : message, {
        provider,
        cause: getCause(error),
      });
    },
  },
  {
    matches: (error) => hasName(error, 'APIConnectionError') || isNetworkMessage(getErrorMessage(error)),
    convert: (error, provider) =>
      new BackendUnavailableError(getErrorMessage(error), { provider, cause: getCause(error) }),
  },
  {
    matches: (error) => isTimeoutMessage(getErrorMessage(error)),
    convert: (error, provider) =>
      new InferenceTimeoutError(getErrorMessage(error), { provider, cause: getCause(error) }),
  },
  {
    matches: (error) => isRateLimitMessage(getErrorMessage(error)),
    convert: (error, provider) =>
      new RateLimitedError(getErrorMessage(error), { provider, cause: getCause(error) }),
  },
];

/**
 * Convert a backend SDK error to an InferenceError
 *
 * @param error - The original error from the SDK
 * @param provider - Backend name recorded on the converted error
 * @returns The matching InferenceError subtype; unrecognized errors become a
 *   non-retryable BackendUnavailableError
 *
 * @example
 * ```typescript
 * try {
 *   await client.chat.completions.create(...);
 * } catch (error) {
 *   throw convertBackendError(error, 'openai');
 * }
 * ```
 */
export function convertBackendError(error: unknown, provider: string): InferenceError {
  if (error instanceof InferenceError) {
    return error;
  }

  for (const pattern of patterns) {
    if (pattern.matches(error)) {
      return pattern.convert(error, provider);
    }
  }

  return new BackendUnavailableError(getErrorMessage(error), {
    provider,
    retryable: false,
    cause: getCause(error),
  });
}
