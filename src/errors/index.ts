/**
 * Custom Error classes for the persona runtime
 */

export interface ErrorOptions {
  code: string;
  provider?: string;
  retryable?: boolean;
  cause?: Error;
}

type SubclassErrorOptions = Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>>;

/**
 * Base error class for all runtime errors
 */
export class PersonaRuntimeError extends Error {
  public readonly code: string;
  public readonly provider?: string;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, options: ErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.provider = options.provider;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      provider: this.provider,
      retryable: this.retryable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

// ============================================
// Configuration
// ============================================

export interface ConfigErrorOptions extends SubclassErrorOptions {
  /** Where the offending document came from (file path or label) */
  location?: string;
  /** Individual validation problems, formatted as `path: message` */
  issues?: string[];
}

/**
 * Malformed or missing persona fields. Fatal to startup, never retried.
 */
export class ConfigError extends PersonaRuntimeError {
  public readonly location?: string;
  public readonly issues: readonly string[];

  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'CONFIG_ERROR',
      provider: options.provider,
      retryable: false,
      cause: options.cause,
    });
    this.location = options.location;
    this.issues = Object.freeze([...(options.issues ?? [])]);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      location: this.location,
      issues: [...this.issues],
    };
  }
}

// ============================================
// Prompt assembly
// ============================================

/**
 * Prompt exceeds the size limit even after truncation
 */
export class AssemblyError extends PersonaRuntimeError {
  constructor(message: string, options: SubclassErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'ASSEMBLY_ERROR',
      provider: options.provider,
      retryable: false,
      cause: options.cause,
    });
  }
}

// ============================================
// Inference
// ============================================

export type InferenceErrorKind = 'timeout' | 'rate_limited' | 'backend_unavailable' | 'invalid_params';

/**
 * Failure reported by an inference backend.
 *
 * `retryCount` is filled in by the retry loop when the error is surfaced
 * after one or more retries.
 */
export abstract class InferenceError extends PersonaRuntimeError {
  abstract readonly kind: InferenceErrorKind;
  public retryCount = 0;

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      retryCount: this.retryCount,
    };
  }
}

/**
 * Inference call exceeded its per-attempt timeout
 */
export class InferenceTimeoutError extends InferenceError {
  readonly kind = 'timeout';

  constructor(message: string = 'Inference request timed out', options: SubclassErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'INFERENCE_TIMEOUT',
      provider: options.provider,
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
  }
}

export interface RateLimitedErrorOptions extends SubclassErrorOptions {
  /** Delay requested by the backend before the next attempt */
  retryAfterMs?: number;
}

/**
 * Backend rejected the request because of rate limiting
 */
export class RateLimitedError extends InferenceError {
  readonly kind = 'rate_limited';
  public readonly retryAfterMs?: number;

  constructor(message: string = 'Backend rate limit exceeded', options: RateLimitedErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'RATE_LIMITED',
      provider: options.provider,
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
    this.retryAfterMs = options.retryAfterMs;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
  }
}

/**
 * Backend could not be reached or failed on its side
 */
export class BackendUnavailableError extends InferenceError {
  readonly kind = 'backend_unavailable';

  constructor(message: string = 'Inference backend unavailable', options: SubclassErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'BACKEND_UNAVAILABLE',
      provider: options.provider,
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
  }
}

/**
 * Request was rejected as invalid. Never retried.
 */
export class InvalidParamsError extends InferenceError {
  readonly kind = 'invalid_params';

  constructor(message: string, options: Omit<SubclassErrorOptions, 'retryable'> = {}) {
    super(message, {
      code: options.code ?? 'INVALID_PARAMS',
      provider: options.provider,
      retryable: false,
      cause: options.cause,
    });
  }
}

// ============================================
// Sessions
// ============================================

/**
 * Session-related error
 */
export class SessionError extends PersonaRuntimeError {
  constructor(message: string, options: SubclassErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'SESSION_ERROR',
      provider: options.provider,
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
  }
}

/**
 * Narrow an unknown failure to an InferenceError
 */
export function isInferenceError(error: unknown): error is InferenceError {
  return error instanceof InferenceError;
}
