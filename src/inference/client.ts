/**
 * Inference Client - Sends assembled prompts to a backend with timeout and retry
 */

import { RUNTIME_DEFAULTS } from '../config/defaults.js';
import { BackendUnavailableError, InferenceTimeoutError, InvalidParamsError } from '../errors/index.js';
import { GenerationParamsSchema } from '../types/schemas.js';
import type {
  AssembledPrompt,
  BackendCompletion,
  BackendRequest,
  CompletionResult,
  GenerationParams,
  InferenceBackend,
  ModelParams,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_RETRY_OPTIONS, withRetry, type RetryOptions } from '../utils/retry.js';
import { convertBackendError } from './error-converter.js';

const logger = createLogger('InferenceClient');

export interface InferenceClientOptions {
  backend: InferenceBackend;
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number;
  /** Model override applied to every request (takes precedence over the persona's model) */
  model?: string;
  retry?: Partial<RetryOptions>;
}

/**
 * Inference Client
 *
 * Every attempt runs under its own timeout; when it fires the backend's
 * AbortSignal is aborted and the attempt fails with InferenceTimeoutError.
 * Retryable failures are retried with exponential backoff (rate limits
 * honour the backend's Retry-After, up to `maxRetryAfter`). A blank reply
 * counts as a retryable backend failure. Out-of-range parameters fail
 * before any request is made.
 *
 * @example
 * const client = new InferenceClient({ backend: new OpenAIBackend(), timeoutMs: 30000 });
 * const result = await client.complete(prompt, persona.modelParams);
 */
export class InferenceClient {
  readonly backend: InferenceBackend;
  readonly timeoutMs: number;
  readonly retryOptions: RetryOptions;
  private readonly model?: string;

  constructor(options: InferenceClientOptions) {
    this.backend = options.backend;
    this.timeoutMs = options.timeoutMs ?? RUNTIME_DEFAULTS.TIMEOUT_MS;
    this.model = options.model;
    this.retryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options.retry };

    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new InvalidParamsError(`timeoutMs must be positive, got ${this.timeoutMs}`);
    }
  }

  /**
   * Resolve and validate the generation parameters for a request
   *
   * @throws InvalidParamsError when a parameter is out of range
   */
  resolveParams(params: ModelParams): GenerationParams {
    const candidate: GenerationParams = {
      model: this.model ?? params.model ?? this.backend.defaultModel,
      temperature: params.temperature,
      maxTokens: params.maxTokens,
      topP: params.topP,
    };
    if (params.frequencyPenalty !== undefined) candidate.frequencyPenalty = params.frequencyPenalty;
    if (params.presencePenalty !== undefined) candidate.presencePenalty = params.presencePenalty;

    const result = GenerationParamsSchema.safeParse(candidate);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new InvalidParamsError(`Invalid generation parameters: ${issues.join('; ')}`, {
        provider: this.backend.name,
      });
    }
    return candidate;
  }

  /**
   * Run a completion for an assembled prompt
   *
   * @throws InferenceError subtype; `retryCount` tells how many retries were made
   */
  async complete(prompt: AssembledPrompt, params: ModelParams): Promise<CompletionResult> {
    const request: BackendRequest = {
      messages: prompt.messages,
      params: this.resolveParams(params),
    };

    let attempts = 0;
    try {
      const completion = await withRetry((attempt) => {
        attempts = attempt + 1;
        return this.attempt(request, attempt);
      }, this.retryOptions);

      return { ...completion, attempts };
    } catch (error) {
      const inferenceError = convertBackendError(error, this.backend.name);
      logger.warn(
        {
          backend: this.backend.name,
          model: request.params.model,
          kind: inferenceError.kind,
          retryCount: inferenceError.retryCount,
          error: inferenceError.message,
        },
        'Inference failed'
      );
      throw inferenceError;
    }
  }

  /**
   * One attempt under the per-attempt timeout
   */
  private async attempt(request: BackendRequest, attempt: number): Promise<BackendCompletion> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle first so the race reports the timeout, not the backend's abort error
        reject(
          new InferenceTimeoutError(`Inference timed out after ${this.timeoutMs}ms`, {
            provider: this.backend.name,
          })
        );
        controller.abort();
      }, this.timeoutMs);
    });

    logger.debug(
      {
        backend: this.backend.name,
        model: request.params.model,
        attempt: attempt + 1,
        messages: request.messages.length,
      },
      'Inference attempt'
    );

    let completion: BackendCompletion;
    try {
      completion = await Promise.race([this.backend.complete(request, controller.signal), timeout]);
    } catch (error) {
      throw convertBackendError(error, this.backend.name);
    } finally {
      clearTimeout(timer);
    }

    // An empty assistant turn would poison every later prompt of the session
    if (completion.text.trim() === '') {
      throw new BackendUnavailableError('Backend returned an empty reply', {
        code: 'BACKEND_EMPTY_REPLY',
        provider: this.backend.name,
      });
    }
    return completion;
  }
}
