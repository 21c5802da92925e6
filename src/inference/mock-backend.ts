/**
 * Mock Backend - In-process scripted backend
 *
 * Replays queued replies and errors in order. Used by tests and by the CLI
 * (`--backend mock`) to exercise the pipeline without network access.
 */

import { DEFAULT_MODELS } from '../config/providers.js';
import type {
  BackendCompletion,
  BackendRequest,
  InferenceBackend,
  PromptMessage,
} from '../types/index.js';

/**
 * One scripted step: a reply text, a full completion, or an error to throw
 */
export type MockStep = string | BackendCompletion | Error;

export interface MockBackendOptions {
  /** Steps consumed in order, one per `complete` call */
  script?: MockStep[];
  /** Reply produced once the script is exhausted */
  fallback?: (request: BackendRequest) => string;
  /** Simulated latency per call; aborting the signal cuts it short */
  delayMs?: number;
  defaultModel?: string;
}

function lastUserMessage(messages: readonly PromptMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === 'user') {
      return message.content;
    }
  }
  return '';
}

/**
 * Default reply once the script runs out: echoes the latest user message
 */
export function echoReply(request: BackendRequest): string {
  return `(mock) ${lastUserMessage(request.messages)}`;
}

function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortError(signal));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class MockBackend implements InferenceBackend {
  readonly name = 'mock';
  readonly provider = 'mock' as const;
  readonly defaultModel: string;

  /** Every request received, in call order */
  readonly requests: BackendRequest[] = [];

  private script: MockStep[];
  private readonly fallback: (request: BackendRequest) => string;
  private readonly delayMs: number;

  constructor(options: MockBackendOptions = {}) {
    this.script = [...(options.script ?? [])];
    this.fallback = options.fallback ?? echoReply;
    this.delayMs = options.delayMs ?? 0;
    this.defaultModel = options.defaultModel ?? DEFAULT_MODELS.mock;
  }

  /**
   * Append steps to the script
   */
  enqueue(...steps: MockStep[]): this {
    this.script.push(...steps);
    return this;
  }

  /**
   * Number of scripted steps not yet consumed
   */
  get pending(): number {
    return this.script.length;
  }

  async complete(request: BackendRequest, signal: AbortSignal): Promise<BackendCompletion> {
    this.requests.push(request);
    const step = this.script.shift();

    if (this.delayMs > 0) {
      await wait(this.delayMs, signal);
    } else if (signal.aborted) {
      throw abortError(signal);
    }

    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'string') {
      return { text: step, model: request.params.model, finishReason: 'stop' };
    }
    if (step) {
      return step;
    }
    return { text: this.fallback(request), model: request.params.model, finishReason: 'stop' };
  }
}
