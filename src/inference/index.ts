/**
 * Inference module - client, backends and backend factory
 */

import type { RuntimeConfig } from '../config/runtime.js';
import { ConfigError } from '../errors/index.js';
import type { BackendProvider, InferenceBackend } from '../types/index.js';
import { AnthropicBackend } from './anthropic-backend.js';
import { InferenceClient } from './client.js';
import { MockBackend } from './mock-backend.js';
import { OpenAIBackend } from './openai-backend.js';

export { InferenceClient, type InferenceClientOptions } from './client.js';
export { OpenAIBackend, type OpenAIBackendOptions } from './openai-backend.js';
export { AnthropicBackend, type AnthropicBackendOptions } from './anthropic-backend.js';
export { MockBackend, echoReply, type MockBackendOptions, type MockStep } from './mock-backend.js';
export { convertBackendError, extractRetryAfterMs, parseRetryAfter } from './error-converter.js';
export type { BackendOptions } from './types.js';

function requireApiKey(apiKey: string | undefined, envName: string): string {
  if (!apiKey) {
    throw new ConfigError(`${envName} is not set`, { location: 'environment', issues: [`${envName}: required`] });
  }
  return apiKey;
}

/**
 * Create the backend named by `provider`
 *
 * @throws ConfigError when the provider's API key is missing
 */
export function createBackend(provider: BackendProvider, config: RuntimeConfig): InferenceBackend {
  switch (provider) {
    case 'openai':
      return new OpenAIBackend({
        apiKey: requireApiKey(config.openai.apiKey, 'OPENAI_API_KEY'),
        baseURL: config.openai.baseUrl,
      });
    case 'anthropic':
      return new AnthropicBackend({ apiKey: requireApiKey(config.anthropic.apiKey, 'ANTHROPIC_API_KEY') });
    case 'mock':
      return new MockBackend();
  }
}

/**
 * Create an InferenceClient wired from runtime configuration
 */
export function createInferenceClient(
  config: RuntimeConfig,
  backend: InferenceBackend = createBackend(config.backend, config)
): InferenceClient {
  return new InferenceClient({
    backend,
    model: config.model,
    timeoutMs: config.inference.timeoutMs,
    retry: {
      maxRetries: config.inference.maxRetries,
      baseDelay: config.inference.baseDelay,
      maxDelay: config.inference.maxDelay,
      maxRetryAfter: config.inference.maxRetryAfter,
    },
  });
}
