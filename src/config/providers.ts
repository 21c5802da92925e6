/**
 * Provider Configuration
 *
 * API key detection and default model assignments for inference backends.
 *
 * Environment variables:
 * - OPENAI_API_KEY: OpenAI (or OpenAI-compatible endpoint) API key
 * - OPENAI_BASE_URL: Base URL of an OpenAI-compatible endpoint
 * - ANTHROPIC_API_KEY: Anthropic API key
 */

import type { BackendProvider } from '../types/index.js';
import { getEnvOptional } from '../utils/env.js';

/**
 * API key configuration for each provider
 */
export interface ApiKeyConfig {
  openai?: string;
  anthropic?: string;
}

/**
 * Default model for each backend, used when neither the persona nor
 * PERSONA_MODEL names one
 */
export const DEFAULT_MODELS: Record<BackendProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  mock: 'mock-model',
};

/**
 * Check which API keys are available from environment
 */
export function detectApiKeys(): ApiKeyConfig {
  return {
    openai: getEnvOptional('OPENAI_API_KEY'),
    anthropic: getEnvOptional('ANTHROPIC_API_KEY'),
  };
}
