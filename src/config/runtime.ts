/**
 * Runtime Configuration
 *
 * Reads backend, prompt and inference settings from environment variables
 * and validates them.
 *
 * Environment variables:
 * - PERSONA_BACKEND: openai | anthropic | mock (default: openai)
 * - PERSONA_MODEL: Model id override
 * - PERSONAS_DIR: Persona directory (default: ./personas)
 * - PERSONA_TOKEN_BUDGET: Prompt token budget (default: 8000)
 * - PERSONA_MAX_HISTORY_TURNS: History turn cap, 0 = unlimited (default: 0)
 * - INFERENCE_TIMEOUT_MS: Per-attempt timeout (default: 60000)
 * - INFERENCE_MAX_RETRIES: Retries after the first attempt (default: 3)
 * - INFERENCE_BASE_DELAY_MS / INFERENCE_MAX_DELAY_MS: Backoff bounds (default: 1000 / 30000)
 * - INFERENCE_MAX_RETRY_AFTER_MS: Longest rate-limit wait honoured (default: 120000)
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { RuntimeConfigSchema } from '../types/schemas.js';
import { getEnvNumber, getEnvOptional, getEnvWithDefault } from '../utils/env.js';
import { RUNTIME_DEFAULTS } from './defaults.js';
import { detectApiKeys } from './providers.js';

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * Environment variable behind each config path, for error messages
 */
const ENV_NAMES: Record<string, string> = {
  backend: 'PERSONA_BACKEND',
  model: 'PERSONA_MODEL',
  'openai.baseUrl': 'OPENAI_BASE_URL',
  personasDir: 'PERSONAS_DIR',
  'prompt.tokenBudget': 'PERSONA_TOKEN_BUDGET',
  'prompt.maxHistoryTurns': 'PERSONA_MAX_HISTORY_TURNS',
  'inference.timeoutMs': 'INFERENCE_TIMEOUT_MS',
  'inference.maxRetries': 'INFERENCE_MAX_RETRIES',
  'inference.baseDelay': 'INFERENCE_BASE_DELAY_MS',
  'inference.maxDelay': 'INFERENCE_MAX_DELAY_MS',
  'inference.maxRetryAfter': 'INFERENCE_MAX_RETRY_AFTER_MS',
};

/**
 * Load runtime configuration from environment variables
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadRuntimeConfig(): RuntimeConfig {
  const apiKeys = detectApiKeys();

  const raw = {
    backend: getEnvWithDefault('PERSONA_BACKEND', RUNTIME_DEFAULTS.BACKEND),
    model: getEnvOptional('PERSONA_MODEL'),
    openai: {
      apiKey: apiKeys.openai,
      baseUrl: getEnvOptional('OPENAI_BASE_URL'),
    },
    anthropic: {
      apiKey: apiKeys.anthropic,
    },
    personasDir: getEnvWithDefault('PERSONAS_DIR', RUNTIME_DEFAULTS.PERSONAS_DIR),
    prompt: {
      tokenBudget: getEnvNumber('PERSONA_TOKEN_BUDGET', RUNTIME_DEFAULTS.TOKEN_BUDGET),
      maxHistoryTurns: getEnvNumber('PERSONA_MAX_HISTORY_TURNS', RUNTIME_DEFAULTS.MAX_HISTORY_TURNS),
    },
    inference: {
      timeoutMs: getEnvNumber('INFERENCE_TIMEOUT_MS', RUNTIME_DEFAULTS.TIMEOUT_MS),
      maxRetries: getEnvNumber('INFERENCE_MAX_RETRIES', RUNTIME_DEFAULTS.MAX_RETRIES),
      baseDelay: getEnvNumber('INFERENCE_BASE_DELAY_MS', RUNTIME_DEFAULTS.BASE_DELAY_MS),
      maxDelay: getEnvNumber('INFERENCE_MAX_DELAY_MS', RUNTIME_DEFAULTS.MAX_DELAY_MS),
      maxRetryAfter: getEnvNumber('INFERENCE_MAX_RETRY_AFTER_MS', RUNTIME_DEFAULTS.MAX_RETRY_AFTER_MS),
    },
  };

  const result = RuntimeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `${ENV_NAMES[path] ?? path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid runtime configuration: ${issues.join('; ')}`, {
      location: 'environment',
      issues,
    });
  }

  return result.data;
}
