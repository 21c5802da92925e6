/**
 * Configuration Module
 *
 * Centralized configuration exports for the persona runtime.
 * All environment variable-based settings should be accessed through this module.
 */

// Defaults
export { DEFAULT_MODEL_PARAMS, RUNTIME_DEFAULTS } from './defaults.js';

// Provider configuration (API keys, models)
export {
  type ApiKeyConfig,
  DEFAULT_MODELS,
  detectApiKeys,
} from './providers.js';

// Runtime configuration
export { type RuntimeConfig, loadRuntimeConfig } from './runtime.js';
