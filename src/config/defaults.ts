/**
 * Default configuration values
 */

/**
 * Generation parameters a persona gets when its `llm_config` omits them
 */
export const DEFAULT_MODEL_PARAMS = {
  temperature: 0.7,
  maxTokens: 1000,
  topP: 0.95,
} as const;

/**
 * Runtime defaults, overridable through environment variables
 */
export const RUNTIME_DEFAULTS = {
  /** Backend used when PERSONA_BACKEND is not set */
  BACKEND: 'openai',
  /** Directory scanned for persona documents */
  PERSONAS_DIR: './personas',
  /** Prompt token budget */
  TOKEN_BUDGET: 8000,
  /** History turns kept before budgeting (0 = unlimited) */
  MAX_HISTORY_TURNS: 0,
  /** Per-attempt inference timeout */
  TIMEOUT_MS: 60000,
  MAX_RETRIES: 3,
  BASE_DELAY_MS: 1000,
  MAX_DELAY_MS: 30000,
  /** Cap on a backend-requested rate-limit wait */
  MAX_RETRY_AFTER_MS: 120000,
  BACKOFF_FACTOR: 2,
} as const;
