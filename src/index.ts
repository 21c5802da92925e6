/**
 * persona-runtime - Library entry point
 *
 * Declarative personas loaded from YAML, assembled into model-ready prompts
 * and sent to an inference backend with timeout and retry. Sessions can
 * optionally learn a user profile that is appended to the system prompt.
 */

export * from './types/index.js';
export * from './errors/index.js';

export {
  PersonaDocumentSchema,
  LlmConfigDocumentSchema,
  GenerationParamsSchema,
  PreferenceUpdateSchema,
  type PersonaDocument,
} from './types/schemas.js';

export * from './config/index.js';
export * from './persona/index.js';
export * from './prompt/index.js';
export * from './inference/index.js';
export * from './session/index.js';
export * from './profile/index.js';

export {
  withRetry,
  calculateDelay,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
  createLogger,
  estimateTokens,
  estimateMessagesTokens,
} from './utils/index.js';
