/**
 * Utility functions and helpers
 */

export { withRetry, calculateDelay, DEFAULT_RETRY_OPTIONS, type RetryOptions } from './retry.js';

export { logger, createLogger } from './logger.js';

export { getEnvWithDefault, getEnvOptional, hasEnv, getEnvNumber } from './env.js';

export {
  estimateTokens,
  estimateMessageTokens,
  estimateMessagesTokens,
  MESSAGE_OVERHEAD_TOKENS,
} from './token-estimator.js';
