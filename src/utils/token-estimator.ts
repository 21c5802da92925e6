/**
 * Token estimation utilities for prompt budget management
 * Uses simple character-based estimation (4 chars ≈ 1 token)
 */
import type { PromptMessage } from '../types/index.js';

const CHARS_PER_TOKEN = 4;

/**
 * Fixed cost of a message's role framing
 */
export const MESSAGE_OVERHEAD_TOKENS = 4;

/**
 * Estimates token count for a text string
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Estimates the tokens a single message costs, including role overhead
 */
export function estimateMessageTokens(message: PromptMessage): number {
  return estimateTokens(message.content) + MESSAGE_OVERHEAD_TOKENS;
}

/**
 * Estimates total token count for an array of messages
 */
export function estimateMessagesTokens(messages: readonly PromptMessage[]): number {
  let total = 0;
  for (const message of messages) {
    total += estimateMessageTokens(message);
  }
  return total;
}
