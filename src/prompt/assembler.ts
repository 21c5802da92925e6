/**
 * Prompt Assembler - Builds model-ready prompts from a persona and history
 */

import { RUNTIME_DEFAULTS } from '../config/defaults.js';
import { AssemblyError } from '../errors/index.js';
import { renderSystemPrompt } from '../persona/system-prompt.js';
import type {
  AssembledPrompt,
  ConversationTurn,
  PersonaConfig,
  PromptMessage,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { estimateMessagesTokens } from '../utils/token-estimator.js';

const logger = createLogger('PromptAssembler');

export interface PromptAssemblerOptions {
  /** Upper bound on the estimated prompt size, in tokens */
  tokenBudget?: number;
  /** Keep only the most recent N history turns before budgeting (0 = unlimited) */
  maxHistoryTurns?: number;
  /** Token estimator for a message list */
  estimateTokens?: (messages: readonly PromptMessage[]) => number;
}

export interface AssembleOptions {
  /** Extra instructions appended to the persona's system prompt after a blank line */
  systemAddendum?: string;
}

/**
 * Prompt Assembler
 *
 * Message order is fixed: system instructions, few-shot example pairs,
 * history in chronological order, then the new user message. When the
 * estimate exceeds the budget the oldest history turns are dropped first;
 * system instructions, examples and the new message are always kept.
 *
 * @example
 * const assembler = new PromptAssembler({ tokenBudget: 4000 });
 * const prompt = assembler.assemble(persona, log.turns(), 'Hello');
 */
export class PromptAssembler {
  readonly tokenBudget: number;
  readonly maxHistoryTurns: number;
  private readonly estimate: (messages: readonly PromptMessage[]) => number;

  constructor(options: PromptAssemblerOptions = {}) {
    this.tokenBudget = options.tokenBudget ?? RUNTIME_DEFAULTS.TOKEN_BUDGET;
    this.maxHistoryTurns = options.maxHistoryTurns ?? RUNTIME_DEFAULTS.MAX_HISTORY_TURNS;
    this.estimate = options.estimateTokens ?? estimateMessagesTokens;

    if (!Number.isInteger(this.tokenBudget) || this.tokenBudget <= 0) {
      throw new AssemblyError(`tokenBudget must be a positive integer, got ${this.tokenBudget}`);
    }
    if (!Number.isInteger(this.maxHistoryTurns) || this.maxHistoryTurns < 0) {
      throw new AssemblyError(`maxHistoryTurns must be a non-negative integer, got ${this.maxHistoryTurns}`);
    }
  }

  /**
   * Assemble the prompt for the next turn
   *
   * @throws AssemblyError when `newMessage` is blank, or when the prompt
   *   exceeds the budget with all history dropped
   */
  assemble(
    config: PersonaConfig,
    history: readonly ConversationTurn[],
    newMessage: string,
    options: AssembleOptions = {}
  ): AssembledPrompt {
    if (newMessage.trim().length === 0) {
      throw new AssemblyError('Cannot assemble a prompt for an empty message');
    }

    const addendum = options.systemAddendum?.trim();
    const systemPrompt = addendum
      ? `${renderSystemPrompt(config)}\n\n${addendum}`
      : renderSystemPrompt(config);
    const head: PromptMessage[] = [{ role: 'system', content: systemPrompt }];
    for (const example of config.examples) {
      head.push({ role: 'user', content: example.user });
      head.push({ role: 'assistant', content: example.assistant });
    }
    const tail: PromptMessage = { role: 'user', content: newMessage };

    let turns = history.map((turn): PromptMessage => ({ role: turn.role, content: turn.text }));
    let droppedTurns = 0;

    if (this.maxHistoryTurns > 0 && turns.length > this.maxHistoryTurns) {
      droppedTurns = turns.length - this.maxHistoryTurns;
      turns = turns.slice(droppedTurns);
    }

    let messages = [...head, ...turns, tail];
    let estimatedTokens = this.estimate(messages);

    while (estimatedTokens > this.tokenBudget && turns.length > 0) {
      turns = turns.slice(1);
      droppedTurns++;
      messages = [...head, ...turns, tail];
      estimatedTokens = this.estimate(messages);
    }

    if (estimatedTokens > this.tokenBudget) {
      throw new AssemblyError(
        `Prompt needs ~${estimatedTokens} tokens without history, over the budget of ${this.tokenBudget}`
      );
    }

    if (droppedTurns > 0) {
      logger.debug(
        { persona: config.name, droppedTurns, keptTurns: turns.length, estimatedTokens },
        'History truncated to fit token budget'
      );
    }

    return Object.freeze({
      systemPrompt,
      messages: Object.freeze(messages.map((message) => Object.freeze(message))),
      droppedTurns,
      estimatedTokens,
    });
  }
}
