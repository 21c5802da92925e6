/**
 * Session Runner - Drives one conversation through assemble, infer, append
 */

import { randomUUID } from 'node:crypto';
import { InferenceError } from '../errors/index.js';
import type { InferenceClient } from '../inference/client.js';
import type { PreferenceExtractor } from '../profile/preference-extractor.js';
import { UserProfile } from '../profile/user-profile.js';
import type { PromptAssembler } from '../prompt/assembler.js';
import type {
  CompletionResult,
  ConversationTurn,
  PersonaConfig,
  SessionState,
  SessionSummary,
  UserProfileSnapshot,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { ConversationLog, createTurn } from './conversation-log.js';
import { Mutex } from './mutex.js';

const logger = createLogger('SessionRunner');

export type StateChangeListener = (from: SessionState, to: SessionState) => void;

export interface SessionRunnerOptions {
  /** Session id (random UUID when omitted) */
  id?: string;
  persona: PersonaConfig;
  assembler: PromptAssembler;
  client: InferenceClient;
  /** Existing log to continue; a fresh one is created when omitted */
  log?: ConversationLog;
  onStateChange?: StateChangeListener;
  /** When set, each message updates a user profile appended to the system prompt */
  preferenceExtractor?: PreferenceExtractor;
}

/**
 * Session Runner
 *
 * State machine: idle → assembling → awaiting_completion → appending → idle.
 * Turns on one runner are serialized; concurrent `runTurn` calls queue in
 * call order. Log effects per outcome:
 * - success: user and assistant turns appended together
 * - InferenceError: only the user turn is appended, the error is rethrown
 * - any earlier failure (e.g. AssemblyError): nothing is appended
 *
 * With a preference extractor, the assembling step first analyses the new
 * message and appends the updated user profile to the system prompt.
 */
export class SessionRunner {
  readonly id: string;
  readonly persona: PersonaConfig;
  readonly createdAt: Date;

  private readonly assembler: PromptAssembler;
  private readonly client: InferenceClient;
  private readonly mutex = new Mutex();
  private readonly onStateChange?: StateChangeListener;
  private readonly preferenceExtractor?: PreferenceExtractor;
  private readonly userProfile?: UserProfile;
  private log: ConversationLog;
  private currentState: SessionState = 'idle';
  private lastResult?: CompletionResult;
  private lastActivity: Date;

  constructor(options: SessionRunnerOptions) {
    this.id = options.id ?? randomUUID();
    this.persona = options.persona;
    this.assembler = options.assembler;
    this.client = options.client;
    this.log = options.log ?? new ConversationLog();
    this.onStateChange = options.onStateChange;
    this.preferenceExtractor = options.preferenceExtractor;
    this.userProfile = options.preferenceExtractor ? new UserProfile() : undefined;
    this.createdAt = new Date();
    this.lastActivity = this.createdAt;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Completion behind the most recent successful turn
   */
  get lastCompletion(): CompletionResult | undefined {
    return this.lastResult;
  }

  get updatedAt(): Date {
    return this.lastActivity;
  }

  /**
   * Frozen snapshot of the conversation so far
   */
  history(): readonly ConversationTurn[] {
    return this.log.turns();
  }

  /**
   * What the session has learned about the user; undefined without a preference extractor
   */
  profile(): UserProfileSnapshot | undefined {
    return this.userProfile?.snapshot();
  }

  summary(): SessionSummary {
    return {
      id: this.id,
      personaName: this.persona.name,
      turnCount: this.log.length,
      createdAt: this.createdAt,
      updatedAt: this.lastActivity,
    };
  }

  /**
   * Run one conversational turn and return the assistant's reply
   *
   * @throws AssemblyError when the prompt cannot be built (nothing appended)
   * @throws InferenceError when inference fails (user turn appended)
   */
  runTurn(userText: string): Promise<string> {
    return this.mutex.runExclusive(() => this.executeTurn(userText));
  }

  /**
   * Start over with an empty conversation
   */
  reset(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.log = new ConversationLog();
      this.userProfile?.clear();
      this.lastResult = undefined;
      this.lastActivity = new Date();
      logger.debug({ sessionId: this.id }, 'Session history cleared');
    });
  }

  private async executeTurn(userText: string): Promise<string> {
    const userTurn = createTurn('user', userText);

    try {
      this.transition('assembling');
      const systemAddendum = await this.updateProfile(userText);
      const prompt = this.assembler.assemble(this.persona, this.log.turns(), userText, { systemAddendum });

      this.transition('awaiting_completion');
      let result: CompletionResult;
      try {
        result = await this.client.complete(prompt, this.persona.modelParams);
      } catch (error) {
        if (error instanceof InferenceError) {
          this.transition('appending');
          this.append(userTurn);
        }
        throw error;
      }

      this.transition('appending');
      this.append(userTurn, createTurn('assistant', result.text));
      this.lastResult = result;
      return result.text;
    } catch (error) {
      logger.warn(
        {
          sessionId: this.id,
          persona: this.persona.name,
          state: this.currentState,
          error: error instanceof Error ? error.message : String(error),
        },
        'Turn failed'
      );
      throw error;
    } finally {
      this.transition('idle');
    }
  }

  /**
   * Profile text for the system prompt, after learning from `userText`
   */
  private async updateProfile(userText: string): Promise<string | undefined> {
    if (!this.preferenceExtractor || !this.userProfile) {
      return undefined;
    }
    // Blank input fails assembly anyway; skip the extra inference call
    if (userText.trim().length > 0) {
      this.userProfile.update(await this.preferenceExtractor.extract(userText));
    }
    return this.userProfile.renderEnhancement();
  }

  private append(...turns: ConversationTurn[]): void {
    this.log.append(...turns);
    this.lastActivity = new Date();
  }

  private transition(to: SessionState): void {
    const from = this.currentState;
    if (from === to) return;
    this.currentState = to;

    logger.debug({ sessionId: this.id, from, to }, 'Session state change');
    if (!this.onStateChange) return;
    try {
      this.onStateChange(from, to);
    } catch (error) {
      logger.error(
        { sessionId: this.id, from, to, error: error instanceof Error ? error.message : String(error) },
        'State change listener threw'
      );
    }
  }
}
