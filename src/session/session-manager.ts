/**
 * Session management for persona conversations
 */

import { randomUUID } from 'node:crypto';
import { SessionError } from '../errors/index.js';
import type { InferenceClient } from '../inference/client.js';
import type { PreferenceExtractor } from '../profile/preference-extractor.js';
import type { PromptAssembler } from '../prompt/assembler.js';
import type { PersonaConfig, SessionSummary } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { SessionRunner, type StateChangeListener } from './session-runner.js';

const logger = createLogger('SessionManager');

export interface SessionManagerOptions {
  persona: PersonaConfig;
  assembler: PromptAssembler;
  client: InferenceClient;
  /** Listener attached to every session created by this manager */
  onStateChange?: StateChangeListener;
  /** Gives every session its own user profile, learned through this extractor */
  preferenceExtractor?: PreferenceExtractor;
}

/**
 * Holds independent sessions sharing one persona, assembler and client
 */
export class SessionManager {
  private sessions: Map<string, SessionRunner> = new Map();

  constructor(private readonly options: SessionManagerOptions) {}

  /**
   * Create a new session
   *
   * @throws SessionError (SESSION_EXISTS) when `id` is already in use
   */
  create(id: string = randomUUID()): SessionRunner {
    if (this.sessions.has(id)) {
      throw new SessionError(`Session "${id}" already exists`, { code: 'SESSION_EXISTS' });
    }

    const runner = new SessionRunner({
      id,
      persona: this.options.persona,
      assembler: this.options.assembler,
      client: this.options.client,
      onStateChange: this.options.onStateChange,
      preferenceExtractor: this.options.preferenceExtractor,
    });
    this.sessions.set(id, runner);

    logger.debug({ sessionId: id, persona: this.options.persona.name }, 'Session created');
    return runner;
  }

  /**
   * Get a session by ID
   */
  get(id: string): SessionRunner | undefined {
    return this.sessions.get(id);
  }

  /**
   * Get a session by ID, throwing if not found
   */
  require(id: string): SessionRunner {
    const runner = this.sessions.get(id);
    if (!runner) {
      throw new SessionError(`Session "${id}" not found`, { code: 'SESSION_NOT_FOUND' });
    }
    return runner;
  }

  /**
   * Remove a session
   */
  delete(id: string): boolean {
    const deleted = this.sessions.delete(id);
    if (deleted) {
      logger.debug({ sessionId: id }, 'Session deleted');
    }
    return deleted;
  }

  /**
   * Summaries of all sessions, most recently updated first
   */
  list(): SessionSummary[] {
    return Array.from(this.sessions.values())
      .map((runner) => runner.summary())
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  }

  get size(): number {
    return this.sessions.size;
  }
}
