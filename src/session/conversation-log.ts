/**
 * Append-only conversation log
 */

import type { ConversationTurn, TurnRole } from '../types/index.js';

/**
 * Create a frozen conversation turn
 */
export function createTurn(role: TurnRole, text: string, timestamp: Date = new Date()): ConversationTurn {
  return Object.freeze({ role, text, timestamp });
}

/**
 * Ordered, append-only sequence of turns
 *
 * `append` adds all of its turns in one step, so a reader never sees
 * some of them without the others.
 */
export class ConversationLog {
  private entries: readonly ConversationTurn[] = Object.freeze([]);

  constructor(initial: readonly ConversationTurn[] = []) {
    if (initial.length > 0) {
      this.append(...initial);
    }
  }

  append(...turns: ConversationTurn[]): void {
    if (turns.length === 0) return;
    this.entries = Object.freeze([...this.entries, ...turns.map((turn) => Object.freeze(turn))]);
  }

  /**
   * Frozen snapshot; later appends do not change it
   */
  turns(): readonly ConversationTurn[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Time of the most recent turn
   */
  get lastUpdated(): Date | undefined {
    return this.entries[this.entries.length - 1]?.timestamp;
  }
}
