/**
 * User Profile - What a session has learned about the person it talks to
 */

import type { PreferenceUpdate, UserProfileSnapshot } from '../types/index.js';

export const PROFILE_ADAPTATION_REQUEST =
  "Adapt your replies to this user's needs and preferences, using the profile above.";

export function emptyPreferenceUpdate(): PreferenceUpdate {
  return { topics: [], preferences: {}, goals: [], concerns: [], context: {} };
}

function appendNew(target: string[], items: readonly string[]): void {
  for (const item of items) {
    if (!target.includes(item)) {
      target.push(item);
    }
  }
}

function listOrUnknown(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : 'unknown';
}

function formatEntries(entries: Readonly<Record<string, string>>): string {
  return Object.entries(entries)
    .map(([key, value]) => `${key}: ${value}`)
    .join('; ');
}

/**
 * Accumulates preference updates across a conversation
 *
 * Lists keep first-seen order without duplicates; later values for a
 * preference or context key replace earlier ones. Every update counts as
 * one interaction, even when it carried nothing.
 */
export class UserProfile {
  private topics: string[] = [];
  private goals: string[] = [];
  private concerns: string[] = [];
  private preferences: Record<string, string> = {};
  private context: Record<string, string> = {};
  private interactions = 0;

  get interactionCount(): number {
    return this.interactions;
  }

  update(update: PreferenceUpdate): void {
    appendNew(this.topics, update.topics);
    appendNew(this.goals, update.goals);
    appendNew(this.concerns, update.concerns);
    Object.assign(this.preferences, update.preferences);
    Object.assign(this.context, update.context);
    this.interactions++;
  }

  clear(): void {
    this.topics = [];
    this.goals = [];
    this.concerns = [];
    this.preferences = {};
    this.context = {};
    this.interactions = 0;
  }

  snapshot(): UserProfileSnapshot {
    return Object.freeze({
      topics: Object.freeze([...this.topics]),
      preferences: Object.freeze({ ...this.preferences }),
      goals: Object.freeze([...this.goals]),
      concerns: Object.freeze([...this.concerns]),
      context: Object.freeze({ ...this.context }),
      interactionCount: this.interactions,
    });
  }

  /**
   * Text appended to the persona's system prompt
   *
   * Topics and goals are always listed ("unknown" when empty); preferences,
   * concerns and context only once something is known.
   */
  renderEnhancement(): string {
    const lines = [
      'User profile:',
      `- Topics of interest: ${listOrUnknown(this.topics)}`,
      `- Goals: ${listOrUnknown(this.goals)}`,
    ];
    if (Object.keys(this.preferences).length > 0) {
      lines.push(`- Preferences: ${formatEntries(this.preferences)}`);
    }
    if (this.concerns.length > 0) {
      lines.push(`- Concerns: ${this.concerns.join(', ')}`);
    }
    if (Object.keys(this.context).length > 0) {
      lines.push(`- Context: ${formatEntries(this.context)}`);
    }
    lines.push(`- Interactions so far: ${this.interactions}`);

    return `${lines.join('\n')}\n\n${PROFILE_ADAPTATION_REQUEST}`;
  }
}
