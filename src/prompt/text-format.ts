/**
 * Completion-style text rendering of an assembled prompt
 */

import type { AssembledPrompt } from '../types/index.js';

export interface SpeakerLabels {
  user: string;
  assistant: string;
}

export const DEFAULT_SPEAKER_LABELS: SpeakerLabels = {
  user: 'User',
  assistant: 'Assistant',
};

/**
 * Render a prompt as a single transcript string
 *
 * The system prompt comes first, then one `Label: content` line per
 * message, ending with the assistant label as the completion cue.
 *
 * @example
 * formatPromptAsText(prompt);
 * // "You are now playing the role of ...\n\nUser: Hi\nAssistant: "
 */
export function formatPromptAsText(
  prompt: AssembledPrompt,
  labels: SpeakerLabels = DEFAULT_SPEAKER_LABELS
): string {
  const lines: string[] = [];
  for (const message of prompt.messages) {
    if (message.role === 'system') continue;
    const label = message.role === 'user' ? labels.user : labels.assistant;
    lines.push(`${label}: ${message.content}`);
  }
  lines.push(`${labels.assistant}: `);

  return `${prompt.systemPrompt}\n\n${lines.join('\n')}`;
}
