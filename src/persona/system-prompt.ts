/**
 * System prompt rendering for personas
 */

import type { PersonaConfig } from '../types/index.js';

export const CHARACTER_REMINDER =
  'Stay in character at all times and do not reveal that you are an AI or a language model.';

/**
 * Render the persona instructions placed in the system message
 *
 * Sections are separated by blank lines; empty guidelines or style are
 * left out rather than replaced with placeholder text.
 */
export function renderSystemPrompt(config: PersonaConfig): string {
  const sections: string[] = [`You are now playing the role of ${config.role.trim()}.`, config.description.trim()];

  const guidelines = config.guidelines.trim();
  if (guidelines) {
    sections.push(`Follow these guidelines:\n${guidelines}`);
  }

  const style = config.style.trim();
  if (style) {
    sections.push(`Your replies should have this style:\n${style}`);
  }

  sections.push(CHARACTER_REMINDER);
  return sections.join('\n\n');
}
