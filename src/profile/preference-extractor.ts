/**
 * Preference Extractor - Asks the model what a message says about the user
 */

import { jsonrepair } from 'jsonrepair';
import { InferenceError } from '../errors/index.js';
import type { InferenceClient } from '../inference/client.js';
import type { AssembledPrompt, ModelParams, PreferenceUpdate, PromptMessage } from '../types/index.js';
import { PreferenceUpdateSchema } from '../types/schemas.js';
import { createLogger } from '../utils/logger.js';
import { estimateMessagesTokens } from '../utils/token-estimator.js';
import { emptyPreferenceUpdate } from './user-profile.js';

const logger = createLogger('PreferenceExtractor');

export const PREFERENCE_EXTRACTION_PROMPT = `You extract a user's interests, preferences and needs from one chat message.
Reply with a single JSON object and nothing else. Use these fields:
- topics: subjects the user is interested in (array of strings)
- preferences: likes or stated preferences (object with string values)
- goals: what the user wants to achieve (array of strings)
- concerns: worries or reservations the user has (array of strings)
- context: situational details the user gave (object with string values)
Use [] or {} for any field the message says nothing about.

Example reply:
{"topics": ["screenwriting", "film"], "preferences": {"genre": "comedy"}, "goals": ["find a plot idea"], "concerns": ["the jokes fall flat"], "context": {"deadline": "one week"}}`;

/**
 * Low temperature keeps the JSON shape stable
 */
export const PREFERENCE_EXTRACTION_PARAMS: ModelParams = {
  temperature: 0.1,
  maxTokens: 300,
  topP: 1,
};

export interface PreferenceExtractorOptions {
  client: InferenceClient;
  /** Overrides for the extraction call's parameters */
  params?: Partial<ModelParams>;
}

/**
 * Parse the model's reply into a preference update
 *
 * Tolerates code fences, leading prose and the usual JSON slips (trailing
 * commas, single quotes). Returns an empty update when no object can be
 * recovered.
 */
export function parsePreferenceResponse(raw: string): PreferenceUpdate {
  try {
    const jsonStr = raw.match(/\{[\s\S]*\}/)?.[0];
    if (!jsonStr) {
      throw new Error('No JSON object in preference extraction reply');
    }

    const parsed: unknown = JSON.parse(jsonrepair(jsonStr));
    const result = PreferenceUpdateSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error('Preference extraction reply is not a JSON object');
    }
    return result.data;
  } catch (error) {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error), reply: raw.slice(0, 100) },
      'Failed to parse preference extraction reply'
    );
    return emptyPreferenceUpdate();
  }
}

/**
 * Preference Extractor
 *
 * One low-temperature completion per user message. Inference failures are
 * logged and yield an empty update so the conversation itself goes on.
 *
 * @example
 * const extractor = new PreferenceExtractor({ client });
 * profile.update(await extractor.extract('I need a comedy plot by Friday'));
 */
export class PreferenceExtractor {
  private readonly client: InferenceClient;
  private readonly params: ModelParams;

  constructor(options: PreferenceExtractorOptions) {
    this.client = options.client;
    this.params = { ...PREFERENCE_EXTRACTION_PARAMS, ...options.params };
  }

  async extract(userText: string): Promise<PreferenceUpdate> {
    const messages: PromptMessage[] = [
      { role: 'system', content: PREFERENCE_EXTRACTION_PROMPT },
      { role: 'user', content: userText },
    ];
    const prompt: AssembledPrompt = {
      systemPrompt: PREFERENCE_EXTRACTION_PROMPT,
      messages,
      droppedTurns: 0,
      estimatedTokens: estimateMessagesTokens(messages),
    };

    try {
      const result = await this.client.complete(prompt, this.params);
      return parsePreferenceResponse(result.text);
    } catch (error) {
      if (!(error instanceof InferenceError)) {
        throw error;
      }
      logger.warn({ kind: error.kind, error: error.message }, 'Preference extraction failed');
      return emptyPreferenceUpdate();
    }
  }
}
