import { describe, it, expect, vi } from 'vitest';
import {
  PreferenceExtractor,
  parsePreferenceResponse,
  PREFERENCE_EXTRACTION_PROMPT,
} from '../../../src/profile/preference-extractor.js';
import { emptyPreferenceUpdate } from '../../../src/profile/user-profile.js';
import { InferenceClient } from '../../../src/inference/client.js';
import { MockBackend } from '../../../src/inference/mock-backend.js';
import { RateLimitedError } from '../../../src/errors/index.js';

const FULL_REPLY = JSON.stringify({
  topics: ['screenwriting'],
  preferences: { genre: 'comedy' },
  goals: ['find a plot idea'],
  concerns: [],
  context: { deadline: 'one week' },
});

describe('parsePreferenceResponse', () => {
  it('should parse a bare JSON object', () => {
    expect(parsePreferenceResponse(FULL_REPLY)).toEqual({
      topics: ['screenwriting'],
      preferences: { genre: 'comedy' },
      goals: ['find a plot idea'],
      concerns: [],
      context: { deadline: 'one week' },
    });
  });

  it('should find the object inside a code fence with prose around it', () => {
    const raw = `Here is what I found:\n\`\`\`json\n${FULL_REPLY}\n\`\`\`\nLet me know if you need more.`;

    expect(parsePreferenceResponse(raw).topics).toEqual(['screenwriting']);
  });

  it('should repair single quotes and trailing commas', () => {
    const raw = "{'topics': ['jazz', 'noir',], 'goals': [],}";

    expect(parsePreferenceResponse(raw)).toEqual({ ...emptyPreferenceUpdate(), topics: ['jazz', 'noir'] });
  });

  it('should default missing fields and drop values of the wrong type', () => {
    const raw = JSON.stringify({
      topics: 'jazz',
      goals: ['  learn chords ', 3, ' '],
      context: { year: 1999, draft: true, nested: { x: 1 } },
    });

    expect(parsePreferenceResponse(raw)).toEqual({
      topics: [],
      preferences: {},
      goals: ['learn chords'],
      concerns: [],
      context: { year: '1999', draft: 'true' },
    });
  });

  it('should return an empty update when there is no JSON object', () => {
    expect(parsePreferenceResponse('I could not tell anything about the user.')).toEqual(
      emptyPreferenceUpdate()
    );
  });
});

describe('PreferenceExtractor', () => {
  function createExtractor(backend: MockBackend) {
    const client = new InferenceClient({ backend, retry: { maxRetries: 0 } });
    return new PreferenceExtractor({ client });
  }

  it('should ask the model with the extraction prompt at low temperature', async () => {
    const backend = new MockBackend({ script: [FULL_REPLY] });

    const update = await createExtractor(backend).extract('I need a comedy plot within a week');

    expect(update.goals).toEqual(['find a plot idea']);
    expect(backend.requests[0]?.messages).toEqual([
      { role: 'system', content: PREFERENCE_EXTRACTION_PROMPT },
      { role: 'user', content: 'I need a comedy plot within a week' },
    ]);
    expect(backend.requests[0]?.params).toEqual({
      model: 'mock-model',
      temperature: 0.1,
      maxTokens: 300,
      topP: 1,
    });
  });

  it('should apply parameter overrides', async () => {
    const backend = new MockBackend({ script: [FULL_REPLY] });
    const client = new InferenceClient({ backend });
    const extractor = new PreferenceExtractor({ client, params: { maxTokens: 120, model: 'small-model' } });

    await extractor.extract('hello');

    expect(backend.requests[0]?.params).toMatchObject({ model: 'small-model', maxTokens: 120, temperature: 0.1 });
  });

  it('should return an empty update when inference fails', async () => {
    const backend = new MockBackend({ script: [new RateLimitedError('slow down')] });

    await expect(createExtractor(backend).extract('hello')).resolves.toEqual(emptyPreferenceUpdate());
  });

  it('should return an empty update for invalid parameters', async () => {
    const backend = new MockBackend({ script: [FULL_REPLY] });
    const client = new InferenceClient({ backend });
    const extractor = new PreferenceExtractor({ client, params: { temperature: 9 } });

    await expect(extractor.extract('hello')).resolves.toEqual(emptyPreferenceUpdate());
    expect(backend.requests).toHaveLength(0);
  });

  it('should rethrow errors that are not inference failures', async () => {
    const client = { complete: vi.fn().mockRejectedValue(new TypeError('boom')) } as unknown as InferenceClient;
    const extractor = new PreferenceExtractor({ client });

    await expect(extractor.extract('hello')).rejects.toThrow(TypeError);
  });
});
