import { describe, it, expect } from 'vitest';
import {
  PersonaDocumentSchema,
  LlmConfigDocumentSchema,
  GenerationParamsSchema,
  PreferenceUpdateSchema,
} from '../../src/types/schemas.js';

describe('Schemas', () => {
  describe('LlmConfigDocumentSchema', () => {
    it('should fill in defaults for missing fields', () => {
      expect(LlmConfigDocumentSchema.parse({ temperature: 1.2 })).toEqual({
        temperature: 1.2,
        max_tokens: 1000,
        top_p: 0.95,
      });
    });

    it('should enforce parameter ranges', () => {
      expect(LlmConfigDocumentSchema.safeParse({ temperature: 2.1 }).success).toBe(false);
      expect(LlmConfigDocumentSchema.safeParse({ temperature: -0.1 }).success).toBe(false);
      expect(LlmConfigDocumentSchema.safeParse({ top_p: 1.5 }).success).toBe(false);
      expect(LlmConfigDocumentSchema.safeParse({ max_tokens: 1.5 }).success).toBe(false);
      expect(LlmConfigDocumentSchema.safeParse({ frequency_penalty: 3 }).success).toBe(false);
      expect(LlmConfigDocumentSchema.safeParse({ presence_penalty: -2 }).success).toBe(true);
    });
  });

  describe('PersonaDocumentSchema', () => {
    const base = {
      name: 'Tester',
      role: 'a tester',
      description: 'Tests things.',
      guidelines: '',
      style: '',
    };

    it('should accept empty guidelines and style', () => {
      expect(PersonaDocumentSchema.safeParse(base).success).toBe(true);
    });

    it('should reject a whitespace-only name', () => {
      const result = PersonaDocumentSchema.safeParse({ ...base, name: '   ' });

      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe('name must not be empty');
    });

    it('should require guidelines to be present', () => {
      const { guidelines: _guidelines, ...rest } = base;
      const result = PersonaDocumentSchema.safeParse(rest);

      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe('guidelines is required');
    });

    it('should accept null examples and llm_config', () => {
      const result = PersonaDocumentSchema.safeParse({ ...base, examples: null, llm_config: null });

      expect(result.success).toBe(true);
    });

    it('should strip unknown keys', () => {
      const result = PersonaDocumentSchema.parse({ ...base, mood: 'sunny' });

      expect(result).not.toHaveProperty('mood');
    });
  });

  describe('GenerationParamsSchema', () => {
    it('should require a model', () => {
      const result = GenerationParamsSchema.safeParse({
        model: '',
        temperature: 0.5,
        maxTokens: 10,
        topP: 1,
      });

      expect(result.success).toBe(false);
    });
  });

  describe('PreferenceUpdateSchema', () => {
    it('should fill every missing field with an empty value', () => {
      expect(PreferenceUpdateSchema.parse({})).toEqual({
        topics: [],
        preferences: {},
        goals: [],
        concerns: [],
        context: {},
      });
    });

    it('should treat an array in place of a map as empty', () => {
      expect(PreferenceUpdateSchema.parse({ preferences: ['comedy'] }).preferences).toEqual({});
    });

    it('should reject a root that is not an object', () => {
      expect(PreferenceUpdateSchema.safeParse(['jazz']).success).toBe(false);
    });
  });
});
