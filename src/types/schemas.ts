/**
 * Zod schemas for runtime validation
 */

import { z } from 'zod';
import { DEFAULT_MODEL_PARAMS } from '../config/defaults.js';

// ============================================
// Persona Document Schemas
// ============================================

const requiredText = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .refine((value) => value.trim().length > 0, { message: `${field} must not be empty` });

const optionalText = (field: string) =>
  z.string({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a string`,
  });

export const PersonaExampleSchema = z.object({
  user: requiredText('user'),
  assistant: requiredText('assistant'),
});

const penalty = z.number().min(-2).max(2);

/**
 * `llm_config` block as written in persona documents (snake_case)
 */
export const LlmConfigDocumentSchema = z.object({
  temperature: z.number().min(0).max(2).default(DEFAULT_MODEL_PARAMS.temperature),
  max_tokens: z.number().int().positive().default(DEFAULT_MODEL_PARAMS.maxTokens),
  top_p: z.number().min(0).max(1).default(DEFAULT_MODEL_PARAMS.topP),
  model: z.string().min(1).optional(),
  frequency_penalty: penalty.optional(),
  presence_penalty: penalty.optional(),
});

/**
 * Persona document. Unknown top-level keys are stripped.
 */
export const PersonaDocumentSchema = z.object({
  name: requiredText('name'),
  role: requiredText('role'),
  description: requiredText('description'),
  guidelines: optionalText('guidelines'),
  style: optionalText('style'),
  examples: z.array(PersonaExampleSchema).nullish(),
  llm_config: LlmConfigDocumentSchema.nullish(),
});

export type PersonaDocument = z.input<typeof PersonaDocumentSchema>;
export type ParsedPersonaDocument = z.output<typeof PersonaDocumentSchema>;

// ============================================
// Generation Parameter Schemas
// ============================================

/**
 * Ranges enforced before a request leaves the client
 */
export const GenerationParamsSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
  topP: z.number().min(0).max(1),
  frequencyPenalty: penalty.optional(),
  presencePenalty: penalty.optional(),
});

// ============================================
// Preference Extraction Schemas
// ============================================

// Model output is loose: malformed fields fall back to empty, non-strings are dropped
const extractedList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const extractedMap = z
  .record(z.unknown())
  .catch({})
  .transform((entries) =>
    Object.fromEntries(
      Object.entries(entries).flatMap(([key, value]): Array<[string, string]> =>
        typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
          ? [[key, String(value).trim()]]
          : []
      )
    )
  );

/**
 * JSON object returned by the preference extraction call
 */
export const PreferenceUpdateSchema = z.object({
  topics: extractedList,
  preferences: extractedMap,
  goals: extractedList,
  concerns: extractedList,
  context: extractedMap,
});

// ============================================
// Runtime Configuration Schemas
// ============================================

export const BackendProviderSchema = z.enum(['openai', 'anthropic', 'mock']);

const nonNegativeInt = z.number().int().nonnegative();

export const RuntimeConfigSchema = z.object({
  backend: BackendProviderSchema,
  model: z.string().min(1).optional(),
  openai: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
  }),
  anthropic: z.object({
    apiKey: z.string().optional(),
  }),
  personasDir: z.string().min(1),
  prompt: z.object({
    tokenBudget: z.number().int().positive(),
    maxHistoryTurns: nonNegativeInt,
  }),
  inference: z.object({
    timeoutMs: z.number().int().positive(),
    maxRetries: nonNegativeInt,
    baseDelay: nonNegativeInt,
    maxDelay: nonNegativeInt,
    maxRetryAfter: nonNegativeInt,
  }),
});
