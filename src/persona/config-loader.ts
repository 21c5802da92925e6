/**
 * Persona Config Loader
 *
 * Loads persona documents (YAML, or JSON as a YAML subset) and validates them
 * into immutable PersonaConfig objects.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigError } from '../errors/index.js';
import {
  LlmConfigDocumentSchema,
  PersonaDocumentSchema,
  type ParsedPersonaDocument,
  type PersonaDocument,
} from '../types/schemas.js';
import type { ModelParams, PersonaConfig, PersonaExample } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ConfigLoader');

/**
 * Where a persona document comes from
 */
export interface ConfigSource {
  /** Label used in errors and logs (file path, URL, test name) */
  readonly location: string;
  read(): Promise<string>;
}

/**
 * Reads a persona document from a UTF-8 file
 */
export class FileConfigSource implements ConfigSource {
  constructor(readonly location: string) {}

  read(): Promise<string> {
    return readFile(this.location, 'utf-8');
  }
}

/**
 * In-memory persona document
 */
export class StringConfigSource implements ConfigSource {
  constructor(
    private readonly text: string,
    readonly location: string = '<inline>'
  ) {}

  read(): Promise<string> {
    return Promise.resolve(this.text);
  }
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toModelParams(doc: ParsedPersonaDocument['llm_config']): ModelParams {
  // An absent block gets the same defaults as an empty one
  const llm = doc ?? LlmConfigDocumentSchema.parse({});
  const params: {
    temperature: number;
    maxTokens: number;
    topP: number;
    model?: string;
    frequencyPenalty?: number;
    presencePenalty?: number;
  } = {
    temperature: llm.temperature,
    maxTokens: llm.max_tokens,
    topP: llm.top_p,
  };
  if (llm.model !== undefined) params.model = llm.model;
  if (llm.frequency_penalty !== undefined) params.frequencyPenalty = llm.frequency_penalty;
  if (llm.presence_penalty !== undefined) params.presencePenalty = llm.presence_penalty;
  return Object.freeze(params);
}

function toPersonaConfig(doc: ParsedPersonaDocument): PersonaConfig {
  const examples: readonly PersonaExample[] = Object.freeze(
    (doc.examples ?? []).map((example) =>
      Object.freeze({ user: example.user, assistant: example.assistant })
    )
  );

  return Object.freeze({
    name: doc.name,
    role: doc.role,
    description: doc.description,
    guidelines: doc.guidelines,
    style: doc.style,
    examples,
    modelParams: toModelParams(doc.llm_config),
  });
}

/**
 * Convert a PersonaConfig back to its document form
 */
export function toPersonaDocument(config: PersonaConfig): PersonaDocument {
  const { modelParams } = config;
  const llmConfig: NonNullable<PersonaDocument['llm_config']> = {
    temperature: modelParams.temperature,
    max_tokens: modelParams.maxTokens,
    top_p: modelParams.topP,
  };
  if (modelParams.model !== undefined) llmConfig.model = modelParams.model;
  if (modelParams.frequencyPenalty !== undefined) llmConfig.frequency_penalty = modelParams.frequencyPenalty;
  if (modelParams.presencePenalty !== undefined) llmConfig.presence_penalty = modelParams.presencePenalty;

  return {
    name: config.name,
    role: config.role,
    description: config.description,
    guidelines: config.guidelines,
    style: config.style,
    examples: config.examples.map((example) => ({ user: example.user, assistant: example.assistant })),
    llm_config: llmConfig,
  };
}

export class ConfigLoader {
  /**
   * Read and validate a persona document
   *
   * @throws ConfigError when the source cannot be read or the document is invalid
   */
  async load(source: ConfigSource): Promise<PersonaConfig> {
    let text: string;
    try {
      text = await source.read();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read persona document ${source.location}: ${reason}`, {
        location: source.location,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const config = this.parse(text, source.location);
    logger.debug({ location: source.location, persona: config.name }, 'Persona loaded');
    return config;
  }

  /**
   * Validate persona document text
   *
   * Unknown top-level keys are ignored; no partial config is ever returned.
   */
  parse(text: string, location?: string): PersonaConfig {
    const where = location ?? '<inline>';

    let raw: unknown;
    try {
      raw = parseYaml(text);
    } catch (error) {
      // Besides YAMLParseError the parser throws plain errors, e.g. for alias bombs
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid YAML in ${where}: ${reason}`, {
        location,
        issues: [reason],
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!isMapping(raw)) {
      throw new ConfigError(`Persona document ${where} must be a mapping`, {
        location,
        issues: ['(root): expected a mapping of persona fields'],
      });
    }

    const result = PersonaDocumentSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(formatIssue);
      throw new ConfigError(`Invalid persona document ${where}: ${issues.join('; ')}`, {
        location,
        issues,
      });
    }

    return toPersonaConfig(result.data);
  }

  /**
   * Emit the document form of a persona (snake_case `llm_config`)
   */
  serialize(config: PersonaConfig): string {
    return stringifyYaml(toPersonaDocument(config));
  }
}
