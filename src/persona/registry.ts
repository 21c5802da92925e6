/**
 * Persona Registry - Directory-backed catalogue of persona documents
 */

import { mkdir, readdir, unlink, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { ConfigError } from '../errors/index.js';
import type { PersonaConfig } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { ConfigLoader, FileConfigSource } from './config-loader.js';

const logger = createLogger('PersonaRegistry');

const PERSONA_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/** Recognized extensions, in lookup priority order */
const PERSONA_EXTENSIONS = ['.yaml', '.yml'] as const;

/**
 * A persona document that failed to load
 */
export interface PersonaLoadFailure {
  id: string;
  error: ConfigError;
}

/**
 * Outcome of loading every persona in the directory
 */
export interface PersonaLoadReport {
  loaded: string[];
  failures: PersonaLoadFailure[];
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toConfigError(error: unknown, location: string): ConfigError {
  if (error instanceof ConfigError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConfigError(message, { location, cause: error instanceof Error ? error : undefined });
}

/**
 * Persona Registry
 *
 * Personas are keyed by file stem: `<dir>/screenwriter.yaml` is persona
 * `screenwriter`. Loaded configs are cached until reloaded, saved or deleted.
 */
export class PersonaRegistry {
  private cache: Map<string, PersonaConfig> = new Map();

  constructor(
    private readonly dir: string,
    private readonly loader: ConfigLoader = new ConfigLoader()
  ) {}

  /**
   * Directory this registry reads from
   */
  get directory(): string {
    return this.dir;
  }

  /**
   * Throw unless `id` is a usable persona id
   */
  static assertValidId(id: string): void {
    if (!PERSONA_ID_PATTERN.test(id)) {
      throw new ConfigError(
        `Invalid persona id "${id}": use letters, digits, "-" or "_", starting with a letter or digit`,
        { issues: [`id: must match ${PERSONA_ID_PATTERN.source}`] }
      );
    }
  }

  /**
   * Map of persona id to file name for every document in the directory
   */
  private async scan(): Promise<Map<string, string>> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isMissingFileError(error)) {
        return new Map();
      }
      throw toConfigError(error, this.dir);
    }

    const files = new Map<string, string>();
    // Iterate extensions in priority order so `.yaml` wins over `.yml`
    for (const ext of PERSONA_EXTENSIONS) {
      for (const entry of entries) {
        if (extname(entry) !== ext) continue;
        const id = entry.slice(0, -ext.length);
        if (PERSONA_ID_PATTERN.test(id) && !files.has(id)) {
          files.set(id, entry);
        }
      }
    }
    return files;
  }

  private async findFile(id: string): Promise<string | undefined> {
    const files = await this.scan();
    const file = files.get(id);
    return file ? join(this.dir, file) : undefined;
  }

  /**
   * Sorted ids of every persona document in the directory
   */
  async list(): Promise<string[]> {
    const files = await this.scan();
    return Array.from(files.keys()).sort();
  }

  /**
   * Load every persona document
   *
   * Invalid documents are logged and reported in `failures`; the rest still load.
   */
  async loadAll(): Promise<PersonaLoadReport> {
    const files = await this.scan();
    const report: PersonaLoadReport = { loaded: [], failures: [] };

    for (const id of Array.from(files.keys()).sort()) {
      const path = join(this.dir, files.get(id) ?? `${id}.yaml`);
      try {
        this.cache.set(id, await this.loader.load(new FileConfigSource(path)));
        report.loaded.push(id);
      } catch (error) {
        const configError = toConfigError(error, path);
        logger.warn({ persona: id, location: path, issues: configError.issues }, 'Skipping invalid persona');
        report.failures.push({ id, error: configError });
      }
    }

    logger.info({ dir: this.dir, loaded: report.loaded.length, failed: report.failures.length }, 'Personas loaded');
    return report;
  }

  /**
   * Get a persona by id
   *
   * @returns The persona, or undefined when no document exists for `id`
   * @throws ConfigError when the document exists but is invalid
   */
  async get(id: string): Promise<PersonaConfig | undefined> {
    PersonaRegistry.assertValidId(id);

    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }

    const path = await this.findFile(id);
    if (!path) {
      return undefined;
    }

    const config = await this.loader.load(new FileConfigSource(path));
    this.cache.set(id, config);
    return config;
  }

  /**
   * Get a persona by id, throwing if not found
   */
  async getOrThrow(id: string): Promise<PersonaConfig> {
    const config = await this.get(id);
    if (!config) {
      throw new ConfigError(`Persona "${id}" not found in ${this.dir}`, {
        code: 'PERSONA_NOT_FOUND',
        location: this.dir,
      });
    }
    return config;
  }

  /**
   * Re-read a persona from disk, replacing the cached copy
   */
  async reload(id: string): Promise<PersonaConfig | undefined> {
    PersonaRegistry.assertValidId(id);
    this.cache.delete(id);
    return this.get(id);
  }

  /**
   * Write a persona document and cache it
   *
   * An existing `.yml` document is overwritten in place; new documents use `.yaml`.
   */
  async save(id: string, config: PersonaConfig): Promise<void> {
    PersonaRegistry.assertValidId(id);

    const path = (await this.findFile(id)) ?? join(this.dir, `${id}.yaml`);
    await mkdir(this.dir, { recursive: true });
    await writeFile(path, this.loader.serialize(config), 'utf-8');
    this.cache.set(id, config);

    logger.info({ persona: id, location: path }, 'Persona saved');
  }

  /**
   * Delete a persona document
   *
   * @returns false when no document exists for `id`
   */
  async delete(id: string): Promise<boolean> {
    PersonaRegistry.assertValidId(id);
    this.cache.delete(id);

    const path = await this.findFile(id);
    if (!path) {
      return false;
    }

    await unlink(path);
    logger.info({ persona: id, location: path }, 'Persona deleted');
    return true;
  }
}
