/**
 * persona-runtime command-line program
 */

import { Command } from 'commander';
import { loadRuntimeConfig, type RuntimeConfig } from '../config/runtime.js';
import { ConfigError, PersonaRuntimeError } from '../errors/index.js';
import { createBackend, createInferenceClient } from '../inference/index.js';
import { ConfigLoader, FileConfigSource } from '../persona/config-loader.js';
import { PersonaRegistry } from '../persona/registry.js';
import { PreferenceExtractor } from '../profile/preference-extractor.js';
import { PromptAssembler } from '../prompt/assembler.js';
import { formatPromptAsText } from '../prompt/text-format.js';
import { SessionRunner } from '../session/session-runner.js';
import { BackendProviderSchema } from '../types/schemas.js';
import type { BackendProvider, InferenceBackend, PersonaConfig } from '../types/index.js';
import { runChat } from './chat.js';

/**
 * Where the program reads and writes
 */
export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  setExitCode: (code: number) => void;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export interface ProgramOptions {
  io?: Partial<CliIO>;
  /** Replaces the backend factory (tests inject a MockBackend here) */
  createBackend?: (provider: BackendProvider, config: RuntimeConfig) => InferenceBackend;
  /** Replaces environment-based runtime configuration */
  loadConfig?: () => RuntimeConfig;
}

type GlobalOptions = {
  dir?: string;
  backend?: string;
  model?: string;
};

type ConversationOptions = {
  preferences?: boolean;
};

const defaultIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  input: process.stdin,
  output: process.stdout,
};

/**
 * Human-readable description of a failure
 */
export function formatCliError(error: unknown): string {
  if (error instanceof ConfigError && error.issues.length > 0) {
    return [`Error: ${error.message}`, ...error.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
  if (error instanceof PersonaRuntimeError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const io: CliIO = { ...defaultIO, ...options.io };
  const backendFactory = options.createBackend ?? createBackend;
  const loadConfig = options.loadConfig ?? loadRuntimeConfig;

  const program = new Command();

  program
    .name('persona-runtime')
    .description('Persona-driven prompt assembly and inference')
    .version('0.1.0')
    .option('-d, --dir <dir>', 'Persona directory (default: PERSONAS_DIR or ./personas)')
    .option('-b, --backend <backend>', 'Inference backend: openai, anthropic or mock')
    .option('-m, --model <model>', 'Model id override');

  /**
   * Runtime config with command-line overrides applied
   */
  const resolveConfig = (): RuntimeConfig => {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig();

    let backend = config.backend;
    if (globals.backend !== undefined) {
      const parsed = BackendProviderSchema.safeParse(globals.backend);
      if (!parsed.success) {
        throw new ConfigError(`Unknown backend "${globals.backend}"`, {
          issues: [`--backend: expected one of ${BackendProviderSchema.options.join(', ')}`],
        });
      }
      backend = parsed.data;
    }

    return {
      ...config,
      backend,
      model: globals.model ?? config.model,
      personasDir: globals.dir ?? config.personasDir,
    };
  };

  const loadPersona = async (config: RuntimeConfig, id: string): Promise<PersonaConfig> => {
    const registry = new PersonaRegistry(config.personasDir);
    return registry.getOrThrow(id);
  };

  const createAssembler = (config: RuntimeConfig): PromptAssembler =>
    new PromptAssembler({
      tokenBudget: config.prompt.tokenBudget,
      maxHistoryTurns: config.prompt.maxHistoryTurns,
    });

  const createRunner = (
    config: RuntimeConfig,
    persona: PersonaConfig,
    conversation: ConversationOptions
  ): SessionRunner => {
    const client = createInferenceClient(config, backendFactory(config.backend, config));
    return new SessionRunner({
      persona,
      assembler: createAssembler(config),
      client,
      preferenceExtractor: conversation.preferences ? new PreferenceExtractor({ client }) : undefined,
    });
  };

  /**
   * Wrap an action so failures are reported and set a non-zero exit code
   */
  const run =
    <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (error) {
        io.err(formatCliError(error));
        io.setExitCode(1);
      }
    };

  program
    .command('list')
    .description('List persona ids in the persona directory')
    .action(
      run(async () => {
        const config = resolveConfig();
        const ids = await new PersonaRegistry(config.personasDir).list();
        if (ids.length === 0) {
          io.out(`No personas found in ${config.personasDir}`);
          return;
        }
        for (const id of ids) {
          io.out(id);
        }
      })
    );

  program
    .command('show <persona>')
    .description('Print the normalized persona document')
    .action(
      run(async (id: string) => {
        const config = resolveConfig();
        const persona = await loadPersona(config, id);
        io.out(new ConfigLoader().serialize(persona).trimEnd());
      })
    );

  program
    .command('validate <file>')
    .description('Check a persona document and report problems')
    .action(
      run(async (file: string) => {
        const persona = await new ConfigLoader().load(new FileConfigSource(file));
        io.out(`OK: ${file} defines persona "${persona.name}"`);
      })
    );

  program
    .command('preview <persona> <message...>')
    .description('Print the prompt that would be sent for a message')
    .action(
      run(async (id: string, message: string[]) => {
        const config = resolveConfig();
        const persona = await loadPersona(config, id);
        const prompt = createAssembler(config).assemble(persona, [], message.join(' '));
        io.out(formatPromptAsText(prompt));
      })
    );

  program
    .command('ask <persona> <message...>')
    .description('Send one message and print the reply')
    .option('-p, --preferences', 'Learn a user profile from the message and add it to the system prompt')
    .action(
      run(async (id: string, message: string[], conversation: ConversationOptions) => {
        const config = resolveConfig();
        const persona = await loadPersona(config, id);
        const reply = await createRunner(config, persona, conversation).runTurn(message.join(' '));
        io.out(reply);
      })
    );

  program
    .command('chat <persona>')
    .description('Start an interactive conversation (/exit, /quit, /clear)')
    .option('-p, --preferences', 'Learn a user profile as you talk and add it to the system prompt')
    .action(
      run(async (id: string, conversation: ConversationOptions) => {
        const config = resolveConfig();
        const persona = await loadPersona(config, id);
        await runChat(createRunner(config, persona, conversation), io);
      })
    );

  return program;
}
