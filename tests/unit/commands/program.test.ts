import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough, Readable } from 'node:stream';
import { createProgram, formatCliError, type CliIO } from '../../../src/commands/program.js';
import type { RuntimeConfig } from '../../../src/config/runtime.js';
import {
  ConfigError,
  InvalidParamsError,
  PersonaRuntimeError,
  RateLimitedError,
} from '../../../src/errors/index.js';
import { MockBackend, type MockStep } from '../../../src/inference/mock-backend.js';
import { VALID_PERSONA_YAML } from '../../utils/mocks.js';

describe('createProgram', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'persona-cli-'));
    await writeFile(join(dir, 'tester.yaml'), VALID_PERSONA_YAML);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createHarness(script: MockStep[] = [], inputLines: string[] = [], tokenBudget = 8000) {
    const out: string[] = [];
    const err: string[] = [];
    const exitCodes: number[] = [];
    const backend = new MockBackend({ script });
    const createBackend = vi.fn(() => backend);

    const config: RuntimeConfig = {
      backend: 'mock',
      openai: {},
      anthropic: {},
      personasDir: dir,
      prompt: { tokenBudget, maxHistoryTurns: 0 },
      inference: { timeoutMs: 1000, maxRetries: 0, baseDelay: 1, maxDelay: 10, maxRetryAfter: 10 },
    };

    const io: CliIO = {
      out: (text) => out.push(text),
      err: (text) => err.push(text),
      setExitCode: (code) => exitCodes.push(code),
      input: Readable.from(inputLines),
      output: new PassThrough(),
    };

    const run = async (...args: string[]): Promise<void> => {
      const program = createProgram({ io, loadConfig: () => config, createBackend });
      await program.parseAsync(['node', 'persona-runtime', ...args]);
    };

    return { out, err, exitCodes, backend, createBackend, run };
  }

  describe('list', () => {
    it('should print persona ids', async () => {
      await writeFile(join(dir, 'another.yml'), VALID_PERSONA_YAML);
      const harness = createHarness();

      await harness.run('list');

      expect(harness.out).toEqual(['another', 'tester']);
    });

    it('should report an empty directory', async () => {
      const empty = join(dir, 'empty');
      const harness = createHarness();

      await harness.run('--dir', empty, 'list');

      expect(harness.out).toEqual([`No personas found in ${empty}`]);
    });
  });

  describe('show', () => {
    it('should print the normalized document', async () => {
      const harness = createHarness();

      await harness.run('show', 'tester');

      expect(harness.out).toEqual([VALID_PERSONA_YAML.trimEnd()]);
    });

    it('should fail for an unknown persona', async () => {
      const harness = createHarness();

      await harness.run('show', 'ghost');

      expect(harness.err).toEqual([`Error [PERSONA_NOT_FOUND]: Persona "ghost" not found in ${dir}`]);
      expect(harness.exitCodes).toEqual([1]);
    });
  });

  describe('validate', () => {
    it('should accept a valid document', async () => {
      const file = join(dir, 'tester.yaml');
      const harness = createHarness();

      await harness.run('validate', file);

      expect(harness.out).toEqual([`OK: ${file} defines persona "Tester"`]);
      expect(harness.exitCodes).toEqual([]);
    });

    it('should list every problem in an invalid document', async () => {
      const file = join(dir, 'broken.yaml');
      await writeFile(file, 'name: Only a name\n');
      const harness = createHarness();

      await harness.run('validate', file);

      const lines = harness.err[0]?.split('\n');
      expect(lines?.slice(1)).toEqual([
        '  - role: role is required',
        '  - description: description is required',
        '  - guidelines: guidelines is required',
        '  - style: style is required',
      ]);
      expect(harness.exitCodes).toEqual([1]);
    });
  });

  describe('preview', () => {
    it('should print the prompt without calling a backend', async () => {
      const harness = createHarness();

      await harness.run('preview', 'tester', 'hello', 'world');

      expect(harness.out[0]?.endsWith(
        'User: Is this done?\nAssistant: Not until it is tested.\nUser: hello world\nAssistant: '
      )).toBe(true);
      expect(harness.out[0]?.startsWith('You are now playing the role of a careful tester.')).toBe(true);
      expect(harness.createBackend).not.toHaveBeenCalled();
    });
  });

  describe('ask', () => {
    it('should print the reply using the persona parameters', async () => {
      const harness = createHarness(['Not yet.']);

      await harness.run('ask', 'tester', 'Ready', 'to', 'ship?');

      expect(harness.out).toEqual(['Not yet.']);
      expect(harness.backend.requests[0]?.params).toEqual({
        model: 'mock-model',
        temperature: 0.5,
        maxTokens: 256,
        topP: 0.9,
      });
      const messages = harness.backend.requests[0]?.messages;
      expect(messages?.[messages.length - 1]).toEqual({ role: 'user', content: 'Ready to ship?' });
    });

    it('should run preference extraction first with --preferences', async () => {
      const harness = createHarness([JSON.stringify({ topics: ['shipping'] }), 'Not yet.']);

      await harness.run('ask', 'tester', '--preferences', 'Ready', 'to', 'ship?');

      expect(harness.out).toEqual(['Not yet.']);
      expect(harness.backend.requests).toHaveLength(2);
      expect(harness.backend.requests[0]?.params.temperature).toBe(0.1);
      expect(harness.backend.requests[1]?.messages[0]?.content).toContain('- Topics of interest: shipping');
    });

    it('should apply --model and --backend overrides', async () => {
      const harness = createHarness(['ok']);

      await harness.run('--backend', 'anthropic', '--model', 'cli-model', 'ask', 'tester', 'Hi');

      expect(harness.createBackend).toHaveBeenCalledWith(
        'anthropic',
        expect.objectContaining({ backend: 'anthropic', model: 'cli-model' })
      );
      expect(harness.backend.requests[0]?.params.model).toBe('cli-model');
    });

    it('should reject an unknown backend', async () => {
      const harness = createHarness();

      await harness.run('--backend', 'bogus', 'ask', 'tester', 'Hi');

      expect(harness.err).toEqual([
        'Error: Unknown backend "bogus"\n  - --backend: expected one of openai, anthropic, mock',
      ]);
      expect(harness.exitCodes).toEqual([1]);
    });

    it('should report inference failures', async () => {
      const harness = createHarness([new InvalidParamsError('model does not exist')]);

      await harness.run('ask', 'tester', 'Hi');

      expect(harness.err).toEqual(['Error [INVALID_PARAMS]: model does not exist']);
      expect(harness.exitCodes).toEqual([1]);
    });
  });

  describe('chat', () => {
    it('should converse until /exit and honour /clear', async () => {
      const harness = createHarness(['first reply', 'second reply'], [
        'Hello\n',
        '/clear\n',
        'Again\n',
        '/exit\n',
        'never read\n',
      ]);

      await harness.run('chat', 'tester');

      expect(harness.out).toEqual([
        'Chatting with Tester. Type /exit to quit, /clear to start over.',
        'Tester: first reply',
        'History cleared.',
        'Tester: second reply',
        'Goodbye.',
      ]);
      // system + one example pair + the new message; "Hello" was cleared
      expect(harness.backend.requests[1]?.messages).toHaveLength(4);
      expect(harness.backend.requests).toHaveLength(2);
    });

    it('should report a failed turn and keep going until input ends', async () => {
      const harness = createHarness([new RateLimitedError('slow down'), 'made it'], ['Hi\n', '\n', 'Again\n']);

      await harness.run('chat', 'tester');

      expect(harness.err).toEqual(['Error [RATE_LIMITED]: slow down']);
      expect(harness.out).toEqual([
        'Chatting with Tester. Type /exit to quit, /clear to start over.',
        'Tester: made it',
        'Goodbye.',
      ]);
      expect(harness.exitCodes).toEqual([]);
    });

    it('should add the learned user profile to the system prompt with --preferences', async () => {
      const harness = createHarness(
        [JSON.stringify({ topics: ['jazz'] }), 'r1', JSON.stringify({ goals: ['play live'] }), 'r2'],
        ['I like jazz\n', 'I want to play live\n', '/exit\n']
      );

      await harness.run('chat', 'tester', '--preferences');

      expect(harness.out).toEqual([
        'Chatting with Tester. Type /exit to quit, /clear to start over.',
        'Tester: r1',
        'Tester: r2',
        'Goodbye.',
      ]);
      expect(harness.backend.requests).toHaveLength(4);
      const systemPrompt = harness.backend.requests[3]?.messages[0]?.content ?? '';
      expect(systemPrompt).toContain('\n- Topics of interest: jazz\n- Goals: play live\n');
      expect(systemPrompt).toContain('\n- Interactions so far: 2\n');
    });

    it('should leave the system prompt alone without --preferences', async () => {
      const harness = createHarness(['r1'], ['I like jazz\n', '/exit\n']);

      await harness.run('chat', 'tester');

      expect(harness.backend.requests).toHaveLength(1);
      expect(harness.backend.requests[0]?.messages[0]?.content).not.toContain('User profile:');
    });

    it('should report an oversized message and keep the conversation', async () => {
      const harness = createHarness(
        ['r1', 'r2'],
        ['hello\n', `${'x'.repeat(2000)}\n`, 'second\n', '/exit\n'],
        200
      );

      await harness.run('chat', 'tester');

      expect(harness.err).toHaveLength(1);
      expect(harness.err[0]).toMatch(/^Error \[ASSEMBLY_ERROR\]: Prompt needs ~\d+ tokens/);
      expect(harness.out).toEqual([
        'Chatting with Tester. Type /exit to quit, /clear to start over.',
        'Tester: r1',
        'Tester: r2',
        'Goodbye.',
      ]);
      // system + example pair + hello/r1 + second
      expect(harness.backend.requests[1]?.messages).toHaveLength(6);
    });
  });
});

describe('formatCliError', () => {
  it('should list config issues', () => {
    const error = new ConfigError('Invalid persona document a.yaml', { issues: ['name: name is required'] });

    expect(formatCliError(error)).toBe('Error: Invalid persona document a.yaml\n  - name: name is required');
  });

  it('should show the code of runtime errors', () => {
    expect(formatCliError(new PersonaRuntimeError('nope', { code: 'SOME_CODE' }))).toBe(
      'Error [SOME_CODE]: nope'
    );
  });

  it('should show plain errors and values', () => {
    expect(formatCliError(new Error('plain'))).toBe('Error: plain');
    expect(formatCliError('text')).toBe('Error: text');
  });
});
