/**
 * Interactive chat loop
 */

import { createInterface } from 'node:readline/promises';
import { PersonaRuntimeError } from '../errors/index.js';
import type { SessionRunner } from '../session/session-runner.js';

export interface ChatIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  out: (text: string) => void;
  err: (text: string) => void;
}

const EXIT_COMMANDS = new Set(['/exit', '/quit']);
const CLEAR_COMMAND = '/clear';

/**
 * Read lines until `/exit`, `/quit` or end of input, replying to each
 *
 * Failed turns are reported and the loop continues; `/clear` starts a
 * fresh conversation.
 */
export async function runChat(runner: SessionRunner, io: ChatIO): Promise<void> {
  const rl = createInterface({ input: io.input, output: io.output, terminal: false });

  io.out(`Chatting with ${runner.persona.name}. Type /exit to quit, /clear to start over.`);

  try {
    rl.setPrompt('You: ');
    rl.prompt();

    for await (const raw of rl) {
      const line = raw.trim();

      if (EXIT_COMMANDS.has(line)) {
        break;
      }

      if (line === CLEAR_COMMAND) {
        await runner.reset();
        io.out('History cleared.');
      } else if (line) {
        try {
          const reply = await runner.runTurn(line);
          io.out(`${runner.persona.name}: ${reply}`);
        } catch (error) {
          if (!(error instanceof PersonaRuntimeError)) {
            throw error;
          }
          io.err(`Error [${error.code}]: ${error.message}`);
        }
      }

      rl.prompt();
    }
  } finally {
    rl.close();
  }

  io.out('Goodbye.');
}
