/**
 * pino logging for the runtime and CLI
 *
 * Everything goes to stderr: `persona-runtime ask` and `chat` print replies
 * on stdout, which must stay clean for piping. LOG_LEVEL overrides the
 * level; tests run silent.
 */

import pino from 'pino';
import { createRequire } from 'module';

const require = createRequire(import.meta.url);
const STDERR = 2;

function resolveLevel(): string {
  return process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
}

// pino-pretty is a dev dependency, so installs from the registry may lack it
function prettyTarget(): string | undefined {
  const env = process.env.NODE_ENV || '';
  if (env === 'production' || env === 'test' || process.env.CI) {
    return undefined;
  }
  try {
    require.resolve('pino-pretty');
    return 'pino-pretty';
  } catch {
    return undefined;
  }
}

function createRootLogger(): pino.Logger {
  const options: pino.LoggerOptions = {
    level: resolveLevel(),
    base: { service: 'persona-runtime' },
  };

  const target = prettyTarget();
  if (!target) {
    return pino(options, pino.destination(STDERR));
  }
  return pino({
    ...options,
    transport: {
      target,
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname', destination: STDERR },
    },
  });
}

export const logger = createRootLogger();

/**
 * Child logger tagged with `context`, e.g. `createLogger('SessionRunner')`
 */
export function createLogger(context: string): pino.Logger {
  return logger.child({ context });
}
