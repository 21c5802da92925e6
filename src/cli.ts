#!/usr/bin/env node

/**
 * persona-runtime - CLI entry point
 */

import { config } from 'dotenv';
import { createProgram } from './commands/program.js';

// Load environment variables from .env before reading runtime configuration
config();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
