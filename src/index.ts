#!/usr/bin/env node

import { CLI_NAME, createProgram } from '@/program.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const log = createLogger(CLI_NAME);

/**
 * Main entry point.
 *
 * --debug is checked before parsing so logging is on while commands register.
 * Commands set process.exitCode themselves; anything escaping them is an
 * unhandled exception.
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  try {
    await createProgram().parseAsync();
  } catch (error: unknown) {
    log.error(getErrorMessage(error));
    process.exitCode = EXIT_CODES.UNHANDLED_EXCEPTION;
  }
}

void main();
