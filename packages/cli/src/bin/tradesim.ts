#!/usr/bin/env node

/**
 * tradesim CLI Entry Point
 */

import { logger } from '@tradesim/utils';
import { createProgram } from '../program.js';
import { handleError } from '../core/error-handler.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});
