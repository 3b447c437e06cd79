#!/usr/bin/env node

/**
 * Appliance Updater CLI
 * Main entry point
 */

import { logger, describeError } from '@appliance-updater/core';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('CLI error', { error: describeError(error) });
    console.error(describeError(error));
    process.exitCode = 1;
  });
