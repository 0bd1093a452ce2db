#!/usr/bin/env node

/**
 * CLI entry point
 */

import 'dotenv/config';
import { createProgram } from './cli.js';
import { createLogger } from './logger.js';
import { toError } from './errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch(error => {
    createLogger().error('Fatal error', toError(error));
    process.exit(1);
  });
