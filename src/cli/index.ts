#!/usr/bin/env node

import { createProgram } from './program.js';
import { logger } from '../utils/logger.js';

const program = createProgram();

if (process.argv.length === 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('schema-ledger failed:', error);
  process.exitCode = 1;
});
