#!/usr/bin/env node

import { createProgram } from '../cli.js';
import { logger } from '../utils/logger.js';

const program = createProgram({
  io: { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Unexpected failure:', error);
  process.exitCode = 1;
});
