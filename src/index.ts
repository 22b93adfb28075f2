#!/usr/bin/env node
import { buildProgram } from './cli/index.js';
import { error as logError } from './utils/logger.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logError(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
