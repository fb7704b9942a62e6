#!/usr/bin/env node
import { configureLoggerFromEnv } from '../shared/logging/structured.js';
import { createProgram } from './program.js';

configureLoggerFromEnv();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
