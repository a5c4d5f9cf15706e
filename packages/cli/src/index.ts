#!/usr/bin/env node
// packages/cli/src/index.ts — diskcare entry point

import chalk from 'chalk';
import { buildProgram } from './program.js';

buildProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  });
