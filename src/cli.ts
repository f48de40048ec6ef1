#!/usr/bin/env node

/**
 * Photo Vault CLI
 */

import chalk from 'chalk';
import { createProgram } from './program.js';
import { getErrorMessage } from './utils/errors.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red('Error:'), getErrorMessage(error));
    process.exitCode = 1;
  });
