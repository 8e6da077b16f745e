import { errorMessage } from '@helpersweep/core';
import chalk from 'chalk';

import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exitCode = 1;
  });
