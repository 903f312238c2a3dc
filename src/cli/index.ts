#!/usr/bin/env node
/**
 * SFTP writer configuration CLI
 *
 * Exit codes: 0 ok, 1 configuration the user must fix, 2 anything else.
 */

import * as dotenv from 'dotenv';
import chalk from 'chalk';
import { getExitCode, errorMessage, UserError } from '../errors/ComponentErrors.js';
import { getLogger, initializeLogging, shutdownLogging } from '../logging/LoggerFactory.js';
import { createProgram } from './program.js';

dotenv.config();

async function main(): Promise<number> {
  initializeLogging();
  const logger = getLogger('cli');

  try {
    await createProgram().parseAsync(process.argv);
    return 0;
  } catch (error) {
    if (error instanceof UserError) {
      console.error(chalk.red('Error:'), error.message);
    } else {
      logger.error('Unexpected failure', error instanceof Error ? error : new Error(errorMessage(error)));
    }
    return getExitCode(error);
  } finally {
    await shutdownLogging();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), errorMessage(error));
    process.exitCode = 2;
  });
