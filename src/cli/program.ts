/**
 * CLI program definition
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { LogLevel } from '../logging/LogLevel.js';
import { setGlobalLevel } from '../logging/LoggerFactory.js';
import { registerSchemaCommands } from './commands/schema.js';
import { registerValidateCommand } from './commands/validate.js';
import type { GlobalOptions } from './lib/options.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('sftp-writer-config')
    .description('Check and inspect the SFTP writer configuration')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--json', 'Output as JSON')
    .option('--debug', 'Enable debug logging');

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().debug) {
      setGlobalLevel(LogLevel.DEBUG);
    }
  });

  registerValidateCommand(program);
  registerSchemaCommands(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Validate ./data/config.json')}
  $ sftp-writer-config validate

  ${chalk.gray('# List connection form fields as JSON')}
  $ sftp-writer-config --json fields
`
  );

  return program;
}
