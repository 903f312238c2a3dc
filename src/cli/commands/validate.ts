/**
 * validate command
 *
 * Loads <dataDir>/config.json the way the writer would and reports the
 * resolved connection, with secrets masked.
 */

import { Command } from 'commander';
import { getConnectionSummary } from '../../config/ConnectionConfiguration.js';
import { ComponentConfig, loadComponentConfig } from '../../config/ComponentConfigLoader.js';
import { ensureTrailingSlash } from '../../config/DestinationPath.js';
import { maskSecrets } from '../../forms/FormFields.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { getGlobalOpts } from '../lib/options.js';

export interface ValidateOptions {
  dataDir?: string;
}

export function runValidate(options: ValidateOptions, output: OutputFormatter): ComponentConfig {
  const config = loadComponentConfig({ dataDir: options.dataDir });

  const { connection, destination } = config;
  const lines = [
    `Connection:  ${getConnectionSummary(connection)}`,
    `Destination: ${ensureTrailingSlash(destination.path)}`,
  ];
  if (destination.append_date) {
    lines.push(`Date suffix: ${destination.append_date_format ?? ''} (UTC)`);
  }

  if (output.isJson()) {
    output.output('', {
      valid: true,
      connection: {
        host: connection.host,
        port: connection.port,
        user: connection.user,
        method: connection.credentials.method,
      },
      destination,
      parameters: maskSecrets(config.parameters),
    });
  } else {
    output.success('Configuration is valid');
    output.output(lines.map((line) => `  ${line}`).join('\n'), null);
  }

  return config;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate the component configuration in the data directory')
    .option('-d, --data-dir <dir>', 'Data directory holding config.json (default: $KBC_DATADIR or ./data)')
    .action((options: ValidateOptions, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);
      runValidate(options, new OutputFormatter(globalOpts.json ?? false));
    });
}
