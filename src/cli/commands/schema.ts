/**
 * schema and fields commands
 */

import { Command } from 'commander';
import { getFormFields } from '../../forms/FormFields.js';
import { getDefaults } from '../../schema/SchemaDocument.js';
import { SCHEMA_FILE_NAMES, SchemaKind, loadSchemaDocument } from '../../schema/SchemaLoader.js';
import { OutputFormatter, formatFieldTable, formatSchemaSummary } from '../lib/OutputFormatter.js';
import { getGlobalOpts } from '../lib/options.js';

export interface SchemaCommandOptions {
  row?: boolean;
  schemaDir?: string;
}

function kindOf(options: SchemaCommandOptions): SchemaKind {
  return options.row ? 'row' : 'config';
}

export function runSchema(options: SchemaCommandOptions, output: OutputFormatter): void {
  const kind = kindOf(options);
  const document = loadSchemaDocument(kind, options.schemaDir);
  const file = SCHEMA_FILE_NAMES[kind];

  output.output(formatSchemaSummary(file, document), {
    file,
    wellFormed: true,
    required: document.required,
    defaults: getDefaults(document),
  });
}

export function runFields(options: SchemaCommandOptions, output: OutputFormatter): void {
  const fields = getFormFields(loadSchemaDocument(kindOf(options), options.schemaDir));
  output.output(formatFieldTable(fields), fields);
}

export function registerSchemaCommands(program: Command): void {
  program
    .command('schema')
    .description('Check a schema document and list its required properties and defaults')
    .option('--row', 'Use the destination (row) schema instead of the connection schema')
    .option('--schema-dir <dir>', 'Directory holding the schema documents')
    .action((options: SchemaCommandOptions, cmd: Command) => {
      runSchema(options, new OutputFormatter(getGlobalOpts(cmd).json ?? false));
    });

  program
    .command('fields')
    .description('List form fields in render order')
    .option('--row', 'Use the destination (row) schema instead of the connection schema')
    .option('--schema-dir <dir>', 'Directory holding the schema documents')
    .action((options: SchemaCommandOptions, cmd: Command) => {
      runFields(options, new OutputFormatter(getGlobalOpts(cmd).json ?? false));
    });
}
