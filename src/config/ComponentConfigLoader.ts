/**
 * Component Config Loader
 *
 * Reads <dataDir>/config.json, validates its parameters against the
 * connection and destination schema documents and applies the rules the
 * schemas cannot express.
 *
 * The data directory is KBC_DATADIR when set, otherwise ./data.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { UserError, errorMessage } from '../errors/ComponentErrors.js';
import { maskSecrets } from '../forms/FormFields.js';
import { LogLevel } from '../logging/LogLevel.js';
import { getLogger, setGlobalLevel } from '../logging/LoggerFactory.js';
import { formatValidationIssues, validateAgainstSchemas } from '../schema/SchemaCompiler.js';
import type { SchemaDocument } from '../schema/SchemaDocument.js';
import { loadSchemaDocument } from '../schema/SchemaLoader.js';
import {
  ConnectionParameters,
  DEFAULT_SFTP_PORT,
  ImageParameters,
  ImageParametersSchema,
  KEY_HOSTNAME,
  KEY_HOSTNAME_IMAGE,
  KEY_PASSWORD,
  KEY_PORT,
  KEY_PORT_IMAGE,
  KEY_PRIVATE_KEY,
  KEY_USER,
  ResolvedConnection,
  hasImageConnectionOverride,
  resolveConnection,
} from './ConnectionConfiguration.js';
import { DEFAULT_APPEND_DATE_FORMAT, DestinationParameters } from './DestinationPath.js';

export const CONFIG_FILE_NAME = 'config.json';
export const KEY_REMOTE_PATH = 'path';
export const KEY_APPEND_DATE = 'append_date';
export const KEY_APPEND_DATE_FORMAT = 'append_date_format';
export const KEY_DEBUG = 'debug';

const logger = getLogger('config-loader');

const ConfigEnvelopeSchema = z
  .object({
    parameters: z.record(z.unknown()),
    image_parameters: ImageParametersSchema.optional(),
    action: z.string().optional(),
  })
  .passthrough();

export interface ComponentConfig {
  dataDir: string;
  action?: string;
  /** Validated parameters with schema defaults applied */
  parameters: Record<string, unknown>;
  imageParameters: ImageParameters;
  connection: ResolvedConnection;
  destination: DestinationParameters;
  debug: boolean;
}

export interface LoadOptions {
  /** Defaults to getDataDir() */
  dataDir?: string;
  /** Connection and destination documents, defaults to the shipped ones */
  schemas?: readonly SchemaDocument[];
}

export function getDataDir(): string {
  return process.env['KBC_DATADIR'] || path.resolve(process.cwd(), 'data');
}

function readConfigFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new UserError(`Configuration file ${filePath} could not be read: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UserError(`Configuration file ${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function readString(values: Record<string, unknown>, key: string): string {
  const value = values[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new UserError(`Parameter "${key}" must be a string`);
  }
  return value;
}

function readOptionalString(values: Record<string, unknown>, key: string): string | undefined {
  return values[key] === undefined ? undefined : readString(values, key);
}

function readBoolean(values: Record<string, unknown>, key: string): boolean {
  return values[key] === true;
}

function readPort(values: Record<string, unknown>, key: string): number {
  const value = values[key];
  if (value === undefined) return DEFAULT_SFTP_PORT;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new UserError(`Parameter "${key}" must be an integer`);
  }
  return value;
}

/**
 * Checks the schemas cannot express. Returns the problems found.
 */
export function checkParameters(
  parameters: Record<string, unknown>,
  imageParameters: ImageParameters
): string[] {
  const missing: string[] = [];

  for (const key of [KEY_USER, KEY_REMOTE_PATH]) {
    if (readString(parameters, key) === '') missing.push(key);
  }

  if (readString(parameters, KEY_PRIVATE_KEY).trim() === '' && readString(parameters, KEY_PASSWORD) === '') {
    missing.push(`${KEY_PRIVATE_KEY} or ${KEY_PASSWORD}`);
  }

  if (hasImageConnectionOverride(imageParameters)) {
    if (!imageParameters[KEY_HOSTNAME_IMAGE]) missing.push(`image parameter ${KEY_HOSTNAME_IMAGE}`);
    if (imageParameters[KEY_PORT_IMAGE] === undefined) missing.push(`image parameter ${KEY_PORT_IMAGE}`);
  } else if (readString(parameters, KEY_HOSTNAME) === '') {
    missing.push(KEY_HOSTNAME);
  }

  return missing;
}

/**
 * Load and check the component configuration.
 * @throws UserError on anything the user has to fix
 */
export function loadComponentConfig(options: LoadOptions = {}): ComponentConfig {
  const dataDir = options.dataDir ?? getDataDir();
  const filePath = path.join(dataDir, CONFIG_FILE_NAME);
  logger.info('Loading configuration...', { file: filePath });

  const envelope = ConfigEnvelopeSchema.safeParse(readConfigFile(filePath));
  if (!envelope.success) {
    const problems = envelope.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new UserError(`Configuration file ${filePath} is malformed:\n${problems.join('\n')}`);
  }

  if (envelope.data.parameters[KEY_DEBUG] === true) {
    setGlobalLevel(LogLevel.DEBUG);
    logger.debug('Debug mode enabled by the "debug" parameter');
  }

  const schemas = options.schemas ?? [loadSchemaDocument('config'), loadSchemaDocument('row')];
  const validation = validateAgainstSchemas(schemas, envelope.data.parameters);
  if (!validation.valid) {
    throw new UserError(`Invalid parameters:\n${formatValidationIssues(validation.issues)}`);
  }

  const parameters = validation.value;
  const imageParameters = envelope.data.image_parameters ?? {};
  logger.debug('Parameters', { parameters: maskSecrets(parameters) });

  const missing = checkParameters(parameters, imageParameters);
  if (missing.length > 0) {
    throw new UserError(`Missing required parameters: ${missing.join(', ')}`);
  }

  const connectionParameters: ConnectionParameters = {
    hostname: readString(parameters, KEY_HOSTNAME),
    port: readPort(parameters, KEY_PORT),
    user: readString(parameters, KEY_USER),
    '#pass': readString(parameters, KEY_PASSWORD),
    '#private_key': readString(parameters, KEY_PRIVATE_KEY),
  };

  return {
    dataDir,
    action: envelope.data.action,
    parameters,
    imageParameters,
    connection: resolveConnection(connectionParameters, imageParameters),
    destination: {
      path: readString(parameters, KEY_REMOTE_PATH),
      append_date: readBoolean(parameters, KEY_APPEND_DATE),
      append_date_format: readOptionalString(parameters, KEY_APPEND_DATE_FORMAT) ?? DEFAULT_APPEND_DATE_FORMAT,
    },
    debug: readBoolean(parameters, KEY_DEBUG),
  };
}
