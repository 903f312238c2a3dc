export {
  resolveCredentials,
  resolveConnection,
  hasImageConnectionOverride,
  getConnectionSummary,
  ImageParametersSchema,
  DEFAULT_SFTP_PORT,
} from './ConnectionConfiguration.js';
export type {
  ConnectionParameters,
  ImageParameters,
  Credentials,
  ResolvedConnection,
} from './ConnectionConfiguration.js';
export {
  buildDestinationPath,
  ensureTrailingSlash,
  DEFAULT_APPEND_DATE_FORMAT,
} from './DestinationPath.js';
export type { DestinationParameters } from './DestinationPath.js';
export { convertStrftimePattern, formatUtcTimestamp } from './DateFormat.js';
export {
  loadComponentConfig,
  checkParameters,
  getDataDir,
  CONFIG_FILE_NAME,
} from './ComponentConfigLoader.js';
export type { ComponentConfig, LoadOptions } from './ComponentConfigLoader.js';
