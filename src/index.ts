/**
 * SFTP writer configuration
 *
 * Schema documents for the connection and destination forms, their
 * validation, and the rules a consumer applies to validated parameters.
 */

export * from './schema/index.js';
export * from './forms/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export { getLogger, initializeLogging, LogLevel } from './logging/index.js';
export type { Logger } from './logging/index.js';
