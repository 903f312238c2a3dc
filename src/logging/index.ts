export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration, LogFormat, TimestampFormat } from './config.js';
export {
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export { ConsoleTransport, FileTransport, formatLogTimestamp, formatTextLine } from './transports.js';
export type { LogTransport } from './transports.js';
