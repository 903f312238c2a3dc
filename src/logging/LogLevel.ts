/**
 * Log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

/**
 * Parse a level name, case-insensitively. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * True when a message at `messageLevel` passes a `thresholdLevel` filter.
 */
export function isLevelEnabled(messageLevel: LogLevel, thresholdLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(thresholdLevel);
}
