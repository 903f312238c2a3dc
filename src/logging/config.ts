/**
 * Logging Configuration
 *
 * Derived from environment variables, cached after the first read.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export type LogFormat = 'text' | 'json';
export type TimestampFormat = 'default' | 'iso';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL env, default INFO) */
  logLevel: LogLevel;
  /** Components with their own level (SFTP_WRITER_DEBUG_COMPONENTS env, comma-separated) */
  debugComponents: string[];
  /** Output format (LOG_FORMAT env, default 'text') */
  logFormat: LogFormat;
  /** Optional file to write logs to (LOG_FILE env) */
  logFile?: string;
  /** 'default' is yyyy-MM-dd HH:mm:ss,SSS; 'iso' is ISO-8601 (LOG_TIMESTAMP_FORMAT env) */
  timestampFormat: TimestampFormat;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): LogFormat {
  return value === 'json' ? 'json' : 'text';
}

function parseTimestampFormat(value: string | undefined): TimestampFormat {
  return value === 'iso' ? 'iso' : 'default';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * Get the logging configuration. Use resetLoggingConfig() in tests.
 */
export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['SFTP_WRITER_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
    timestampFormat: parseTimestampFormat(process.env['LOG_TIMESTAMP_FORMAT']),
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}
