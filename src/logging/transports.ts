/**
 * Logging Transports
 *
 * Winston transport wrappers. Text output looks like:
 * INFO  2026-02-10 14:30:15,042 [schema-loader] Loaded configSchema.json
 */

import winston from 'winston';
import type { LogFormat, TimestampFormat } from './config.js';

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatLogTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one log record as a text line, with the error stack on following lines.
 */
export function formatTextLine(
  level: string,
  message: string,
  timestamp: string,
  component?: string,
  errorStack?: string
): string {
  const componentPart = component ? ` [${component}]` : '';
  let line = `${level.toUpperCase().padEnd(5)} ${timestamp}${componentPart} ${message}`;
  if (errorStack) {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const now = new Date();
    const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLogTimestamp(now);
    const component = typeof info['component'] === 'string' ? info['component'] : undefined;
    const errorStack = typeof info['errorStack'] === 'string' ? info['errorStack'] : undefined;
    return formatTextLine(info.level, String(info.message), timestamp, component, errorStack);
  });
}

function buildJsonFormat(): winston.Logform.Format {
  return winston.format.combine(winston.format.timestamp(), winston.format.json());
}

/**
 * Console transport. Everything goes to stderr so that stdout stays free for
 * command output (JSON included).
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat(this.timestampFormat),
      stderrLevels: ['error', 'warn', 'info', 'debug', 'trace'],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat('default'),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
