/**
 * Logger
 *
 * Thin wrapper around a winston logger bound to a component name.
 * Level filtering goes through DebugModeRegistry so that per-component
 * overrides win over the global level.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Injected by LoggerFactory to avoid a circular import */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/**
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

/**
 * Resolves the root winston logger at write time, so module-level loggers
 * survive re-initialization.
 */
export type WinstonProvider = () => winston.Logger;

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonProvider: WinstonProvider
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message with an optional Error object.
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  /**
   * logger.child('row') on "config-loader" yields "config-loader.row"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonProvider);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    this.winstonProvider().log(winstonLevel, message, meta);
  }
}
