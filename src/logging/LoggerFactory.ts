/**
 * Logger Factory
 *
 * Creates the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   const logger = getLogger('schema-loader');
 *   logger.info('Loaded configSchema.json');
 *
 * The root logger is created with defaults on first write when
 * initializeLogging() was not called.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston priorities run the other way round: error=0 is the highest.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

// The first level check initializes logging, so LOG_LEVEL applies to
// loggers created at module load.
setGlobalLevelProvider(() => {
  ensureInitialized();
  return currentGlobalLevel;
});

/**
 * Initialize the logging subsystem from the environment.
 * `transports` replaces the console/file transports when given.
 */
export function initializeLogging(transports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();
  currentGlobalLevel = config.logLevel;

  const selected: LogTransport[] = transports ?? [
    new ConsoleTransport(config.logFormat, config.timestampFormat),
    ...(config.logFile ? [new FileTransport(config.logFile, config.logFormat)] : []),
  ];

  if (rootLogger) {
    rootLogger.close();
  }

  // Winston itself lets everything through; Logger does the filtering.
  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: 'trace',
    transports: selected.map((t) => t.createWinstonTransport()),
    exitOnError: false,
  });
  rootLogger = root;

  initFromEnv(config.debugComponents);

  return root;
}

function ensureInitialized(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

/**
 * Get (or create) the Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureInitialized);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global level at runtime. Components with an override keep theirs.
 */
export function setGlobalLevel(level: LogLevel): void {
  ensureInitialized();
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  rootLogger = null;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
}
