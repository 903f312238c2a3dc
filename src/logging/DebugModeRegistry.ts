/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset for tests.
 *
 * Entries come from SFTP_WRITER_DEBUG_COMPONENTS, e.g. "schema-loader:TRACE,cli".
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

const overrides = new Map<string, LogLevel>();

export function setComponentLevel(name: string, level: LogLevel): void {
  overrides.set(name, level);
}

export function clearComponentLevel(name: string): void {
  overrides.delete(name);
}

/**
 * The component's override if one is set, otherwise the global level.
 * Child components ("cli.validate") inherit their parent's override.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | undefined = name;
  while (current) {
    const level = overrides.get(current);
    if (level) return level;
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : undefined;
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply entries of the form "name" or "name:LEVEL". A bare name gets DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  overrides.clear();
}
