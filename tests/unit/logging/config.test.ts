import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getLoggingConfig, resetLoggingConfig } from '../../../src/logging/config.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('LoggingConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLoggingConfig();
    delete process.env['LOG_LEVEL'];
    delete process.env['LOG_FORMAT'];
    delete process.env['LOG_FILE'];
    delete process.env['LOG_TIMESTAMP_FORMAT'];
    delete process.env['SFTP_WRITER_DEBUG_COMPONENTS'];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLoggingConfig();
  });

  it('should use defaults when nothing is set', () => {
    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.INFO,
      debugComponents: [],
      logFormat: 'text',
      logFile: undefined,
      timestampFormat: 'default',
    });
  });

  it('should parse LOG_LEVEL case-insensitively', () => {
    process.env['LOG_LEVEL'] = 'debug';
    expect(getLoggingConfig().logLevel).toBe(LogLevel.DEBUG);
  });

  it('should fall back to INFO for an unknown level', () => {
    process.env['LOG_LEVEL'] = 'VERBOSE';
    expect(getLoggingConfig().logLevel).toBe(LogLevel.INFO);
  });

  it('should read format, file and timestamp settings', () => {
    process.env['LOG_FORMAT'] = 'json';
    process.env['LOG_FILE'] = '/var/log/sftp-writer.log';
    process.env['LOG_TIMESTAMP_FORMAT'] = 'iso';
    const config = getLoggingConfig();
    expect(config.logFormat).toBe('json');
    expect(config.logFile).toBe('/var/log/sftp-writer.log');
    expect(config.timestampFormat).toBe('iso');
  });

  it('should split debug components and drop blanks', () => {
    process.env['SFTP_WRITER_DEBUG_COMPONENTS'] = ' cli , schema-loader:TRACE,, ';
    expect(getLoggingConfig().debugComponents).toEqual(['cli', 'schema-loader:TRACE']);
  });

  it('should cache until reset', () => {
    const first = getLoggingConfig();
    process.env['LOG_LEVEL'] = 'ERROR';
    expect(getLoggingConfig()).toBe(first);
    resetLoggingConfig();
    expect(getLoggingConfig().logLevel).toBe(LogLevel.ERROR);
  });
});
