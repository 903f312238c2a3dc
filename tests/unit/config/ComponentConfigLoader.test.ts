import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { getDataDir, loadComponentConfig } from '../../../src/config/ComponentConfigLoader.js';
import { UserError } from '../../../src/errors/ComponentErrors.js';
import { parseSchemaDocument } from '../../../src/schema/SchemaDocument.js';
import { initializeLogging, resetLogging } from '../../../src/logging/LoggerFactory.js';
import { CaptureTransport, captureLogTransport, flushLogs } from '../../helpers/CaptureTransport.js';
import { createDataDir, removeDataDir, VALID_PARAMETERS, writeConfig } from '../../helpers/dataDir.js';

describe('ComponentConfigLoader', () => {
  const originalEnv = { ...process.env };
  let dataDir: string;

  beforeEach(() => {
    dataDir = createDataDir();
  });

  afterEach(() => {
    removeDataDir(dataDir);
    resetLogging();
    process.env = { ...originalEnv };
  });

  function load(config: unknown) {
    writeConfig(dataDir, config);
    return loadComponentConfig({ dataDir });
  }

  describe('getDataDir', () => {
    it('should use KBC_DATADIR when set', () => {
      process.env['KBC_DATADIR'] = '/data';
      expect(getDataDir()).toBe('/data');
    });

    it('should fall back to ./data', () => {
      delete process.env['KBC_DATADIR'];
      expect(getDataDir()).toBe(path.resolve(process.cwd(), 'data'));
    });
  });

  describe('loadComponentConfig', () => {
    it('should resolve a password connection with defaults', () => {
      const config = load({ parameters: VALID_PARAMETERS });

      expect(config.dataDir).toBe(dataDir);
      expect(config.connection).toEqual({
        host: 'sftp.example.com',
        port: 22,
        user: 'writer',
        credentials: { method: 'password', password: 'test-secret' },
      });
      expect(config.destination).toEqual({
        path: '/upload',
        append_date: false,
        append_date_format: '%Y%m%d%H%M%S',
      });
      expect(config.debug).toBe(false);
      expect(config.parameters['port']).toBe(22);
    });

    it('should prefer the private key over the password', () => {
      const config = load({ parameters: { ...VALID_PARAMETERS, '#private_key': 'test-private-key' } });
      expect(config.connection.credentials).toEqual({ method: 'privateKey', privateKey: 'test-private-key' });
    });

    it('should read the debug flag and action', () => {
      const config = load({ parameters: { ...VALID_PARAMETERS, debug: true }, action: 'run' });
      expect(config.debug).toBe(true);
      expect(config.action).toBe('run');
    });

    it('should enable debug logging before logging the parameters', async () => {
      const capture = new CaptureTransport();
      initializeLogging([captureLogTransport(capture)]);

      load({ parameters: { ...VALID_PARAMETERS, debug: true } });
      await flushLogs();

      const parametersRecord = capture.records.find((record) => record.message === 'Parameters');
      expect(parametersRecord?.level).toBe('debug');
      expect(parametersRecord?.meta['parameters']).toEqual({
        hostname: 'sftp.example.com',
        port: 22,
        user: 'writer',
        '#pass': '*****',
        '#private_key': '',
        path: '/upload',
        append_date: false,
        append_date_format: '%Y%m%d%H%M%S',
        debug: true,
      });
    });

    it('should fall back to the standard SFTP port when no schema supplies one', () => {
      writeConfig(dataDir, { parameters: VALID_PARAMETERS });
      const schemas = [parseSchemaDocument({ type: 'object', properties: {} })];
      expect(loadComponentConfig({ dataDir, schemas }).connection.port).toBe(22);
    });

    it('should let image parameters replace hostname and port', () => {
      const config = load({
        parameters: { ...VALID_PARAMETERS, hostname: '' },
        image_parameters: { sftp_host: '10.0.0.5', sftp_port: 2222 },
      });
      expect(config.connection.host).toBe('10.0.0.5');
      expect(config.connection.port).toBe(2222);
    });

    it('should require both image parameters once one is given', () => {
      expect(() =>
        load({ parameters: VALID_PARAMETERS, image_parameters: { sftp_host: '10.0.0.5' } })
      ).toThrow('Missing required parameters: image parameter sftp_port');
    });

    it('should require both image parameters whenever image parameters are set', () => {
      expect(() =>
        load({ parameters: VALID_PARAMETERS, image_parameters: { region: 'eu-central-1' } })
      ).toThrow('Missing required parameters: image parameter sftp_host, image parameter sftp_port');
    });

    it('should use the user connection with empty image parameters', () => {
      const config = load({ parameters: VALID_PARAMETERS, image_parameters: {} });
      expect(config.connection.host).toBe('sftp.example.com');
    });

    it('should require a hostname without image parameters', () => {
      expect(() => load({ parameters: { ...VALID_PARAMETERS, hostname: '' } })).toThrow(
        'Missing required parameters: hostname'
      );
    });

    it('should list every empty required value', () => {
      expect(() =>
        load({ parameters: { ...VALID_PARAMETERS, user: '', '#pass': '' } })
      ).toThrow('Missing required parameters: user, #private_key or #pass');
    });

    it('should report schema violations', () => {
      expect(() => load({ parameters: { ...VALID_PARAMETERS, port: 'abc' } })).toThrow(
        'Invalid parameters:\nport: expected integer, received string'
      );
    });

    it('should report a missing remote path', () => {
      const { path: _path, ...withoutPath } = VALID_PARAMETERS;
      expect(() => load({ parameters: withoutPath })).toThrow(
        'Invalid parameters:\npath: missing required property "path"'
      );
    });

    it('should reject an envelope without parameters', () => {
      expect(() => load({ action: 'run' })).toThrow(/is malformed:\nparameters: Required$/);
    });

    it('should reject invalid JSON', () => {
      fs.writeFileSync(path.join(dataDir, 'config.json'), '{"parameters": ');
      expect(() => loadComponentConfig({ dataDir })).toThrow(UserError);
      expect(() => loadComponentConfig({ dataDir })).toThrow(/is not valid JSON/);
    });

    it('should report a missing config.json', () => {
      expect(() => loadComponentConfig({ dataDir })).toThrow(/could not be read/);
    });

    it('should read from KBC_DATADIR by default', () => {
      writeConfig(dataDir, { parameters: VALID_PARAMETERS });
      process.env['KBC_DATADIR'] = dataDir;
      expect(loadComponentConfig().connection.host).toBe('sftp.example.com');
    });
  });
});
