import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  defaultServerConfig,
  loadServerConfig,
  parseServerConfig,
} from '../src/config/serverConfig.js';
import { InvalidConfigError } from '../src/errors.js';

describe('serverConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'broadside-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): string {
    const path = join(dir, 'server.yaml');
    writeFileSync(path, contents);
    return path;
  }

  describe('parseServerConfig', () => {
    it('should fill in every default', () => {
      expect(defaultServerConfig()).toEqual({
        tcp: { host: '0.0.0.0', port: 4000 },
        websocket: { enabled: true, port: 4001 },
        status: { enabled: true, port: 4002 },
        legacy: { enabled: false, port: 4003 },
        connection: { maxBufferedBytes: 1048576, maxFrameBytes: 65536, closeGraceMs: 2000 },
        heartbeat: { intervalMs: 15000, timeoutMs: 45000 },
        names: { maxLength: 32 },
        logging: { level: 'info' },
      });
    });

    it('should keep given values and default the rest', () => {
      const config = parseServerConfig({ tcp: { port: 5000 }, legacy: { enabled: true } });

      expect(config.tcp).toEqual({ host: '0.0.0.0', port: 5000 });
      expect(config.legacy).toEqual({ enabled: true, port: 4003 });
    });

    it('should reject a heartbeat timeout shorter than the interval', () => {
      expect(() => parseServerConfig({ heartbeat: { intervalMs: 5000, timeoutMs: 1000 } })).toThrow(
        'Invalid server configuration: heartbeat: timeoutMs must not be shorter than intervalMs'
      );
    });

    it('should name the offending field', () => {
      expect(() => parseServerConfig({ tcp: { port: 'four thousand' } })).toThrow(InvalidConfigError);
      expect(() => parseServerConfig({ tcp: { port: 'four thousand' } })).toThrow(/tcp\.port/);
    });
  });

  describe('loadServerConfig', () => {
    it('should read the YAML file', () => {
      const path = writeConfig('tcp:\n  port: 4100\nlogging:\n  level: debug\n');

      const config = loadServerConfig(path, {});

      expect(config.tcp.port).toBe(4100);
      expect(config.logging.level).toBe('debug');
    });

    it('should fall back to defaults when the file is missing', () => {
      const config = loadServerConfig(join(dir, 'missing.yaml'), {});

      expect(config).toEqual(defaultServerConfig());
    });

    it('should find the file through CONFIG_PATH', () => {
      const path = writeConfig('names:\n  maxLength: 12\n');

      const config = loadServerConfig(undefined, { CONFIG_PATH: path });

      expect(config.names.maxLength).toBe(12);
    });

    it('should let PORT override the TCP port', () => {
      const path = writeConfig('tcp:\n  host: 127.0.0.1\n  port: 4100\n');

      const config = loadServerConfig(path, { PORT: '4200' });

      expect(config.tcp).toEqual({ host: '127.0.0.1', port: 4200 });
    });

    it('should reject a PORT that is not a port number', () => {
      expect(() => loadServerConfig(join(dir, 'missing.yaml'), { PORT: 'abc' })).toThrow(
        'Invalid server configuration: PORT must be a port number, got "abc"'
      );
    });

    it('should reject unparsable YAML', () => {
      const path = writeConfig('tcp: [unclosed\n');

      expect(() => loadServerConfig(path, {})).toThrow(InvalidConfigError);
    });
  });
});
