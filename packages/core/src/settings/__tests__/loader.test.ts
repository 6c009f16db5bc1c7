/**
 * @fileoverview Tests for settings loading and overrides
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger, getLogger, resetLogger } from '../../logging/index.js';
import { DEFAULT_SETTINGS } from '../defaults.js';
import {
  applyEnvOverrides,
  clearSettingsCache,
  getSettings,
  getSettingsPath,
  loadSettings,
  loadUserSettings,
  mergeSettings,
} from '../loader.js';

describe('settings loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-settings-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    clearSettingsCache();
  });

  function writeSettings(content: string): string {
    const file = path.join(dir, 'settings.json');
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('should place the settings file under the home directory', () => {
    expect(getSettingsPath('/home/test')).toBe(path.join('/home/test', '.switchyard', 'settings.json'));
  });

  it('should return defaults when the file does not exist', () => {
    expect(loadUserSettings(path.join(dir, 'missing.json'))).toBeNull();
    expect(loadSettings(path.join(dir, 'missing.json'), {})).toEqual(DEFAULT_SETTINGS);
  });

  it('should merge a partial file over defaults', () => {
    const file = writeSettings(JSON.stringify({ rpc: { handlerTimeoutMs: 5000 }, http: { cors: true } }));

    const settings = loadSettings(file, {});

    expect(settings.rpc).toEqual({ handlerTimeoutMs: 5000, maxBatchSize: 0 });
    expect(settings.http).toEqual({ ...DEFAULT_SETTINGS.http, cors: true });
    expect(settings.logging).toEqual(DEFAULT_SETTINGS.logging);
  });

  it('should ignore a file that is not valid JSON', () => {
    const file = writeSettings('{ rpc: ');

    expect(loadUserSettings(file)).toBeNull();
    expect(loadSettings(file, {})).toEqual(DEFAULT_SETTINGS);
  });

  it('should ignore a file that fails validation', () => {
    const file = writeSettings(JSON.stringify({ http: { port: 'eighty' } }));

    expect(loadUserSettings(file)).toBeNull();
  });

  it('should not mutate the defaults when merging', () => {
    mergeSettings(DEFAULT_SETTINGS, { rpc: { maxBatchSize: 10 } });

    expect(DEFAULT_SETTINGS.rpc.maxBatchSize).toBe(0);
  });

  it('should apply environment overrides after the file', () => {
    const file = writeSettings(JSON.stringify({ rpc: { handlerTimeoutMs: 5000 } }));

    const settings = loadSettings(file, {
      SWITCHYARD_RPC_TIMEOUT_MS: '750',
      SWITCHYARD_MAX_BATCH_SIZE: '100',
      SWITCHYARD_HTTP_HOST: '0.0.0.0',
      SWITCHYARD_HTTP_PORT: '9000',
      SWITCHYARD_HTTP_CORS: 'yes',
      LOG_LEVEL: 'DEBUG',
    });

    expect(settings).toEqual({
      rpc: { handlerTimeoutMs: 750, maxBatchSize: 100 },
      http: { host: '0.0.0.0', port: 9000, cors: true, maxBodyBytes: DEFAULT_SETTINGS.http.maxBodyBytes },
      logging: { level: 'debug' },
    });
  });

  it('should keep file values when environment values are invalid', () => {
    const settings = applyEnvOverrides(DEFAULT_SETTINGS, {
      SWITCHYARD_RPC_TIMEOUT_MS: 'soon',
      SWITCHYARD_HTTP_PORT: '-1',
      LOG_LEVEL: 'chatty',
    });

    expect(settings).toEqual(DEFAULT_SETTINGS);
  });

  it('should cache settings until cleared', () => {
    const first = getSettings();

    expect(getSettings()).toBe(first);
    clearSettingsCache();
    expect(getSettings()).not.toBe(first);
  });

  it('should read only the file the test environment names', () => {
    expect(process.env.SWITCHYARD_SETTINGS_PATH).toBe('/nonexistent/switchyard/settings.json');
    expect(loadUserSettings(process.env.SWITCHYARD_SETTINGS_PATH)).toBeNull();
    expect(getSettings().http).toEqual(DEFAULT_SETTINGS.http);
  });

  describe('logging level', () => {
    const saved = { ...process.env };

    afterEach(() => {
      for (const name of ['LOG_LEVEL', 'SWITCHYARD_SETTINGS_PATH']) {
        const value = saved[name];
        if (value === undefined) {
          delete process.env[name];
        } else {
          process.env[name] = value;
        }
      }
      resetLogger();
    });

    it('should set the root logger to the configured level on first load', () => {
      const file = writeSettings(JSON.stringify({ logging: { level: 'debug' } }));
      const lines: string[] = [];
      delete process.env.LOG_LEVEL;
      process.env.SWITCHYARD_SETTINGS_PATH = file;
      resetLogger();
      getLogger({ destination: { write: (line) => lines.push(line) } });

      createLogger('rpc-dispatcher').debug('before settings');
      expect(getSettings().logging.level).toBe('debug');
      createLogger('rpc-dispatcher').debug('after settings');

      expect(lines.map((line) => JSON.parse(line).msg)).toEqual(['after settings']);
    });
  });
});
