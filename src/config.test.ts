import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_PORT,
  DEFAULT_RETRY_DELAY_MS,
  configuredClients,
  loadBotSettings,
  parseClientNames,
  parseConfig,
} from './config.js';
import { checkConfiguration } from './validate.js';

function env(overrides: Record<string, string | undefined> = {}): NodeJS.ProcessEnv {
  return {
    BOT_TOKEN: 'test-token',
    DATA_PATH: '/srv/trackbot',
    CLIENT_NAMES: 'A,B',
    ...overrides,
  };
}

function mockLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parseConfig', () => {
  it('parses required fields and defaults', () => {
    const { config, warnings, infos } = parseConfig(env());
    expect(config).toEqual({
      token: 'test-token',
      dataDir: '/srv/trackbot',
      port: DEFAULT_PORT,
      host: '0.0.0.0',
      configPath: path.join('config', 'config.json'),
      logLevel: 'info',
      logFile: 'console.log',
      retryDelayMs: DEFAULT_RETRY_DELAY_MS,
      ownerIds: new Set(),
    });
    expect(warnings).toEqual([]);
    expect(infos).toEqual(['BOT_OWNER_IDS is empty: administrative commands are limited to the application owner']);
  });

  it('leaves a missing token to the bootstrap env check', () => {
    const { config, warnings } = parseConfig(env({ BOT_TOKEN: '  ' }));
    expect(config.token).toBeUndefined();
    expect(warnings).toEqual([]);
  });

  it('falls back to ./data when DATA_PATH is missing', () => {
    const { config, warnings } = parseConfig(env({ DATA_PATH: undefined }));
    expect(config.dataDir).toBe('data');
    expect(warnings).toEqual(['DATA_PATH is not set: using "data" relative to the working directory']);
  });

  it('parses PORT and the retry delay', () => {
    const { config } = parseConfig(env({ PORT: '8080', BOOTSTRAP_RETRY_DELAY_MS: '500' }));
    expect(config.port).toBe(8080);
    expect(config.retryDelayMs).toBe(500);
  });

  it('rejects invalid numbers', () => {
    expect(() => parseConfig(env({ PORT: 'abc' }))).toThrow('PORT must be a non-negative number, got "abc"');
    expect(() => parseConfig(env({ PORT: '70000' }))).toThrow('PORT must be a valid TCP port (0-65535), got "70000"');
    expect(() => parseConfig(env({ BOOTSTRAP_RETRY_DELAY_MS: '1.5' }))).toThrow(
      'BOOTSTRAP_RETRY_DELAY_MS must be an integer, got "1.5"',
    );
  });

  it('normalizes LOG_LEVEL and warns about unknown levels', () => {
    expect(parseConfig(env({ LOG_LEVEL: 'DEBUG' })).config.logLevel).toBe('debug');
    const { config, warnings } = parseConfig(env({ LOG_LEVEL: 'verbose' }));
    expect(config.logLevel).toBe('info');
    expect(warnings).toEqual(['LOG_LEVEL "verbose" is not a log level: using "info"']);
  });

  it('parses owner IDs', () => {
    const { config, infos } = parseConfig(env({ BOT_OWNER_IDS: '123, 456' }));
    expect(config.ownerIds).toEqual(new Set(['123', '456']));
    expect(infos).toEqual([]);
  });

  it('warns when BOT_OWNER_IDS has no valid IDs', () => {
    const { config, warnings } = parseConfig(env({ BOT_OWNER_IDS: 'alice' }));
    expect(config.ownerIds.size).toBe(0);
    expect(warnings).toEqual([
      'BOT_OWNER_IDS was set but no valid IDs were parsed: falling back to the application owner',
    ]);
  });

  it('honors path overrides', () => {
    const { config } = parseConfig(env({ CONFIG_PATH: '/etc/trackbot.json', LOG_FILE: '/var/log/trackbot.log', HOST: '127.0.0.1' }));
    expect(config.configPath).toBe('/etc/trackbot.json');
    expect(config.logFile).toBe('/var/log/trackbot.log');
    expect(config.host).toBe('127.0.0.1');
  });
});

describe('parseClientNames', () => {
  it('keeps declared order and drops blanks and duplicates', () => {
    expect(parseClientNames(' A, B ,A,, C')).toEqual(['A', 'B', 'C']);
  });

  it('returns an empty list for missing input', () => {
    expect(parseClientNames(undefined)).toEqual([]);
    expect(parseClientNames('  ')).toEqual([]);
  });

  it('reads the live environment', () => {
    expect(configuredClients({ CLIENT_NAMES: 'x,y' })).toEqual(['x', 'y']);
    vi.stubEnv('CLIENT_NAMES', 'later');
    expect(configuredClients()).toEqual(['later']);
  });
});

describe('loadBotSettings', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'trackbot-config-'));
  });

  afterEach(async () => {
    await fsp.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns the parsed object', async () => {
    const file = path.join(tmpDir, 'config.json');
    await fsp.writeFile(file, JSON.stringify({ prefix: '?', extra: 1 }));
    await expect(loadBotSettings(file)).resolves.toEqual({ prefix: '?', extra: 1 });
  });

  it('returns an empty mapping for a missing file', async () => {
    const log = mockLog();
    const file = path.join(tmpDir, 'missing.json');
    await expect(loadBotSettings(file, log)).resolves.toEqual({});
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ filePath: file }), 'config:settings file unreadable');
  });

  it('returns an empty mapping for invalid JSON', async () => {
    const log = mockLog();
    const file = path.join(tmpDir, 'config.json');
    await fsp.writeFile(file, '{ prefix: ');
    await expect(loadBotSettings(file, log)).resolves.toEqual({});
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ filePath: file }), 'config:settings file is not valid JSON');
  });

  it('returns an empty mapping when the file is not an object', async () => {
    const log = mockLog();
    const file = path.join(tmpDir, 'config.json');
    await fsp.writeFile(file, '["!"]');
    await expect(loadBotSettings(file, log)).resolves.toEqual({});
    expect(log.warn).toHaveBeenCalledWith({ filePath: file }, 'config:settings file must contain a JSON object');
  });

  it('ships a settings file that passes the configuration check', async () => {
    const shipped = fileURLToPath(new URL('../config/config.json', import.meta.url));
    expect(checkConfiguration(await loadBotSettings(shipped))).toBe(true);
  });
});
