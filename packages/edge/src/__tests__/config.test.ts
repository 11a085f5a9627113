import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Dialect } from '@doorsync/core';
import { loadConfig } from '../config.js';

const BASE_ENV = {
  DOORSYNC_BASE_URL: 'https://panel.test/',
  DOORSYNC_USERNAME: 'operator',
  DOORSYNC_PASSWORD: 'test-secret',
  DOORSYNC_PARTITION_ID: '3',
};

describe('loadConfig', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it('applies defaults', () => {
    expect(loadConfig({ env: BASE_ENV })).toEqual({
      baseUrl: 'https://panel.test',
      username: 'operator',
      password: 'test-secret',
      partitionId: 3,
      verifyTls: false,
      dialect: null,
      defaultOverrideMinutes: 5,
      requestTimeoutMs: 10000,
      snapshotIntervalMs: 60000,
      cacheRefreshMs: 300000,
      reconnectBaseMs: 5000,
      reconnectMaxMs: 30000,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      env: {
        ...BASE_ENV,
        DOORSYNC_VERIFY_TLS: 'yes',
        DOORSYNC_DIALECT: 'odyssey',
        DOORSYNC_DEFAULT_OVERRIDE_MINUTES: '15',
      },
    });

    expect(config.verifyTls).toBe(true);
    expect(config.dialect).toBe(Dialect.ODYSSEY);
    expect(config.defaultOverrideMinutes).toBe(15);
  });

  it('names the first invalid variable', () => {
    const { DOORSYNC_BASE_URL: _omitted, ...rest } = BASE_ENV;

    expect(() => loadConfig({ env: rest })).toThrowError('Invalid configuration for DOORSYNC_BASE_URL: Required');
    expect(() => loadConfig({ env: { ...BASE_ENV, DOORSYNC_PARTITION_ID: 'abc' } })).toThrowError(
      expect.objectContaining({ name: 'ValidationError', field: 'DOORSYNC_PARTITION_ID' }),
    );
  });

  it('rejects a reconnect cap below the base delay', () => {
    expect(() =>
      loadConfig({ env: { ...BASE_ENV, DOORSYNC_RECONNECT_BASE_MS: '10000', DOORSYNC_RECONNECT_MAX_MS: '5000' } }),
    ).toThrowError('DOORSYNC_RECONNECT_MAX_MS must not be smaller than DOORSYNC_RECONNECT_BASE_MS');
  });

  it('fills missing variables from a .env file without overriding the environment', () => {
    const dir = mkdtempSync(join(tmpdir(), 'doorsync-config-'));
    dirs.push(dir);
    const envPath = join(dir, '.env');
    writeFileSync(envPath, 'DOORSYNC_PASSWORD=test-secret-file\nDOORSYNC_DIALECT=protectornet\nDOORSYNC_USERNAME=file-user\n');

    const { DOORSYNC_PASSWORD: _omitted, ...rest } = BASE_ENV;
    const config = loadConfig({ env: rest, envPath });

    expect(config.password).toBe('test-secret-file');
    expect(config.dialect).toBe(Dialect.PROTECTORNET);
    expect(config.username).toBe('operator');
  });
});
