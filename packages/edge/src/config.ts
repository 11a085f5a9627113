/**
 * Runtime configuration loaded from environment variables, optionally merged
 * from a .env file.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { Dialect } from '@doorsync/core';
import { ValidationError } from './edge-logger.js';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  DOORSYNC_BASE_URL: z.string().url(),
  DOORSYNC_USERNAME: z.string().min(1),
  DOORSYNC_PASSWORD: z.string().min(1),
  DOORSYNC_PARTITION_ID: z.coerce.number().int().nonnegative(),
  DOORSYNC_VERIFY_TLS: booleanString.default('false'),
  DOORSYNC_DIALECT: z.enum(['auto', 'protectornet', 'odyssey']).default('auto'),
  DOORSYNC_DEFAULT_OVERRIDE_MINUTES: positiveInt(5),
  DOORSYNC_REQUEST_TIMEOUT_MS: positiveInt(10000),
  DOORSYNC_SNAPSHOT_INTERVAL_MS: positiveInt(60000),
  DOORSYNC_CACHE_REFRESH_MS: positiveInt(300000),
  DOORSYNC_RECONNECT_BASE_MS: positiveInt(5000),
  DOORSYNC_RECONNECT_MAX_MS: positiveInt(30000),
});

export interface RuntimeConfig {
  baseUrl: string;
  username: string;
  password: string;
  partitionId: number;
  verifyTls: boolean;
  /** Fixed backend dialect, or null to detect it on each connection. */
  dialect: Dialect | null;
  /** Default: 5 */
  defaultOverrideMinutes: number;
  /** Default: 10000 (10s) */
  requestTimeoutMs: number;
  /** Default: 60000 (1m) */
  snapshotIntervalMs: number;
  /** Default: 300000 (5m) */
  cacheRefreshMs: number;
  /** Default: 5000 (5s) */
  reconnectBaseMs: number;
  /** Default: 30000 (30s) */
  reconnectMaxMs: number;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Path of a .env file whose values fill in variables missing from `env`. */
  envPath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(options.env ?? process.env)) {
    if (value !== undefined) env[key] = value;
  }
  if (options.envPath) {
    loadDotenv({ path: options.envPath, processEnv: env });
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'env';
    throw new ValidationError(`Invalid configuration for ${field}: ${issue?.message ?? 'unknown error'}`, field);
  }

  const e = parsed.data;
  if (e.DOORSYNC_RECONNECT_MAX_MS < e.DOORSYNC_RECONNECT_BASE_MS) {
    throw new ValidationError(
      'DOORSYNC_RECONNECT_MAX_MS must not be smaller than DOORSYNC_RECONNECT_BASE_MS',
      'DOORSYNC_RECONNECT_MAX_MS',
    );
  }

  return {
    baseUrl: e.DOORSYNC_BASE_URL.replace(/\/+$/, ''),
    username: e.DOORSYNC_USERNAME,
    password: e.DOORSYNC_PASSWORD,
    partitionId: e.DOORSYNC_PARTITION_ID,
    verifyTls: e.DOORSYNC_VERIFY_TLS,
    dialect:
      e.DOORSYNC_DIALECT === 'protectornet'
        ? Dialect.PROTECTORNET
        : e.DOORSYNC_DIALECT === 'odyssey'
          ? Dialect.ODYSSEY
          : null,
    defaultOverrideMinutes: e.DOORSYNC_DEFAULT_OVERRIDE_MINUTES,
    requestTimeoutMs: e.DOORSYNC_REQUEST_TIMEOUT_MS,
    snapshotIntervalMs: e.DOORSYNC_SNAPSHOT_INTERVAL_MS,
    cacheRefreshMs: e.DOORSYNC_CACHE_REFRESH_MS,
    reconnectBaseMs: e.DOORSYNC_RECONNECT_BASE_MS,
    reconnectMaxMs: e.DOORSYNC_RECONNECT_MAX_MS,
  };
}
