import { ValidationError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import type { DatabaseConfig } from './database.js';
import type { RetryOptions } from './retry.js';

export interface AppConfig {
  database: DatabaseConfig;
  logLevel: LogLevel;
  storageRetry: RetryOptions;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError(`${key} must be a non-negative integer, got "${raw}"`, key);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    throw new ValidationError(`${key} must be at least ${min}, got ${value}`, key);
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new ValidationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, 'LOG_LEVEL');
  }
  return level;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    database: {
      host: env.DB_HOST ?? 'localhost',
      port: readInteger(env, 'DB_PORT', 5432, 1),
      database: env.DB_NAME ?? 'lineage',
      user: env.DB_USER ?? 'lineage',
      password: env.DB_PASSWORD ?? 'lineage',
      max: readInteger(env, 'DB_POOL_MAX', 10, 1),
    },
    logLevel: readLogLevel(env),
    storageRetry: {
      maxAttempts: readInteger(env, 'STORAGE_RETRY_ATTEMPTS', 3, 1),
      baseDelayMs: readInteger(env, 'STORAGE_RETRY_DELAY_MS', 50),
    },
  };
}
