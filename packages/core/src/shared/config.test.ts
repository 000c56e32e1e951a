import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ValidationError } from './errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      database: {
        host: 'localhost',
        port: 5432,
        database: 'lineage',
        user: 'lineage',
        password: 'lineage',
        max: 10,
      },
      logLevel: 'info',
      storageRetry: { maxAttempts: 3, baseDelayMs: 50 },
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      DB_HOST: 'db.internal',
      DB_PORT: '6543',
      DB_PASSWORD: 'test-secret',
      LOG_LEVEL: ' DEBUG ',
      STORAGE_RETRY_ATTEMPTS: '5',
      STORAGE_RETRY_DELAY_MS: '0',
    });

    expect(config.database.host).toBe('db.internal');
    expect(config.database.port).toBe(6543);
    expect(config.database.password).toBe('test-secret');
    expect(config.logLevel).toBe('debug');
    expect(config.storageRetry).toEqual({ maxAttempts: 5, baseDelayMs: 0 });
  });

  it('should reject a port that is not a number', () => {
    expect(() => loadConfig({ DB_PORT: 'five' })).toThrow(ValidationError);
  });

  it('should reject zero retry attempts', () => {
    expect(() => loadConfig({ STORAGE_RETRY_ATTEMPTS: '0' })).toThrow('STORAGE_RETRY_ATTEMPTS must be at least 1, got 0');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ValidationError);
  });
});
