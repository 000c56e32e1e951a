import pg from 'pg';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from './logger.js';

// Override pg type parser for INT8 (OID 20): ids are BIGINT but stay within
// Number.MAX_SAFE_INTEGER, so return numbers instead of strings.
pg.types.setTypeParser(20, (val: string) => Number(val));

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max?: number;
}

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max ?? 10,
  });
}

export async function runMigrations(
  pool: pg.Pool,
  migrationsDir: string,
  logger?: Logger,
): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();
  const applied: string[] = [];

  for (const file of sqlFiles) {
    const version = file.replace('.sql', '');

    const { rows } = await pool.query(
      'SELECT version FROM schema_migrations WHERE version = $1',
      [version],
    );

    if (rows.length > 0) continue;

    const sql = await readFile(join(migrationsDir, file), 'utf-8');
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
      await client.query('COMMIT');
      applied.push(version);
      logger?.info({ version }, 'migration applied');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  return applied;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  timestamp: string;
  checks: { database: 'ok' | 'error' };
}

export async function checkHealth(pool: pg.Pool, logger?: Logger, timeoutMs = 3000): Promise<HealthReport> {
  let dbStatus: 'ok' | 'error' = 'error';
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), timeoutMs);
    });
    await Promise.race([pool.query('SELECT 1'), timeoutPromise]);
    dbStatus = 'ok';
  } catch (error) {
    logger?.warn({ err: error }, 'database health check failed');
  } finally {
    clearTimeout(timer);
  }

  return {
    status: dbStatus === 'ok' ? 'ok' : 'degraded',
    timestamp: new Date().toISOString(),
    checks: { database: dbStatus },
  };
}

const TRANSIENT_NODE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

// SQLSTATE values that say nothing about the request itself.
const TRANSIENT_SQLSTATES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * True for connection-level and retry-safe PostgreSQL failures, looking
 * through `cause` chains so wrapped errors keep their classification.
 */
export function isTransientStorageError(error: unknown, depth = 0): boolean {
  if (depth > 5) return false;
  const code = errorCode(error);
  if (code !== undefined) {
    if (TRANSIENT_NODE_CODES.has(code) || TRANSIENT_SQLSTATES.has(code)) return true;
    if (code.startsWith('08')) return true; // connection_exception class
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isTransientStorageError(error.cause, depth + 1);
  }
  return false;
}
