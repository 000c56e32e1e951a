#!/usr/bin/env tsx
/**
 * Applies pending SQL migrations from ./migrations.
 *
 * Usage:
 *   npm run migrate
 */

import { fileURLToPath } from 'node:url';
import { checkHealth, createLogger, createPool, loadConfig, runMigrations } from '@lineage/core';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, name: 'lineage-migrate' });
const pool = createPool(config.database);

async function main(): Promise<void> {
  const health = await checkHealth(pool, logger);
  if (health.status !== 'ok') {
    throw new Error(`Database ${config.database.host}:${config.database.port} is not reachable`);
  }

  const migrationsDir = fileURLToPath(new URL('../migrations', import.meta.url));
  const applied = await runMigrations(pool, migrationsDir, logger);
  logger.info({ applied }, applied.length > 0 ? 'migrations applied' : 'schema already up to date');
}

main()
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'migration failed');
    process.exitCode = 1;
  })
  .finally(() => pool.end());
