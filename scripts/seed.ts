#!/usr/bin/env tsx
/**
 * Seeds one account with a small three-generation family, a wedding and a
 * parish register, then prints the account's JSON export.
 *
 * Usage:
 *   npm run seed
 */

import { createLogger, createPool, loadConfig } from '@lineage/core';
import type { AccountContext, EntityRecord } from '@lineage/core';
import { GenealogyEngine } from '@lineage/engine';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, name: 'lineage-seed' });
const pool = createPool(config.database);
const engine = GenealogyEngine.fromPool(pool, { logger, retry: config.storageRetry });

async function seed(ctx: AccountContext): Promise<void> {
  const person = (given: string, family: string, extra: Record<string, unknown> = {}) =>
    engine.create(ctx, 'person', { given_name: given, family_name: family, ...extra });
  const relate = (a: EntityRecord<'person'>, b: EntityRecord<'person'>, type: string, extra = {}) =>
    engine.create(ctx, 'relationship', { person1_id: a.id, person2_id: b.id, type, ...extra });

  const manuel = await person('Manuel', 'Ferreira', { birth_date: '1898-04-02', birth_place: 'Braga' });
  const gloria = await person('Gloria', 'Sousa', { birth_date: '1901', death_date: '1979-11' });
  const jose = await person('Jose', 'Ferreira', { birth_date: '1925-08-15' });
  const lucia = await person('Lucia', 'Ferreira', { birth_date: '1928' });
  const amelia = await person('Amelia', 'Costa', { birth_date: '1927-01', privacy: 'public' });
  const paulo = await person('Paulo', 'Ferreira', { birth_date: '1952-10-30', privacy: 'public' });

  await relate(manuel, gloria, 'husband', { start_date: '1922-06' });
  await relate(manuel, jose, 'father');
  await relate(gloria, jose, 'mother');
  await relate(manuel, lucia, 'father');
  await relate(gloria, lucia, 'mother');
  await relate(jose, lucia, 'brother');
  await relate(jose, amelia, 'spouse', { start_date: '1950-09-09' });
  await relate(jose, paulo, 'parent');
  await relate(amelia, paulo, 'parent');
  await relate(lucia, paulo, 'godparent');

  const wedding = await engine.create(ctx, 'event', {
    title: 'Wedding of Jose and Amelia',
    event_date: '1950-09-09',
    place: 'Porto',
    created_by: jose.id,
  });
  await engine.create(ctx, 'event_person', { event_id: wedding.id, person_id: jose.id, role: 'groom' });
  await engine.create(ctx, 'event_person', { event_id: wedding.id, person_id: amelia.id, role: 'bride' });
  await engine.create(ctx, 'event_person', { event_id: wedding.id, person_id: lucia.id, role: 'witness' });

  const register = await engine.create(ctx, 'source', {
    title: 'Parish register, Se do Porto',
    citation_text: 'Marriages 1950, folio 112',
  });
  await engine.create(ctx, 'source_link', { source_id: register.id, entity_type: 'event', entity_id: wedding.id });
}

async function main(): Promise<void> {
  const account = await engine.createAccount('Ferreira family');
  const ctx: AccountContext = { account_id: account.id, author: 'seed' };
  await seed(ctx);

  logger.info({ account_id: account.id }, 'seed complete');
  process.stdout.write(await engine.exportJson(ctx));
}

main()
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'seed failed');
    process.exitCode = 1;
  })
  .finally(() => pool.end());
