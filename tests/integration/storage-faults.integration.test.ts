import { describe, it, expect } from 'vitest';
import { StorageUnavailableError } from '@lineage/core';
import { captureError, createTestEngine, personInput } from './helpers/test-engine.js';
import { StorageFault } from './helpers/memory-storage.js';

describe('Storage fault handling', () => {
  it('should retry transient faults and commit once', async () => {
    const { engine, storage, newAccount } = createTestEngine();
    const ctx = await newAccount();

    storage.failTransactions(2, 'ECONNRESET');
    const person = await engine.create(ctx, 'person', personInput('Persistent'));

    expect(person.version).toBe(1);
    expect(storage.transactionsStarted).toBe(3);
    expect(storage.transactionsCommitted).toBe(1);
    expect(storage.rowCount('person')).toBe(1);
  });

  it('should give up after the configured attempts', async () => {
    const { engine, storage, newAccount } = createTestEngine({ maxAttempts: 2, baseDelayMs: 0 });
    const ctx = await newAccount();

    storage.failTransactions(2, '40001');
    const error = await captureError(engine.create(ctx, 'person', personInput('Unlucky')));

    expect(error).toBeInstanceOf(StorageUnavailableError);
    expect(error).toHaveProperty('code', 'STORAGE_UNAVAILABLE');
    expect(error).toHaveProperty('attempts', 2);
    expect(error).toHaveProperty('cause.code', '40001');
    expect(storage.rowCount('person')).toBe(0);
  });

  it('should surface other storage errors immediately', async () => {
    const { engine, storage, newAccount } = createTestEngine();
    const ctx = await newAccount();

    storage.failTransactions(1, '23505');
    const error = await captureError(engine.create(ctx, 'person', personInput('Unique')));

    expect(error).toBeInstanceOf(StorageFault);
    expect(storage.transactionsStarted).toBe(1);
  });

  it('should retry reads as well', async () => {
    const { engine, storage, newAccount } = createTestEngine();
    const ctx = await newAccount();
    const person = await engine.create(ctx, 'person', personInput('Reader'));

    storage.failTransactions(1, '08006');
    expect((await engine.get(ctx, 'person', person.id)).id).toBe(person.id);
  });

  it('should never accept both halves of a racing cycle', async () => {
    const { engine, newAccount } = createTestEngine();
    const ctx = await newAccount();
    const a = await engine.create(ctx, 'person', personInput('A'));
    const b = await engine.create(ctx, 'person', personInput('B'));

    const results = await Promise.allSettled([
      engine.create(ctx, 'relationship', { person1_id: a.id, person2_id: b.id, type: 'parent' }),
      engine.create(ctx, 'relationship', { person1_id: b.id, person2_id: a.id, type: 'parent' }),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toHaveProperty('code', 'CYCLE_DETECTED');
  });
});
