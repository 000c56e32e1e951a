import { describe, it, expect } from 'vitest';
import { GraphCorruptedError } from '../shared/errors.js';
import { isAncestor } from './invariant-checker.js';
import type { ParentLookup } from './invariant-checker.js';

function lookup(parents: Record<number, number[]>): ParentLookup {
  return async (child) => parents[child] ?? [];
}

describe('isAncestor', () => {
  // 1's parents are 2 and 3; 2's parent is 4.
  const family = lookup({ 1: [2, 3], 2: [4] });

  it('should find ancestors several generations up', async () => {
    await expect(isAncestor(4, 1, family, 10, 1)).resolves.toBe(true);
    await expect(isAncestor(3, 1, family, 10, 1)).resolves.toBe(true);
  });

  it('should not look downwards or sideways', async () => {
    await expect(isAncestor(1, 4, family, 10, 1)).resolves.toBe(false);
    await expect(isAncestor(3, 2, family, 10, 1)).resolves.toBe(false);
  });

  it('should stop at people it has already visited', async () => {
    const looped = lookup({ 1: [2], 2: [1] });
    await expect(isAncestor(5, 1, looped, 10, 1)).resolves.toBe(false);
  });

  it('should flag a walk that meets more people than exist', async () => {
    const chain = lookup({ 1: [2], 2: [3], 3: [4] });
    await expect(isAncestor(9, 1, chain, 2, 77)).rejects.toBeInstanceOf(GraphCorruptedError);
    await expect(isAncestor(9, 1, chain, 2, 77)).rejects.toMatchObject({ accountId: 77, personId: 1 });
  });
});
