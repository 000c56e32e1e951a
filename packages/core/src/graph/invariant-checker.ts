import {
  CycleDetectedError,
  DomainError,
  DuplicateRelationshipError,
  ForbiddenError,
  GraphCorruptedError,
  InvalidRelationshipError,
  NotFoundError,
} from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { intervalsOverlap } from '../entities/dates.js';
import type { EntityRecord, RelationshipFields } from '../entities/types.js';
import type { StorageTransaction } from '../storage/types.js';

export type ParentLookup = (childId: number) => Promise<number[]>;

/**
 * Depth-first walk up the parent edges from `start`. True when `candidate`
 * is among its ancestors. `bound` is the number of persons the walk can
 * legitimately meet; visiting more means the stored graph is corrupt.
 */
export async function isAncestor(
  candidate: number,
  start: number,
  parentsOf: ParentLookup,
  bound: number,
  accountId: number,
): Promise<boolean> {
  const visited = new Set<number>([start]);
  const stack = [start];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    for (const parent of await parentsOf(current)) {
      if (parent === candidate) return true;
      if (visited.has(parent)) continue;
      visited.add(parent);
      if (visited.size > bound) {
        throw new GraphCorruptedError(
          `Ancestor walk from person ${start} exceeded ${bound} persons`,
          accountId,
          start,
        );
      }
      stack.push(parent);
    }
  }
  return false;
}

/**
 * Rejects relationship writes that would break the family graph: self
 * loops, edges across accounts, edges to missing or tombstoned people,
 * duplicate edges over overlapping periods and parent cycles.
 *
 * Callers hold the account lock for the whole check-then-write sequence.
 */
export class GraphInvariantChecker {
  constructor(private readonly logger: Logger) {}

  async checkNewRelationship(
    tx: StorageTransaction,
    accountId: number,
    fields: RelationshipFields,
  ): Promise<void> {
    await this.guard(accountId, fields, async () => {
      if (fields.person1_id === fields.person2_id) {
        throw new InvalidRelationshipError(
          `Person ${fields.person1_id} cannot be related to themselves`,
          'self_loop',
        );
      }
      await this.assertEndpoints(tx, accountId, fields);
      await this.assertNoDuplicate(tx, accountId, fields);
      if (fields.type === 'parent') {
        await this.assertAcyclic(tx, accountId, fields.person1_id, fields.person2_id);
      }
    });
  }

  /** Only validity dates and details change after creation. */
  async checkRelationshipUpdate(
    tx: StorageTransaction,
    accountId: number,
    current: EntityRecord<'relationship'>,
    next: RelationshipFields,
  ): Promise<void> {
    await this.guard(accountId, next, async () => {
      await this.assertEndpoints(tx, accountId, next);
      await this.assertNoDuplicate(tx, accountId, next, current.id);
    });
  }

  private async guard(accountId: number, fields: RelationshipFields, check: () => Promise<void>): Promise<void> {
    try {
      await check();
    } catch (error) {
      if (error instanceof DomainError) {
        this.logger.debug(
          {
            account_id: accountId,
            person1_id: fields.person1_id,
            person2_id: fields.person2_id,
            type: fields.type,
            code: error.code,
          },
          'relationship rejected',
        );
      }
      throw error;
    }
  }

  private async assertEndpoints(
    tx: StorageTransaction,
    accountId: number,
    fields: RelationshipFields,
  ): Promise<void> {
    const first = await tx.findRecord('person', fields.person1_id);
    if (!first) throw new NotFoundError('person', fields.person1_id);
    const second = await tx.findRecord('person', fields.person2_id);
    if (!second) throw new NotFoundError('person', fields.person2_id);

    if (first.account_id !== second.account_id) {
      throw new InvalidRelationshipError(
        `Persons ${first.id} and ${second.id} belong to different accounts`,
        'cross_tenant',
      );
    }
    if (first.account_id !== accountId) {
      throw new ForbiddenError('person', first.id);
    }
    for (const person of [first, second]) {
      if (person.is_deleted) throw new NotFoundError('person', person.id);
    }
  }

  private async assertNoDuplicate(
    tx: StorageTransaction,
    accountId: number,
    fields: RelationshipFields,
    excludeId?: number,
  ): Promise<void> {
    const existing = await tx.queryRecords('relationship', accountId, {
      where: {
        person1_id: fields.person1_id,
        person2_id: fields.person2_id,
        type: fields.type,
      },
    });

    const interval = { start: fields.start_date, end: fields.end_date };
    const duplicate = existing.find(
      (edge) =>
        edge.id !== excludeId &&
        intervalsOverlap(interval, { start: edge.fields.start_date, end: edge.fields.end_date }),
    );
    if (duplicate) {
      throw new DuplicateRelationshipError(duplicate.id);
    }
  }

  /**
   * The new edge makes `parentId` a parent of `childId`; it closes a cycle
   * exactly when `childId` is already an ancestor of `parentId`. The walk
   * follows every live parent edge of the account, including edges whose
   * endpoints are tombstoned.
   */
  private async assertAcyclic(
    tx: StorageTransaction,
    accountId: number,
    parentId: number,
    childId: number,
  ): Promise<void> {
    const bound = await tx.countRecords('person', accountId, true);
    const parentsOf: ParentLookup = async (personId) => {
      const edges = await tx.queryRecords('relationship', accountId, {
        where: { type: 'parent', person2_id: personId },
      });
      return edges.map((edge) => edge.fields.person1_id);
    };

    if (await isAncestor(childId, parentId, parentsOf, bound, accountId)) {
      throw new CycleDetectedError(parentId, childId);
    }
  }
}
