import { DomainError, RevisionLedgerError } from '../shared/errors.js';
import { descriptorFor } from '../entities/kinds.js';
import type { EntityKind } from '../entities/types.js';
import type { GenealogyStorage, StorageTransaction } from '../storage/types.js';
import { foldRevisions } from './diff.js';
import type { NewRevision, ReconstructedRecord, Revision, RevisionPage, RevisionQuery } from './types.js';

const DEFAULT_PAGE_SIZE = 100;

/**
 * Append-only log of every committed mutation. Bound to one storage handle
 * for its lifetime; appends join the caller's transaction so an entity
 * change and its revision commit or roll back together.
 */
export class RevisionLedger {
  constructor(private readonly storage: GenealogyStorage) {}

  async append(tx: StorageTransaction, input: NewRevision): Promise<Revision> {
    try {
      return await tx.appendRevision(input);
    } catch (error) {
      if (error instanceof DomainError) throw error;
      throw new RevisionLedgerError(
        `Failed to append revision for ${input.entity_type}/${input.entity_id}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error,
      );
    }
  }

  async history(accountId: number, query: RevisionQuery = {}): Promise<RevisionPage> {
    const limit = query.limit ?? DEFAULT_PAGE_SIZE;
    const rows = await this.storage.transaction((tx) =>
      tx.readRevisions(accountId, { ...query, limit: limit + 1 }),
    );

    const hasMore = rows.length > limit;
    const revisions = rows.slice(0, limit);
    const nextAfterId = hasMore ? revisions[revisions.length - 1].id : undefined;
    return { revisions, has_more: hasMore, next_after_id: nextAfterId };
  }

  /**
   * Field values of an entity as of `at`, replayed from its revisions.
   * `null` when the entity did not exist at that moment.
   */
  async reconstruct<K extends EntityKind>(
    accountId: number,
    kind: K,
    entityId: number,
    at: Date,
  ): Promise<ReconstructedRecord<K> | null> {
    const revisions = await this.storage.transaction((tx) =>
      tx.readRevisions(accountId, { entity_type: kind, entity_id: entityId, to: at }),
    );
    const state = foldRevisions(revisions);
    if (!state) return null;

    return {
      kind,
      id: entityId,
      version: state.version,
      is_deleted: state.is_deleted,
      fields: descriptorFor(kind).decode(state.fields),
      as_of: state.as_of,
    };
  }
}
