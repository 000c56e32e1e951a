import { normalizeRelationshipInput } from '@lineage/core';
import type {
  EntityKind,
  GraphInvariantChecker,
  EntityRecord,
  FieldPatch,
  FieldsOf,
  LinkTargetKind,
  StorageTransaction,
  VisibilityResolver,
} from '@lineage/core';

export interface GuardContext {
  tx: StorageTransaction;
  account_id: number;
  resolver: VisibilityResolver;
}

/**
 * Per-kind write rules applied inside the mutation's transaction, after
 * input validation and before anything is written.
 */
export interface WriteGuard<K extends EntityKind> {
  /** Take the per-account lock before reading anything. */
  locksAccount: boolean;
  normalizeInput?(input: FieldPatch): FieldPatch;
  checkCreate(ctx: GuardContext, fields: FieldsOf<K>): Promise<void>;
  checkUpdate(ctx: GuardContext, current: EntityRecord<K>, next: FieldsOf<K>): Promise<void>;
}

export type WriteGuards = { [K in EntityKind]: WriteGuard<K> };

const unguarded = <K extends EntityKind>(): WriteGuard<K> => ({
  locksAccount: false,
  checkCreate: async () => undefined,
  checkUpdate: async () => undefined,
});

async function requireLinkTarget(
  ctx: GuardContext,
  entityType: LinkTargetKind,
  entityId: number,
): Promise<void> {
  await ctx.resolver.requireLiveTarget(entityType, entityId, ctx.account_id);
}

export function createWriteGuards(checker: GraphInvariantChecker): WriteGuards {
  return {
    person: unguarded(),

    relationship: {
      locksAccount: true,
      normalizeInput: normalizeRelationshipInput,
      checkCreate: (ctx, fields) => checker.checkNewRelationship(ctx.tx, ctx.account_id, fields),
      checkUpdate: (ctx, current, next) =>
        checker.checkRelationshipUpdate(ctx.tx, ctx.account_id, current, next),
    },

    event: {
      locksAccount: false,
      checkCreate: async (ctx, fields) => {
        if (fields.created_by !== null) {
          await ctx.resolver.requireLiveTarget('person', fields.created_by, ctx.account_id);
        }
      },
      checkUpdate: async (ctx, current, next) => {
        if (next.created_by !== null && next.created_by !== current.fields.created_by) {
          await ctx.resolver.requireLiveTarget('person', next.created_by, ctx.account_id);
        }
      },
    },

    event_person: {
      locksAccount: false,
      checkCreate: async (ctx, fields) => {
        await ctx.resolver.requireLiveTarget('event', fields.event_id, ctx.account_id);
        await ctx.resolver.requireLiveTarget('person', fields.person_id, ctx.account_id);
      },
      checkUpdate: async () => undefined,
    },

    media: unguarded(),

    media_link: {
      locksAccount: false,
      checkCreate: async (ctx, fields) => {
        await ctx.resolver.requireLiveTarget('media', fields.media_id, ctx.account_id);
        await requireLinkTarget(ctx, fields.entity_type, fields.entity_id);
      },
      checkUpdate: async () => undefined,
    },

    source: unguarded(),

    source_link: {
      locksAccount: false,
      checkCreate: async (ctx, fields) => {
        await ctx.resolver.requireLiveTarget('source', fields.source_id, ctx.account_id);
        await requireLinkTarget(ctx, fields.entity_type, fields.entity_id);
      },
      checkUpdate: async () => undefined,
    },
  };
}
