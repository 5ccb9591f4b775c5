import type { AssociationKind, RelationshipKind } from '../../constants/graph.js';
import type { AssociationEdge, AssociationKey, AssociationMetadata } from '../../types/graph.js';
import { stableStringify } from '../../utils/fingerprint.js';
import type { AssociationChange, AssociationTarget, ProcessorContext, ReconciliationDelta } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function identity(sourceId: string, targetId: string, discriminator: string): string {
  return `${sourceId}|${targetId}|${discriminator}`;
}

/**
 * Drop empty role fields so that absent and null compare equal
 */
export function cleanMetadata(
  metadata: Record<string, string | number | null | undefined>
): AssociationMetadata {
  const cleaned: AssociationMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined || value === '') continue;
    cleaned[key] = value;
  }
  return cleaned;
}

/**
 * Collapse duplicate targets; later duplicates add to the earlier metadata
 */
export function dedupeTargets(targets: AssociationTarget[]): AssociationTarget[] {
  const byIdentity = new Map<string, AssociationTarget>();
  for (const target of targets) {
    const id = identity(target.sourceId, target.targetId, target.discriminator);
    const existing = byIdentity.get(id);
    byIdentity.set(id, existing ? { ...existing, metadata: { ...existing.metadata, ...target.metadata } } : target);
  }
  return [...byIdentity.values()];
}

/**
 * Bring one association kind for the given sources in line with the target set.
 *
 * replace: target set is authoritative (removals, additions, metadata updates).
 * merge:   current ∪ targets (additions and metadata updates only).
 *
 * Removals run before additions. Entities that lose an association are
 * recorded as orphan candidates under `owner`.
 */
export async function reconcileAssociations(
  ctx: ProcessorContext,
  kind: AssociationKind,
  owner: RelationshipKind,
  sourceIds: string[],
  targets: AssociationTarget[],
  delta: ReconciliationDelta
): Promise<void> {
  const desired = dedupeTargets(targets);
  const current = sourceIds.length > 0 ? await ctx.tx.associations.listBySources(kind, sourceIds) : [];

  const currentById = new Map<string, AssociationEdge>();
  for (const edge of current) {
    currentById.set(identity(edge.source_id, edge.target_id, edge.discriminator), edge);
  }
  const desiredIds = new Set(desired.map((t) => identity(t.sourceId, t.targetId, t.discriminator)));

  const change = (sourceId: string, targetId: string, discriminator: string): AssociationChange => ({
    kind,
    sourceId,
    targetId,
    discriminator,
  });

  if (ctx.mode === 'replace') {
    for (const [id, edge] of currentById) {
      if (desiredIds.has(id)) continue;
      await removeAssociation(ctx, edge, null);
      delta.removed.push(change(edge.source_id, edge.target_id, edge.discriminator));
      markOrphanCandidate(ctx, owner, edge.target_id);
    }
  }

  for (const target of desired) {
    const existing = currentById.get(identity(target.sourceId, target.targetId, target.discriminator));

    if (!existing) {
      const key: AssociationKey = {
        kind,
        source_id: target.sourceId,
        target_id: target.targetId,
        discriminator: target.discriminator,
      };
      await ctx.tx.associations.insert({ ...key, metadata: target.metadata }, ctx.now);
      await ctx.tx.associationTombstones.clear(key);
      delta.added.push(change(target.sourceId, target.targetId, target.discriminator));
      ctx.addedTargets.add(target.targetId);
      continue;
    }

    if (stableStringify(existing.metadata) !== stableStringify(target.metadata)) {
      await ctx.tx.associations.updateMetadata(
        { kind, source_id: target.sourceId, target_id: target.targetId, discriminator: target.discriminator },
        target.metadata,
        ctx.now
      );
      delta.updated.push(change(target.sourceId, target.targetId, target.discriminator));
    }
  }
}

/**
 * Remove every association of a kind leaving the given sources (scene teardown).
 * `reason` is written on their tombstones.
 */
export async function clearAssociations(
  ctx: ProcessorContext,
  kind: AssociationKind,
  owner: RelationshipKind,
  sourceIds: string[],
  delta: ReconciliationDelta,
  reason: string
): Promise<void> {
  if (sourceIds.length === 0) return;
  const current = await ctx.tx.associations.listBySources(kind, sourceIds);
  for (const edge of current) {
    await removeAssociation(ctx, edge, reason);
    delta.removed.push({ kind, sourceId: edge.source_id, targetId: edge.target_id, discriminator: edge.discriminator });
    markOrphanCandidate(ctx, owner, edge.target_id);
  }
}

/**
 * Delete an association and leave a tombstone naming who removed it
 */
async function removeAssociation(ctx: ProcessorContext, edge: AssociationEdge, reason: string | null): Promise<void> {
  const key: AssociationKey = {
    kind: edge.kind,
    source_id: edge.source_id,
    target_id: edge.target_id,
    discriminator: edge.discriminator,
  };
  await ctx.tx.associations.remove(key);

  const { removedBy, syncSource, ttlDays } = ctx.removal;
  const expiresAt = ttlDays === null ? null : new Date(new Date(ctx.now).getTime() + ttlDays * DAY_MS).toISOString();
  await ctx.tx.associationTombstones.record(
    { ...key, removed_by: removedBy, sync_source: syncSource, reason, expires_at: expiresAt },
    ctx.now
  );
}

function markOrphanCandidate(ctx: ProcessorContext, owner: RelationshipKind, entityId: string): void {
  const candidates = ctx.orphanCandidates.get(owner) ?? new Set<string>();
  candidates.add(entityId);
  ctx.orphanCandidates.set(owner, candidates);
}
