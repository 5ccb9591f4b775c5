/**
 * Entity lifecycle transitions shared by processors, the reconciler and the sweeper
 */

import type { StoreTransaction } from '../repositories/types.js';
import type { EntityNode } from '../types/graph.js';
import { lifecycleStateOf, nextLifecycleState } from '../utils/lifecycle.js';

/**
 * References per entity: associations targeting it plus non-deleted structural children
 */
export async function referenceCounts(tx: StoreTransaction, ids: string[]): Promise<Map<string, number>> {
  const counts = new Map<string, number>();
  if (ids.length === 0) return counts;

  const associationCounts = await tx.associations.countByTargets(ids);
  const childCounts = await tx.entities.countActiveChildren(ids);

  for (const id of ids) {
    counts.set(id, (associationCounts.get(id) ?? 0) + (childCounts.get(id) ?? 0));
  }
  return counts;
}

/**
 * Tombstone every listed entity that no longer has a reference. Tombstoning a
 * child re-checks its structural parent (Location → City, Reference → source).
 *
 * @returns ids tombstoned by this call, in order
 */
export async function releaseIfOrphaned(tx: StoreTransaction, ids: Iterable<string>, now: string): Promise<string[]> {
  const tombstoned: string[] = [];
  const pending = [...new Set(ids)];
  const visited = new Set<string>();

  while (pending.length > 0) {
    const id = pending.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);

    const entity = await tx.entities.findById(id);
    if (!entity || lifecycleStateOf(entity) !== 'active') continue;

    const counts = await referenceCounts(tx, [id]);
    if ((counts.get(id) ?? 0) > 0) continue;

    await tombstone(tx, entity, now);
    tombstoned.push(id);

    if (entity.parent_id) {
      pending.push(entity.parent_id);
    }
  }

  return tombstoned;
}

export async function tombstone(tx: StoreTransaction, entity: EntityNode, now: string): Promise<EntityNode> {
  nextLifecycleState(lifecycleStateOf(entity), 'lastReferenceRemoved');
  console.log(`🪦 Tombstoned ${entity.kind} "${entity.name}" (${entity.id})`);
  return tx.entities.update(entity.id, { deleted_at: now }, now);
}

/**
 * Clear the tombstone of a re-referenced entity; the id is kept
 */
export async function reactivate(tx: StoreTransaction, entity: EntityNode, now: string): Promise<EntityNode> {
  nextLifecycleState(lifecycleStateOf(entity), 'referenced');
  console.log(`♻️  Reactivated ${entity.kind} "${entity.name}" (${entity.id})`);
  return tx.entities.update(entity.id, { deleted_at: null }, now);
}
