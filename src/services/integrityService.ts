/**
 * Store integrity check: read-only scan for states the engine should never leave behind
 */

import type { ArchiveStore } from '../repositories/types.js';
import type { AssociationEdge, EntityNode } from '../types/graph.js';
import { withSpan } from '../utils/tracing.js';
import { referenceCounts } from './lifecycleService.js';

export interface IntegrityIssue {
  type: 'duplicate_natural_key' | 'dangling_association' | 'referenced_tombstone' | 'active_orphan';
  message: string;
  ids: string[];
}

export interface IntegrityReport {
  ok: boolean;
  entityCount: number;
  associationCount: number;
  issues: IntegrityIssue[];
}

function describe(entity: EntityNode): string {
  return entity.disambiguator ? `${entity.kind} "${entity.name}" (${entity.disambiguator})` : `${entity.kind} "${entity.name}"`;
}

export async function checkIntegrity(store: ArchiveStore): Promise<IntegrityReport> {
  return withSpan('integrity.check', {}, () =>
    store.withTransaction(async (tx) => {
      const entities = await tx.entities.list(undefined, { includeDeleted: true });
      const associations = await tx.associations.listAll();
      const entries = await tx.entries.list({ includeDeleted: true });
      const issues: IntegrityIssue[] = [];

      const byKey = new Map<string, EntityNode[]>();
      for (const entity of entities) {
        if (entity.deleted_at) continue;
        const key = `${entity.kind}|${entity.name_key}|${entity.disambiguator_key}`;
        byKey.set(key, [...(byKey.get(key) ?? []), entity]);
      }
      for (const group of byKey.values()) {
        if (group.length > 1) {
          issues.push({
            type: 'duplicate_natural_key',
            message: `${group.length} active entities share the key of ${describe(group[0])}`,
            ids: group.map((e) => e.id),
          });
        }
      }

      const entityIds = new Set(entities.map((e) => e.id));
      const nodeIds = new Set([...entityIds, ...entries.map((e) => e.id)]);
      const dangling = associations.filter(
        (edge: AssociationEdge) => !entityIds.has(edge.target_id) || !nodeIds.has(edge.source_id)
      );
      for (const edge of dangling) {
        issues.push({
          type: 'dangling_association',
          message: `${edge.kind} association ${edge.source_id} → ${edge.target_id} points at a missing node`,
          ids: [edge.source_id, edge.target_id],
        });
      }

      const counts = await referenceCounts(
        tx,
        entities.map((e) => e.id)
      );
      for (const entity of entities) {
        const references = counts.get(entity.id) ?? 0;
        if (entity.deleted_at && references > 0) {
          issues.push({
            type: 'referenced_tombstone',
            message: `${describe(entity)} is tombstoned but has ${references} reference(s)`,
            ids: [entity.id],
          });
        } else if (!entity.deleted_at && references === 0) {
          issues.push({
            type: 'active_orphan',
            message: `${describe(entity)} is active without references`,
            ids: [entity.id],
          });
        }
      }

      if (issues.length > 0) {
        console.log(`⚠️  Integrity check found ${issues.length} issue(s)`);
      }

      return {
        ok: issues.length === 0,
        entityCount: entities.length,
        associationCount: associations.length,
        issues,
      };
    })
  );
}
