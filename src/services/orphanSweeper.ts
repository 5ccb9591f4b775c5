/**
 * Orphan / Tombstone Sweeper
 *
 * Maintenance pass run apart from reconciliation (scheduled job or admin call):
 * 1. Snapshot reference counts for every entity
 * 2. Tombstone active entities nothing references (left by rolled-back entries)
 * 3. Reactivate tombstones that regained a reference
 * 4. Purge tombstones past the grace window, each under its natural-key lock
 *    and in its own transaction, re-checking state right before the delete
 * 5. Drop expired records of removed associations
 */

import { DEFAULT_TOMBSTONE_GRACE_DAYS, RelationshipKinds, SceneAssociationKinds } from '../constants/graph.js';
import type { ArchiveStore, StoreTransaction } from '../repositories/types.js';
import type { EntityNode } from '../types/graph.js';
import { naturalKeyLockId } from '../utils/entityNormalization.js';
import type { KeyedLock } from '../utils/keyedLock.js';
import { graceElapsed, lifecycleStateOf, nextLifecycleState } from '../utils/lifecycle.js';
import { TraceAttributes, withSpan } from '../utils/tracing.js';
import { reactivate, referenceCounts, tombstone } from './lifecycleService.js';

export interface SweepOptions {
  now?: Date;
  graceDays?: number;
  /** Active orphans younger than this are left alone (a reconcile may still link them) */
  orphanMinAgeMinutes?: number;
}

export interface SweepReport {
  startedAt: string;
  graceDays: number;
  tombstoned: string[];
  reactivated: string[];
  purged: string[];
  skipped: Array<{ id: string; reason: string }>;
  /** Association tombstones past their expiry, deleted */
  expiredAssociationTombstones: number;
  durationMs: number;
}

export interface OrphanSweeperDeps {
  store: ArchiveStore;
  locks: KeyedLock;
  graceDays?: number;
}

const SWEEP_LOCK = 'sweeper';

const SCENE_OWNED_KINDS = [...Object.values(SceneAssociationKinds), RelationshipKinds.SceneEvents];

export class OrphanSweeper {
  constructor(private readonly deps: OrphanSweeperDeps) {}

  async sweep(options: SweepOptions = {}): Promise<SweepReport> {
    const now = options.now ?? new Date();
    const graceDays = options.graceDays ?? this.deps.graceDays ?? DEFAULT_TOMBSTONE_GRACE_DAYS;
    const minAgeMs = (options.orphanMinAgeMinutes ?? 0) * 60 * 1000;

    return withSpan('sweeper.sweep', { [TraceAttributes.OPERATION_NAME]: 'sweep' }, () =>
      this.deps.locks.run(SWEEP_LOCK, async () => {
        const startTime = Date.now();
        const nowIso = now.toISOString();
        console.log(`🧹 Sweeping tombstones (grace ${graceDays} days)`);

        const report: SweepReport = {
          startedAt: nowIso,
          graceDays,
          tombstoned: [],
          reactivated: [],
          purged: [],
          skipped: [],
          expiredAssociationTombstones: 0,
          durationMs: 0,
        };

        const purgeCandidates = await this.deps.store.withTransaction(async (tx) => {
          const entities = await tx.entities.list(undefined, { includeDeleted: true });
          const counts = await referenceCounts(
            tx,
            entities.map((e) => e.id)
          );

          const candidates: EntityNode[] = [];
          for (const entity of entities) {
            const references = counts.get(entity.id) ?? 0;
            const state = lifecycleStateOf(entity);

            if (state === 'active' && references === 0) {
              if (now.getTime() - new Date(entity.updated_at).getTime() < minAgeMs) continue;
              await tombstone(tx, entity, nowIso);
              report.tombstoned.push(entity.id);
            } else if (state === 'tombstoned' && references > 0) {
              await reactivate(tx, entity, nowIso);
              report.reactivated.push(entity.id);
            } else if (state === 'tombstoned' && entity.deleted_at && graceElapsed(entity.deleted_at, now, graceDays)) {
              candidates.push(entity);
            }
          }
          return candidates;
        });

        for (const candidate of purgeCandidates) {
          const outcome = await this.purge(candidate, now, graceDays);
          if (outcome === 'purged') {
            report.purged.push(candidate.id);
          } else {
            report.skipped.push({ id: candidate.id, reason: outcome });
            console.log(`⏭️  Skipped purge of ${candidate.kind} ${candidate.id}: ${outcome}`);
          }
        }

        report.expiredAssociationTombstones = await this.deps.store.withTransaction((tx) =>
          tx.associationTombstones.deleteExpired(nowIso)
        );

        report.durationMs = Date.now() - startTime;
        console.log(
          `✅ Sweep done: ${report.tombstoned.length} tombstoned, ${report.reactivated.length} reactivated, ` +
            `${report.purged.length} purged, ${report.skipped.length} skipped, ` +
            `${report.expiredAssociationTombstones} association tombstone(s) expired`
        );
        return report;
      })
    );
  }

  /**
   * Delete one tombstone if it is still tombstoned, past grace and unreferenced
   */
  private async purge(snapshot: EntityNode, now: Date, graceDays: number): Promise<string> {
    return this.deps.locks.run(naturalKeyLockId(snapshot.kind, snapshot.name_key), () =>
      this.deps.store.withTransaction(async (tx) => {
        const entity = await tx.entities.findById(snapshot.id);
        if (!entity) return 'already purged';
        if (!entity.deleted_at) return 'reactivated';
        if (!graceElapsed(entity.deleted_at, now, graceDays)) return 'tombstoned again within the grace window';

        const counts = await referenceCounts(tx, [entity.id]);
        if ((counts.get(entity.id) ?? 0) > 0) return 're-referenced';

        nextLifecycleState(lifecycleStateOf(entity), 'graceElapsed');
        await this.deleteEntity(tx, entity);
        console.log(`💀 Purged ${entity.kind} "${entity.name}" (${entity.id})`);
        return 'purged';
      })
    );
  }

  private async deleteEntity(tx: StoreTransaction, entity: EntityNode): Promise<void> {
    if (entity.kind === 'Poem') {
      await tx.poemVersions.removeForPoem(entity.id);
    }
    if (entity.kind === 'Scene') {
      for (const kind of SCENE_OWNED_KINDS) {
        for (const edge of await tx.associations.listBySources(kind, [entity.id])) {
          await tx.associations.remove(edge);
        }
      }
    }
    await tx.associationTombstones.removeForEntity(entity.id);
    await tx.syncStates.remove(entity.id);
    await tx.entities.remove(entity.id);
  }
}
