/**
 * Entry Reconciler
 *
 * Brings the store in line with one entry descriptor:
 * 1. Validate and normalize the descriptor
 * 2. Take the entry lock (keyed by date)
 * 3. Upsert the Entry (restoring a soft-deleted one)
 * 4. Run every relationship processor in dependency order
 * 5. Reactivate re-referenced tombstones, then release orphans kind by kind
 * 6. Commit, or roll back everything on the first error
 *
 * Entity resolution commits on its own (see BaseResolver), so a rolled-back
 * entry can leave freshly created entities without references; the sweeper
 * tombstones those.
 */

import { DEFAULT_ASSOCIATION_TOMBSTONE_TTL_DAYS } from '../constants/graph.js';
import { EMPTY_DECLARED_SPECS, entryDescriptorSchema, type DeclaredSpecs, type EntryDescriptor } from '../schemas/entryDescriptor.js';
import { DescriptorValidationError, EntityNotFoundError } from '../errors/archiveErrors.js';
import type { ArchiveStore, StoreTransaction } from '../repositories/types.js';
import type { EntryNode } from '../types/graph.js';
import { LockScope, type KeyedLock } from '../utils/keyedLock.js';
import { TraceAttributes, withSpan } from '../utils/tracing.js';
import type { EntityResolverRegistry } from './entityResolvers/index.js';
import { reactivate, releaseIfOrphaned } from './lifecycleService.js';
import {
  deltaSize,
  processorOrder,
  runProcessor,
  type ProcessorContext,
  type ReconcileMode,
  type ReconciliationDelta,
  type RemovalProvenance,
} from './relationshipProcessors/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ReconciliationReport {
  entryId: string;
  date: string;
  mode: ReconcileMode;
  /** True when this call created the entry row */
  entryCreated: boolean;
  /** One delta per relationship kind, in processor order */
  deltas: ReconciliationDelta[];
  totalChanges: number;
  durationMs: number;
}

export interface DeleteEntryReport {
  entryId: string;
  date: string;
  deltas: ReconciliationDelta[];
  totalChanges: number;
}

export type ReconcileOutcome =
  | { status: 'fulfilled'; date: string | null; report: ReconciliationReport }
  | { status: 'rejected'; date: string | null; error: Error };

export interface ReconcileManyOptions {
  mode?: ReconcileMode;
  concurrency?: number;
}

export interface EntryReconcilerDeps {
  store: ArchiveStore;
  locks: KeyedLock;
  resolvers: EntityResolverRegistry;
  now: () => string;
  /** Lifetime of association tombstones; null keeps them until an endpoint is purged */
  associationTombstoneTtlDays?: number | null;
}

export function entryLockKey(date: string): string {
  return `entry:${date}`;
}

/**
 * Validate a raw descriptor (bare strings allowed) into its normalized form
 */
export function parseEntryDescriptor(input: unknown): EntryDescriptor {
  const parsed = entryDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw new DescriptorValidationError('entry descriptor', parsed.error.issues);
  }
  return parsed.data;
}

function declaredSpecsOf(descriptor: EntryDescriptor): DeclaredSpecs {
  const { date: _date, digest: _digest, wordCount: _wordCount, ...declared } = descriptor;
  return declared;
}

function descriptorDate(input: unknown): string | null {
  if (typeof input === 'object' && input !== null && 'date' in input && typeof input.date === 'string') {
    return input.date;
  }
  return null;
}

// ============================================================================
// Reconciler
// ============================================================================

export class EntryReconciler {
  constructor(private readonly deps: EntryReconcilerDeps) {}

  /**
   * @param removedBy - Recorded on the tombstone of every association this call removes
   */
  async reconcile(
    input: unknown,
    mode: ReconcileMode = 'replace',
    removedBy = 'reconciler'
  ): Promise<ReconciliationReport> {
    const descriptor = parseEntryDescriptor(input);

    return withSpan(
      'entry.reconcile',
      { [TraceAttributes.ENTRY_DATE]: descriptor.date, [TraceAttributes.RECONCILE_MODE]: mode },
      (span) =>
        this.deps.locks.run(entryLockKey(descriptor.date), async () => {
          const startTime = Date.now();
          console.log(`📥 Reconciling entry ${descriptor.date} (${mode})`);

          const scope = new LockScope(this.deps.locks);
          try {
            const report = await this.deps.store.withTransaction(async (tx) => {
              const now = this.deps.now();
              const { entry, created } = await tx.entries.upsert(
                { date: descriptor.date, digest: descriptor.digest, word_count: descriptor.wordCount },
                now
              );
              const deltas = await this.runProcessors(tx, entry, mode, declaredSpecsOf(descriptor), scope, now, {
                removedBy,
                syncSource: 'descriptor',
                ttlDays: this.tombstoneTtlDays(),
              });

              return {
                entryId: entry.id,
                date: entry.date,
                mode,
                entryCreated: created,
                deltas,
                totalChanges: deltas.reduce((sum, delta) => sum + deltaSize(delta), 0),
                durationMs: 0,
              };
            });

            report.durationMs = Date.now() - startTime;
            span.setAttribute(TraceAttributes.CHANGE_COUNT, report.totalChanges);
            console.log(
              `✅ Entry ${report.date}: ${report.totalChanges} association change(s) in ${report.durationMs}ms`
            );
            return report;
          } catch (error) {
            console.error(`❌ Entry ${descriptor.date} rolled back:`, error instanceof Error ? error.message : error);
            throw error;
          } finally {
            scope.releaseAll();
          }
        })
    );
  }

  /**
   * Reconcile independent entries with bounded parallelism. Each entry
   * succeeds or fails on its own.
   */
  async reconcileMany(inputs: unknown[], options: ReconcileManyOptions = {}): Promise<ReconcileOutcome[]> {
    const mode = options.mode ?? 'replace';
    const concurrency = Math.max(1, options.concurrency ?? 4);
    const outcomes: ReconcileOutcome[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < inputs.length) {
        const index = next++;
        const input = inputs[index];
        const date = descriptorDate(input);
        try {
          outcomes[index] = { status: 'fulfilled', date, report: await this.reconcile(input, mode) };
        } catch (error) {
          outcomes[index] = {
            status: 'rejected',
            date,
            error: error instanceof Error ? error : new Error(String(error)),
          };
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, inputs.length) }, () => worker()));

    const failed = outcomes.filter((o) => o.status === 'rejected').length;
    console.log(`📚 Reconciled ${inputs.length - failed}/${inputs.length} entries`);
    return outcomes;
  }

  /**
   * Soft-delete an entry: drop every association it owns (scenes included),
   * release what that orphans, and stamp deleted_at. Reconciling the date
   * again restores it.
   */
  async deleteEntry(date: string, removedBy = 'entry-delete'): Promise<DeleteEntryReport> {
    return withSpan('entry.delete', { [TraceAttributes.ENTRY_DATE]: date }, (span) =>
      this.deps.locks.run(entryLockKey(date), async () => {
        const scope = new LockScope(this.deps.locks);
        try {
          const report = await this.deps.store.withTransaction(async (tx) => {
            const entry = await tx.entries.findByDate(date);
            if (!entry || entry.deleted_at) {
              throw new EntityNotFoundError('Entry', date);
            }

            const now = this.deps.now();
            const deltas = await this.runProcessors(tx, entry, 'replace', { ...EMPTY_DECLARED_SPECS }, scope, now, {
              removedBy,
              syncSource: 'manual',
              ttlDays: this.tombstoneTtlDays(),
            });
            await tx.entries.update(entry.id, { deleted_at: now }, now);

            return {
              entryId: entry.id,
              date: entry.date,
              deltas,
              totalChanges: deltas.reduce((sum, delta) => sum + deltaSize(delta), 0),
            };
          });
          span.setAttribute(TraceAttributes.CHANGE_COUNT, report.totalChanges);
          console.log(`🗑️  Deleted entry ${date} (${report.totalChanges} association(s) removed)`);
          return report;
        } finally {
          scope.releaseAll();
        }
      })
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private tombstoneTtlDays(): number | null {
    const ttl = this.deps.associationTombstoneTtlDays;
    return ttl === undefined ? DEFAULT_ASSOCIATION_TOMBSTONE_TTL_DAYS : ttl;
  }

  private async runProcessors(
    tx: StoreTransaction,
    entry: EntryNode,
    mode: ReconcileMode,
    declared: DeclaredSpecs,
    locks: LockScope,
    now: string,
    removal: RemovalProvenance
  ): Promise<ReconciliationDelta[]> {
    const ctx: ProcessorContext = {
      tx,
      entry,
      mode,
      resolver: this.deps.resolvers.session(),
      locks,
      now,
      declared,
      sceneIds: new Map(),
      orphanCandidates: new Map(),
      addedTargets: new Set(),
      removal,
    };

    const deltas: ReconciliationDelta[] = [];
    for (const kind of processorOrder()) {
      deltas.push(await runProcessor(kind, ctx, declared));
    }

    await this.settleLifecycle(ctx, deltas);
    return deltas;
  }

  /**
   * Tombstones that gained an association in this transaction are revived
   * first (another entry may have released them after they were resolved);
   * then every entity that lost one is released if nothing references it.
   */
  private async settleLifecycle(ctx: ProcessorContext, deltas: ReconciliationDelta[]): Promise<void> {
    for (const id of ctx.addedTargets) {
      const entity = await ctx.tx.entities.findById(id);
      if (entity?.deleted_at) {
        await reactivate(ctx.tx, entity, ctx.now);
      }
    }

    for (const delta of deltas) {
      const candidates = ctx.orphanCandidates.get(delta.kind);
      if (!candidates || candidates.size === 0) continue;
      delta.tombstoned.push(...(await releaseIfOrphaned(ctx.tx, candidates, ctx.now)));
    }
  }
}
