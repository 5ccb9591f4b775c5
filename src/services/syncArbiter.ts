/**
 * Sync Arbiter
 *
 * Three-way merge of note-page edits against the store, per field:
 * - computed fields always take the store value
 * - editable fields take the note value unless the store also moved away from
 *   the last merged baseline to a different value (conflict, store value kept)
 *
 * The baseline is the set of editable values at the last successful merge,
 * kept in the subject's SyncState with its fingerprint. A subject merged for
 * the first time uses its current store values as the baseline.
 */

import type { EntityKind } from '../constants/graph.js';
import {
  DescriptorValidationError,
  EntityNotFoundError,
  MergeConflictError,
} from '../errors/archiveErrors.js';
import {
  conflictResolutionSchema,
  editableValueSchema,
  noteFieldsSchema,
  noteFieldsSchemaFor,
  type ConflictChoice,
} from '../schemas/notePage.js';
import type { ArchiveStore, StoreTransaction } from '../repositories/types.js';
import type {
  FieldConflict,
  FieldMap,
  FieldValue,
  SyncStateNode,
  SyncSubjectKind,
} from '../types/graph.js';
import { computedFields, editableFields, fieldValuesEqual, pickEditable } from '../utils/fieldOwnership.js';
import { fingerprint } from '../utils/fingerprint.js';
import { TraceAttributes, withSpan } from '../utils/tracing.js';
import { computeEntityAggregates, computeEntryAggregates } from './archiveReadService.js';
import type { PersonResolver } from './entityResolvers/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface MergeSubject {
  kind: SyncSubjectKind;
  id: string;
}

export interface MergeOutcome {
  merged: FieldMap;
  conflicts: FieldConflict[];
}

export interface MergeResult extends MergeOutcome {
  kind: SyncSubjectKind;
  id: string;
  /** Editable fields whose store value changed */
  applied: string[];
  fingerprint: string;
  error: MergeConflictError | null;
}

export interface SyncArbiterDeps {
  store: ArchiveStore;
  people: PersonResolver;
  now: () => string;
}

interface SubjectState {
  kind: SyncSubjectKind;
  id: string;
  editable: FieldMap;
  computed: FieldMap;
}

function valueOf(fields: FieldMap, field: string): FieldValue {
  return fields[field] ?? null;
}

function validateNoteFields(kind: SyncSubjectKind, fields: unknown): FieldMap {
  const parsed = noteFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new DescriptorValidationError('note page', parsed.error.issues);
  }
  const checked = noteFieldsSchemaFor(editableFields(kind), computedFields(kind)).safeParse(parsed.data);
  if (!checked.success) {
    throw new DescriptorValidationError(`${kind} note page`, checked.error.issues);
  }
  return parsed.data;
}

// ============================================================================
// Pure merge
// ============================================================================

/**
 * Field-by-field merge. Fields missing from the note page count as unchanged.
 */
export function computeMerge(
  kind: SyncSubjectKind,
  baseline: FieldMap,
  storeState: FieldMap,
  noteState: FieldMap
): MergeOutcome {
  const merged: FieldMap = {};
  const conflicts: FieldConflict[] = [];

  for (const field of computedFields(kind)) {
    if (field in storeState) merged[field] = valueOf(storeState, field);
  }

  for (const field of editableFields(kind)) {
    const base = valueOf(baseline, field);
    const store = valueOf(storeState, field);
    const note = field in noteState ? valueOf(noteState, field) : base;

    const storeChanged = !fieldValuesEqual(store, base);
    const noteChanged = !fieldValuesEqual(note, base);

    if (!noteChanged) {
      merged[field] = store;
    } else if (!storeChanged || fieldValuesEqual(store, note)) {
      merged[field] = note;
    } else {
      merged[field] = store;
      conflicts.push({ field, baseline: base, store, note });
    }
  }

  return { merged, conflicts };
}

// ============================================================================
// Arbiter
// ============================================================================

export class SyncArbiter {
  constructor(private readonly deps: SyncArbiterDeps) {}

  /**
   * Merge a note page's fields back into the store.
   *
   * Non-conflicting editable fields are written even when other fields
   * conflict; conflicting fields keep their old baseline and are recorded on
   * the sync state until resolved.
   */
  async mergeNotePage(kind: SyncSubjectKind, id: string, noteFields: unknown): Promise<MergeResult> {
    const noteState = validateNoteFields(kind, noteFields);

    return withSpan(
      'sync.merge',
      { [TraceAttributes.ENTITY_TYPE]: kind, [TraceAttributes.ENTITY_ID]: id },
      () =>
        this.deps.store.withTransaction(async (tx) => {
          const now = this.deps.now();
          const subject = await this.loadSubject(tx, kind, id);
          const previous = await tx.syncStates.get(id);
          const baseline = previous?.baseline ?? subject.editable;

          const { merged, conflicts } = computeMerge(kind, baseline, { ...subject.computed, ...subject.editable }, noteState);

          const editable: FieldMap = {};
          for (const field of editableFields(kind)) {
            editable[field] = valueOf(merged, field);
          }
          const applied = editableFields(kind).filter(
            (field) => !fieldValuesEqual(editable[field], valueOf(subject.editable, field))
          );
          if (applied.length > 0) {
            await this.writeEditable(tx, subject, editable, now);
          }

          const conflicted = new Set(conflicts.map((c) => c.field));
          const nextBaseline: FieldMap = {};
          for (const field of editableFields(kind)) {
            nextBaseline[field] = conflicted.has(field) ? valueOf(baseline, field) : valueOf(editable, field);
          }

          const state: SyncStateNode = {
            entity_id: id,
            kind,
            fingerprint: fingerprint(nextBaseline),
            baseline: nextBaseline,
            last_merged_at: now,
            conflict_detected: conflicts.length > 0,
            conflict_resolved: conflicts.length === 0 && (previous?.conflict_detected ?? false),
            conflicts,
          };
          await tx.syncStates.save(state);

          if (conflicts.length > 0) {
            console.log(`⚠️  Merge conflict on ${kind} ${id}: ${conflicts.map((c) => c.field).join(', ')}`);
          } else if (applied.length > 0) {
            console.log(`🔄 Merged note page for ${kind} ${id}: ${applied.join(', ')}`);
          }

          return {
            kind,
            id,
            merged,
            conflicts,
            applied,
            fingerprint: state.fingerprint,
            error: conflicts.length > 0 ? new MergeConflictError(kind, id, conflicts) : null,
          };
        })
    );
  }

  /**
   * Merge without persisting, against the subject's recorded baseline
   */
  async merge(subject: MergeSubject, storeState: FieldMap, noteState: FieldMap): Promise<MergeOutcome> {
    const state = await this.deps.store.withTransaction((tx) => tx.syncStates.get(subject.id));
    return computeMerge(subject.kind, state?.baseline ?? pickEditable(subject.kind, storeState), storeState, noteState);
  }

  async listConflicts(): Promise<SyncStateNode[]> {
    return this.deps.store.withTransaction((tx) => tx.syncStates.listConflicted());
  }

  /**
   * Settle one conflicting field: write the chosen value and advance its baseline
   */
  async resolveConflict(entityId: string, field: string, choice: ConflictChoice): Promise<SyncStateNode> {
    const request = conflictResolutionSchema.safeParse({ field, choice });
    if (!request.success) {
      throw new DescriptorValidationError('conflict resolution', request.error.issues);
    }

    return this.deps.store.withTransaction(async (tx) => {
      const now = this.deps.now();
      const state = await tx.syncStates.get(entityId);
      const conflict = state?.conflicts.find((c) => c.field === field);
      if (!state || !conflict) {
        throw new DescriptorValidationError('conflict resolution', [
          { code: 'custom', path: ['field'], message: `No open conflict on ${field} for ${entityId}` },
        ]);
      }

      const value: FieldValue =
        choice === 'store' ? conflict.store : choice === 'note' ? conflict.note : choice.value;
      const checked = editableValueSchema(field).safeParse(value);
      if (!checked.success) {
        throw new DescriptorValidationError(`value for ${field}`, checked.error.issues);
      }

      const subject = await this.loadSubject(tx, state.kind, entityId);
      await this.writeEditable(tx, subject, { ...subject.editable, [field]: value }, now);

      const baseline: FieldMap = { ...state.baseline, [field]: value };
      const remaining = state.conflicts.filter((c) => c.field !== field);
      const next: SyncStateNode = {
        ...state,
        baseline,
        fingerprint: fingerprint(baseline),
        last_merged_at: now,
        conflicts: remaining,
        conflict_detected: remaining.length > 0,
        conflict_resolved: remaining.length === 0,
      };
      await tx.syncStates.save(next);

      console.log(`✅ Resolved ${field} on ${state.kind} ${entityId}`);
      return next;
    });
  }

  /**
   * Throw the conflict carried by a merge result, if any
   */
  assertNoConflicts(result: MergeResult): void {
    if (result.error) {
      throw result.error;
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async loadSubject(tx: StoreTransaction, kind: SyncSubjectKind, id: string): Promise<SubjectState> {
    if (kind === 'Entry') {
      const entry = await tx.entries.findById(id);
      if (!entry || entry.deleted_at) {
        throw new EntityNotFoundError('Entry', id);
      }
      return { kind, id, editable: { notes: entry.notes }, computed: computeEntryAggregates(entry) };
    }

    const entity = await tx.entities.findById(id);
    if (!entity || entity.kind !== kind) {
      throw new EntityNotFoundError(kind, id);
    }
    const editable: FieldMap = {};
    for (const field of editableFields(kind)) {
      editable[field] = valueOf(entity.attributes, field);
    }
    return { kind, id, editable, computed: await computeEntityAggregates(tx, entity) };
  }

  private async writeEditable(tx: StoreTransaction, subject: SubjectState, values: FieldMap, now: string): Promise<void> {
    const { kind } = subject;
    if (kind === 'Entry') {
      const notes = values.notes;
      await tx.entries.update(subject.id, { notes: typeof notes === 'string' ? notes : null }, now);
      return;
    }

    const entity = await tx.entities.findById(subject.id);
    if (!entity) {
      throw new EntityNotFoundError(kind, subject.id);
    }

    const attributes: FieldMap = { ...entity.attributes };
    for (const [field, value] of Object.entries(values)) {
      if (value === null) {
        delete attributes[field];
      } else {
        attributes[field] = value;
      }
    }

    const aliasKeys = await this.aliasKeysFor(tx, kind, subject.id, attributes.aliases);
    await tx.entities.update(subject.id, aliasKeys ? { attributes, alias_keys: aliasKeys } : { attributes }, now);
  }

  /**
   * Renamed aliases are re-checked so that no alias shadows another person
   */
  private async aliasKeysFor(
    tx: StoreTransaction,
    kind: EntityKind,
    personId: string,
    aliases: FieldValue | undefined
  ): Promise<string[] | null> {
    if (kind !== 'Person') return null;
    const list = Array.isArray(aliases) ? aliases : [];
    return this.deps.people.checkAliases(tx, personId, list);
  }
}
