import type { EntityKind } from '../constants/graph.js';
import type { FieldMap, FieldValue, SyncSubjectKind } from '../types/graph.js';

export type FieldOwnership = 'computed' | 'editable';

/**
 * Computed fields are derived from associations and aggregates only. They are
 * served to the note-page generator and never written from outside the engine.
 */
const COMMON_COMPUTED = ['mentionCount', 'firstAppearance', 'lastAppearance', 'entryDates'] as const;

const KIND_COMPUTED: Record<EntityKind, readonly string[]> = {
  Person: [],
  City: ['locationCount'],
  Location: [],
  Event: ['sceneCount'],
  Tag: ['usageCount'],
  Theme: [],
  Poem: ['versionCount'],
  ReferenceSource: ['referenceCount'],
  Reference: [],
  NarratedDate: [],
  Scene: [],
  Thread: ['memberCount'],
  Arc: ['memberCount'],
  Motif: [],
};

/**
 * Editable fields are owned by the note-page representation; the store keeps
 * them as opaque payload.
 */
const KIND_EDITABLE: Record<EntityKind, readonly string[]> = {
  Person: ['fullName', 'aliases'],
  City: ['country'],
  Location: ['neighborhood'],
  Event: ['description'],
  Tag: [],
  Theme: ['description'],
  Poem: [],
  ReferenceSource: ['author', 'sourceType', 'url'],
  Reference: ['description'],
  NarratedDate: [],
  Scene: ['description'],
  Thread: ['description'],
  Arc: ['description'],
  Motif: ['description'],
};

const ENTRY_COMPUTED = ['digest', 'wordCount'] as const;
const ENTRY_EDITABLE = ['notes'] as const;

export function computedFields(kind: SyncSubjectKind): readonly string[] {
  if (kind === 'Entry') return ENTRY_COMPUTED;
  return [...COMMON_COMPUTED, ...KIND_COMPUTED[kind]];
}

export function editableFields(kind: SyncSubjectKind): readonly string[] {
  if (kind === 'Entry') return ENTRY_EDITABLE;
  return ['notes', ...KIND_EDITABLE[kind]];
}

export function fieldOwnership(kind: SyncSubjectKind, field: string): FieldOwnership | null {
  if (computedFields(kind).includes(field)) return 'computed';
  if (editableFields(kind).includes(field)) return 'editable';
  return null;
}

/**
 * Keep only the editable subset of a field map
 */
export function pickEditable(kind: SyncSubjectKind, fields: FieldMap | undefined): FieldMap {
  const editable = editableFields(kind);
  const picked: FieldMap = {};
  if (!fields) return picked;

  for (const [key, value] of Object.entries(fields)) {
    if (editable.includes(key)) {
      picked[key] = value;
    }
  }
  return picked;
}

export function fieldValuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  const left = a === undefined ? null : a;
  const right = b === undefined ? null : b;

  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right)) return false;
    return left.length === right.length && left.every((value, idx) => value === right[idx]);
  }
  return left === right;
}
