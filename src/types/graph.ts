/**
 * Archive graph record types
 * Persisted shapes use snake_case to match node and relationship properties.
 */

import type { AssociationKind, EntityKind } from '../constants/graph.js';

// ============================================================================
// Field values
// ============================================================================

export type FieldValue = string | number | boolean | null | string[];

export type FieldMap = Record<string, FieldValue>;

/**
 * Role payload carried on an association (relation type, speaker, position, ...)
 */
export type AssociationMetadata = Record<string, string | number>;

// ============================================================================
// Core records
// ============================================================================

export interface EntryNode {
  id: string;
  date: string; // YYYY-MM-DD, unique
  digest: string;
  word_count: number;
  notes: string | null;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface EntityNode {
  id: string;
  kind: EntityKind;
  name: string;
  name_key: string;
  disambiguator: string | null;
  disambiguator_key: string; // '' when the entity has no disambiguator
  parent_id: string | null;
  alias_keys: string[];
  attributes: FieldMap; // editable payload only
  deleted_at: string | null; // tombstone timestamp
  created_at: string;
  updated_at: string;
}

export interface AssociationEdge {
  kind: AssociationKind;
  source_id: string;
  target_id: string;
  discriminator: string;
  metadata: AssociationMetadata;
  created_at: string;
  updated_at: string;
}

export interface PoemVersionNode {
  id: string;
  poem_id: string;
  entry_id: string;
  content: string;
  content_hash: string;
  created_at: string;
}

/**
 * Kinds the sync arbiter merges note pages for
 */
export type SyncSubjectKind = EntityKind | 'Entry';

export interface FieldConflict {
  field: string;
  baseline: FieldValue;
  store: FieldValue;
  note: FieldValue;
}

export interface SyncStateNode {
  entity_id: string;
  kind: SyncSubjectKind;
  fingerprint: string;
  baseline: FieldMap;
  last_merged_at: string;
  conflict_detected: boolean;
  conflict_resolved: boolean;
  conflicts: FieldConflict[];
}

/**
 * Where a removal came from: a descriptor reconcile, or an explicit entry delete
 */
export type RemovalSource = 'descriptor' | 'manual';

/**
 * Record of a removed association, kept so the removal can be told apart
 * from an association that never existed
 */
export interface AssociationTombstoneNode {
  id: string;
  kind: AssociationKind;
  source_id: string;
  target_id: string;
  discriminator: string;
  removed_by: string;
  sync_source: RemovalSource;
  reason: string | null;
  removed_at: string;
  expires_at: string | null; // null: kept until its entity is purged
}

export interface AssociationTombstoneStats {
  total: number;
  byKind: Record<string, number>;
  bySource: Record<string, number>;
  expired: number;
}

// ============================================================================
// Write inputs
// ============================================================================

export interface CreateEntityInput {
  kind: EntityKind;
  name: string;
  name_key: string;
  disambiguator: string | null;
  disambiguator_key: string;
  parent_id: string | null;
  alias_keys: string[];
  attributes: FieldMap;
}

export interface EntityPatch {
  attributes?: FieldMap;
  alias_keys?: string[];
  parent_id?: string | null;
  deleted_at?: string | null;
}

export interface UpsertEntryInput {
  date: string;
  digest: string;
  word_count: number;
}

export interface AssociationInput {
  kind: AssociationKind;
  source_id: string;
  target_id: string;
  discriminator: string;
  metadata: AssociationMetadata;
}

export interface AssociationKey {
  kind: AssociationKind;
  source_id: string;
  target_id: string;
  discriminator: string;
}

export interface RecordTombstoneInput extends AssociationKey {
  removed_by: string;
  sync_source: RemovalSource;
  reason: string | null;
  expires_at: string | null;
}
