/**
 * Store contracts shared by the Neo4j and in-memory backends
 *
 * Every read and write goes through a StoreTransaction. A transaction either
 * commits as a whole or is rolled back as a whole; the function passed to
 * withTransaction decides which by resolving or throwing.
 */

import type { AssociationKind, EntityKind } from '../constants/graph.js';
import type {
  AssociationEdge,
  AssociationInput,
  AssociationKey,
  AssociationMetadata,
  AssociationTombstoneNode,
  AssociationTombstoneStats,
  CreateEntityInput,
  EntityNode,
  EntityPatch,
  EntryNode,
  PoemVersionNode,
  RecordTombstoneInput,
  SyncStateNode,
  UpsertEntryInput,
} from '../types/graph.js';

export interface ListOptions {
  includeDeleted?: boolean;
}

export interface EntryRepository {
  findByDate(date: string): Promise<EntryNode | null>;
  findById(id: string): Promise<EntryNode | null>;
  findByIds(ids: string[]): Promise<EntryNode[]>;
  /** Create or refresh the entry for a date; a soft-deleted entry is restored */
  upsert(input: UpsertEntryInput, now: string): Promise<{ entry: EntryNode; created: boolean }>;
  update(id: string, patch: { notes?: string | null; deleted_at?: string | null }, now: string): Promise<EntryNode>;
  list(options?: ListOptions): Promise<EntryNode[]>;
}

export interface EntityRepository {
  findById(id: string): Promise<EntityNode | null>;
  findByIds(ids: string[]): Promise<EntityNode[]>;
  /** Non-deleted entities of a kind sharing a name key, any disambiguator */
  findActiveByName(kind: EntityKind, nameKey: string): Promise<EntityNode[]>;
  findActiveByKey(kind: EntityKind, nameKey: string, disambiguatorKey: string): Promise<EntityNode | null>;
  findActiveByAlias(kind: EntityKind, aliasKey: string): Promise<EntityNode[]>;
  /** Most recently tombstoned entity with exactly this natural key */
  findLatestTombstone(kind: EntityKind, nameKey: string, disambiguatorKey: string): Promise<EntityNode | null>;
  create(input: CreateEntityInput, now: string): Promise<EntityNode>;
  update(id: string, patch: EntityPatch, now: string): Promise<EntityNode>;
  /** Physical delete (purge) */
  remove(id: string): Promise<void>;
  list(kind?: EntityKind, options?: ListOptions): Promise<EntityNode[]>;
  /** Non-deleted structural children per parent id */
  countActiveChildren(parentIds: string[]): Promise<Map<string, number>>;
}

export interface AssociationRepository {
  listBySources(kind: AssociationKind, sourceIds: string[]): Promise<AssociationEdge[]>;
  listByTarget(targetId: string): Promise<AssociationEdge[]>;
  listAll(): Promise<AssociationEdge[]>;
  /** Associations targeting each id (ids without any are absent from the map) */
  countByTargets(targetIds: string[]): Promise<Map<string, number>>;
  insert(input: AssociationInput, now: string): Promise<AssociationEdge>;
  updateMetadata(key: AssociationKey, metadata: AssociationMetadata, now: string): Promise<void>;
  remove(key: AssociationKey): Promise<void>;
}

export interface TombstoneFilter {
  kind?: AssociationKind;
  sourceId?: string;
  /** Default 100 */
  limit?: number;
}

export interface AssociationTombstoneRepository {
  /** Idempotent: the tombstone already recorded for the association is returned as is */
  record(input: RecordTombstoneInput, now: string): Promise<AssociationTombstoneNode>;
  /** Drop the tombstone of a re-added association; false when there was none */
  clear(key: AssociationKey): Promise<boolean>;
  /** Newest removal first */
  list(filter?: TombstoneFilter): Promise<AssociationTombstoneNode[]>;
  /** Delete tombstones whose expiry is before `now`; returns how many went */
  deleteExpired(now: string): Promise<number>;
  /** Delete tombstones naming the entity on either side (purge) */
  removeForEntity(entityId: string): Promise<void>;
  statistics(now: string): Promise<AssociationTombstoneStats>;
}

export interface PoemVersionRepository {
  findById(id: string): Promise<PoemVersionNode | null>;
  latestForPoem(poemId: string): Promise<PoemVersionNode | null>;
  /** Oldest first */
  listForPoem(poemId: string): Promise<PoemVersionNode[]>;
  create(input: Omit<PoemVersionNode, 'id' | 'created_at'>, now: string): Promise<PoemVersionNode>;
  removeForPoem(poemId: string): Promise<void>;
}

export interface SyncStateRepository {
  get(entityId: string): Promise<SyncStateNode | null>;
  save(state: SyncStateNode): Promise<void>;
  remove(entityId: string): Promise<void>;
  listConflicted(): Promise<SyncStateNode[]>;
}

export interface StoreTransaction {
  entries: EntryRepository;
  entities: EntityRepository;
  associations: AssociationRepository;
  associationTombstones: AssociationTombstoneRepository;
  poemVersions: PoemVersionRepository;
  syncStates: SyncStateRepository;
}

export interface ArchiveStore {
  readonly backend: 'neo4j' | 'memory';
  withTransaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
