import { v4 as uuidv4 } from 'uuid';
import type { EntityKind } from '../constants/graph.js';
import type {
  ArchiveStore,
  AssociationRepository,
  AssociationTombstoneRepository,
  EntityRepository,
  EntryRepository,
  ListOptions,
  PoemVersionRepository,
  StoreTransaction,
  SyncStateRepository,
  TombstoneFilter,
} from '../repositories/types.js';
import type {
  AssociationEdge,
  AssociationKey,
  AssociationTombstoneNode,
  AssociationTombstoneStats,
  EntityNode,
  EntryNode,
  PoemVersionNode,
  RecordTombstoneInput,
  SyncStateNode,
} from '../types/graph.js';

/**
 * In-process archive store used by tests and STORE_BACKEND=memory
 *
 * Writes apply immediately and push an undo step; rollback replays the undo
 * log newest first. Reads hand out copies so callers never alias stored rows.
 */

function associationId(key: AssociationKey): string {
  return `${key.kind}|${key.source_id}|${key.target_id}|${key.discriminator}`;
}

function byCreatedAt<T extends { created_at: string }>(a: T, b: T): number {
  return a.created_at < b.created_at ? -1 : a.created_at > b.created_at ? 1 : 0;
}

class MemoryTables {
  entries = new Map<string, EntryNode>();
  entities = new Map<string, EntityNode>();
  associations = new Map<string, AssociationEdge>();
  associationTombstones = new Map<string, AssociationTombstoneNode>();
  poemVersions: PoemVersionNode[] = [];
  syncStates = new Map<string, SyncStateNode>();
}

type UndoLog = Array<() => void>;

function setWithUndo<K, V>(map: Map<K, V>, key: K, value: V | undefined, undo: UndoLog): void {
  const had = map.has(key);
  const previous = map.get(key);
  if (value === undefined) {
    map.delete(key);
  } else {
    map.set(key, value);
  }
  undo.push(() => {
    if (had && previous !== undefined) {
      map.set(key, previous);
    } else {
      map.delete(key);
    }
  });
}

class MemoryEntryRepository implements EntryRepository {
  constructor(
    private tables: MemoryTables,
    private undo: UndoLog
  ) {}

  async findByDate(date: string): Promise<EntryNode | null> {
    for (const entry of this.tables.entries.values()) {
      if (entry.date === date) return structuredClone(entry);
    }
    return null;
  }

  async findById(id: string): Promise<EntryNode | null> {
    const entry = this.tables.entries.get(id);
    return entry ? structuredClone(entry) : null;
  }

  async findByIds(ids: string[]): Promise<EntryNode[]> {
    const wanted = new Set(ids);
    return [...this.tables.entries.values()].filter((entry) => wanted.has(entry.id)).map((entry) => structuredClone(entry));
  }

  async upsert(input: { date: string; digest: string; word_count: number }, now: string) {
    const existing = await this.findByDate(input.date);
    if (existing) {
      const updated: EntryNode = {
        ...existing,
        digest: input.digest,
        word_count: input.word_count,
        deleted_at: null,
        updated_at: now,
      };
      setWithUndo(this.tables.entries, existing.id, updated, this.undo);
      return { entry: structuredClone(updated), created: false };
    }

    const entry: EntryNode = {
      id: uuidv4(),
      date: input.date,
      digest: input.digest,
      word_count: input.word_count,
      notes: null,
      deleted_at: null,
      created_at: now,
      updated_at: now,
    };
    setWithUndo(this.tables.entries, entry.id, entry, this.undo);
    return { entry: structuredClone(entry), created: true };
  }

  async update(id: string, patch: { notes?: string | null; deleted_at?: string | null }, now: string) {
    const existing = this.tables.entries.get(id);
    if (!existing) {
      throw new Error(`Entry ${id} not found`);
    }
    const updated: EntryNode = { ...existing, ...patch, updated_at: now };
    setWithUndo(this.tables.entries, id, updated, this.undo);
    return structuredClone(updated);
  }

  async list(options: ListOptions = {}): Promise<EntryNode[]> {
    return [...this.tables.entries.values()]
      .filter((entry) => options.includeDeleted || !entry.deleted_at)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
      .map((entry) => structuredClone(entry));
  }
}

class MemoryEntityRepository implements EntityRepository {
  constructor(
    private tables: MemoryTables,
    private undo: UndoLog
  ) {}

  private active(kind: EntityKind): EntityNode[] {
    return [...this.tables.entities.values()].filter((entity) => entity.kind === kind && !entity.deleted_at);
  }

  async findById(id: string): Promise<EntityNode | null> {
    const entity = this.tables.entities.get(id);
    return entity ? structuredClone(entity) : null;
  }

  async findByIds(ids: string[]): Promise<EntityNode[]> {
    const found: EntityNode[] = [];
    for (const id of new Set(ids)) {
      const entity = this.tables.entities.get(id);
      if (entity) found.push(structuredClone(entity));
    }
    return found;
  }

  async findActiveByName(kind: EntityKind, nameKey: string): Promise<EntityNode[]> {
    return this.active(kind)
      .filter((entity) => entity.name_key === nameKey)
      .sort(byCreatedAt)
      .map((entity) => structuredClone(entity));
  }

  async findActiveByKey(kind: EntityKind, nameKey: string, disambiguatorKey: string): Promise<EntityNode | null> {
    const match = this.active(kind).find(
      (entity) => entity.name_key === nameKey && entity.disambiguator_key === disambiguatorKey
    );
    return match ? structuredClone(match) : null;
  }

  async findActiveByAlias(kind: EntityKind, aliasKey: string): Promise<EntityNode[]> {
    return this.active(kind)
      .filter((entity) => entity.alias_keys.includes(aliasKey))
      .sort(byCreatedAt)
      .map((entity) => structuredClone(entity));
  }

  async findLatestTombstone(kind: EntityKind, nameKey: string, disambiguatorKey: string): Promise<EntityNode | null> {
    let latest: EntityNode | null = null;
    for (const entity of this.tables.entities.values()) {
      if (
        entity.kind !== kind ||
        !entity.deleted_at ||
        entity.name_key !== nameKey ||
        entity.disambiguator_key !== disambiguatorKey
      ) {
        continue;
      }
      if (!latest || (latest.deleted_at !== null && entity.deleted_at > latest.deleted_at)) {
        latest = entity;
      }
    }
    return latest ? structuredClone(latest) : null;
  }

  async create(input: Omit<EntityNode, 'id' | 'deleted_at' | 'created_at' | 'updated_at'>, now: string) {
    const entity: EntityNode = {
      ...structuredClone(input),
      id: uuidv4(),
      deleted_at: null,
      created_at: now,
      updated_at: now,
    };
    setWithUndo(this.tables.entities, entity.id, entity, this.undo);
    return structuredClone(entity);
  }

  async update(id: string, patch: Partial<Pick<EntityNode, 'attributes' | 'alias_keys' | 'parent_id' | 'deleted_at'>>, now: string) {
    const existing = this.tables.entities.get(id);
    if (!existing) {
      throw new Error(`Entity ${id} not found`);
    }
    const updated: EntityNode = { ...existing, ...structuredClone(patch), updated_at: now };
    setWithUndo(this.tables.entities, id, updated, this.undo);
    return structuredClone(updated);
  }

  async remove(id: string): Promise<void> {
    setWithUndo(this.tables.entities, id, undefined, this.undo);
  }

  async list(kind?: EntityKind, options: ListOptions = {}): Promise<EntityNode[]> {
    return [...this.tables.entities.values()]
      .filter((entity) => (!kind || entity.kind === kind) && (options.includeDeleted || !entity.deleted_at))
      .sort(byCreatedAt)
      .map((entity) => structuredClone(entity));
  }

  async countActiveChildren(parentIds: string[]): Promise<Map<string, number>> {
    const wanted = new Set(parentIds);
    const counts = new Map<string, number>();
    for (const entity of this.tables.entities.values()) {
      if (entity.deleted_at || !entity.parent_id || !wanted.has(entity.parent_id)) continue;
      counts.set(entity.parent_id, (counts.get(entity.parent_id) ?? 0) + 1);
    }
    return counts;
  }
}

class MemoryAssociationRepository implements AssociationRepository {
  constructor(
    private tables: MemoryTables,
    private undo: UndoLog
  ) {}

  async listBySources(kind: AssociationEdge['kind'], sourceIds: string[]): Promise<AssociationEdge[]> {
    const wanted = new Set(sourceIds);
    return [...this.tables.associations.values()]
      .filter((edge) => edge.kind === kind && wanted.has(edge.source_id))
      .map((edge) => structuredClone(edge));
  }

  async listByTarget(targetId: string): Promise<AssociationEdge[]> {
    return [...this.tables.associations.values()]
      .filter((edge) => edge.target_id === targetId)
      .map((edge) => structuredClone(edge));
  }

  async listAll(): Promise<AssociationEdge[]> {
    return [...this.tables.associations.values()].map((edge) => structuredClone(edge));
  }

  async countByTargets(targetIds: string[]): Promise<Map<string, number>> {
    const wanted = new Set(targetIds);
    const counts = new Map<string, number>();
    for (const edge of this.tables.associations.values()) {
      if (!wanted.has(edge.target_id)) continue;
      counts.set(edge.target_id, (counts.get(edge.target_id) ?? 0) + 1);
    }
    return counts;
  }

  async insert(input: Omit<AssociationEdge, 'created_at' | 'updated_at'>, now: string): Promise<AssociationEdge> {
    const id = associationId(input);
    if (this.tables.associations.has(id)) {
      throw new Error(`Association ${id} already exists`);
    }
    const edge: AssociationEdge = { ...structuredClone(input), created_at: now, updated_at: now };
    setWithUndo(this.tables.associations, id, edge, this.undo);
    return structuredClone(edge);
  }

  async updateMetadata(key: AssociationKey, metadata: AssociationEdge['metadata'], now: string): Promise<void> {
    const id = associationId(key);
    const existing = this.tables.associations.get(id);
    if (!existing) {
      throw new Error(`Association ${id} not found`);
    }
    setWithUndo(this.tables.associations, id, { ...existing, metadata: { ...metadata }, updated_at: now }, this.undo);
  }

  async remove(key: AssociationKey): Promise<void> {
    setWithUndo(this.tables.associations, associationId(key), undefined, this.undo);
  }
}

class MemoryAssociationTombstoneRepository implements AssociationTombstoneRepository {
  constructor(
    private tables: MemoryTables,
    private undo: UndoLog
  ) {}

  async record(input: RecordTombstoneInput, now: string): Promise<AssociationTombstoneNode> {
    const id = associationId(input);
    const existing = this.tables.associationTombstones.get(id);
    if (existing) return structuredClone(existing);

    const tombstone: AssociationTombstoneNode = {
      id: uuidv4(),
      kind: input.kind,
      source_id: input.source_id,
      target_id: input.target_id,
      discriminator: input.discriminator,
      removed_by: input.removed_by,
      sync_source: input.sync_source,
      reason: input.reason,
      removed_at: now,
      expires_at: input.expires_at,
    };
    setWithUndo(this.tables.associationTombstones, id, tombstone, this.undo);
    return structuredClone(tombstone);
  }

  async clear(key: AssociationKey): Promise<boolean> {
    const id = associationId(key);
    if (!this.tables.associationTombstones.has(id)) return false;
    setWithUndo(this.tables.associationTombstones, id, undefined, this.undo);
    return true;
  }

  async list(filter: TombstoneFilter = {}): Promise<AssociationTombstoneNode[]> {
    return [...this.tables.associationTombstones.values()]
      .filter((t) => (!filter.kind || t.kind === filter.kind) && (!filter.sourceId || t.source_id === filter.sourceId))
      .sort((a, b) => (a.removed_at > b.removed_at ? -1 : a.removed_at < b.removed_at ? 1 : 0))
      .slice(0, filter.limit ?? 100)
      .map((t) => structuredClone(t));
  }

  async deleteExpired(now: string): Promise<number> {
    let removed = 0;
    for (const [id, tombstone] of [...this.tables.associationTombstones]) {
      if (tombstone.expires_at !== null && tombstone.expires_at < now) {
        setWithUndo(this.tables.associationTombstones, id, undefined, this.undo);
        removed++;
      }
    }
    return removed;
  }

  async removeForEntity(entityId: string): Promise<void> {
    for (const [id, tombstone] of [...this.tables.associationTombstones]) {
      if (tombstone.source_id === entityId || tombstone.target_id === entityId) {
        setWithUndo(this.tables.associationTombstones, id, undefined, this.undo);
      }
    }
  }

  async statistics(now: string): Promise<AssociationTombstoneStats> {
    const stats: AssociationTombstoneStats = { total: 0, byKind: {}, bySource: {}, expired: 0 };
    for (const tombstone of this.tables.associationTombstones.values()) {
      stats.total++;
      stats.byKind[tombstone.kind] = (stats.byKind[tombstone.kind] ?? 0) + 1;
      stats.bySource[tombstone.sync_source] = (stats.bySource[tombstone.sync_source] ?? 0) + 1;
      if (tombstone.expires_at !== null && tombstone.expires_at < now) stats.expired++;
    }
    return stats;
  }
}

class MemoryPoemVersionRepository implements PoemVersionRepository {
  constructor(
    private tables: MemoryTables,
    private undo: UndoLog
  ) {}

  async findById(id: string): Promise<PoemVersionNode | null> {
    const version = this.tables.poemVersions.find((v) => v.id === id);
    return version ? structuredClone(version) : null;
  }

  async latestForPoem(poemId: string): Promise<PoemVersionNode | null> {
    const versions = await this.listForPoem(poemId);
    return versions.length > 0 ? versions[versions.length - 1] : null;
  }

  async listForPoem(poemId: string): Promise<PoemVersionNode[]> {
    // Array order is creation order
    return this.tables.poemVersions.filter((v) => v.poem_id === poemId).map((v) => structuredClone(v));
  }

  async create(input: Omit<PoemVersionNode, 'id' | 'created_at'>, now: string): Promise<PoemVersionNode> {
    const version: PoemVersionNode = { ...input, id: uuidv4(), created_at: now };
    this.tables.poemVersions.push(version);
    this.undo.push(() => {
      this.tables.poemVersions = this.tables.poemVersions.filter((v) => v !== version);
    });
    return structuredClone(version);
  }

  async removeForPoem(poemId: string): Promise<void> {
    const previous = this.tables.poemVersions;
    this.tables.poemVersions = previous.filter((v) => v.poem_id !== poemId);
    this.undo.push(() => {
      this.tables.poemVersions = previous;
    });
  }
}

class MemorySyncStateRepository implements SyncStateRepository {
  constructor(
    private tables: MemoryTables,
    private undo: UndoLog
  ) {}

  async get(entityId: string): Promise<SyncStateNode | null> {
    const state = this.tables.syncStates.get(entityId);
    return state ? structuredClone(state) : null;
  }

  async save(state: SyncStateNode): Promise<void> {
    setWithUndo(this.tables.syncStates, state.entity_id, structuredClone(state), this.undo);
  }

  async remove(entityId: string): Promise<void> {
    setWithUndo(this.tables.syncStates, entityId, undefined, this.undo);
  }

  async listConflicted(): Promise<SyncStateNode[]> {
    return [...this.tables.syncStates.values()]
      .filter((state) => state.conflict_detected && !state.conflict_resolved)
      .map((state) => structuredClone(state));
  }
}

export class MemoryArchiveStore implements ArchiveStore {
  readonly backend = 'memory';
  private tables = new MemoryTables();

  async withTransaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const undo: UndoLog = [];
    const tx: StoreTransaction = {
      entries: new MemoryEntryRepository(this.tables, undo),
      entities: new MemoryEntityRepository(this.tables, undo),
      associations: new MemoryAssociationRepository(this.tables, undo),
      associationTombstones: new MemoryAssociationTombstoneRepository(this.tables, undo),
      poemVersions: new MemoryPoemVersionRepository(this.tables, undo),
      syncStates: new MemorySyncStateRepository(this.tables, undo),
    };

    try {
      return await fn(tx);
    } catch (error) {
      for (const step of undo.reverse()) {
        step();
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    this.tables = new MemoryTables();
  }
}
