/**
 * Archive Read Service
 *
 * Read-only views for the note-page generator: entities with their computed
 * aggregates, entries with their associations, sequence member lists and poem
 * version history. Computed fields are derived here on every read and are
 * never stored.
 */

import {
  RelationshipKinds,
  SceneAssociationKinds,
  type AssociationKind,
  type EntityKind,
} from '../constants/graph.js';
import { EntityNotFoundError } from '../errors/archiveErrors.js';
import type { ArchiveStore, StoreTransaction, TombstoneFilter } from '../repositories/types.js';
import type {
  AssociationEdge,
  AssociationTombstoneNode,
  AssociationTombstoneStats,
  EntityNode,
  EntryNode,
  FieldMap,
  PoemVersionNode,
} from '../types/graph.js';
import { compareIsoDates } from '../utils/dates.js';
import { lifecycleStateOf, type LifecycleState } from '../utils/lifecycle.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface EntityView {
  entity: EntityNode;
  state: LifecycleState;
  computed: FieldMap;
}

export interface EntryView {
  entry: EntryNode;
  computed: FieldMap;
  /** Outgoing associations grouped by kind, scene-owned kinds included */
  associations: Partial<Record<AssociationKind, AssociationEdge[]>>;
  scenes: EntityNode[];
}

export interface SequenceView {
  sequence: EntityNode;
  /** Member entry dates, oldest first; positions are 1-based indexes into this list */
  members: Array<{ position: number; date: string; entryId: string }>;
}

export interface PoemHistory {
  poem: EntityNode;
  versions: PoemVersionNode[];
}

/** Association kinds whose source is a scene rather than an entry */
const SCENE_SOURCED: ReadonlySet<AssociationKind> = new Set<AssociationKind>([
  ...Object.values(SceneAssociationKinds),
  RelationshipKinds.SceneEvents,
]);

// ============================================================================
// Aggregates
// ============================================================================

/**
 * Live entries that reference an entity, directly or through one of their scenes
 */
async function referencingEntries(tx: StoreTransaction, edges: AssociationEdge[]): Promise<EntryNode[]> {
  const entryIds = new Set<string>();
  const sceneIds = new Set<string>();
  for (const edge of edges) {
    if (SCENE_SOURCED.has(edge.kind)) {
      sceneIds.add(edge.source_id);
    } else {
      entryIds.add(edge.source_id);
    }
  }

  for (const scene of await tx.entities.findByIds([...sceneIds])) {
    if (scene.parent_id) entryIds.add(scene.parent_id);
  }

  const entries = await tx.entries.findByIds([...entryIds]);
  return entries.filter((entry) => !entry.deleted_at).sort((a, b) => compareIsoDates(a.date, b.date));
}

/**
 * Computed fields of an entity as of this transaction
 */
export async function computeEntityAggregates(tx: StoreTransaction, entity: EntityNode): Promise<FieldMap> {
  const edges = await tx.associations.listByTarget(entity.id);
  const entries = await referencingEntries(tx, edges);
  const dates = entries.map((entry) => entry.date);

  const computed: FieldMap = {
    mentionCount: entries.length,
    firstAppearance: dates[0] ?? null,
    lastAppearance: dates[dates.length - 1] ?? null,
    entryDates: dates,
  };

  switch (entity.kind) {
    case 'Tag':
      computed.usageCount = entries.length;
      break;
    case 'Thread':
    case 'Arc':
      computed.memberCount = entries.length;
      break;
    case 'Event':
      computed.sceneCount = edges.filter((edge) => edge.kind === RelationshipKinds.SceneEvents).length;
      break;
    case 'Poem':
      computed.versionCount = (await tx.poemVersions.listForPoem(entity.id)).length;
      break;
    case 'City':
      computed.locationCount = (await tx.entities.countActiveChildren([entity.id])).get(entity.id) ?? 0;
      break;
    case 'ReferenceSource':
      computed.referenceCount = (await tx.entities.countActiveChildren([entity.id])).get(entity.id) ?? 0;
      break;
    default:
      break;
  }

  return computed;
}

export function computeEntryAggregates(entry: EntryNode): FieldMap {
  return { digest: entry.digest, wordCount: entry.word_count };
}

// ============================================================================
// Read Service
// ============================================================================

export class ArchiveReadService {
  constructor(private readonly store: ArchiveStore) {}

  async getEntity(kind: EntityKind, id: string): Promise<EntityView> {
    return this.store.withTransaction(async (tx) => {
      const entity = await tx.entities.findById(id);
      if (!entity || entity.kind !== kind) {
        throw new EntityNotFoundError(kind, id);
      }
      return { entity, state: lifecycleStateOf(entity), computed: await computeEntityAggregates(tx, entity) };
    });
  }

  async listEntities(kind: EntityKind, options: { includeDeleted?: boolean } = {}): Promise<EntityView[]> {
    return this.store.withTransaction(async (tx) => {
      const entities = await tx.entities.list(kind, options);
      const views: EntityView[] = [];
      for (const entity of entities) {
        views.push({ entity, state: lifecycleStateOf(entity), computed: await computeEntityAggregates(tx, entity) });
      }
      return views;
    });
  }

  async getEntry(date: string): Promise<EntryView> {
    return this.store.withTransaction(async (tx) => {
      const entry = await tx.entries.findByDate(date);
      if (!entry || entry.deleted_at) {
        throw new EntityNotFoundError('Entry', date);
      }

      const associations: Partial<Record<AssociationKind, AssociationEdge[]>> = {};
      for (const kind of Object.values(RelationshipKinds)) {
        if (SCENE_SOURCED.has(kind)) continue;
        const edges = await tx.associations.listBySources(kind, [entry.id]);
        if (edges.length > 0) associations[kind] = edges;
      }

      const sceneIds = (associations.scenes ?? []).map((edge) => edge.target_id);
      for (const kind of SCENE_SOURCED) {
        const edges = await tx.associations.listBySources(kind, sceneIds);
        if (edges.length > 0) associations[kind] = edges;
      }

      return {
        entry,
        computed: computeEntryAggregates(entry),
        associations,
        scenes: await tx.entities.findByIds(sceneIds),
      };
    });
  }

  async getSequence(kind: 'Thread' | 'Arc', id: string): Promise<SequenceView> {
    return this.store.withTransaction(async (tx) => {
      const sequence = await tx.entities.findById(id);
      if (!sequence || sequence.kind !== kind) {
        throw new EntityNotFoundError(kind, id);
      }

      const edgeKind = kind === 'Thread' ? RelationshipKinds.Threads : RelationshipKinds.Arcs;
      const edges = (await tx.associations.listByTarget(id)).filter((edge) => edge.kind === edgeKind);
      const entries = await referencingEntries(tx, edges);

      return {
        sequence,
        members: entries.map((entry, index) => ({ position: index + 1, date: entry.date, entryId: entry.id })),
      };
    });
  }

  async getPoemHistory(id: string): Promise<PoemHistory> {
    return this.store.withTransaction(async (tx) => {
      const poem = await tx.entities.findById(id);
      if (!poem || poem.kind !== 'Poem') {
        throw new EntityNotFoundError('Poem', id);
      }
      return { poem, versions: await tx.poemVersions.listForPoem(id) };
    });
  }

  /**
   * Recently removed associations, newest first
   */
  async listAssociationTombstones(filter: TombstoneFilter = {}): Promise<AssociationTombstoneNode[]> {
    return this.store.withTransaction((tx) => tx.associationTombstones.list(filter));
  }

  async getAssociationTombstoneStats(now: string): Promise<AssociationTombstoneStats> {
    return this.store.withTransaction((tx) => tx.associationTombstones.statistics(now));
  }
}
