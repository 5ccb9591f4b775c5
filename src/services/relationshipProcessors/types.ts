import type { AssociationKind, RelationshipKind } from '../../constants/graph.js';
import type { DeclaredSpecs } from '../../schemas/entryDescriptor.js';
import type { StoreTransaction } from '../../repositories/types.js';
import type { AssociationMetadata, EntryNode, RemovalSource } from '../../types/graph.js';
import type { LockScope } from '../../utils/keyedLock.js';
import type { ResolutionSession } from '../entityResolvers/index.js';

export type ReconcileMode = 'replace' | 'merge';

/**
 * Provenance written on the tombstone of every association removed in one run
 */
export interface RemovalProvenance {
  removedBy: string;
  syncSource: RemovalSource;
  /** Expiry of the tombstones; null keeps them until an endpoint is purged */
  ttlDays: number | null;
}

/**
 * State shared by every processor while one entry is reconciled
 */
export interface ProcessorContext {
  tx: StoreTransaction;
  entry: EntryNode;
  mode: ReconcileMode;
  resolver: ResolutionSession;
  /** Sequence member locks, held until the entry transaction ends */
  locks: LockScope;
  now: string;
  /** Full declaration, for processors whose targets derive from other kinds */
  declared: DeclaredSpecs;
  /** Scene name key → scene id, filled by the scenes processor */
  sceneIds: Map<string, string>;
  /** Entities that lost an association, per kind; checked for orphaning at the end */
  orphanCandidates: Map<RelationshipKind, Set<string>>;
  /** Entities that gained an association */
  addedTargets: Set<string>;
  removal: RemovalProvenance;
}

/**
 * Desired association before diffing against the store
 */
export interface AssociationTarget {
  sourceId: string;
  targetId: string;
  discriminator: string;
  metadata: AssociationMetadata;
}

export interface AssociationChange {
  kind: AssociationKind;
  sourceId: string;
  targetId: string;
  discriminator: string;
}

export interface ReconciliationDelta {
  kind: RelationshipKind;
  added: AssociationChange[];
  removed: AssociationChange[];
  updated: AssociationChange[];
  /** Entity ids tombstoned because this kind removed their last reference */
  tombstoned: string[];
}

export function emptyDelta(kind: RelationshipKind): ReconciliationDelta {
  return { kind, added: [], removed: [], updated: [], tombstoned: [] };
}

export function deltaSize(delta: ReconciliationDelta): number {
  return delta.added.length + delta.removed.length + delta.updated.length;
}

/**
 * Processor contract as seen by the registry, keyed by the declared spec list
 */
export interface RelationshipProcessor<S> {
  readonly kind: RelationshipKind;
  readonly dependsOn: readonly RelationshipKind[];
  apply(ctx: ProcessorContext, specs: S): Promise<ReconciliationDelta>;
}
