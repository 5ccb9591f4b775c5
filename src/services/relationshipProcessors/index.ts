/**
 * Relationship Processors Index
 *
 * One processor per relationship kind. The reconciler runs them in the
 * topological order of their declared dependencies.
 */

import { RELATIONSHIP_KINDS, type RelationshipKind } from '../../constants/graph.js';
import type { DeclaredSpecs } from '../../schemas/entryDescriptor.js';
import {
  CitiesProcessor,
  ConceptProcessor,
  EntryEventsProcessor,
  LocationsProcessor,
  PeopleProcessor,
} from './entityLinkProcessors.js';
import { MotifsProcessor } from './MotifsProcessor.js';
import { NarratedDatesProcessor } from './NarratedDatesProcessor.js';
import { PoemsProcessor } from './PoemsProcessor.js';
import { ReferencesProcessor } from './ReferencesProcessor.js';
import { SceneEventsProcessor } from './SceneEventsProcessor.js';
import { ScenesProcessor } from './ScenesProcessor.js';
import { SequenceProcessor } from './SequenceProcessor.js';
import type { ProcessorContext, ReconciliationDelta, RelationshipProcessor } from './types.js';

export { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
export { cleanMetadata, clearAssociations, dedupeTargets, reconcileAssociations } from './reconcileAssociations.js';
export { sequenceLockKey } from './SequenceProcessor.js';
export * from './types.js';

type ProcessorTable = { [K in RelationshipKind]: RelationshipProcessor<DeclaredSpecs[K]> };

export const processors: ProcessorTable = {
  people: new PeopleProcessor(),
  cities: new CitiesProcessor(),
  locations: new LocationsProcessor(),
  tags: new ConceptProcessor('tags', 'Tag'),
  themes: new ConceptProcessor('themes', 'Theme'),
  narratedDates: new NarratedDatesProcessor(),
  references: new ReferencesProcessor(),
  poems: new PoemsProcessor(),
  scenes: new ScenesProcessor(),
  sceneEvents: new SceneEventsProcessor(),
  entryEvents: new EntryEventsProcessor(),
  threads: new SequenceProcessor('threads', 'Thread'),
  arcs: new SequenceProcessor('arcs', 'Arc'),
  motifs: new MotifsProcessor(),
};

/**
 * Kahn's algorithm over the dependency table. Ties keep the declaration order
 * of RELATIONSHIP_KINDS so the run order is stable.
 */
export function topologicalOrder(
  kinds: readonly RelationshipKind[],
  dependenciesOf: (kind: RelationshipKind) => readonly RelationshipKind[]
): RelationshipKind[] {
  const remaining = new Map<RelationshipKind, Set<RelationshipKind>>();
  for (const kind of kinds) {
    remaining.set(kind, new Set(dependenciesOf(kind).filter((dep) => kinds.includes(dep))));
  }

  const order: RelationshipKind[] = [];
  while (remaining.size > 0) {
    const ready = kinds.find((kind) => remaining.get(kind)?.size === 0);
    if (ready === undefined) {
      throw new Error(`Relationship processor dependencies form a cycle: ${[...remaining.keys()].join(', ')}`);
    }
    order.push(ready);
    remaining.delete(ready);
    for (const deps of remaining.values()) {
      deps.delete(ready);
    }
  }
  return order;
}

let cachedOrder: RelationshipKind[] | null = null;

export function processorOrder(): RelationshipKind[] {
  if (!cachedOrder) {
    cachedOrder = topologicalOrder(RELATIONSHIP_KINDS, (kind) => processors[kind].dependsOn);
  }
  return cachedOrder;
}

export function runProcessor<K extends RelationshipKind>(
  kind: K,
  ctx: ProcessorContext,
  declared: DeclaredSpecs
): Promise<ReconciliationDelta> {
  const processor: RelationshipProcessor<DeclaredSpecs[K]> = processors[kind];
  return processor.apply(ctx, declared[kind]);
}
