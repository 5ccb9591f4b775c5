/**
 * Centralized constants for the archive graph schema
 * Defines entity kinds, node labels and association (relationship) types so the
 * store, resolvers and processors agree on names.
 */

export const EntityKinds = {
  Person: 'Person',
  City: 'City',
  Location: 'Location',
  Event: 'Event',
  Tag: 'Tag',
  Theme: 'Theme',
  Poem: 'Poem',
  ReferenceSource: 'ReferenceSource',
  Reference: 'Reference',
  NarratedDate: 'NarratedDate',
  Scene: 'Scene',
  Thread: 'Thread',
  Arc: 'Arc',
  Motif: 'Motif',
} as const;

export type EntityKind = typeof EntityKinds[keyof typeof EntityKinds];

export const ENTITY_KINDS: readonly EntityKind[] = Object.values(EntityKinds);

export const NodeLabels = {
  Entry: 'Entry',
  Entity: 'ArchiveEntity',
  PoemVersion: 'PoemVersion',
  SyncState: 'SyncState',
  AssociationTombstone: 'AssociationTombstone',
} as const;

/**
 * The fourteen entry-level relationship kinds. Each one has exactly one
 * processor; the reconciler runs them in dependency order.
 */
export const RelationshipKinds = {
  People: 'people',
  Cities: 'cities',
  Locations: 'locations',
  Tags: 'tags',
  Themes: 'themes',
  NarratedDates: 'narratedDates',
  References: 'references',
  Poems: 'poems',
  Scenes: 'scenes',
  SceneEvents: 'sceneEvents',
  EntryEvents: 'entryEvents',
  Threads: 'threads',
  Arcs: 'arcs',
  Motifs: 'motifs',
} as const;

export type RelationshipKind = typeof RelationshipKinds[keyof typeof RelationshipKinds];

export const RELATIONSHIP_KINDS: readonly RelationshipKind[] = Object.values(RelationshipKinds);

/**
 * Associations owned by a scene rather than directly by its entry.
 */
export const SceneAssociationKinds = {
  ScenePeople: 'scenePeople',
  SceneLocations: 'sceneLocations',
  SceneDates: 'sceneDates',
} as const;

export type SceneAssociationKind = typeof SceneAssociationKinds[keyof typeof SceneAssociationKinds];

export type AssociationKind = RelationshipKind | SceneAssociationKind;

/**
 * Neo4j relationship type per association kind
 */
export const RelationshipTypes: Record<AssociationKind, string> = {
  people: 'MENTIONS_PERSON',
  cities: 'SET_IN_CITY',
  locations: 'SET_AT_LOCATION',
  tags: 'TAGGED',
  themes: 'HAS_THEME',
  narratedDates: 'NARRATES_DATE',
  references: 'CITES',
  poems: 'CONTAINS_POEM',
  scenes: 'HAS_SCENE',
  sceneEvents: 'PART_OF_EVENT',
  entryEvents: 'MENTIONS_EVENT',
  threads: 'IN_THREAD',
  arcs: 'IN_ARC',
  motifs: 'HAS_MOTIF',
  scenePeople: 'SCENE_PERSON',
  sceneLocations: 'SCENE_LOCATION',
  sceneDates: 'SCENE_DATE',
};

/**
 * Target entity kind per association kind
 */
export const AssociationTargetKinds: Record<AssociationKind, EntityKind> = {
  people: 'Person',
  cities: 'City',
  locations: 'Location',
  tags: 'Tag',
  themes: 'Theme',
  narratedDates: 'NarratedDate',
  references: 'Reference',
  poems: 'Poem',
  scenes: 'Scene',
  sceneEvents: 'Event',
  entryEvents: 'Event',
  threads: 'Thread',
  arcs: 'Arc',
  motifs: 'Motif',
  scenePeople: 'Person',
  sceneLocations: 'Location',
  sceneDates: 'NarratedDate',
};

/**
 * Kinds whose names are concepts rather than proper names; their keys are stemmed.
 */
export const STEMMED_KINDS: ReadonlySet<EntityKind> = new Set<EntityKind>(['Tag', 'Theme', 'Motif']);

export const DEFAULT_TOMBSTONE_GRACE_DAYS = 90;

/** Lifetime of the record of a removed association */
export const DEFAULT_ASSOCIATION_TOMBSTONE_TTL_DAYS = 90;
