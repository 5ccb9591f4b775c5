import type { EntityKind } from '../../constants/graph.js';
import type { FieldMap } from '../../types/graph.js';

/**
 * Canonical entity handed back by every resolver
 */
export interface EntityRef {
  id: string;
  kind: EntityKind;
  name: string;
  nameKey: string;
  disambiguator: string | null;
  parentId: string | null;
  outcome: 'matched' | 'created' | 'resurrected';
}

export interface NamedDescriptor {
  name: string;
  disambiguator?: string | null;
  attributes?: FieldMap;
}

export interface PersonDescriptor extends NamedDescriptor {
  alias?: string;
}

export interface LocationDescriptor {
  name: string;
  city?: NamedDescriptor;
  attributes?: FieldMap;
}

export interface ReferenceDescriptor {
  content?: string;
  description?: string;
  source?: NamedDescriptor;
  attributes?: FieldMap;
}

export interface NarratedDateDescriptor {
  date: string;
}

export interface SceneDescriptor {
  name: string;
  description?: string;
  entryId: string;
  entryDate: string;
}

export interface ResolveDescriptorMap {
  Person: PersonDescriptor;
  City: NamedDescriptor;
  Location: LocationDescriptor;
  Event: NamedDescriptor;
  Tag: NamedDescriptor;
  Theme: NamedDescriptor;
  Poem: NamedDescriptor;
  ReferenceSource: NamedDescriptor;
  Reference: ReferenceDescriptor;
  NarratedDate: NarratedDateDescriptor;
  Scene: SceneDescriptor;
  Thread: NamedDescriptor;
  Arc: NamedDescriptor;
  Motif: NamedDescriptor;
}

export interface KindResolver<D> {
  resolve(descriptor: D): Promise<EntityRef>;
}
