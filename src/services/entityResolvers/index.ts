/**
 * Entity Resolvers Index
 *
 * One resolver per entity kind, dispatched through a table keyed by kind.
 */

import type { EntityKind } from '../../constants/graph.js';
import { stableStringify } from '../../utils/fingerprint.js';
import type { ResolverContext } from './BaseResolver.js';
import { LocationResolver } from './LocationResolver.js';
import { NarratedDateResolver } from './NarratedDateResolver.js';
import { PersonResolver } from './PersonResolver.js';
import { ReferenceResolver } from './ReferenceResolver.js';
import { SceneResolver } from './SceneResolver.js';
import { SimpleResolver } from './SimpleResolver.js';
import type { EntityRef, KindResolver, ResolveDescriptorMap } from './types.js';

export { BaseResolver, type ResolverContext, type KeyedResolution } from './BaseResolver.js';
export { PersonResolver } from './PersonResolver.js';
export { SimpleResolver, naturalKeyDisplay } from './SimpleResolver.js';
export type * from './types.js';

type ResolverTable = { [K in EntityKind]: KindResolver<ResolveDescriptorMap[K]> };

export class EntityResolverRegistry {
  readonly people: PersonResolver;
  private readonly resolvers: ResolverTable;

  constructor(ctx: ResolverContext) {
    const cities = new SimpleResolver('City', ctx);
    const sources = new SimpleResolver('ReferenceSource', ctx);
    this.people = new PersonResolver(ctx);

    this.resolvers = {
      Person: this.people,
      City: cities,
      Location: new LocationResolver(ctx, cities),
      Event: new SimpleResolver('Event', ctx),
      Tag: new SimpleResolver('Tag', ctx),
      Theme: new SimpleResolver('Theme', ctx),
      Poem: new SimpleResolver('Poem', ctx),
      ReferenceSource: sources,
      Reference: new ReferenceResolver(ctx, sources),
      NarratedDate: new NarratedDateResolver(ctx),
      Scene: new SceneResolver(ctx),
      Thread: new SimpleResolver('Thread', ctx),
      Arc: new SimpleResolver('Arc', ctx),
      Motif: new SimpleResolver('Motif', ctx),
    };
  }

  /**
   * resolve(kind, descriptor) → existing, resurrected or newly created entity
   */
  resolve<K extends EntityKind>(kind: K, descriptor: ResolveDescriptorMap[K]): Promise<EntityRef> {
    const resolver: KindResolver<ResolveDescriptorMap[K]> = this.resolvers[kind];
    return resolver.resolve(descriptor);
  }

  /**
   * Memoizing view for one reconciliation
   */
  session(): ResolutionSession {
    return new ResolutionSession(this);
  }
}

/**
 * Resolutions performed while reconciling one entry. Identical descriptors
 * (e.g. a city declared directly and again through a location) resolve once.
 */
export class ResolutionSession {
  private cache = new Map<string, Promise<EntityRef>>();

  constructor(private readonly registry: EntityResolverRegistry) {}

  resolve<K extends EntityKind>(kind: K, descriptor: ResolveDescriptorMap[K]): Promise<EntityRef> {
    const key = `${kind}|${stableStringify(descriptor)}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.registry.resolve(kind, descriptor);
    this.cache.set(key, pending);
    return pending;
  }
}
