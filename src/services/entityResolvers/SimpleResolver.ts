import { STEMMED_KINDS, type EntityKind } from '../../constants/graph.js';
import { BaseResolver, type ResolverContext } from './BaseResolver.js';
import type { EntityRef, KindResolver, NamedDescriptor } from './types.js';

/**
 * Resolver for kinds keyed by name and an optional disambiguator, with no
 * structural parent. Concept kinds (tags, themes, motifs) take no disambiguator.
 */
export class SimpleResolver extends BaseResolver implements KindResolver<NamedDescriptor> {
  constructor(kind: EntityKind, ctx: ResolverContext) {
    super(kind, ctx);
  }

  async resolve(descriptor: NamedDescriptor): Promise<EntityRef> {
    const disambiguator = STEMMED_KINDS.has(this.kind) ? null : descriptor.disambiguator ?? null;
    return this.resolveByKey({
      name: descriptor.name,
      disambiguator,
      parentId: null,
      attributes: descriptor.attributes ?? {},
      descriptor,
    });
  }
}

/**
 * Display form of a resolved entity's natural key, used as the disambiguator
 * of its children ("Paris", "Paris, Texas")
 */
export function naturalKeyDisplay(ref: EntityRef): string {
  return ref.disambiguator ? `${ref.name}, ${ref.disambiguator}` : ref.name;
}
