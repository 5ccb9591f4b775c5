import { BaseResolver, type ResolverContext } from './BaseResolver.js';
import type { EntityRef, KindResolver, SceneDescriptor } from './types.js';

/**
 * Scenes belong to exactly one entry: the entry date disambiguates the name
 * and the entry id is the parent.
 */
export class SceneResolver extends BaseResolver implements KindResolver<SceneDescriptor> {
  constructor(ctx: ResolverContext) {
    super('Scene', ctx);
  }

  async resolve(descriptor: SceneDescriptor): Promise<EntityRef> {
    return this.resolveByKey({
      name: descriptor.name,
      disambiguator: descriptor.entryDate,
      parentId: descriptor.entryId,
      attributes: descriptor.description ? { description: descriptor.description } : {},
      strictParent: true,
      descriptor,
    });
  }
}
