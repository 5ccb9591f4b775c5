import { InvalidAssociationError } from '../../errors/archiveErrors.js';
import { BaseResolver, type ResolverContext } from './BaseResolver.js';
import { naturalKeyDisplay, type SimpleResolver } from './SimpleResolver.js';
import type { EntityRef, KindResolver, ReferenceDescriptor } from './types.js';

/**
 * References (quotations, allusions) hang under a ReferenceSource. The source
 * is resolved first; a reference without one is rejected.
 */
export class ReferenceResolver extends BaseResolver implements KindResolver<ReferenceDescriptor> {
  constructor(
    ctx: ResolverContext,
    private readonly sources: SimpleResolver
  ) {
    super('Reference', ctx);
  }

  async resolve(descriptor: ReferenceDescriptor): Promise<EntityRef> {
    const name = descriptor.content ?? descriptor.description;
    if (!name) {
      throw new InvalidAssociationError('reference has neither content nor description', descriptor);
    }
    if (!descriptor.source) {
      throw new InvalidAssociationError('reference has no source', descriptor);
    }

    const source = await this.sources.resolve(descriptor.source);
    const attributes = { ...descriptor.attributes };
    if (descriptor.content && descriptor.description) {
      attributes.description = descriptor.description;
    }

    return this.resolveByKey({
      name,
      disambiguator: naturalKeyDisplay(source),
      parentId: source.id,
      attributes,
      descriptor,
    });
  }
}
