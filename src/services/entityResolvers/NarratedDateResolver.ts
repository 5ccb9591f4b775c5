import { InvalidAssociationError } from '../../errors/archiveErrors.js';
import { isIsoDate } from '../../utils/dates.js';
import { BaseResolver, type ResolverContext } from './BaseResolver.js';
import type { EntityRef, KindResolver, NarratedDateDescriptor } from './types.js';

export class NarratedDateResolver extends BaseResolver implements KindResolver<NarratedDateDescriptor> {
  constructor(ctx: ResolverContext) {
    super('NarratedDate', ctx);
  }

  async resolve(descriptor: NarratedDateDescriptor): Promise<EntityRef> {
    if (!isIsoDate(descriptor.date)) {
      throw new InvalidAssociationError(`"${descriptor.date}" is not a calendar date`, descriptor);
    }
    return this.resolveByKey({
      name: descriptor.date,
      disambiguator: null,
      parentId: null,
      attributes: {},
      descriptor,
    });
  }
}
