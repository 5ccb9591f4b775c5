import { InvalidAssociationError } from '../../errors/archiveErrors.js';
import { BaseResolver, type ResolverContext } from './BaseResolver.js';
import { naturalKeyDisplay, type SimpleResolver } from './SimpleResolver.js';
import type { EntityRef, KindResolver, LocationDescriptor } from './types.js';

/**
 * Locations are keyed by (name, city): the city is resolved first and becomes
 * both the disambiguator and the structural parent.
 */
export class LocationResolver extends BaseResolver implements KindResolver<LocationDescriptor> {
  constructor(
    ctx: ResolverContext,
    private readonly cities: SimpleResolver
  ) {
    super('Location', ctx);
  }

  async resolve(descriptor: LocationDescriptor): Promise<EntityRef> {
    if (!descriptor.city) {
      throw new InvalidAssociationError(`location "${descriptor.name}" has no city`, descriptor);
    }

    const city = await this.cities.resolve(descriptor.city);
    return this.resolveByKey({
      name: descriptor.name,
      disambiguator: naturalKeyDisplay(city),
      parentId: city.id,
      attributes: descriptor.attributes ?? {},
      descriptor,
    });
  }
}
