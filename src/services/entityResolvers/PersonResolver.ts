/**
 * Person Entity Resolver
 *
 * Resolves Person entities using the shared natural-key strategy plus aliases:
 * 1. (name, disambiguator) match
 * 2. Unique name match
 * 3. Unique alias match
 * 4. Tombstone resurrection
 * 5. Creation
 */

import { InvalidAssociationError } from '../../errors/archiveErrors.js';
import type { StoreTransaction } from '../../repositories/types.js';
import { normalizeEntityName } from '../../utils/entityNormalization.js';
import { BaseResolver, type ResolverContext } from './BaseResolver.js';
import type { EntityRef, KindResolver, PersonDescriptor } from './types.js';

export class PersonResolver extends BaseResolver implements KindResolver<PersonDescriptor> {
  constructor(ctx: ResolverContext) {
    super('Person', ctx);
  }

  protected override get usesAliases(): boolean {
    return true;
  }

  async resolve(descriptor: PersonDescriptor): Promise<EntityRef> {
    return this.resolveByKey({
      name: descriptor.name,
      disambiguator: descriptor.disambiguator ?? null,
      parentId: null,
      attributes: descriptor.attributes ?? {},
      alias: descriptor.alias,
      descriptor,
    });
  }

  /**
   * Reject aliases that equal another active person's name; such an alias would
   * shadow that person on every later name-only lookup.
   *
   * @returns normalized alias keys
   */
  async checkAliases(tx: StoreTransaction, personId: string, aliases: string[]): Promise<string[]> {
    const keys: string[] = [];
    for (const alias of aliases) {
      const aliasKey = normalizeEntityName(alias);
      if (!aliasKey) continue;

      const shadowed = (await tx.entities.findActiveByName('Person', aliasKey)).filter((p) => p.id !== personId);
      if (shadowed.length > 0) {
        throw new InvalidAssociationError(`alias "${alias}" is the name of another person (${shadowed[0].name})`, {
          personId,
          alias,
        });
      }
      if (!keys.includes(aliasKey)) {
        keys.push(aliasKey);
      }
    }
    return keys;
  }
}
