/**
 * Entry → entity processors for the plain many-to-many kinds
 */

import type { RelationshipKind } from '../../constants/graph.js';
import type {
  ConceptSpec,
  LocationSpec,
  NamedRefSpec,
  PersonSpec,
} from '../../schemas/entryDescriptor.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import { cleanMetadata } from './reconcileAssociations.js';
import type { AssociationTarget, ProcessorContext } from './types.js';

export class PeopleProcessor extends BaseRelationshipProcessor<'people'> {
  constructor() {
    super('people');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: PersonSpec[]): Promise<AssociationTarget[]> {
    const targets: AssociationTarget[] = [];
    for (const spec of specs) {
      const person = await ctx.resolver.resolve('Person', {
        name: spec.name,
        disambiguator: spec.disambiguator,
        alias: spec.alias,
        attributes: spec.attributes,
      });
      targets.push({
        sourceId: ctx.entry.id,
        targetId: person.id,
        discriminator: '',
        metadata: cleanMetadata({ relationType: spec.relationType }),
      });
    }
    return targets;
  }
}

/**
 * Cities declared directly plus the cities of every declared location (entry
 * and scene level), so a location never hangs under a city its entry omits.
 */
export class CitiesProcessor extends BaseRelationshipProcessor<'cities'> {
  constructor() {
    super('cities');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: NamedRefSpec[]): Promise<AssociationTarget[]> {
    const cities: NamedRefSpec[] = [...specs];
    const locations: LocationSpec[] = [
      ...ctx.declared.locations,
      ...ctx.declared.scenes.flatMap((scene) => scene.locations),
    ];
    for (const location of locations) {
      if (location.city) cities.push(location.city);
    }

    const targets: AssociationTarget[] = [];
    for (const spec of cities) {
      const city = await ctx.resolver.resolve('City', {
        name: spec.name,
        disambiguator: spec.disambiguator,
        attributes: spec.attributes,
      });
      targets.push({ sourceId: ctx.entry.id, targetId: city.id, discriminator: '', metadata: {} });
    }
    return targets;
  }
}

export class LocationsProcessor extends BaseRelationshipProcessor<'locations'> {
  readonly dependsOn: readonly RelationshipKind[] = ['cities'];

  constructor() {
    super('locations');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: LocationSpec[]): Promise<AssociationTarget[]> {
    const targets: AssociationTarget[] = [];
    for (const spec of specs) {
      const location = await ctx.resolver.resolve('Location', {
        name: spec.name,
        city: spec.city,
        attributes: spec.attributes,
      });
      targets.push({ sourceId: ctx.entry.id, targetId: location.id, discriminator: '', metadata: {} });
    }
    return targets;
  }
}

/**
 * Tags and themes: stemmed concept names, no role metadata
 */
export class ConceptProcessor extends BaseRelationshipProcessor<'tags' | 'themes'> {
  constructor(
    kind: 'tags' | 'themes',
    private readonly entityKind: 'Tag' | 'Theme'
  ) {
    super(kind);
  }

  protected async buildTargets(ctx: ProcessorContext, specs: ConceptSpec[]): Promise<AssociationTarget[]> {
    const targets: AssociationTarget[] = [];
    for (const spec of specs) {
      const concept = await ctx.resolver.resolve(this.entityKind, { name: spec.name, attributes: spec.attributes });
      targets.push({ sourceId: ctx.entry.id, targetId: concept.id, discriminator: '', metadata: {} });
    }
    return targets;
  }
}

/**
 * Events-as-entry-tag: the entry mentions an event without tying it to a scene
 */
export class EntryEventsProcessor extends BaseRelationshipProcessor<'entryEvents'> {
  constructor() {
    super('entryEvents');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: NamedRefSpec[]): Promise<AssociationTarget[]> {
    const targets: AssociationTarget[] = [];
    for (const spec of specs) {
      const event = await ctx.resolver.resolve('Event', {
        name: spec.name,
        disambiguator: spec.disambiguator,
        attributes: spec.attributes,
      });
      targets.push({ sourceId: ctx.entry.id, targetId: event.id, discriminator: '', metadata: {} });
    }
    return targets;
  }
}
