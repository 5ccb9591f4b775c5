import type { NarratedDateSpec } from '../../schemas/entryDescriptor.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import { cleanMetadata } from './reconcileAssociations.js';
import type { AssociationTarget, ProcessorContext } from './types.js';

/**
 * Dates the entry narrates. Every date a scene spans is also an entry-level
 * narrated date, so the entry's list is the union of both.
 */
export class NarratedDatesProcessor extends BaseRelationshipProcessor<'narratedDates'> {
  constructor() {
    super('narratedDates');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: NarratedDateSpec[]): Promise<AssociationTarget[]> {
    const declared: NarratedDateSpec[] = [
      ...specs,
      ...ctx.declared.scenes.flatMap((scene) => scene.dates.map((date) => ({ date }))),
    ];

    const targets: AssociationTarget[] = [];
    for (const spec of declared) {
      const narrated = await ctx.resolver.resolve('NarratedDate', { date: spec.date });
      targets.push({
        sourceId: ctx.entry.id,
        targetId: narrated.id,
        discriminator: '',
        metadata: cleanMetadata({ context: spec.context }),
      });
    }
    return targets;
  }
}
