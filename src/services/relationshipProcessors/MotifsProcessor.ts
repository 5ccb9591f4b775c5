import type { MotifSpec } from '../../schemas/entryDescriptor.js';
import { normalizeLocatorKey } from '../../utils/entityNormalization.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import { cleanMetadata } from './reconcileAssociations.js';
import type { AssociationTarget, ProcessorContext } from './types.js';

/**
 * Motif instances: one association per (entry, motif, locator). The folded
 * locator is the discriminator, so repeats of the same instance collapse.
 */
export class MotifsProcessor extends BaseRelationshipProcessor<'motifs'> {
  constructor() {
    super('motifs');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: MotifSpec[]): Promise<AssociationTarget[]> {
    const targets: AssociationTarget[] = [];
    for (const spec of specs) {
      const motif = await ctx.resolver.resolve('Motif', { name: spec.name, attributes: spec.attributes });
      const locator = spec.locator.trim();
      targets.push({
        sourceId: ctx.entry.id,
        targetId: motif.id,
        discriminator: normalizeLocatorKey(locator),
        metadata: cleanMetadata({ locator }),
      });
    }
    return targets;
  }
}
