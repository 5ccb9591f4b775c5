import type { ReferenceSpec } from '../../schemas/entryDescriptor.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import { cleanMetadata } from './reconcileAssociations.js';
import type { AssociationTarget, ProcessorContext } from './types.js';

/**
 * Quotations and allusions. The resolver rejects a reference whose source
 * cannot be resolved, which rolls back the whole entry.
 */
export class ReferencesProcessor extends BaseRelationshipProcessor<'references'> {
  constructor() {
    super('references');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: ReferenceSpec[]): Promise<AssociationTarget[]> {
    const targets: AssociationTarget[] = [];
    for (const spec of specs) {
      const reference = await ctx.resolver.resolve('Reference', {
        content: spec.content,
        description: spec.description,
        source: spec.source,
        attributes: spec.attributes,
      });
      targets.push({
        sourceId: ctx.entry.id,
        targetId: reference.id,
        discriminator: '',
        metadata: cleanMetadata({ speaker: spec.speaker, mode: spec.mode }),
      });
    }
    return targets;
  }
}
