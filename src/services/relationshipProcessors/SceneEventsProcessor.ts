import type { RelationshipKind } from '../../constants/graph.js';
import { InvalidAssociationError } from '../../errors/archiveErrors.js';
import type { SceneEventSpec } from '../../schemas/entryDescriptor.js';
import { normalizeNameKey } from '../../utils/entityNormalization.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import type { AssociationTarget, ProcessorContext } from './types.js';

/**
 * Events-as-scene-link: each event names the scenes of this entry it spans.
 * The association runs scene → event, so the sources are this entry's scenes.
 */
export class SceneEventsProcessor extends BaseRelationshipProcessor<'sceneEvents'> {
  readonly dependsOn: readonly RelationshipKind[] = ['scenes'];

  constructor() {
    super('sceneEvents');
  }

  protected sourceIds(ctx: ProcessorContext): string[] {
    return [...new Set(ctx.sceneIds.values())];
  }

  protected async buildTargets(ctx: ProcessorContext, specs: SceneEventSpec[]): Promise<AssociationTarget[]> {
    // Check every scene name before resolving anything
    const sceneIdsPerSpec = specs.map((spec) =>
      spec.scenes.map((sceneName) => {
        const sceneId = ctx.sceneIds.get(normalizeNameKey('Scene', sceneName));
        if (!sceneId) {
          throw new InvalidAssociationError(`scene "${sceneName}" is not declared in entry ${ctx.entry.date}`, spec);
        }
        return sceneId;
      })
    );

    const targets: AssociationTarget[] = [];
    for (const [index, spec] of specs.entries()) {
      const event = await ctx.resolver.resolve('Event', {
        name: spec.name,
        disambiguator: spec.disambiguator,
        attributes: spec.attributes,
      });
      for (const sceneId of sceneIdsPerSpec[index] ?? []) {
        targets.push({ sourceId: sceneId, targetId: event.id, discriminator: '', metadata: {} });
      }
    }
    return targets;
  }
}
