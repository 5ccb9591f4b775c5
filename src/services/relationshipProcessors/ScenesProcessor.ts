import { RelationshipKinds, SceneAssociationKinds, type RelationshipKind } from '../../constants/graph.js';
import type { SceneSpec } from '../../schemas/entryDescriptor.js';
import { normalizeNameKey } from '../../utils/entityNormalization.js';
import { TraceAttributes, withSpan } from '../../utils/tracing.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import { cleanMetadata, clearAssociations, reconcileAssociations } from './reconcileAssociations.js';
import { emptyDelta, type AssociationTarget, type ProcessorContext, type ReconciliationDelta } from './types.js';

/**
 * Scenes: one-to-many entry → scene, each scene owning its own people,
 * locations and narrated dates.
 *
 * A scene removed from the entry loses its owned associations (and its event
 * links) before its own association goes, so it can be tombstoned with the rest.
 */
export class ScenesProcessor extends BaseRelationshipProcessor<'scenes'> {
  readonly dependsOn: readonly RelationshipKind[] = ['people', 'locations', 'narratedDates'];

  constructor() {
    super('scenes');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: SceneSpec[]): Promise<AssociationTarget[]> {
    const targets: AssociationTarget[] = [];
    for (const spec of specs) {
      const scene = await ctx.resolver.resolve('Scene', {
        name: spec.name,
        description: spec.description,
        entryId: ctx.entry.id,
        entryDate: ctx.entry.date,
      });
      ctx.sceneIds.set(normalizeNameKey('Scene', spec.name), scene.id);
      targets.push({ sourceId: ctx.entry.id, targetId: scene.id, discriminator: '', metadata: {} });
    }
    return targets;
  }

  async apply(ctx: ProcessorContext, specs: SceneSpec[]): Promise<ReconciliationDelta> {
    return withSpan(
      'processor.apply',
      {
        [TraceAttributes.RELATIONSHIP_KIND]: this.kind,
        [TraceAttributes.RECONCILE_MODE]: ctx.mode,
        [TraceAttributes.ITEM_COUNT]: specs.length,
      },
      async () => {
        const delta = emptyDelta(this.kind);
        const targets = await this.buildTargets(ctx, specs);

        if (ctx.mode === 'replace') {
          const kept = new Set(targets.map((t) => t.targetId));
          const current = await ctx.tx.associations.listBySources('scenes', [ctx.entry.id]);
          const dropped = current.map((edge) => edge.target_id).filter((id) => !kept.has(id));
          await this.teardownScenes(ctx, dropped, delta);
        }

        await reconcileAssociations(ctx, 'scenes', this.kind, [ctx.entry.id], targets, delta);

        for (const spec of specs) {
          const sceneId = ctx.sceneIds.get(normalizeNameKey('Scene', spec.name));
          if (sceneId) {
            await this.reconcileSceneContents(ctx, sceneId, spec, delta);
          }
        }
        return delta;
      }
    );
  }

  private async teardownScenes(ctx: ProcessorContext, sceneIds: string[], delta: ReconciliationDelta): Promise<void> {
    if (sceneIds.length === 0) return;
    for (const kind of Object.values(SceneAssociationKinds)) {
      await clearAssociations(ctx, kind, this.kind, sceneIds, delta, 'scene removed');
    }
    const events = RelationshipKinds.SceneEvents;
    await clearAssociations(ctx, events, events, sceneIds, delta, 'scene removed');
  }

  private async reconcileSceneContents(
    ctx: ProcessorContext,
    sceneId: string,
    spec: SceneSpec,
    delta: ReconciliationDelta
  ): Promise<void> {
    const people: AssociationTarget[] = [];
    for (const person of spec.people) {
      const ref = await ctx.resolver.resolve('Person', {
        name: person.name,
        disambiguator: person.disambiguator,
        alias: person.alias,
        attributes: person.attributes,
      });
      people.push({
        sourceId: sceneId,
        targetId: ref.id,
        discriminator: '',
        metadata: cleanMetadata({ relationType: person.relationType }),
      });
    }

    const locations: AssociationTarget[] = [];
    for (const location of spec.locations) {
      const ref = await ctx.resolver.resolve('Location', {
        name: location.name,
        city: location.city,
        attributes: location.attributes,
      });
      locations.push({ sourceId: sceneId, targetId: ref.id, discriminator: '', metadata: {} });
    }

    const dates: AssociationTarget[] = [];
    for (const date of spec.dates) {
      const ref = await ctx.resolver.resolve('NarratedDate', { date });
      dates.push({ sourceId: sceneId, targetId: ref.id, discriminator: '', metadata: {} });
    }

    await reconcileAssociations(ctx, SceneAssociationKinds.ScenePeople, this.kind, [sceneId], people, delta);
    await reconcileAssociations(ctx, SceneAssociationKinds.SceneLocations, this.kind, [sceneId], locations, delta);
    await reconcileAssociations(ctx, SceneAssociationKinds.SceneDates, this.kind, [sceneId], dates, delta);
  }
}
