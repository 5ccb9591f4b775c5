/**
 * Base Relationship Processor
 *
 * Every relationship kind follows the same shape:
 * 1. Resolve each declared spec to canonical entities (any failure aborts)
 * 2. Build the desired association set
 * 3. Diff it against the persisted set and apply removals, additions and
 *    metadata updates
 *
 * Subclasses supply the spec list and the target builder; kinds with extra
 * structure (scenes, sequences) extend apply().
 */

import type { AssociationKind, RelationshipKind } from '../../constants/graph.js';
import type { DeclaredSpecs } from '../../schemas/entryDescriptor.js';
import { TraceAttributes, withSpan } from '../../utils/tracing.js';
import { reconcileAssociations } from './reconcileAssociations.js';
import { emptyDelta, type AssociationTarget, type ProcessorContext, type ReconciliationDelta } from './types.js';

export abstract class BaseRelationshipProcessor<K extends RelationshipKind = RelationshipKind> {
  /** Kinds whose processors must run first */
  readonly dependsOn: readonly RelationshipKind[] = [];

  constructor(readonly kind: K) {}

  /**
   * Association kind written by this processor (same name as the relationship kind)
   */
  protected get associationKind(): AssociationKind {
    return this.kind;
  }

  /**
   * Ids whose associations of this kind are owned by the current entry
   */
  protected sourceIds(ctx: ProcessorContext): string[] {
    return [ctx.entry.id];
  }

  protected abstract buildTargets(ctx: ProcessorContext, specs: DeclaredSpecs[K]): Promise<AssociationTarget[]>;

  async apply(ctx: ProcessorContext, specs: DeclaredSpecs[K]): Promise<ReconciliationDelta> {
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
        await reconcileAssociations(ctx, this.associationKind, this.kind, this.sourceIds(ctx), targets, delta);
        return delta;
      }
    );
  }
}
