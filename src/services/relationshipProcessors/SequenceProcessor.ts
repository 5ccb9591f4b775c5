/**
 * Threads and arcs: ordered sequences of entries.
 *
 * Membership is an entry → sequence association; the member order is the
 * order of the entries' dates and is never stored. A declared position is a
 * check against that order, not an instruction: when it disagrees the whole
 * entry is rejected before any membership changes.
 *
 * Member locks (`sequence:{id}`) are taken once the sequences are resolved and
 * held until the entry transaction ends, so two entries joining the same
 * sequence validate their positions one after the other.
 */

import type { RelationshipKind } from '../../constants/graph.js';
import { OrderingViolationError } from '../../errors/archiveErrors.js';
import type { SequenceSpec } from '../../schemas/entryDescriptor.js';
import { compareIsoDates } from '../../utils/dates.js';
import type { EntityRef } from '../entityResolvers/index.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import type { AssociationTarget, ProcessorContext } from './types.js';

type SequenceKind = 'threads' | 'arcs';

export function sequenceLockKey(sequenceId: string): string {
  return `sequence:${sequenceId}`;
}

export class SequenceProcessor extends BaseRelationshipProcessor<SequenceKind> {
  readonly dependsOn: readonly RelationshipKind[];

  constructor(
    kind: SequenceKind,
    private readonly entityKind: 'Thread' | 'Arc'
  ) {
    super(kind);
    // Arcs lock after threads
    this.dependsOn = kind === 'arcs' ? ['threads'] : [];
  }

  protected async buildTargets(ctx: ProcessorContext, specs: SequenceSpec[]): Promise<AssociationTarget[]> {
    const resolved: Array<{ spec: SequenceSpec; sequence: EntityRef }> = [];
    for (const spec of specs) {
      const sequence = await ctx.resolver.resolve(this.entityKind, {
        name: spec.name,
        disambiguator: spec.disambiguator,
        attributes: spec.attributes,
      });
      resolved.push({ spec, sequence });
    }

    await ctx.locks.hold(resolved.map(({ sequence }) => sequenceLockKey(sequence.id)));

    for (const { spec, sequence } of resolved) {
      if (spec.position === undefined) continue;
      const chronological = await this.chronologicalPosition(ctx, sequence.id);
      if (spec.position !== chronological) {
        throw new OrderingViolationError(this.entityKind, sequence.name, ctx.entry.date, spec.position, chronological);
      }
    }

    return resolved.map(({ sequence }) => ({
      sourceId: ctx.entry.id,
      targetId: sequence.id,
      discriminator: '',
      metadata: {},
    }));
  }

  /**
   * 1-based position the entry takes among the sequence's other live members
   */
  private async chronologicalPosition(ctx: ProcessorContext, sequenceId: string): Promise<number> {
    const edges = await ctx.tx.associations.listByTarget(sequenceId);
    const memberIds = edges
      .filter((edge) => edge.kind === this.kind && edge.source_id !== ctx.entry.id)
      .map((edge) => edge.source_id);
    const members = await ctx.tx.entries.findByIds([...new Set(memberIds)]);

    const earlier = members.filter(
      (member) => member.deleted_at === null && compareIsoDates(member.date, ctx.entry.date) < 0
    );
    return earlier.length + 1;
  }
}
