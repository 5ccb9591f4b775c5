import { InvalidAssociationError } from '../../errors/archiveErrors.js';
import type { PoemSpec } from '../../schemas/entryDescriptor.js';
import { hashContent } from '../../utils/entityNormalization.js';
import { BaseRelationshipProcessor } from './BaseRelationshipProcessor.js';
import type { AssociationTarget, ProcessorContext } from './types.js';

/**
 * Poems with append-only version history.
 *
 * The association records which version the entry carries. A version is
 * reused when its content hash matches (the version this entry already
 * points at first, then the poem's latest); otherwise a new immutable version
 * is appended.
 */
export class PoemsProcessor extends BaseRelationshipProcessor<'poems'> {
  constructor() {
    super('poems');
  }

  protected async buildTargets(ctx: ProcessorContext, specs: PoemSpec[]): Promise<AssociationTarget[]> {
    const current = await ctx.tx.associations.listBySources('poems', [ctx.entry.id]);
    const targets: AssociationTarget[] = [];
    const seen = new Set<string>();

    for (const spec of specs) {
      const poem = await ctx.resolver.resolve('Poem', { name: spec.title, disambiguator: spec.disambiguator });
      if (seen.has(poem.id)) {
        throw new InvalidAssociationError('poem declared twice in one entry', { title: spec.title });
      }
      seen.add(poem.id);
      const contentHash = hashContent(spec.content);
      const versionId = await this.versionFor(ctx, poem.id, contentHash, spec.content, current);

      targets.push({
        sourceId: ctx.entry.id,
        targetId: poem.id,
        discriminator: '',
        metadata: { versionId },
      });
    }
    return targets;
  }

  private async versionFor(
    ctx: ProcessorContext,
    poemId: string,
    contentHash: string,
    content: string,
    current: Array<{ target_id: string; metadata: Record<string, string | number> }>
  ): Promise<string> {
    const linked = current.find((edge) => edge.target_id === poemId);
    const linkedVersionId = linked?.metadata.versionId;
    if (typeof linkedVersionId === 'string') {
      const version = await ctx.tx.poemVersions.findById(linkedVersionId);
      if (version?.content_hash === contentHash) {
        return version.id;
      }
    }

    const latest = await ctx.tx.poemVersions.latestForPoem(poemId);
    if (latest?.content_hash === contentHash) {
      return latest.id;
    }

    const created = await ctx.tx.poemVersions.create(
      { poem_id: poemId, entry_id: ctx.entry.id, content, content_hash: contentHash },
      ctx.now
    );
    console.log(`📝 New version of poem ${poemId} from entry ${ctx.entry.date}`);
    return created.id;
  }
}
