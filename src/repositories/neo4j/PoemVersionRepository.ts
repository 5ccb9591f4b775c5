import { v4 as uuidv4 } from 'uuid';
import type { ManagedTransaction, Transaction } from 'neo4j-driver';
import { NodeLabels } from '../../constants/graph.js';
import { runQuery, runStatement } from '../../db/neo4j.js';
import type { PoemVersionNode } from '../../types/graph.js';
import type { PoemVersionRepository } from '../types.js';
import { poemVersionRowSchema } from './rows.js';

const VERSION_PROJECTION = 'v {.id, .poem_id, .entry_id, .content, .content_hash, .created_at}';

/**
 * Append-only poem history. Versions carry a per-poem sequence number so
 * ordering does not depend on timestamp resolution.
 */
export class Neo4jPoemVersionRepository implements PoemVersionRepository {
  constructor(private tx: Transaction | ManagedTransaction) {}

  async findById(id: string): Promise<PoemVersionNode | null> {
    const query = `
      MATCH (v:${NodeLabels.PoemVersion} {id: $id})
      RETURN ${VERSION_PROJECTION} AS version
    `;
    const rows = await runQuery(this.tx, query, { id }, poemVersionRowSchema);
    return rows[0]?.version ?? null;
  }

  async latestForPoem(poemId: string): Promise<PoemVersionNode | null> {
    const query = `
      MATCH (v:${NodeLabels.PoemVersion} {poem_id: $poemId})
      RETURN ${VERSION_PROJECTION} AS version
      ORDER BY v.sequence DESC
      LIMIT 1
    `;
    const rows = await runQuery(this.tx, query, { poemId }, poemVersionRowSchema);
    return rows[0]?.version ?? null;
  }

  async listForPoem(poemId: string): Promise<PoemVersionNode[]> {
    const query = `
      MATCH (v:${NodeLabels.PoemVersion} {poem_id: $poemId})
      RETURN ${VERSION_PROJECTION} AS version
      ORDER BY v.sequence
    `;
    const rows = await runQuery(this.tx, query, { poemId }, poemVersionRowSchema);
    return rows.map((row) => row.version);
  }

  async create(input: Omit<PoemVersionNode, 'id' | 'created_at'>, now: string): Promise<PoemVersionNode> {
    const query = `
      OPTIONAL MATCH (existing:${NodeLabels.PoemVersion} {poem_id: $poemId})
      WITH count(existing) AS previous
      CREATE (v:${NodeLabels.PoemVersion} {
        id: $id,
        poem_id: $poemId,
        entry_id: $entryId,
        content: $content,
        content_hash: $contentHash,
        created_at: $now,
        sequence: previous + 1
      })
      RETURN ${VERSION_PROJECTION} AS version
    `;
    const rows = await runQuery(
      this.tx,
      query,
      {
        id: uuidv4(),
        poemId: input.poem_id,
        entryId: input.entry_id,
        content: input.content,
        contentHash: input.content_hash,
        now,
      },
      poemVersionRowSchema
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Failed to create version for poem ${input.poem_id}`);
    }
    return row.version;
  }

  async removeForPoem(poemId: string): Promise<void> {
    const query = `
      MATCH (v:${NodeLabels.PoemVersion} {poem_id: $poemId})
      DETACH DELETE v
    `;
    await runStatement(this.tx, query, { poemId });
  }
}
