import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ManagedTransaction, Transaction } from 'neo4j-driver';
import { NodeLabels } from '../../constants/graph.js';
import { runQuery } from '../../db/neo4j.js';
import type { EntryNode, UpsertEntryInput } from '../../types/graph.js';
import type { EntryRepository, ListOptions } from '../types.js';
import { entryRowSchema } from './rows.js';

const upsertRowSchema = entryRowSchema.extend({ created: z.boolean() });

/**
 * Repository for Entry nodes (one per calendar date)
 */
export class Neo4jEntryRepository implements EntryRepository {
  constructor(private tx: Transaction | ManagedTransaction) {}

  async findByDate(date: string): Promise<EntryNode | null> {
    const query = `
      MATCH (e:${NodeLabels.Entry} {date: $date})
      RETURN e {.*} AS entry
    `;
    const rows = await runQuery(this.tx, query, { date }, entryRowSchema);
    return rows[0]?.entry ?? null;
  }

  async findById(id: string): Promise<EntryNode | null> {
    const query = `
      MATCH (e:${NodeLabels.Entry} {id: $id})
      RETURN e {.*} AS entry
    `;
    const rows = await runQuery(this.tx, query, { id }, entryRowSchema);
    return rows[0]?.entry ?? null;
  }

  async findByIds(ids: string[]): Promise<EntryNode[]> {
    const query = `
      MATCH (e:${NodeLabels.Entry})
      WHERE e.id IN $ids
      RETURN e {.*} AS entry
      ORDER BY e.date
    `;
    const rows = await runQuery(this.tx, query, { ids }, entryRowSchema);
    return rows.map((row) => row.entry);
  }

  /**
   * MERGE on date; re-reconciling a soft-deleted entry restores it
   */
  async upsert(input: UpsertEntryInput, now: string): Promise<{ entry: EntryNode; created: boolean }> {
    const id = uuidv4();
    const query = `
      MERGE (e:${NodeLabels.Entry} {date: $date})
      ON CREATE SET e.id = $id, e.created_at = $now
      SET e.digest = $digest,
          e.word_count = $wordCount,
          e.updated_at = $now
      REMOVE e.deleted_at
      RETURN e {.*} AS entry, e.id = $id AS created
    `;
    const rows = await runQuery(
      this.tx,
      query,
      { id, date: input.date, digest: input.digest, wordCount: input.word_count, now },
      upsertRowSchema
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Entry upsert for ${input.date} returned no row`);
    }
    return { entry: row.entry, created: row.created };
  }

  async update(id: string, patch: { notes?: string | null; deleted_at?: string | null }, now: string): Promise<EntryNode> {
    const assignments = ['e.updated_at = $now'];
    if (patch.notes !== undefined) assignments.push('e.notes = $notes');
    if (patch.deleted_at !== undefined) assignments.push('e.deleted_at = $deletedAt');

    const query = `
      MATCH (e:${NodeLabels.Entry} {id: $id})
      SET ${assignments.join(', ')}
      RETURN e {.*} AS entry
    `;
    const rows = await runQuery(
      this.tx,
      query,
      { id, now, notes: patch.notes ?? null, deletedAt: patch.deleted_at ?? null },
      entryRowSchema
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Entry ${id} not found`);
    }
    return row.entry;
  }

  async list(options: ListOptions = {}): Promise<EntryNode[]> {
    const query = `
      MATCH (e:${NodeLabels.Entry})
      WHERE $includeDeleted OR e.deleted_at IS NULL
      RETURN e {.*} AS entry
      ORDER BY e.date
    `;
    const rows = await runQuery(this.tx, query, { includeDeleted: options.includeDeleted ?? false }, entryRowSchema);
    return rows.map((row) => row.entry);
  }
}
