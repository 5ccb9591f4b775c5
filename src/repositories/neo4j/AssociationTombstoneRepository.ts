import neo4j, { type ManagedTransaction, type Transaction } from 'neo4j-driver';
import { v4 as uuidv4 } from 'uuid';
import { NodeLabels } from '../../constants/graph.js';
import { runQuery, runStatement } from '../../db/neo4j.js';
import type {
  AssociationKey,
  AssociationTombstoneNode,
  AssociationTombstoneStats,
  RecordTombstoneInput,
} from '../../types/graph.js';
import type { AssociationTombstoneRepository, TombstoneFilter } from '../types.js';
import { associationTombstoneRowSchema, countRowSchema, groupCountRowSchema } from './rows.js';

const TOMBSTONE_PROJECTION =
  't {.id, .kind, .source_id, .target_id, .discriminator, .removed_by, .sync_source, .reason, .removed_at, .expires_at}';

function tombstoneKey(key: AssociationKey): string {
  return `${key.kind}|${key.source_id}|${key.target_id}|${key.discriminator}`;
}

/**
 * Removed associations, one node per association identity (the `key` property)
 */
export class Neo4jAssociationTombstoneRepository implements AssociationTombstoneRepository {
  constructor(private tx: Transaction | ManagedTransaction) {}

  async record(input: RecordTombstoneInput, now: string): Promise<AssociationTombstoneNode> {
    const query = `
      MERGE (t:${NodeLabels.AssociationTombstone} {key: $key})
      ON CREATE SET t.id = $id,
                    t.kind = $kind,
                    t.source_id = $sourceId,
                    t.target_id = $targetId,
                    t.discriminator = $discriminator,
                    t.removed_by = $removedBy,
                    t.sync_source = $syncSource,
                    t.reason = $reason,
                    t.removed_at = $now,
                    t.expires_at = $expiresAt
      RETURN ${TOMBSTONE_PROJECTION} AS tombstone
    `;
    const rows = await runQuery(
      this.tx,
      query,
      {
        key: tombstoneKey(input),
        id: uuidv4(),
        kind: input.kind,
        sourceId: input.source_id,
        targetId: input.target_id,
        discriminator: input.discriminator,
        removedBy: input.removed_by,
        syncSource: input.sync_source,
        reason: input.reason,
        expiresAt: input.expires_at,
        now,
      },
      associationTombstoneRowSchema
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Failed to record tombstone ${tombstoneKey(input)}`);
    }
    return row.tombstone;
  }

  async clear(key: AssociationKey): Promise<boolean> {
    const query = `
      MATCH (t:${NodeLabels.AssociationTombstone} {key: $key})
      DELETE t
      RETURN $key AS id, 1 AS count
    `;
    const rows = await runQuery(this.tx, query, { key: tombstoneKey(key) }, countRowSchema);
    return rows.length > 0;
  }

  async list(filter: TombstoneFilter = {}): Promise<AssociationTombstoneNode[]> {
    const query = `
      MATCH (t:${NodeLabels.AssociationTombstone})
      WHERE ($kind IS NULL OR t.kind = $kind)
        AND ($sourceId IS NULL OR t.source_id = $sourceId)
      RETURN ${TOMBSTONE_PROJECTION} AS tombstone
      ORDER BY t.removed_at DESC
      LIMIT $limit
    `;
    const rows = await runQuery(
      this.tx,
      query,
      { kind: filter.kind ?? null, sourceId: filter.sourceId ?? null, limit: neo4j.int(filter.limit ?? 100) },
      associationTombstoneRowSchema
    );
    return rows.map((row) => row.tombstone);
  }

  async deleteExpired(now: string): Promise<number> {
    const query = `
      MATCH (t:${NodeLabels.AssociationTombstone})
      WHERE t.expires_at IS NOT NULL AND t.expires_at < $now
      DELETE t
      RETURN 'expired' AS id, count(*) AS count
    `;
    const rows = await runQuery(this.tx, query, { now }, countRowSchema);
    return rows[0]?.count ?? 0;
  }

  async removeForEntity(entityId: string): Promise<void> {
    const query = `
      MATCH (t:${NodeLabels.AssociationTombstone})
      WHERE t.source_id = $entityId OR t.target_id = $entityId
      DELETE t
    `;
    await runStatement(this.tx, query, { entityId });
  }

  async statistics(now: string): Promise<AssociationTombstoneStats> {
    const byKind = await runQuery(
      this.tx,
      `MATCH (t:${NodeLabels.AssociationTombstone}) RETURN t.kind AS group, count(*) AS count`,
      {},
      groupCountRowSchema
    );
    const bySource = await runQuery(
      this.tx,
      `MATCH (t:${NodeLabels.AssociationTombstone}) RETURN t.sync_source AS group, count(*) AS count`,
      {},
      groupCountRowSchema
    );
    const expired = await runQuery(
      this.tx,
      `
        MATCH (t:${NodeLabels.AssociationTombstone})
        WHERE t.expires_at IS NOT NULL AND t.expires_at < $now
        RETURN 'expired' AS id, count(*) AS count
      `,
      { now },
      countRowSchema
    );

    return {
      total: byKind.reduce((sum, row) => sum + row.count, 0),
      byKind: Object.fromEntries(byKind.map((row) => [row.group, row.count])),
      bySource: Object.fromEntries(bySource.map((row) => [row.group, row.count])),
      expired: expired[0]?.count ?? 0,
    };
  }
}
