import type { ManagedTransaction, Transaction } from 'neo4j-driver';
import { NodeLabels } from '../../constants/graph.js';
import { runQuery, runStatement } from '../../db/neo4j.js';
import type { SyncStateNode } from '../../types/graph.js';
import type { SyncStateRepository } from '../types.js';
import { syncStateRowSchema } from './rows.js';

/**
 * Per-entity last-merged baselines for the note-page merge
 */
export class Neo4jSyncStateRepository implements SyncStateRepository {
  constructor(private tx: Transaction | ManagedTransaction) {}

  async get(entityId: string): Promise<SyncStateNode | null> {
    const query = `
      MATCH (s:${NodeLabels.SyncState} {entity_id: $entityId})
      RETURN s {.*} AS state
    `;
    const rows = await runQuery(this.tx, query, { entityId }, syncStateRowSchema);
    return rows[0]?.state ?? null;
  }

  async save(state: SyncStateNode): Promise<void> {
    const query = `
      MERGE (s:${NodeLabels.SyncState} {entity_id: $entityId})
      SET s.kind = $kind,
          s.fingerprint = $fingerprint,
          s.baseline_json = $baselineJson,
          s.last_merged_at = $lastMergedAt,
          s.conflict_detected = $conflictDetected,
          s.conflict_resolved = $conflictResolved,
          s.conflicts_json = $conflictsJson
    `;
    await runStatement(this.tx, query, {
      entityId: state.entity_id,
      kind: state.kind,
      fingerprint: state.fingerprint,
      baselineJson: JSON.stringify(state.baseline),
      lastMergedAt: state.last_merged_at,
      conflictDetected: state.conflict_detected,
      conflictResolved: state.conflict_resolved,
      conflictsJson: JSON.stringify(state.conflicts),
    });
  }

  async remove(entityId: string): Promise<void> {
    const query = `
      MATCH (s:${NodeLabels.SyncState} {entity_id: $entityId})
      DELETE s
    `;
    await runStatement(this.tx, query, { entityId });
  }

  async listConflicted(): Promise<SyncStateNode[]> {
    const query = `
      MATCH (s:${NodeLabels.SyncState})
      WHERE s.conflict_detected AND NOT s.conflict_resolved
      RETURN s {.*} AS state
      ORDER BY s.last_merged_at
    `;
    const rows = await runQuery(this.tx, query, {}, syncStateRowSchema);
    return rows.map((row) => row.state);
  }
}
