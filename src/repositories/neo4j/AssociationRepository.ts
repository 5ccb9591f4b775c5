import type { ManagedTransaction, Transaction } from 'neo4j-driver';
import {
  NodeLabels,
  RelationshipTypes,
  SceneAssociationKinds,
  RelationshipKinds,
  type AssociationKind,
} from '../../constants/graph.js';
import { runQuery, runStatement } from '../../db/neo4j.js';
import type { AssociationEdge, AssociationInput, AssociationKey, AssociationMetadata } from '../../types/graph.js';
import type { AssociationRepository } from '../types.js';
import { associationRowSchema, countRowSchema } from './rows.js';

/**
 * Associations owned by a scene start at the Scene node; every other kind starts at the Entry
 */
const SCENE_SOURCED = new Set<AssociationKind>([RelationshipKinds.SceneEvents, ...Object.values(SceneAssociationKinds)]);

function sourceLabel(kind: AssociationKind): string {
  return SCENE_SOURCED.has(kind) ? NodeLabels.Entity : NodeLabels.Entry;
}

/**
 * Repository for association relationships
 *
 * Each association is one relationship whose type comes from RelationshipTypes;
 * the relationship also carries its kind and endpoint ids so it can be read
 * without projecting the nodes.
 */
export class Neo4jAssociationRepository implements AssociationRepository {
  constructor(private tx: Transaction | ManagedTransaction) {}

  async listBySources(kind: AssociationKind, sourceIds: string[]): Promise<AssociationEdge[]> {
    const query = `
      MATCH (s:${sourceLabel(kind)})-[r:${RelationshipTypes[kind]}]->(:${NodeLabels.Entity})
      WHERE s.id IN $sourceIds
      RETURN r {.*} AS edge
    `;
    const rows = await runQuery(this.tx, query, { sourceIds }, associationRowSchema);
    return rows.map((row) => row.edge);
  }

  async listByTarget(targetId: string): Promise<AssociationEdge[]> {
    const query = `
      MATCH ()-[r]->(t:${NodeLabels.Entity} {id: $targetId})
      WHERE r.kind IS NOT NULL
      RETURN r {.*} AS edge
    `;
    const rows = await runQuery(this.tx, query, { targetId }, associationRowSchema);
    return rows.map((row) => row.edge);
  }

  async listAll(): Promise<AssociationEdge[]> {
    const query = `
      MATCH ()-[r]->(:${NodeLabels.Entity})
      WHERE r.kind IS NOT NULL
      RETURN r {.*} AS edge
    `;
    const rows = await runQuery(this.tx, query, {}, associationRowSchema);
    return rows.map((row) => row.edge);
  }

  async countByTargets(targetIds: string[]): Promise<Map<string, number>> {
    const query = `
      MATCH ()-[r]->(t:${NodeLabels.Entity})
      WHERE t.id IN $targetIds AND r.kind IS NOT NULL
      RETURN t.id AS id, count(r) AS count
    `;
    const rows = await runQuery(this.tx, query, { targetIds }, countRowSchema);
    return new Map(rows.map((row) => [row.id, row.count]));
  }

  async insert(input: AssociationInput, now: string): Promise<AssociationEdge> {
    const query = `
      MATCH (s:${sourceLabel(input.kind)} {id: $sourceId})
      MATCH (t:${NodeLabels.Entity} {id: $targetId})
      CREATE (s)-[r:${RelationshipTypes[input.kind]} {
        kind: $kind,
        source_id: $sourceId,
        target_id: $targetId,
        discriminator: $discriminator,
        metadata_json: $metadataJson,
        created_at: $now,
        updated_at: $now
      }]->(t)
      RETURN r {.*} AS edge
    `;
    const rows = await runQuery(
      this.tx,
      query,
      {
        kind: input.kind,
        sourceId: input.source_id,
        targetId: input.target_id,
        discriminator: input.discriminator,
        metadataJson: JSON.stringify(input.metadata),
        now,
      },
      associationRowSchema
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Cannot link ${input.kind} ${input.source_id} → ${input.target_id}: endpoint missing`);
    }
    return row.edge;
  }

  async updateMetadata(key: AssociationKey, metadata: AssociationMetadata, now: string): Promise<void> {
    const query = `
      MATCH ()-[r:${RelationshipTypes[key.kind]} {source_id: $sourceId, target_id: $targetId, discriminator: $discriminator}]->()
      SET r.metadata_json = $metadataJson, r.updated_at = $now
    `;
    await runStatement(this.tx, query, {
      sourceId: key.source_id,
      targetId: key.target_id,
      discriminator: key.discriminator,
      metadataJson: JSON.stringify(metadata),
      now,
    });
  }

  async remove(key: AssociationKey): Promise<void> {
    const query = `
      MATCH ()-[r:${RelationshipTypes[key.kind]} {source_id: $sourceId, target_id: $targetId, discriminator: $discriminator}]->()
      DELETE r
    `;
    await runStatement(this.tx, query, {
      sourceId: key.source_id,
      targetId: key.target_id,
      discriminator: key.discriminator,
    });
  }
}
