import { v4 as uuidv4 } from 'uuid';
import type { ManagedTransaction, Transaction } from 'neo4j-driver';
import { ENTITY_KINDS, NodeLabels, type EntityKind } from '../../constants/graph.js';
import { runQuery, runStatement } from '../../db/neo4j.js';
import type { CreateEntityInput, EntityNode, EntityPatch } from '../../types/graph.js';
import type { EntityRepository, ListOptions } from '../types.js';
import { countRowSchema, entityRowSchema } from './rows.js';

/**
 * Label pair for an entity kind, e.g. `ArchiveEntity:Person`.
 * Kinds are interpolated into Cypher, so only the fixed kind set is accepted.
 */
function entityLabels(kind: EntityKind): string {
  if (!ENTITY_KINDS.includes(kind)) {
    throw new Error(`Unknown entity kind: ${kind}`);
  }
  return `${NodeLabels.Entity}:${kind}`;
}

/**
 * Repository for canonical entity nodes of every kind
 */
export class Neo4jEntityRepository implements EntityRepository {
  constructor(private tx: Transaction | ManagedTransaction) {}

  async findById(id: string): Promise<EntityNode | null> {
    const query = `
      MATCH (e:${NodeLabels.Entity} {id: $id})
      RETURN e {.*} AS entity
    `;
    const rows = await runQuery(this.tx, query, { id }, entityRowSchema);
    return rows[0]?.entity ?? null;
  }

  async findByIds(ids: string[]): Promise<EntityNode[]> {
    const query = `
      MATCH (e:${NodeLabels.Entity})
      WHERE e.id IN $ids
      RETURN e {.*} AS entity
    `;
    const rows = await runQuery(this.tx, query, { ids }, entityRowSchema);
    return rows.map((row) => row.entity);
  }

  async findActiveByName(kind: EntityKind, nameKey: string): Promise<EntityNode[]> {
    const query = `
      MATCH (e:${entityLabels(kind)} {name_key: $nameKey})
      WHERE e.deleted_at IS NULL
      RETURN e {.*} AS entity
      ORDER BY e.created_at
    `;
    const rows = await runQuery(this.tx, query, { nameKey }, entityRowSchema);
    return rows.map((row) => row.entity);
  }

  async findActiveByKey(kind: EntityKind, nameKey: string, disambiguatorKey: string): Promise<EntityNode | null> {
    const query = `
      MATCH (e:${entityLabels(kind)} {name_key: $nameKey, disambiguator_key: $disambiguatorKey})
      WHERE e.deleted_at IS NULL
      RETURN e {.*} AS entity
    `;
    const rows = await runQuery(this.tx, query, { nameKey, disambiguatorKey }, entityRowSchema);
    return rows[0]?.entity ?? null;
  }

  async findActiveByAlias(kind: EntityKind, aliasKey: string): Promise<EntityNode[]> {
    const query = `
      MATCH (e:${entityLabels(kind)})
      WHERE e.deleted_at IS NULL AND $aliasKey IN e.alias_keys
      RETURN e {.*} AS entity
      ORDER BY e.created_at
    `;
    const rows = await runQuery(this.tx, query, { aliasKey }, entityRowSchema);
    return rows.map((row) => row.entity);
  }

  async findLatestTombstone(kind: EntityKind, nameKey: string, disambiguatorKey: string): Promise<EntityNode | null> {
    const query = `
      MATCH (e:${entityLabels(kind)} {name_key: $nameKey, disambiguator_key: $disambiguatorKey})
      WHERE e.deleted_at IS NOT NULL
      RETURN e {.*} AS entity
      ORDER BY e.deleted_at DESC
      LIMIT 1
    `;
    const rows = await runQuery(this.tx, query, { nameKey, disambiguatorKey }, entityRowSchema);
    return rows[0]?.entity ?? null;
  }

  async create(input: CreateEntityInput, now: string): Promise<EntityNode> {
    const query = `
      CREATE (e:${entityLabels(input.kind)} {
        id: $id,
        kind: $kind,
        name: $name,
        name_key: $nameKey,
        disambiguator: $disambiguator,
        disambiguator_key: $disambiguatorKey,
        parent_id: $parentId,
        alias_keys: $aliasKeys,
        attributes_json: $attributesJson,
        created_at: $now,
        updated_at: $now
      })
      RETURN e {.*} AS entity
    `;
    const rows = await runQuery(
      this.tx,
      query,
      {
        id: uuidv4(),
        kind: input.kind,
        name: input.name,
        nameKey: input.name_key,
        disambiguator: input.disambiguator,
        disambiguatorKey: input.disambiguator_key,
        parentId: input.parent_id,
        aliasKeys: input.alias_keys,
        attributesJson: JSON.stringify(input.attributes),
        now,
      },
      entityRowSchema
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Failed to create ${input.kind} "${input.name}"`);
    }
    console.log(`✨ Created ${input.kind} "${input.name}" (${row.entity.id})`);
    return row.entity;
  }

  async update(id: string, patch: EntityPatch, now: string): Promise<EntityNode> {
    const assignments = ['e.updated_at = $now'];
    if (patch.attributes !== undefined) assignments.push('e.attributes_json = $attributesJson');
    if (patch.alias_keys !== undefined) assignments.push('e.alias_keys = $aliasKeys');
    if (patch.parent_id !== undefined) assignments.push('e.parent_id = $parentId');
    if (patch.deleted_at !== undefined) assignments.push('e.deleted_at = $deletedAt');

    const query = `
      MATCH (e:${NodeLabels.Entity} {id: $id})
      SET ${assignments.join(', ')}
      RETURN e {.*} AS entity
    `;
    const rows = await runQuery(
      this.tx,
      query,
      {
        id,
        now,
        attributesJson: patch.attributes ? JSON.stringify(patch.attributes) : null,
        aliasKeys: patch.alias_keys ?? null,
        parentId: patch.parent_id ?? null,
        deletedAt: patch.deleted_at ?? null,
      },
      entityRowSchema
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Entity ${id} not found`);
    }
    return row.entity;
  }

  async remove(id: string): Promise<void> {
    const query = `
      MATCH (e:${NodeLabels.Entity} {id: $id})
      DETACH DELETE e
    `;
    await runStatement(this.tx, query, { id });
  }

  async list(kind?: EntityKind, options: ListOptions = {}): Promise<EntityNode[]> {
    const label = kind ? entityLabels(kind) : NodeLabels.Entity;
    const query = `
      MATCH (e:${label})
      WHERE $includeDeleted OR e.deleted_at IS NULL
      RETURN e {.*} AS entity
      ORDER BY e.created_at
    `;
    const rows = await runQuery(this.tx, query, { includeDeleted: options.includeDeleted ?? false }, entityRowSchema);
    return rows.map((row) => row.entity);
  }

  async countActiveChildren(parentIds: string[]): Promise<Map<string, number>> {
    const query = `
      MATCH (c:${NodeLabels.Entity})
      WHERE c.parent_id IN $parentIds AND c.deleted_at IS NULL
      RETURN c.parent_id AS id, count(c) AS count
    `;
    const rows = await runQuery(this.tx, query, { parentIds }, countRowSchema);
    return new Map(rows.map((row) => [row.id, row.count]));
  }
}
