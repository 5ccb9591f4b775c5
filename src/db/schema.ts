import { z } from 'zod';
import { NodeLabels, RelationshipTypes } from '../constants/graph.js';
import { emptyRowSchema } from '../repositories/neo4j/rows.js';
import { neo4jService } from './neo4j.js';

const indexRowSchema = z
  .object({
    name: z.string(),
    labelsOrTypes: z.array(z.string()).nullable(),
    properties: z.array(z.string()).nullable(),
  })
  .passthrough();

/**
 * Initialize Neo4j schema with constraints and indexes
 * Natural-key uniqueness among non-deleted entities is enforced by the
 * resolvers under the key lock; Neo4j has no partial uniqueness constraint.
 */
export async function initializeSchema(): Promise<void> {
  console.log('🔧 Initializing Neo4j schema...');

  try {
    await createConstraints();
    await createIndexes();
    console.log('✅ Neo4j schema initialized successfully');
  } catch (error) {
    if (error instanceof Error) {
      console.error('❌ Schema initialization failed:', error.message);
    } else {
      console.error('❌ Schema initialization failed with unknown error:', error);
    }
    throw error;
  }
}

/**
 * Helper to safely execute constraint creation, ignoring if already exists
 */
async function createConstraintIfNotExists(constraintQuery: string): Promise<void> {
  try {
    await neo4jService.executeQuery(constraintQuery, emptyRowSchema);
  } catch (caughtError) {
    if (!(caughtError instanceof Error)) {
      throw caughtError;
    }

    const isAlreadyExists = caughtError.message.includes('equivalent constraint already exists');

    const isIndexConflict =
      caughtError.message.includes('There already exists an index') &&
      caughtError.message.includes('A constraint cannot be created until the index has been dropped');

    if (isAlreadyExists) {
      return;
    }

    if (isIndexConflict) {
      await handleIndexConflict(constraintQuery, caughtError.message);
      return;
    }

    throw caughtError;
  }
}

/**
 * Handle index conflict by dropping the conflicting index and retrying constraint creation
 */
async function handleIndexConflict(constraintQuery: string, errorMessage: string): Promise<void> {
  // Example: "There already exists an index (:Entry {date})."
  const indexMatch = errorMessage.match(/index \(([^)]+)\)/);

  if (!indexMatch) {
    throw new Error(`Could not parse index name from error: ${errorMessage}`);
  }

  const indexInfo = indexMatch[1];
  const indexes = await neo4jService.executeQuery('SHOW INDEXES', indexRowSchema);

  const labelMatch = indexInfo.match(/:(\w+)/);
  const propertyMatch = indexInfo.match(/\{([^}]+)\}/);

  if (!labelMatch || !propertyMatch) {
    throw new Error(`Could not parse label or property from index info: ${indexInfo}`);
  }

  const label = labelMatch[1];
  const property = propertyMatch[1];

  const conflictingIndex = indexes.find(
    (idx) => idx.labelsOrTypes?.includes(label) && idx.properties?.includes(property)
  );

  if (!conflictingIndex) {
    throw new Error(`Could not find conflicting index for ${label}.${property}`);
  }

  console.log(`  🔧 Dropping conflicting index: ${conflictingIndex.name}`);

  await neo4jService.executeQuery(`DROP INDEX ${conflictingIndex.name}`, emptyRowSchema);
  await neo4jService.executeQuery(constraintQuery, emptyRowSchema);
}

async function createConstraints(): Promise<void> {
  const constraints = [
    // ===== Entry: one per calendar date =====
    `CREATE CONSTRAINT entry_id_unique IF NOT EXISTS FOR (e:${NodeLabels.Entry}) REQUIRE (e.id) IS UNIQUE`,
    `CREATE CONSTRAINT entry_date_unique IF NOT EXISTS FOR (e:${NodeLabels.Entry}) REQUIRE (e.date) IS UNIQUE`,

    // ===== Entities (all kinds share the ArchiveEntity label) =====
    `CREATE CONSTRAINT archive_entity_id_unique IF NOT EXISTS FOR (e:${NodeLabels.Entity}) REQUIRE (e.id) IS UNIQUE`,

    // ===== Poem history and sync state =====
    `CREATE CONSTRAINT poem_version_id_unique IF NOT EXISTS FOR (v:${NodeLabels.PoemVersion}) REQUIRE (v.id) IS UNIQUE`,
    `CREATE CONSTRAINT sync_state_entity_unique IF NOT EXISTS FOR (s:${NodeLabels.SyncState}) REQUIRE (s.entity_id) IS UNIQUE`,
    `CREATE CONSTRAINT association_tombstone_key_unique IF NOT EXISTS FOR (t:${NodeLabels.AssociationTombstone}) REQUIRE (t.key) IS UNIQUE`,
  ];

  for (const constraint of constraints) {
    await createConstraintIfNotExists(constraint);
  }

  console.log('  ✓ Constraints created');
}

/**
 * Helper to safely execute index creation, ignoring if already exists
 */
async function createIndexIfNotExists(indexQuery: string): Promise<void> {
  try {
    await neo4jService.executeQuery(indexQuery, emptyRowSchema);
  } catch (caughtError) {
    if (!(caughtError instanceof Error)) {
      throw caughtError;
    }

    if (!caughtError.message.includes('equivalent index already exists')) {
      throw caughtError;
    }
  }
}

/**
 * Indexes for natural-key lookups, child counts and association scans
 */
async function createIndexes(): Promise<void> {
  const indexes = [
    `CREATE INDEX archive_entity_natural_key IF NOT EXISTS FOR (e:${NodeLabels.Entity}) ON (e.kind, e.name_key, e.disambiguator_key)`,
    `CREATE INDEX archive_entity_name_key IF NOT EXISTS FOR (e:${NodeLabels.Entity}) ON (e.name_key)`,
    `CREATE INDEX archive_entity_parent IF NOT EXISTS FOR (e:${NodeLabels.Entity}) ON (e.parent_id)`,
    `CREATE INDEX archive_entity_deleted_at IF NOT EXISTS FOR (e:${NodeLabels.Entity}) ON (e.deleted_at)`,
    `CREATE INDEX poem_version_poem IF NOT EXISTS FOR (v:${NodeLabels.PoemVersion}) ON (v.poem_id)`,
    `CREATE INDEX association_tombstone_source IF NOT EXISTS FOR (t:${NodeLabels.AssociationTombstone}) ON (t.source_id)`,
    `CREATE INDEX association_tombstone_target IF NOT EXISTS FOR (t:${NodeLabels.AssociationTombstone}) ON (t.target_id)`,
    `CREATE INDEX association_tombstone_expires IF NOT EXISTS FOR (t:${NodeLabels.AssociationTombstone}) ON (t.expires_at)`,
  ];

  // Association lookups by endpoint (relationship property indexes)
  for (const [kind, type] of Object.entries(RelationshipTypes)) {
    indexes.push(
      `CREATE INDEX rel_${kind.toLowerCase()}_source IF NOT EXISTS FOR ()-[r:${type}]-() ON (r.source_id, r.target_id, r.discriminator)`
    );
  }

  for (const index of indexes) {
    await createIndexIfNotExists(index);
  }

  console.log('  ✓ Indexes created');
}
