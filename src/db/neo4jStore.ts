import type { Neo4jService } from './neo4j.js';
import type { ArchiveStore, StoreTransaction } from '../repositories/types.js';
import { Neo4jAssociationRepository } from '../repositories/neo4j/AssociationRepository.js';
import { Neo4jAssociationTombstoneRepository } from '../repositories/neo4j/AssociationTombstoneRepository.js';
import { Neo4jEntityRepository } from '../repositories/neo4j/EntityRepository.js';
import { Neo4jEntryRepository } from '../repositories/neo4j/EntryRepository.js';
import { Neo4jPoemVersionRepository } from '../repositories/neo4j/PoemVersionRepository.js';
import { Neo4jSyncStateRepository } from '../repositories/neo4j/SyncStateRepository.js';

/**
 * Archive store on Neo4j explicit transactions
 *
 * One session and one transaction per unit of work; any error rolls the
 * transaction back and is rethrown unchanged.
 */
export class Neo4jArchiveStore implements ArchiveStore {
  readonly backend = 'neo4j';

  constructor(private service: Neo4jService) {}

  async withTransaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const session = this.service.getDriver().session();
    const tx = session.beginTransaction();

    try {
      const result = await fn({
        entries: new Neo4jEntryRepository(tx),
        entities: new Neo4jEntityRepository(tx),
        associations: new Neo4jAssociationRepository(tx),
        associationTombstones: new Neo4jAssociationTombstoneRepository(tx),
        poemVersions: new Neo4jPoemVersionRepository(tx),
        syncStates: new Neo4jSyncStateRepository(tx),
      });
      await tx.commit();
      return result;
    } catch (error) {
      if (tx.isOpen()) {
        await tx.rollback();
      }
      throw error;
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.service.close();
  }
}
