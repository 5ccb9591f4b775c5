/**
 * Wiring for the reconciliation engine: one store, one lock table, and the
 * services built on them. Entry points (HTTP server, worker, scripts) share a
 * process-wide instance; tests build their own over a memory store.
 */

import { getConfig, type AppConfig } from '../config/index.js';
import { MemoryArchiveStore } from '../db/memoryStore.js';
import { neo4jService } from '../db/neo4j.js';
import { Neo4jArchiveStore } from '../db/neo4jStore.js';
import type { ArchiveStore } from '../repositories/types.js';
import { nowIso } from '../utils/dates.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { ArchiveReadService } from './archiveReadService.js';
import { EntityResolverRegistry } from './entityResolvers/index.js';
import { EntryReconciler } from './entryReconciler.js';
import { checkIntegrity, type IntegrityReport } from './integrityService.js';
import { OrphanSweeper } from './orphanSweeper.js';
import { SyncArbiter } from './syncArbiter.js';

export interface ArchiveServicesOptions {
  graceDays?: number;
  associationTombstoneTtlDays?: number;
  /** Clock for stored timestamps */
  now?: () => string;
  locks?: KeyedLock;
}

export interface ArchiveServices {
  store: ArchiveStore;
  locks: KeyedLock;
  resolvers: EntityResolverRegistry;
  reconciler: EntryReconciler;
  sweeper: OrphanSweeper;
  arbiter: SyncArbiter;
  reader: ArchiveReadService;
  checkIntegrity(): Promise<IntegrityReport>;
  close(): Promise<void>;
}

export function createArchiveServices(store: ArchiveStore, options: ArchiveServicesOptions = {}): ArchiveServices {
  const locks = options.locks ?? new KeyedLock();
  const now = options.now ?? (() => nowIso());
  const resolvers = new EntityResolverRegistry({ store, locks, now });

  return {
    store,
    locks,
    resolvers,
    reconciler: new EntryReconciler({
      store,
      locks,
      resolvers,
      now,
      associationTombstoneTtlDays: options.associationTombstoneTtlDays,
    }),
    sweeper: new OrphanSweeper({ store, locks, graceDays: options.graceDays }),
    arbiter: new SyncArbiter({ store, people: resolvers.people, now }),
    reader: new ArchiveReadService(store),
    checkIntegrity: () => checkIntegrity(store),
    close: () => store.close(),
  };
}

/**
 * Store for the configured backend; Neo4j is connected before it is returned
 */
export async function createStore(config: AppConfig): Promise<ArchiveStore> {
  if (config.STORE_BACKEND === 'memory') {
    console.log('🧠 Using in-memory archive store');
    return new MemoryArchiveStore();
  }

  await neo4jService.connect({
    uri: config.NEO4J_URI,
    username: config.NEO4J_USERNAME,
    password: config.NEO4J_PASSWORD,
  });
  return new Neo4jArchiveStore(neo4jService);
}

let shared: Promise<ArchiveServices> | null = null;

export function getArchiveServices(): Promise<ArchiveServices> {
  if (!shared) {
    const config = getConfig();
    shared = createStore(config).then((store) =>
      createArchiveServices(store, {
        graceDays: config.TOMBSTONE_GRACE_DAYS,
        associationTombstoneTtlDays: config.ASSOCIATION_TOMBSTONE_TTL_DAYS,
      })
    );
  }
  return shared;
}
