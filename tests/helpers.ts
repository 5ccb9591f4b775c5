import { expect } from 'chai';
import sinon from 'sinon';
import { MemoryArchiveStore } from '../src/db/memoryStore.js';
import { createArchiveServices, type ArchiveServices } from '../src/services/archiveServices.js';
import type { EntityKind } from '../src/constants/graph.js';
import type { EntityNode } from '../src/types/graph.js';

export const T0 = '2024-06-01T00:00:00.000Z';

export interface TestClock {
  value: string;
}

export interface TestHarness {
  services: ArchiveServices;
  store: MemoryArchiveStore;
  clock: TestClock;
}

/**
 * Services over a fresh memory store with a settable clock
 */
export function createHarness(store: MemoryArchiveStore = new MemoryArchiveStore()): TestHarness {
  const clock: TestClock = { value: T0 };
  const services = createArchiveServices(store, { now: () => clock.value, graceDays: 90 });
  return { services, store, clock };
}

/**
 * Keep service logging out of the mocha reporter
 */
export function silenceConsole(): void {
  sinon.stub(console, 'log');
  sinon.stub(console, 'error');
}

export async function expectRejection<E extends Error>(
  promise: Promise<unknown>,
  errorType: new (...args: never[]) => E
): Promise<E> {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  expect(caught).to.be.instanceOf(errorType);
  if (!(caught instanceof errorType)) {
    throw new Error(`Expected ${errorType.name}`);
  }
  return caught;
}

export async function entitiesOf(services: ArchiveServices, kind: EntityKind, includeDeleted = false): Promise<EntityNode[]> {
  return services.store.withTransaction((tx) => tx.entities.list(kind, { includeDeleted }));
}

export async function findEntity(services: ArchiveServices, kind: EntityKind, name: string): Promise<EntityNode> {
  const entities = await entitiesOf(services, kind, true);
  const matches = entities.filter((entity) => entity.name === name);
  expect(matches, `${kind} "${name}"`).to.have.lengthOf(1);
  return matches[0];
}
