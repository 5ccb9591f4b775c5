import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import sinon from 'sinon';
import { MemoryArchiveStore } from '../src/db/memoryStore.js';
import { InvalidAssociationError } from '../src/errors/archiveErrors.js';
import { createArchiveServices } from '../src/services/archiveServices.js';
import { createHarness, expectRejection, findEntity, silenceConsole, T0, type TestHarness } from './helpers.js';

describe('association tombstones', () => {
  let harness: TestHarness;

  beforeEach(() => {
    silenceConsole();
    harness = createHarness();
  });

  afterEach(() => {
    sinon.restore();
  });

  function listTombstones() {
    return harness.services.reader.listAssociationTombstones();
  }

  it('records who removed an association and when it expires', async () => {
    const { reconciler } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });

    const entry = await harness.services.reader.getEntry('2024-03-01');
    const bob = await findEntity(harness.services, 'Person', 'Bob');
    const [tombstone] = await listTombstones();

    expect(tombstone).to.include({
      kind: 'people',
      source_id: entry.entry.id,
      target_id: bob.id,
      discriminator: '',
      removed_by: 'reconciler',
      sync_source: 'descriptor',
      reason: null,
      removed_at: T0,
      expires_at: '2024-08-30T00:00:00.000Z',
    });
  });

  it('leaves nothing behind for a merge', async () => {
    const { reconciler } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
    await reconciler.reconcile({ date: '2024-03-01', people: ['Carol'] }, 'merge');

    expect(await listTombstones()).to.deep.equal([]);
  });

  it('clears the tombstone when the association comes back', async () => {
    const { reconciler } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });

    expect(await listTombstones()).to.deep.equal([]);
  });

  it('marks entry deletion as a manual removal', async () => {
    const { reconciler } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', scenes: [{ name: 'Dinner', people: ['Carol'] }] });
    await reconciler.deleteEntry('2024-03-01');

    const tombstones = await listTombstones();
    expect(tombstones.map((t) => [t.kind, t.removed_by, t.sync_source, t.reason])).to.have.deep.members([
      ['scenePeople', 'entry-delete', 'manual', 'scene removed'],
      ['scenes', 'entry-delete', 'manual', null],
    ]);
  });

  it('takes the expiry from the configured time to live', async () => {
    const services = createArchiveServices(new MemoryArchiveStore(), { now: () => T0, associationTombstoneTtlDays: 7 });
    await services.reconciler.reconcile({ date: '2024-03-01', tags: ['travel', 'food'] });
    await services.reconciler.reconcile({ date: '2024-03-01', tags: ['travel'] });

    const [tombstone] = await services.reader.listAssociationTombstones();
    expect(tombstone.expires_at).to.equal('2024-06-08T00:00:00.000Z');
  });

  it('is rolled back with a failed reconcile', async () => {
    const { reconciler } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });

    await expectRejection(
      reconciler.reconcile({ date: '2024-03-01', people: ['Alice'], locations: ['Nowhere'] }),
      InvalidAssociationError
    );

    expect(await listTombstones()).to.deep.equal([]);
  });

  it('keeps the first record of a removal', async () => {
    const key = { kind: 'tags' as const, source_id: 'entry-1', target_id: 'tag-1', discriminator: '' };
    await harness.store.withTransaction(async (tx) => {
      await tx.associationTombstones.record(
        { ...key, removed_by: 'reconciler', sync_source: 'descriptor', reason: null, expires_at: null },
        T0
      );
      const repeat = await tx.associationTombstones.record(
        { ...key, removed_by: 'api', sync_source: 'manual', reason: 'again', expires_at: null },
        '2024-06-02T00:00:00.000Z'
      );
      expect(repeat).to.include({ removed_by: 'reconciler', removed_at: T0 });
    });

    expect(await listTombstones()).to.have.lengthOf(1);
  });

  it('lists newest first with kind, source and limit filters', async () => {
    const { reconciler, reader } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'], tags: ['travel', 'food'] });
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'], tags: ['travel'] });
    harness.clock.value = '2024-06-02T00:00:00.000Z';
    await reconciler.reconcile({ date: '2024-03-01', tags: ['travel'] });

    const entry = await reader.getEntry('2024-03-01');
    const alice = await findEntity(harness.services, 'Person', 'Alice');

    const all = await reader.listAssociationTombstones();
    expect(all).to.have.lengthOf(3);
    expect(all[0]).to.include({ kind: 'people', target_id: alice.id, removed_at: '2024-06-02T00:00:00.000Z' });
    expect((await reader.listAssociationTombstones({ kind: 'people', limit: 1 })).map((t) => t.target_id)).to.deep.equal([
      alice.id,
    ]);
    expect(await reader.listAssociationTombstones({ kind: 'tags' })).to.have.lengthOf(1);
    expect(await reader.listAssociationTombstones({ sourceId: 'another-entry' })).to.deep.equal([]);
    expect(await reader.listAssociationTombstones({ sourceId: entry.entry.id })).to.have.lengthOf(3);
  });

  it('counts tombstones by kind and source', async () => {
    const { reconciler, reader } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });
    await reconciler.reconcile({ date: '2024-03-02', tags: ['travel'] });
    await reconciler.deleteEntry('2024-03-02');

    expect(await reader.getAssociationTombstoneStats(T0)).to.deep.equal({
      total: 2,
      byKind: { people: 1, tags: 1 },
      bySource: { descriptor: 1, manual: 1 },
      expired: 0,
    });
    expect((await reader.getAssociationTombstoneStats('2024-09-01T00:00:00.000Z')).expired).to.equal(2);
  });

  describe('sweep', () => {
    it('drops tombstones past their expiry', async () => {
      const { reconciler, sweeper } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
      await reconciler.reconcile({ date: '2024-03-02', people: ['Bob'] });
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });

      const early = await sweeper.sweep({ now: new Date('2024-08-29T00:00:00.000Z') });
      expect(early.expiredAssociationTombstones).to.equal(0);
      expect(await listTombstones()).to.have.lengthOf(1);

      const late = await sweeper.sweep({ now: new Date('2024-08-31T00:00:00.000Z') });
      expect(late.expiredAssociationTombstones).to.equal(1);
      expect(await listTombstones()).to.deep.equal([]);
    });

    it('drops the tombstones of a purged entity', async () => {
      const { reconciler, sweeper } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });
      const bob = await findEntity(harness.services, 'Person', 'Bob');

      const report = await sweeper.sweep({ now: new Date('2024-08-30T00:00:00.000Z') });

      expect(report.purged).to.deep.equal([bob.id]);
      expect(report.expiredAssociationTombstones).to.equal(0);
      expect(await listTombstones()).to.deep.equal([]);
    });
  });
});
