import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import sinon from 'sinon';
import {
  AmbiguousReferenceError,
  DescriptorValidationError,
  EntityNotFoundError,
  InvalidAssociationError,
} from '../src/errors/archiveErrors.js';
import { entitiesOf, createHarness, expectRejection, findEntity, silenceConsole, type TestHarness } from './helpers.js';

describe('EntryReconciler', () => {
  let harness: TestHarness;

  beforeEach(() => {
    silenceConsole();
    harness = createHarness();
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('reconcile', () => {
    it('creates entities and associations for a new entry', async () => {
      const report = await harness.services.reconciler.reconcile({
        date: '2024-03-01',
        people: ['Alice', 'Bob'],
        tags: ['travel'],
      });

      expect(report.entryCreated).to.equal(true);
      expect(report.mode).to.equal('replace');
      expect(report.totalChanges).to.equal(3);
      expect(report.deltas.map((d) => d.kind)).to.have.lengthOf(14);

      const alice = await findEntity(harness.services, 'Person', 'Alice');
      const bob = await findEntity(harness.services, 'Person', 'Bob');
      const travel = await findEntity(harness.services, 'Tag', 'travel');

      expect((await harness.services.reader.getEntity('Person', alice.id)).computed.mentionCount).to.equal(1);
      expect((await harness.services.reader.getEntity('Person', bob.id)).computed.mentionCount).to.equal(1);
      expect((await harness.services.reader.getEntity('Tag', travel.id)).computed.usageCount).to.equal(1);
    });

    it('tombstones an entity whose last reference a replace removes', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'], tags: ['travel'] });
      const report = await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'], tags: ['travel'] });

      const bob = await findEntity(harness.services, 'Person', 'Bob');
      const people = report.deltas.find((d) => d.kind === 'people');

      expect(report.entryCreated).to.equal(false);
      expect(people?.removed.map((c) => c.targetId)).to.deep.equal([bob.id]);
      expect(people?.tombstoned).to.deep.equal([bob.id]);
      expect(bob.deleted_at).to.equal('2024-06-01T00:00:00.000Z');
      expect((await harness.services.reader.getEntity('Person', bob.id)).state).to.equal('tombstoned');
    });

    it('keeps an entity that another entry still references', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
      await reconciler.reconcile({ date: '2024-03-02', people: ['Bob'] });
      const report = await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });

      const bob = await findEntity(harness.services, 'Person', 'Bob');
      expect(report.deltas.find((d) => d.kind === 'people')?.tombstoned).to.deep.equal([]);
      expect(bob.deleted_at).to.equal(null);
    });

    it('only adds in merge mode', async () => {
      const { reconciler, reader } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
      const report = await reconciler.reconcile({ date: '2024-03-01', people: ['Carol'] }, 'merge');

      expect(report.totalChanges).to.equal(1);
      const entry = await reader.getEntry('2024-03-01');
      expect(entry.associations.people).to.have.lengthOf(3);
    });

    it('is idempotent', async () => {
      const descriptor = {
        date: '2024-03-01',
        digest: 'A long walk',
        wordCount: 420,
        people: [{ name: 'Alice', relationType: 'friend' }],
        cities: ['Paris'],
        locations: [{ name: 'Louvre', city: 'Paris' }],
        themes: ['Belonging'],
        narratedDates: [{ date: '2024-02-14', context: 'flashback' }],
        references: [{ content: 'All that is gold does not glitter', source: 'The Fellowship' }],
        poems: [{ title: 'Ode to Rain', content: 'first draft' }],
        scenes: [{ name: 'Dinner', people: ['Alice'], locations: [{ name: 'Louvre', city: 'Paris' }] }],
        sceneEvents: [{ name: 'Reunion', scenes: ['Dinner'] }],
        entryEvents: ['Spring Fair'],
        threads: [{ name: 'The Move', position: 1 }],
        arcs: ['Spring'],
        motifs: [{ name: 'Mirror', locator: 'para 2' }],
      };

      const first = await harness.services.reconciler.reconcile(descriptor);
      const second = await harness.services.reconciler.reconcile(descriptor);

      expect(first.totalChanges).to.be.greaterThan(0);
      expect(second.totalChanges).to.equal(0);
      expect(second.deltas.every((d) => d.tombstoned.length === 0)).to.equal(true);
      expect(await harness.services.checkIntegrity()).to.include({ ok: true });
    });

    it('rejects a malformed descriptor before touching the store', async () => {
      const error = await expectRejection(
        harness.services.reconciler.reconcile({ date: '2024-02-30', people: ['Alice'] }),
        DescriptorValidationError
      );

      expect(error.message).to.equal('Invalid entry descriptor: date: Expected an ISO date (YYYY-MM-DD)');
      expect(await entitiesOf(harness.services, 'Person')).to.have.lengthOf(0);
    });

    it('rolls back the whole entry when one reference is invalid', async () => {
      const error = await expectRejection(
        harness.services.reconciler.reconcile({
          date: '2024-03-01',
          people: ['Alice'],
          references: [{ content: 'To be or not to be', speaker: 'Hamlet' }],
        }),
        InvalidAssociationError
      );

      expect(error.reason).to.equal('reference has no source');
      const { store } = harness.services;
      expect(await store.withTransaction((tx) => tx.entries.findByDate('2024-03-01'))).to.equal(null);
      expect(await store.withTransaction((tx) => tx.associations.listAll())).to.deep.equal([]);

      // Resolution commits on its own; the orphan is left for the sweeper
      const integrity = await harness.services.checkIntegrity();
      expect(integrity.issues.map((issue) => issue.type)).to.deep.equal(['active_orphan']);
    });

    it('rejects a location without a city', async () => {
      const error = await expectRejection(
        harness.services.reconciler.reconcile({ date: '2024-03-01', locations: ['Louvre'] }),
        InvalidAssociationError
      );
      expect(error.reason).to.equal('location "Louvre" has no city');
    });

    it('stores a location under its city and brings the city to the entry', async () => {
      await harness.services.reconciler.reconcile({
        date: '2024-03-01',
        locations: [{ name: 'Louvre', city: { name: 'Paris', disambiguator: 'Texas' } }],
      });

      const paris = await findEntity(harness.services, 'City', 'Paris');
      const louvre = await findEntity(harness.services, 'Location', 'Louvre');
      expect(paris.disambiguator).to.equal('Texas');
      expect(louvre.parent_id).to.equal(paris.id);
      expect(louvre.disambiguator).to.equal('Paris, Texas');

      const entry = await harness.services.reader.getEntry('2024-03-01');
      expect(entry.associations.cities?.map((e) => e.target_id)).to.deep.equal([paris.id]);
    });
  });

  describe('entity resolution', () => {
    it('fails on an ambiguous name and accepts the disambiguated one', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({
        date: '2024-03-01',
        people: [
          { name: 'Alice', disambiguator: 'Smith' },
          { name: 'Alice', disambiguator: 'Jones' },
        ],
      });

      const error = await expectRejection(
        reconciler.reconcile({ date: '2024-03-02', people: ['Alice'] }),
        AmbiguousReferenceError
      );
      expect(error.candidates.map((c) => c.disambiguator)).to.deep.equal(['Smith', 'Jones']);

      await reconciler.reconcile({ date: '2024-03-02', people: [{ name: 'alice', disambiguator: 'JONES' }] });
      expect(await entitiesOf(harness.services, 'Person')).to.have.lengthOf(2);
    });

    it('matches a person by a recorded alias', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', people: [{ name: 'Robert', alias: 'Bob' }] });
      await reconciler.reconcile({ date: '2024-03-02', people: ['Bob'] });

      const people = await entitiesOf(harness.services, 'Person');
      expect(people.map((p) => p.name)).to.deep.equal(['Robert']);
      expect(people[0]?.alias_keys).to.deep.equal(['bob']);
      expect(people[0]?.attributes.aliases).to.deep.equal(['Bob']);
    });

    it('writes only editable descriptor attributes', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({
        date: '2024-03-01',
        people: [{ name: 'Alice', attributes: { fullName: 'Alice Liddell', mentionCount: 99 } }],
      });
      await reconciler.reconcile({
        date: '2024-03-02',
        people: [{ name: 'Alice', attributes: { fullName: 'A. Liddell', lastAppearance: '1999-01-01', height: 160 } }],
      });

      const alice = await findEntity(harness.services, 'Person', 'Alice');
      expect(alice.attributes).to.deep.equal({ fullName: 'A. Liddell' });
      const view = await harness.services.reader.getEntity('Person', alice.id);
      expect(view.computed.mentionCount).to.equal(2);
      expect(view.computed.lastAppearance).to.equal('2024-03-02');
    });

    it('resurrects a tombstoned entity with its original id', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'] });
      await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });
      const tombstoned = await findEntity(harness.services, 'Person', 'Bob');

      harness.clock.value = '2024-06-02T00:00:00.000Z';
      await reconciler.reconcile({ date: '2024-03-02', people: ['Bob'] });

      const revived = await findEntity(harness.services, 'Person', 'Bob');
      expect(revived.id).to.equal(tombstoned.id);
      expect(revived.deleted_at).to.equal(null);
    });

    it('does not duplicate a city reconciled by concurrent entries', async () => {
      const { reconciler } = harness.services;
      await Promise.all([
        reconciler.reconcile({ date: '2024-03-01', cities: ['Paris'] }),
        reconciler.reconcile({ date: '2024-03-02', cities: ['paris'] }),
        reconciler.reconcile({ date: '2024-03-03', locations: [{ name: 'Louvre', city: 'Paris' }] }),
      ]);

      const cities = await entitiesOf(harness.services, 'City');
      expect(cities).to.have.lengthOf(1);
      expect((await harness.services.reader.getEntity('City', cities[0]?.id ?? '')).computed.mentionCount).to.equal(3);
    });
  });

  describe('reconcileMany', () => {
    it('reports each entry on its own', async () => {
      const outcomes = await harness.services.reconciler.reconcileMany(
        [
          { date: '2024-03-01', people: ['Alice'] },
          { date: '2024-03-02', locations: ['Nowhere'] },
          { people: ['Bob'] },
          { date: '2024-03-03', people: ['Alice'] },
        ],
        { concurrency: 2 }
      );

      expect(outcomes.map((o) => [o.status, o.date])).to.deep.equal([
        ['fulfilled', '2024-03-01'],
        ['rejected', '2024-03-02'],
        ['rejected', null],
        ['fulfilled', '2024-03-03'],
      ]);
      const failures = outcomes.flatMap((o) => (o.status === 'rejected' ? [o.error] : []));
      expect(failures[0]).to.be.instanceOf(InvalidAssociationError);
      expect(failures[1]).to.be.instanceOf(DescriptorValidationError);
    });
  });

  describe('deleteEntry', () => {
    it('removes every association, tombstones orphans and restores on re-reconcile', async () => {
      const { reconciler, reader } = harness.services;
      const descriptor = {
        date: '2024-03-01',
        people: ['Alice'],
        scenes: [{ name: 'Dinner', people: ['Carol'] }],
      };
      await reconciler.reconcile(descriptor);
      await reconciler.reconcile({ date: '2024-03-02', people: ['Alice'] });

      const report = await reconciler.deleteEntry('2024-03-01');

      const carol = await findEntity(harness.services, 'Person', 'Carol');
      const dinner = await findEntity(harness.services, 'Scene', 'Dinner');
      const alice = await findEntity(harness.services, 'Person', 'Alice');
      expect(report.totalChanges).to.equal(3);
      expect(report.deltas.find((d) => d.kind === 'scenes')?.tombstoned).to.have.members([carol.id, dinner.id]);
      expect(alice.deleted_at).to.equal(null);
      await expectRejection(reader.getEntry('2024-03-01'), EntityNotFoundError);

      const restored = await reconciler.reconcile(descriptor);
      expect(restored.entryCreated).to.equal(false);
      expect(restored.entryId).to.equal(report.entryId);
      expect((await findEntity(harness.services, 'Person', 'Carol')).deleted_at).to.equal(null);
      expect((await reader.getEntry('2024-03-01')).scenes.map((s) => s.id)).to.deep.equal([dinner.id]);
    });

    it('rejects an unknown date', async () => {
      const error = await expectRejection(harness.services.reconciler.deleteEntry('2024-03-09'), EntityNotFoundError);
      expect(error.message).to.equal('Entry 2024-03-09 not found');
    });
  });
});
