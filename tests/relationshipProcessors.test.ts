import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import sinon from 'sinon';
import type { RelationshipKind } from '../src/constants/graph.js';
import { DescriptorValidationError, InvalidAssociationError, OrderingViolationError } from '../src/errors/archiveErrors.js';
import { processorOrder, topologicalOrder } from '../src/services/relationshipProcessors/index.js';
import { createHarness, expectRejection, findEntity, silenceConsole, type TestHarness } from './helpers.js';

describe('relationship processors', () => {
  let harness: TestHarness;

  beforeEach(() => {
    silenceConsole();
    harness = createHarness();
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('processorOrder', () => {
    it('runs every kind after its prerequisites', () => {
      const order = processorOrder();
      expect(order).to.have.lengthOf(14);
      expect(order.indexOf('cities')).to.be.lessThan(order.indexOf('locations'));
      expect(order.indexOf('locations')).to.be.lessThan(order.indexOf('scenes'));
      expect(order.indexOf('people')).to.be.lessThan(order.indexOf('scenes'));
      expect(order.indexOf('narratedDates')).to.be.lessThan(order.indexOf('scenes'));
      expect(order.indexOf('scenes')).to.be.lessThan(order.indexOf('sceneEvents'));
      expect(order.indexOf('threads')).to.be.lessThan(order.indexOf('arcs'));
    });

    it('keeps declaration order among independent kinds', () => {
      const kinds: RelationshipKind[] = ['tags', 'people', 'cities'];
      const deps: Partial<Record<RelationshipKind, RelationshipKind[]>> = { tags: ['cities'] };
      expect(topologicalOrder(kinds, (kind) => deps[kind] ?? [])).to.deep.equal(['people', 'cities', 'tags']);
    });

    it('rejects a dependency cycle', () => {
      const kinds: RelationshipKind[] = ['threads', 'arcs'];
      const deps: Partial<Record<RelationshipKind, RelationshipKind[]>> = { threads: ['arcs'], arcs: ['threads'] };
      expect(() => topologicalOrder(kinds, (kind) => deps[kind] ?? [])).to.throw(
        'Relationship processor dependencies form a cycle: threads, arcs'
      );
    });
  });

  describe('poems', () => {
    it('appends a version only when the content changes', async () => {
      const { reconciler, reader } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', poems: [{ title: 'Ode to Rain', content: 'first draft' }] });
      await reconciler.reconcile({ date: '2024-03-02', poems: [{ title: 'Ode to Rain', content: 'second draft' }] });
      const again = await reconciler.reconcile({
        date: '2024-03-01',
        poems: [{ title: 'Ode to Rain', content: 'first draft' }],
      });
      await reconciler.reconcile({ date: '2024-03-03', poems: [{ title: 'ode to rain', content: 'second draft' }] });

      expect(again.totalChanges).to.equal(0);

      const poem = await findEntity(harness.services, 'Poem', 'Ode to Rain');
      const history = await reader.getPoemHistory(poem.id);
      expect(history.versions.map((v) => v.content)).to.deep.equal(['first draft', 'second draft']);

      const entry = await reader.getEntry('2024-03-03');
      expect(entry.associations.poems?.[0]?.metadata.versionId).to.equal(history.versions[1]?.id);
    });

    it('moves an entry to a new version when its copy is edited', async () => {
      const { reconciler, reader } = harness.services;
      await reconciler.reconcile({ date: '2024-03-01', poems: [{ title: 'Ode to Rain', content: 'first draft' }] });
      const edited = await reconciler.reconcile({
        date: '2024-03-01',
        poems: [{ title: 'Ode to Rain', content: 'revised' }],
      });

      const poems = edited.deltas.find((d) => d.kind === 'poems');
      expect(poems?.updated).to.have.lengthOf(1);

      const poem = await findEntity(harness.services, 'Poem', 'Ode to Rain');
      const history = await reader.getPoemHistory(poem.id);
      expect(history.versions.map((v) => v.content)).to.deep.equal(['first draft', 'revised']);
    });
    it('rejects a poem declared twice in one entry', async () => {
      const { reconciler, store } = harness.services;
      const error = await expectRejection(
        reconciler.reconcile({
          date: '2024-03-01',
          poems: [
            { title: 'Ode to Rain', content: 'first draft' },
            { title: 'ode to rain', content: 'second draft' },
          ],
        }),
        DescriptorValidationError
      );
      expect(error.issues.map((issue) => issue.path.join('.'))).to.deep.equal(['poems.1.title']);
      expect(await store.withTransaction((tx) => tx.entries.findByDate('2024-03-01'))).to.equal(null);
    });

    it('rejects two poem specs that resolve to one poem', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({
        date: '2024-03-01',
        poems: [{ title: 'Ode to Rain', disambiguator: 'Neruda', content: 'first draft' }],
      });

      await expectRejection(
        reconciler.reconcile({
          date: '2024-03-02',
          poems: [
            { title: 'Ode to Rain', content: 'first draft' },
            { title: 'Ode to Rain', disambiguator: 'Neruda', content: 'second draft' },
          ],
        }),
        InvalidAssociationError
      );

      const poem = await findEntity(harness.services, 'Poem', 'Ode to Rain');
      const history = await harness.services.reader.getPoemHistory(poem.id);
      expect(history.versions.map((v) => v.content)).to.deep.equal(['first draft']);
    });
  });

  describe('motifs', () => {
    it('collapses repeats of the same motif instance', async () => {
      const report = await harness.services.reconciler.reconcile({
        date: '2024-03-01',
        motifs: [
          { name: 'Mirror', locator: 'Para 2' },
          { name: 'mirror', locator: '  para   2 ' },
          { name: 'Mirror', locator: 'Para 5' },
        ],
      });

      const motifs = report.deltas.find((d) => d.kind === 'motifs');
      expect(motifs?.added.map((c) => c.discriminator)).to.deep.equal(['para 2', 'para 5']);

      const entry = await harness.services.reader.getEntry('2024-03-01');
      expect(entry.associations.motifs?.map((edge) => edge.metadata.locator)).to.deep.equal(['para   2', 'Para 5']);
    });
  });

  describe('tags', () => {
    it('matches stemmed variants to one tag', async () => {
      await harness.services.reconciler.reconcile({ date: '2024-03-01', tags: ['travel'] });
      await harness.services.reconciler.reconcile({ date: '2024-03-02', tags: ['Travels'] });

      const tag = await findEntity(harness.services, 'Tag', 'travel');
      const view = await harness.services.reader.getEntity('Tag', tag.id);
      expect(view.computed.usageCount).to.equal(2);
    });
  });

  describe('scenes', () => {
    it('links scene people, locations and dates to the scene', async () => {
      await harness.services.reconciler.reconcile({
        date: '2024-03-01',
        scenes: [
          {
            name: 'Dinner',
            people: [{ name: 'Carol', relationType: 'host' }],
            locations: [{ name: 'Chez Marie', city: 'Lyon' }],
            dates: ['2024-02-28'],
          },
        ],
      });

      const entry = await harness.services.reader.getEntry('2024-03-01');
      const scene = await findEntity(harness.services, 'Scene', 'Dinner');
      const carol = await findEntity(harness.services, 'Person', 'Carol');
      const lyon = await findEntity(harness.services, 'City', 'Lyon');

      expect(scene.parent_id).to.equal(entry.entry.id);
      expect(scene.disambiguator).to.equal('2024-03-01');
      expect(entry.scenes.map((s) => s.name)).to.deep.equal(['Dinner']);
      expect(entry.associations.scenePeople?.map((e) => [e.source_id, e.target_id, e.metadata.relationType])).to.deep.equal([
        [scene.id, carol.id, 'host'],
      ]);
      expect(entry.associations.sceneLocations).to.have.lengthOf(1);
      // Scene locations bring their city and scene dates their narrated date to the entry
      expect(entry.associations.cities?.map((e) => e.target_id)).to.deep.equal([lyon.id]);
      expect(entry.associations.narratedDates).to.have.lengthOf(1);
      expect(entry.associations.sceneDates).to.have.lengthOf(1);
    });

    it('tears down a dropped scene and releases what only it referenced', async () => {
      const { reconciler } = harness.services;
      await reconciler.reconcile({
        date: '2024-03-01',
        scenes: [
          { name: 'Dinner', people: ['Carol'] },
          { name: 'Walk', people: ['Dave'] },
        ],
        sceneEvents: [{ name: 'Reunion', scenes: ['Dinner'] }],
      });

      const report = await reconciler.reconcile({ date: '2024-03-01', scenes: [{ name: 'Walk', people: ['Dave'] }] });

      const dinner = await findEntity(harness.services, 'Scene', 'Dinner');
      const carol = await findEntity(harness.services, 'Person', 'Carol');
      const reunion = await findEntity(harness.services, 'Event', 'Reunion');
      const dave = await findEntity(harness.services, 'Person', 'Dave');

      const scenes = report.deltas.find((d) => d.kind === 'scenes');
      expect(scenes?.removed.map((c) => c.kind)).to.have.members(['scenePeople', 'sceneEvents', 'scenes']);
      expect(scenes?.tombstoned).to.have.members([carol.id, dinner.id]);
      expect(report.deltas.find((d) => d.kind === 'sceneEvents')?.tombstoned).to.deep.equal([reunion.id]);
      expect(dinner.deleted_at).to.not.equal(null);
      expect(dave.deleted_at).to.equal(null);
    });

    it('rejects a scene declared twice under one name', async () => {
      const error = await expectRejection(
        harness.services.reconciler.reconcile({
          date: '2024-03-01',
          scenes: [
            { name: 'Dinner', people: ['Alice'] },
            { name: 'dinner', people: ['Bob'] },
          ],
        }),
        DescriptorValidationError
      );
      expect(error.message).to.equal('Invalid entry descriptor: scenes.1.name: Duplicate scene "dinner"');
    });

    it('leaves scene contents untouched on a repeat reconcile', async () => {
      const { reconciler } = harness.services;
      const descriptor = {
        date: '2024-03-01',
        scenes: [
          { name: 'Dinner', people: ['Alice'] },
          { name: 'Walk', people: ['Bob'] },
        ],
      };
      await reconciler.reconcile(descriptor);
      const again = await reconciler.reconcile(descriptor);
      const third = await reconciler.reconcile(descriptor);

      expect([again.totalChanges, third.totalChanges]).to.deep.equal([0, 0]);
      expect((await findEntity(harness.services, 'Person', 'Alice')).deleted_at).to.equal(null);
    });

    it('rejects an event naming a scene the entry does not declare', async () => {
      const error = await expectRejection(
        harness.services.reconciler.reconcile({
          date: '2024-03-01',
          scenes: ['Dinner'],
          sceneEvents: [{ name: 'Reunion', scenes: ['Dinner', 'Breakfast'] }],
        }),
        InvalidAssociationError
      );

      expect(error.reason).to.equal('scene "Breakfast" is not declared in entry 2024-03-01');
      expect(await harness.services.store.withTransaction((tx) => tx.entries.findByDate('2024-03-01'))).to.equal(null);
    });
  });

  describe('threads and arcs', () => {
    beforeEach(async () => {
      await harness.services.reconciler.reconcile({ date: '2024-03-01', threads: [{ name: 'The Move', position: 1 }] });
      await harness.services.reconciler.reconcile({ date: '2024-03-10', threads: ['The Move'] });
    });

    it('accepts a position that matches the date order', async () => {
      await harness.services.reconciler.reconcile({ date: '2024-03-05', threads: [{ name: 'The Move', position: 2 }] });

      const thread = await findEntity(harness.services, 'Thread', 'The Move');
      const view = await harness.services.reader.getSequence('Thread', thread.id);
      expect(view.members.map((m) => [m.position, m.date])).to.deep.equal([
        [1, '2024-03-01'],
        [2, '2024-03-05'],
        [3, '2024-03-10'],
      ]);
    });

    it('rejects a position that contradicts the date order', async () => {
      const error = await expectRejection(
        harness.services.reconciler.reconcile({
          date: '2024-03-05',
          people: ['Alice'],
          threads: [{ name: 'The Move', position: 3 }],
        }),
        OrderingViolationError
      );

      expect(error.declaredPosition).to.equal(3);
      expect(error.chronologicalPosition).to.equal(2);
      expect(error.message).to.equal(
        'Thread "The Move": entry 2024-03-05 declared at position 3 but its date places it at position 2'
      );

      const thread = await findEntity(harness.services, 'Thread', 'The Move');
      const view = await harness.services.reader.getSequence('Thread', thread.id);
      expect(view.members.map((m) => m.date)).to.deep.equal(['2024-03-01', '2024-03-10']);
    });

    it('releases the sequence lock after the entry commits or fails', async () => {
      const thread = await findEntity(harness.services, 'Thread', 'The Move');
      expect(harness.services.locks.isLocked(`sequence:${thread.id}`)).to.equal(false);

      await expectRejection(
        harness.services.reconciler.reconcile({ date: '2024-03-05', threads: [{ name: 'The Move', position: 1 }] }),
        OrderingViolationError
      );
      expect(harness.services.locks.isLocked(`sequence:${thread.id}`)).to.equal(false);
    });

    it('orders arcs independently of threads', async () => {
      await harness.services.reconciler.reconcile({
        date: '2024-03-05',
        threads: [{ name: 'The Move', position: 2 }],
        arcs: [{ name: 'Spring', position: 1 }],
      });

      const arc = await findEntity(harness.services, 'Arc', 'Spring');
      const view = await harness.services.reader.getSequence('Arc', arc.id);
      expect(view.members.map((m) => m.position)).to.deep.equal([1]);
    });
  });
});
