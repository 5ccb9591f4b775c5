import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import sinon from 'sinon';
import { EntityNotFoundError } from '../src/errors/archiveErrors.js';
import { createHarness, expectRejection, findEntity, silenceConsole, type TestHarness } from './helpers.js';

describe('ArchiveReadService', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    silenceConsole();
    harness = createHarness();
    const { reconciler } = harness.services;
    await reconciler.reconcile({
      date: '2024-03-05',
      digest: 'Market day',
      wordCount: 310,
      people: ['Alice'],
      locations: [{ name: 'Les Halles', city: 'Paris' }],
      entryEvents: ['Spring Fair'],
    });
    await reconciler.reconcile({
      date: '2024-03-01',
      people: ['Alice'],
      references: [{ content: 'Not all who wander are lost', source: 'The Fellowship', speaker: 'Bilbo' }],
    });
    await reconciler.reconcile({
      date: '2024-03-09',
      scenes: [{ name: 'Picnic', people: ['Alice'], locations: [{ name: 'Parc Monceau', city: 'Paris' }] }],
      sceneEvents: [{ name: 'Spring Fair', scenes: ['Picnic'] }],
    });
  });

  afterEach(() => {
    sinon.restore();
  });

  it('derives appearance fields from live entries, through scenes too', async () => {
    const alice = await findEntity(harness.services, 'Person', 'Alice');
    const view = await harness.services.reader.getEntity('Person', alice.id);

    expect(view.state).to.equal('active');
    expect(view.computed).to.deep.equal({
      mentionCount: 3,
      firstAppearance: '2024-03-01',
      lastAppearance: '2024-03-09',
      entryDates: ['2024-03-01', '2024-03-05', '2024-03-09'],
    });
  });

  it('drops deleted entries from the aggregates', async () => {
    await harness.services.reconciler.deleteEntry('2024-03-09');
    const alice = await findEntity(harness.services, 'Person', 'Alice');
    const view = await harness.services.reader.getEntity('Person', alice.id);
    expect(view.computed.entryDates).to.deep.equal(['2024-03-01', '2024-03-05']);
  });

  it('adds the kind-specific counts', async () => {
    const { reader } = harness.services;
    const paris = await findEntity(harness.services, 'City', 'Paris');
    const fair = await findEntity(harness.services, 'Event', 'Spring Fair');
    const source = await findEntity(harness.services, 'ReferenceSource', 'The Fellowship');

    expect((await reader.getEntity('City', paris.id)).computed.locationCount).to.equal(2);
    expect((await reader.getEntity('Event', fair.id)).computed).to.include({ sceneCount: 1, mentionCount: 2 });
    expect((await reader.getEntity('ReferenceSource', source.id)).computed.referenceCount).to.equal(1);
  });

  it('returns an entry with its associations grouped by kind', async () => {
    const view = await harness.services.reader.getEntry('2024-03-05');

    expect(view.computed).to.deep.equal({ digest: 'Market day', wordCount: 310 });
    expect(Object.keys(view.associations).sort()).to.deep.equal(['cities', 'entryEvents', 'locations', 'people']);
    expect(view.scenes).to.deep.equal([]);
  });

  it('includes scene-owned associations', async () => {
    const view = await harness.services.reader.getEntry('2024-03-09');
    expect(Object.keys(view.associations).sort()).to.deep.equal([
      'cities',
      'sceneEvents',
      'sceneLocations',
      'scenePeople',
      'scenes',
    ]);
  });

  it('carries reference roles on the association', async () => {
    const view = await harness.services.reader.getEntry('2024-03-01');
    expect(view.associations.references?.[0]?.metadata).to.deep.equal({ speaker: 'Bilbo', mode: 'direct' });
  });

  it('lists entities of a kind, tombstones on request', async () => {
    const { reconciler, reader } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });

    expect((await reader.listEntities('Reference')).map((v) => v.entity.name)).to.deep.equal([]);
    expect((await reader.listEntities('Reference', { includeDeleted: true })).map((v) => v.state)).to.deep.equal([
      'tombstoned',
    ]);
  });

  it('reports a missing or mismatched entity', async () => {
    const alice = await findEntity(harness.services, 'Person', 'Alice');
    await expectRejection(harness.services.reader.getEntity('City', alice.id), EntityNotFoundError);
    await expectRejection(harness.services.reader.getEntry('2023-01-01'), EntityNotFoundError);
    await expectRejection(harness.services.reader.getPoemHistory(alice.id), EntityNotFoundError);
  });
});
