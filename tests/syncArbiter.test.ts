import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import sinon from 'sinon';
import {
  DescriptorValidationError,
  EntityNotFoundError,
  InvalidAssociationError,
  MergeConflictError,
} from '../src/errors/archiveErrors.js';
import { computeMerge } from '../src/services/syncArbiter.js';
import { createHarness, expectRejection, findEntity, silenceConsole, type TestHarness } from './helpers.js';

describe('computeMerge', () => {
  const baseline = { notes: null, description: 'Leaving home' };

  it('takes the note value when only the note changed', () => {
    const outcome = computeMerge('Theme', baseline, { description: 'Leaving home' }, { description: 'Leaving for good' });
    expect(outcome.merged.description).to.equal('Leaving for good');
    expect(outcome.conflicts).to.deep.equal([]);
  });

  it('keeps the store value when only the store changed', () => {
    const outcome = computeMerge('Theme', baseline, { description: 'Home, revisited' }, { description: 'Leaving home' });
    expect(outcome.merged.description).to.equal('Home, revisited');
    expect(outcome.conflicts).to.deep.equal([]);
  });

  it('treats a field missing from the note as unchanged', () => {
    const outcome = computeMerge('Theme', baseline, { description: 'Home, revisited' }, {});
    expect(outcome.merged.description).to.equal('Home, revisited');
  });

  it('accepts identical edits on both sides', () => {
    const outcome = computeMerge('Theme', baseline, { description: 'Same' }, { description: 'Same' });
    expect(outcome.merged.description).to.equal('Same');
    expect(outcome.conflicts).to.deep.equal([]);
  });

  it('reports a conflict and keeps the store value when both sides differ', () => {
    const outcome = computeMerge('Theme', baseline, { description: 'Store edit' }, { description: 'Note edit' });
    expect(outcome.merged.description).to.equal('Store edit');
    expect(outcome.conflicts).to.deep.equal([
      { field: 'description', baseline: 'Leaving home', store: 'Store edit', note: 'Note edit' },
    ]);
  });

  it('always serves computed fields from the store', () => {
    const outcome = computeMerge('Tag', {}, { mentionCount: 2, usageCount: 2 }, { mentionCount: 40, usageCount: 40 });
    expect(outcome.merged).to.deep.equal({ mentionCount: 2, usageCount: 2, notes: null });
  });
});

describe('SyncArbiter', () => {
  let harness: TestHarness;
  let aliceId: string;

  beforeEach(async () => {
    silenceConsole();
    harness = createHarness();
    await harness.services.reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Robert'] });
    aliceId = (await findEntity(harness.services, 'Person', 'Alice')).id;
  });

  afterEach(() => {
    sinon.restore();
  });

  it('writes note edits to the store and records the baseline', async () => {
    const { arbiter, reader, store } = harness.services;
    const result = await arbiter.mergeNotePage('Person', aliceId, { fullName: 'Alice Liddell', mentionCount: 99 });

    expect(result.error).to.equal(null);
    expect(result.applied).to.deep.equal(['fullName']);
    expect(result.merged.mentionCount).to.equal(1);

    const view = await reader.getEntity('Person', aliceId);
    expect(view.entity.attributes).to.deep.equal({ fullName: 'Alice Liddell' });

    const state = await store.withTransaction((tx) => tx.syncStates.get(aliceId));
    expect(state?.baseline).to.deep.equal({ notes: null, fullName: 'Alice Liddell', aliases: null });
    expect(state?.fingerprint).to.equal(result.fingerprint);
    expect(state?.conflict_detected).to.equal(false);
  });

  it('records a conflict when the store and the note both moved', async () => {
    const { arbiter, reconciler, reader } = harness.services;
    await arbiter.mergeNotePage('Person', aliceId, { fullName: 'Alice Liddell' });
    await reconciler.reconcile({ date: '2024-03-02', people: [{ name: 'Alice', attributes: { fullName: 'A. Liddell' } }] });

    const result = await arbiter.mergeNotePage('Person', aliceId, {
      fullName: 'Alice P. Liddell',
      notes: 'Met at the station',
    });

    expect(result.error).to.be.instanceOf(MergeConflictError);
    expect(result.conflicts).to.deep.equal([
      { field: 'fullName', baseline: 'Alice Liddell', store: 'A. Liddell', note: 'Alice P. Liddell' },
    ]);
    expect(result.applied).to.deep.equal(['notes']);
    expect(() => arbiter.assertNoConflicts(result)).to.throw(MergeConflictError);

    const view = await reader.getEntity('Person', aliceId);
    expect(view.entity.attributes).to.deep.equal({ fullName: 'A. Liddell', notes: 'Met at the station' });

    const conflicted = await arbiter.listConflicts();
    expect(conflicted.map((s) => [s.entity_id, s.baseline.fullName])).to.deep.equal([[aliceId, 'Alice Liddell']]);
  });

  it('settles a conflict with the chosen side', async () => {
    const { arbiter, reconciler, reader } = harness.services;
    await arbiter.mergeNotePage('Person', aliceId, { fullName: 'Alice Liddell' });
    await reconciler.reconcile({ date: '2024-03-02', people: [{ name: 'Alice', attributes: { fullName: 'A. Liddell' } }] });
    await arbiter.mergeNotePage('Person', aliceId, { fullName: 'Alice P. Liddell' });

    const state = await arbiter.resolveConflict(aliceId, 'fullName', 'note');

    expect(state.conflicts).to.deep.equal([]);
    expect(state.conflict_detected).to.equal(false);
    expect(state.conflict_resolved).to.equal(true);
    expect(state.baseline.fullName).to.equal('Alice P. Liddell');
    expect((await reader.getEntity('Person', aliceId)).entity.attributes.fullName).to.equal('Alice P. Liddell');
    expect(await arbiter.listConflicts()).to.deep.equal([]);

    const followUp = await arbiter.mergeNotePage('Person', aliceId, { fullName: 'Alice P. Liddell' });
    expect(followUp.conflicts).to.deep.equal([]);
    expect(followUp.applied).to.deep.equal([]);
  });

  it('rejects settling a field without an open conflict', async () => {
    const error = await expectRejection(
      harness.services.arbiter.resolveConflict(aliceId, 'fullName', 'store'),
      DescriptorValidationError
    );
    expect(error.message).to.equal(`Invalid conflict resolution: field: No open conflict on fullName for ${aliceId}`);
  });

  it('rejects fields the kind does not own', async () => {
    const error = await expectRejection(
      harness.services.arbiter.mergeNotePage('Person', aliceId, { favouriteColour: 'green' }),
      DescriptorValidationError
    );
    expect(error.subject).to.equal('Person note page');
  });

  it('rejects an alias that is another person\'s name', async () => {
    await expectRejection(
      harness.services.arbiter.mergeNotePage('Person', aliceId, { aliases: ['Robert'] }),
      InvalidAssociationError
    );

    const alice = await findEntity(harness.services, 'Person', 'Alice');
    expect(alice.alias_keys).to.deep.equal([]);
    expect(await harness.services.store.withTransaction((tx) => tx.syncStates.get(aliceId))).to.equal(null);
  });

  it('records aliases edited on the note page as lookup keys', async () => {
    await harness.services.arbiter.mergeNotePage('Person', aliceId, { aliases: ['Ally'] });
    await harness.services.reconciler.reconcile({ date: '2024-03-02', people: ['Ally'] });

    const alice = await findEntity(harness.services, 'Person', 'Alice');
    expect(alice.alias_keys).to.deep.equal(['ally']);
    expect((await harness.services.reader.getEntity('Person', aliceId)).computed.mentionCount).to.equal(2);
  });

  it('merges entry notes', async () => {
    const { arbiter, reader } = harness.services;
    const entry = await reader.getEntry('2024-03-01');
    const result = await arbiter.mergeNotePage('Entry', entry.entry.id, { notes: 'Rainy day', wordCount: 10 });

    expect(result.applied).to.deep.equal(['notes']);
    expect(result.merged).to.deep.equal({ digest: '', wordCount: 0, notes: 'Rainy day' });
    expect((await reader.getEntry('2024-03-01')).entry.notes).to.equal('Rainy day');
  });

  it('rejects an unknown subject', async () => {
    await expectRejection(harness.services.arbiter.mergeNotePage('Theme', aliceId, {}), EntityNotFoundError);
  });
});
