import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import sinon from 'sinon';
import { createHarness, findEntity, silenceConsole, type TestHarness } from './helpers.js';

describe('checkIntegrity', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    silenceConsole();
    harness = createHarness();
    await harness.services.reconciler.reconcile({
      date: '2024-03-01',
      people: ['Alice'],
      locations: [{ name: 'Louvre', city: 'Paris' }],
    });
  });

  afterEach(() => {
    sinon.restore();
  });

  it('passes on a store the engine wrote', async () => {
    const report = await harness.services.checkIntegrity();
    expect(report).to.deep.equal({ ok: true, entityCount: 3, associationCount: 3, issues: [] });
  });

  it('flags duplicate natural keys', async () => {
    const alice = await findEntity(harness.services, 'Person', 'Alice');
    const copy = await harness.services.store.withTransaction((tx) =>
      tx.entities.create(
        {
          kind: 'Person',
          name: 'ALICE',
          name_key: 'alice',
          disambiguator: null,
          disambiguator_key: '',
          parent_id: null,
          alias_keys: [],
          attributes: {},
        },
        '2024-06-01T00:00:00.000Z'
      )
    );

    const report = await harness.services.checkIntegrity();
    expect(report.ok).to.equal(false);
    expect(report.issues.find((issue) => issue.type === 'duplicate_natural_key')).to.deep.equal({
      type: 'duplicate_natural_key',
      message: '2 active entities share the key of Person "Alice"',
      ids: [alice.id, copy.id],
    });
  });

  it('flags referenced tombstones and dangling associations', async () => {
    const { store } = harness.services;
    const louvre = await findEntity(harness.services, 'Location', 'Louvre');
    await store.withTransaction((tx) =>
      tx.entities.update(louvre.id, { deleted_at: '2024-06-01T00:00:00.000Z' }, '2024-06-01T00:00:00.000Z')
    );
    await store.withTransaction((tx) =>
      tx.associations.insert(
        { kind: 'tags', source_id: louvre.id, target_id: 'missing-tag', discriminator: '', metadata: {} },
        '2024-06-01T00:00:00.000Z'
      )
    );

    const report = await harness.services.checkIntegrity();
    expect(report.issues.map((issue) => issue.type)).to.deep.equal(['dangling_association', 'referenced_tombstone']);
    expect(report.issues[1]?.message).to.equal('Location "Louvre" (Paris) is tombstoned but has 1 reference(s)');
  });
});
