import { trace } from '@opentelemetry/api';
import { BasicTracerProvider, InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { expect } from 'chai';
import { after, afterEach, before, beforeEach, describe, it } from 'mocha';
import sinon from 'sinon';
import { sanitizeMetadata } from '../src/utils/tracing.js';
import { createHarness, silenceConsole, type TestHarness } from './helpers.js';

describe('tracing', () => {
  const exporter = new InMemorySpanExporter();
  let provider: BasicTracerProvider;
  let harness: TestHarness;

  before(() => {
    provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    provider.register();
  });

  after(async () => {
    await provider.shutdown();
    trace.disable();
  });

  beforeEach(() => {
    silenceConsole();
    exporter.reset();
    harness = createHarness();
  });

  afterEach(() => {
    sinon.restore();
  });

  it('records the change count on the reconcile span', async () => {
    const { reconciler } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'], tags: ['travel'] });
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice', 'Bob'], tags: ['travel'] });

    const spans = exporter.getFinishedSpans().filter((span) => span.name === 'entry.reconcile');
    expect(spans.map((span) => span.attributes)).to.deep.equal([
      { entryDate: '2024-03-01', reconcileMode: 'replace', changeCount: 3 },
      { entryDate: '2024-03-01', reconcileMode: 'replace', changeCount: 0 },
    ]);
  });

  it('records the change count on the delete span', async () => {
    const { reconciler } = harness.services;
    await reconciler.reconcile({ date: '2024-03-01', people: ['Alice'] });
    await reconciler.deleteEntry('2024-03-01');

    const span = exporter.getFinishedSpans().find((s) => s.name === 'entry.delete');
    expect(span?.attributes).to.deep.equal({ entryDate: '2024-03-01', changeCount: 1 });
  });

  it('drops free text and empty values from attributes', () => {
    expect(
      sanitizeMetadata({ entityId: 'e-1', notes: 'private', poemContent: 'verse', apiToken: 'test-secret', missing: null })
    ).to.deep.equal({ entityId: 'e-1' });
  });
});
