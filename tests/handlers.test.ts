import { describe, expect, it } from 'vitest';
import { Analyzer } from '../src/analyze.js';
import { handleWorkMessage, type HandlerDeps } from '../src/handlers.js';
import { createSilentLogger } from '../src/logger.js';
import { InlineWorkQueue } from '../src/queue.js';
import { MemoryRecordStore } from '../src/store/index.js';
import { FakeModelClient, sampleSource } from './fixtures.js';

const REPLY = JSON.stringify({
  summary: 'One item.',
  items: [{ title: 'Approval of consent agenda', topic: 'budget', relevance: 2 }],
  notable_items: []
});

function deps(): HandlerDeps & { store: MemoryRecordStore; queue: InlineWorkQueue } {
  const logger = createSilentLogger();
  const store = new MemoryRecordStore();
  const queue = new InlineWorkQueue();
  return {
    store,
    queue,
    ingestion: { source: sampleSource(), store, queue, logger, sourceName: 'spokane' },
    enrichment: { store, analyzer: new Analyzer(new FakeModelClient(REPLY), logger), logger },
    lookbackDays: 0,
    logger
  };
}

describe('handleWorkMessage', () => {
  it('runs ingestion for the scheduled trigger', async () => {
    const d = deps();

    const result = await handleWorkMessage(undefined, d);

    expect(result).toEqual({ status: 'ok', action: 'ingest_meetings', processed: 1, errors: 0 });
    expect(await d.store.countAgendaItems()).toBe(2);
    expect(d.queue.size).toBe(1);
  });

  it('analyzes a queued meeting', async () => {
    const d = deps();
    await handleWorkMessage({ action: 'ingest_meetings' }, d);
    const [message] = d.queue.drain();

    const result = await handleWorkMessage(message, d);

    expect(result).toEqual({ status: 'ok', action: 'analyze_meeting', processed: 1, errors: 0 });
    expect((await d.store.getAgendaItem('42-102'))?.topic).toBe('budget');
  });

  it('reports a malformed message as one error', async () => {
    const result = await handleWorkMessage({ action: 'analyze_meeting' }, deps());

    expect(result).toEqual({ status: 'ok', processed: 0, errors: 1 });
  });

  it('ignores unknown actions', async () => {
    const result = await handleWorkMessage({ action: 'reindex' }, deps());

    expect(result).toEqual({ status: 'ignored', processed: 0, errors: 0 });
  });
});
