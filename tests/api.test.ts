import type { Server } from 'node:http';
import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/api/app.js';
import { RecordStoreError } from '../src/errors.js';
import { runIngestion } from '../src/ingest.js';
import { createSilentLogger } from '../src/logger.js';
import { MemoryRecordStore, type RecordStore } from '../src/store/index.js';
import type { Meeting } from '../src/types.js';
import { sampleSource } from './fixtures.js';

class UnavailableStore extends MemoryRecordStore {
  override async getMeeting(): Promise<Meeting | null> {
    throw new RecordStoreError('get', 'meetings', 'connect ECONNREFUSED 127.0.0.1:27017');
  }

  override async countMeetings(): Promise<number> {
    throw new RecordStoreError('count', 'meetings', 'connect ECONNREFUSED 127.0.0.1:27017');
  }
}

let server: Server | undefined;

async function start(store: RecordStore): Promise<string> {
  const app = createApp({ store, logger: createSilentLogger(), config: { stage: 'test' } });
  const listening = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  server = listening;
  const address = listening.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  return `http://127.0.0.1:${address.port}`;
}

async function ingestedStore(): Promise<MemoryRecordStore> {
  const store = new MemoryRecordStore();
  await runIngestion({
    source: sampleSource(),
    store,
    queue: null,
    logger: createSilentLogger(),
    sourceName: 'spokane'
  });
  return store;
}

afterEach(async () => {
  const running = server;
  server = undefined;
  if (running) {
    await new Promise<void>((resolve, reject) => {
      running.close((err) => (err ? reject(err) : resolve()));
    });
  }
});

describe('read API', () => {
  it('reports health', async () => {
    const baseUrl = await start(new MemoryRecordStore());

    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(await res.json()).toEqual({ status: 'healthy', stage: 'test', version: '0.1.0' });
  });

  it('serves an ingested meeting with its items and documents', async () => {
    const baseUrl = await start(await ingestedStore());

    const res = await fetch(`${baseUrl}/api/meetings/42`);

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({
      meeting: { meeting_id: '42', body_name: 'City Council', meeting_date: '2026-02-23T00:00:00' },
      items: [
        { item_id: '42-101', title: 'Rezoning of North Monroe corridor' },
        { item_id: '42-102', title: 'Approval of consent agenda' }
      ],
      documents: [{ document_id: '42-agenda', document_type: 'agenda' }]
    });
  });

  it('returns 404 for an unknown meeting', async () => {
    const baseUrl = await start(new MemoryRecordStore());

    const res = await fetch(`${baseUrl}/api/meetings/999`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Meeting not found' });
  });

  it('lists meetings', async () => {
    const baseUrl = await start(await ingestedStore());

    const res = await fetch(`${baseUrl}/api/meetings?body=City%20Council&limit=5`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ count: 1, meetings: [{ meeting_id: '42' }] });
  });

  it('rejects a limit above the maximum', async () => {
    const baseUrl = await start(new MemoryRecordStore());

    const res = await fetch(`${baseUrl}/api/meetings?limit=500`);

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: 'Validation failed', details: [{ path: 'limit' }] });
  });

  it('filters items by relevance and sorts by it', async () => {
    const store = new MemoryRecordStore();
    await store.putAgendaItem({ item_id: 'a', meeting_id: '1', title: 'Sidewalk repair', relevance: 3, topic: 'infrastructure' });
    await store.putAgendaItem({ item_id: 'b', meeting_id: '1', title: 'Tax levy', relevance: 5, topic: 'taxes' });
    await store.putAgendaItem({ item_id: 'c', meeting_id: '1', title: 'Proclamation', relevance: 1 });
    const baseUrl = await start(store);

    const all = await fetch(`${baseUrl}/api/items?min_relevance=3`);
    expect(await all.json()).toMatchObject({ count: 2, items: [{ item_id: 'b' }, { item_id: 'a' }] });

    const byTopic = await fetch(`${baseUrl}/api/items?topic=taxes`);
    expect(await byTopic.json()).toMatchObject({ count: 1, items: [{ item_id: 'b' }] });

    const badTopic = await fetch(`${baseUrl}/api/items?topic=weather`);
    expect(badTopic.status).toBe(422);
  });

  it('searches items', async () => {
    const baseUrl = await start(await ingestedStore());

    const res = await fetch(`${baseUrl}/api/search?q=rezoning%20Monroe`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      query: 'rezoning Monroe',
      count: 1,
      total_indexed: 2,
      results: [{ item_id: '42-101', search_score: 3 }]
    });
  });

  it('requires a search query', async () => {
    const baseUrl = await start(new MemoryRecordStore());

    const missing = await fetch(`${baseUrl}/api/search`);
    expect(missing.status).toBe(422);
    expect(await missing.json()).toMatchObject({ details: [{ path: 'q' }] });

    const blank = await fetch(`${baseUrl}/api/search?q=%20%20`);
    expect(blank.status).toBe(422);
  });

  it('reports stats', async () => {
    const store = await ingestedStore();
    await store.putAgendaItem({ item_id: '42-101', meeting_id: '42', title: 'Rezoning of North Monroe corridor', topic: 'zoning', relevance: 4, meeting_date: '2026-02-23T00:00:00' });
    const baseUrl = await start(store);

    const res = await fetch(`${baseUrl}/api/stats`);

    expect(await res.json()).toEqual({ meetings: 1, agenda_items: 2, high_relevance: 1, topics: ['other', 'zoning'] });
  });

  it('hides storage failures behind a 502', async () => {
    const baseUrl = await start(new UnavailableStore());

    const detail = await fetch(`${baseUrl}/api/meetings/42`);
    expect(detail.status).toBe(502);
    expect(await detail.json()).toEqual({ error: 'Storage unavailable' });

    const stats = await fetch(`${baseUrl}/api/stats`);
    expect(stats.status).toBe(502);
    expect(await stats.json()).toEqual({ error: 'Storage unavailable' });
  });
});
