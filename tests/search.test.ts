import { describe, expect, it } from 'vitest';
import { normalizeAgendaItem } from '../src/records.js';
import { rankItems, scoreItem, searchItems, searchStats, tokenize } from '../src/search.js';
import { MemoryRecordStore } from '../src/store/index.js';
import type { AgendaItemInput } from '../src/types.js';

function item(input: Partial<AgendaItemInput> & { item_id: string; title: string }) {
  return normalizeAgendaItem({ meeting_id: '42', meeting_date: '2026-02-23', ...input });
}

const REZONING = item({ item_id: '42-101', title: 'Rezoning of North Monroe corridor' });
const PAVING = item({ item_id: '42-102', title: 'Monroe street paving', summary: 'Repaves Monroe.' });
const LIBRARY = item({ item_id: '42-103', title: 'Library hours', topic: 'parks' });

describe('tokenize', () => {
  it('lower-cases and splits on whitespace', () => {
    expect(tokenize('  Rezoning   MONROE ')).toEqual(['rezoning', 'monroe']);
  });
});

describe('scoreItem', () => {
  it('averages field weights over query tokens', () => {
    expect(scoreItem(REZONING, ['rezoning', 'monroe'])).toBe(3);
    expect(scoreItem(PAVING, ['rezoning', 'monroe'])).toBe(2.5);
  });

  it('counts topic and key details', () => {
    const zoned = item({ item_id: 'z', title: 'Parcel hearing', topic: 'zoning', key_details: ['Zoning change to R2'] });
    expect(scoreItem(zoned, ['zoning'])).toBe(2);
  });
});

describe('rankItems', () => {
  it('orders by score and drops non-matching items', () => {
    const results = rankItems([PAVING, LIBRARY, REZONING], 'rezoning Monroe');

    expect(results.map(r => [r.item_id, r.search_score])).toEqual([
      ['42-101', 3],
      ['42-102', 2.5]
    ]);
  });

  it('returns nothing for a query without overlap', () => {
    expect(rankItems([REZONING, PAVING], 'stormwater')).toEqual([]);
  });

  it('returns nothing for a blank query', () => {
    expect(rankItems([REZONING], '   ')).toEqual([]);
  });

  it('rounds scores to three decimals', () => {
    const summarised = item({ item_id: 's', title: 'Item x', summary: 'alpha' });

    expect(rankItems([summarised], 'alpha qq zz')[0].search_score).toBe(0.667);
  });

  it('orders by the unrounded score', () => {
    const titled = item({ item_id: 'a', title: 'alpha' });
    const described = item({ item_id: 'b', title: 'beta', summary: 'alpha', why_it_matters: 'alpha' });
    const filler = Array.from({ length: 1000 }, (_, i) => `zq${i}`);

    const results = rankItems([titled, described], ['alpha', ...filler].join(' '), { minScore: 0 });

    expect(results.map(r => [r.item_id, r.search_score])).toEqual([
      ['b', 0.003],
      ['a', 0.003]
    ]);
  });

  it('truncates to topK', () => {
    expect(rankItems([REZONING, PAVING], 'monroe', { topK: 1 }).map(r => r.item_id)).toEqual(['42-102']);
  });
});

describe('searchItems', () => {
  it('searches the stored working set', async () => {
    const store = new MemoryRecordStore();
    await store.putAgendaItem(REZONING);
    await store.putAgendaItem(LIBRARY);

    const results = await searchItems(store, 'north monroe');

    expect(results.map(r => r.item_id)).toEqual(['42-101']);
    expect(await searchStats(store)).toEqual({ total_items: 2, search_method: 'keyword_scan', backend: 'memory' });
  });
});
