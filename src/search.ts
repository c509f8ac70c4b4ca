/**
 * Keyword search over recent agenda items
 *
 * Scores the most recent SEARCH_WORKING_SET items in memory. Cost is
 * working set × query tokens, which is fine for a few hundred items and is
 * the ceiling of this approach.
 */

import { SEARCH_WORKING_SET } from './config.js';
import type { RecordStore } from './store/index.js';
import type { AgendaItem } from './types.js';

export interface ScoredItem extends AgendaItem {
  search_score: number;
}

export interface SearchOptions {
  topK?: number;
  minScore?: number;
}

export interface SearchStats {
  total_items: number;
  search_method: 'keyword_scan';
  backend: string;
}

const FIELD_WEIGHTS = [
  ['title', 3.0],
  ['summary', 2.0],
  ['why_it_matters', 1.5],
  ['topic', 1.0]
] as const;

const KEY_DETAILS_WEIGHT = 1.0;

export function tokenize(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(token => token !== '');
}

/**
 * Mean per-token score of an item: each token adds a field's weight when it
 * is a substring of that field
 */
export function scoreItem(item: AgendaItem, tokens: string[]): number {
  if (tokens.length === 0) {
    return 0;
  }

  let score = 0;
  for (const [field, weight] of FIELD_WEIGHTS) {
    const value = item[field].toLowerCase();
    for (const token of tokens) {
      if (value.includes(token)) score += weight;
    }
  }

  const details = item.key_details.join(' ').toLowerCase();
  for (const token of tokens) {
    if (details.includes(token)) score += KEY_DETAILS_WEIGHT;
  }

  return score / tokens.length;
}

/**
 * Score, filter and order a list of items. Ties keep input order.
 */
export function rankItems(items: AgendaItem[], query: string, options: SearchOptions = {}): ScoredItem[] {
  const { topK = 10, minScore = 0.1 } = options;
  const tokens = tokenize(query);
  if (tokens.length === 0) {
    return [];
  }

  const scored: Array<{ item: AgendaItem; score: number }> = [];
  for (const item of items) {
    const score = scoreItem(item, tokens);
    if (score >= minScore) {
      scored.push({ item, score });
    }
  }

  scored.sort((a, b) => b.score - a.score);
  return scored
    .slice(0, topK)
    .map(({ item, score }) => ({ ...item, search_score: Math.round(score * 1000) / 1000 }));
}

/**
 * Search agenda items in the recent working set
 */
export async function searchItems(store: RecordStore, query: string, options: SearchOptions = {}): Promise<ScoredItem[]> {
  const items = await store.listRecentItems(SEARCH_WORKING_SET);
  return rankItems(items, query, options);
}

export async function searchStats(store: RecordStore): Promise<SearchStats> {
  const items = await store.listRecentItems(SEARCH_WORKING_SET);
  return {
    total_items: items.length,
    search_method: 'keyword_scan',
    backend: store.backend
  };
}
