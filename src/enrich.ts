/**
 * Enrich a meeting's agenda items with model-generated analysis
 *
 * Analysed items are matched back to stored items by the item id echoed by
 * the model, then by normalised title, so re-running analysis updates items
 * in place instead of adding copies.
 */

import { AnalysisError, RecordStoreError, errorMessage } from './errors.js';
import { normalizeTitle, sleep, stableId } from './utils.js';
import type { Analyzer } from './analyze.js';
import type { Logger } from './logger.js';
import type { RecordStore } from './store/index.js';
import type { AgendaItem, AgendaItemInput, AnalysisResult, AnalyzedItem } from './types.js';

export interface EnrichmentDeps {
  store: RecordStore;
  analyzer: Pick<Analyzer, 'analyze'>;
  logger: Logger;
}

export type MeetingAnalysisStatus = 'analyzed' | 'skipped' | 'failed';

export interface MeetingAnalysisOutcome {
  meeting_id: string;
  status: MeetingAnalysisStatus;
  items_analyzed: number;
  items_updated: number;
  items_created: number;
  errors: string[];
}

export interface EnrichmentSummary {
  processed: number;
  errors: number;
  outcomes: MeetingAnalysisOutcome[];
}

/**
 * Text block sent to the analyzer, one paragraph per item in store order.
 * Each paragraph carries the item id for the model to echo back.
 */
export function buildAgendaText(items: AgendaItem[]): string {
  return items.map(item => `Item ID: ${item.item_id}\nItem: ${item.title}\n${item.summary}`).join('\n\n');
}

/**
 * Id for an analysed item that matches no stored item; stable across runs
 */
export function deriveItemId(meetingId: string, title: string): string {
  return `${meetingId}-${stableId(meetingId, normalizeTitle(title))}`;
}

/**
 * Merge analysis into the stored item it was generated from, or build a new
 * item when there is none. Identity and ingestion fields are never
 * overwritten.
 */
export function mergeAnalysis(
  meetingId: string,
  analyzed: AnalyzedItem,
  existing: AgendaItem | undefined,
  meetingDate: string,
  model: string,
  analyzedAt: string
): AgendaItemInput {
  const { title, item_id: _echoedId, ...analysis } = analyzed;
  if (existing) {
    return {
      ...existing,
      ...analysis,
      analyzed_at: analyzedAt,
      model_used: model
    };
  }
  return {
    ...analysis,
    item_id: deriveItemId(meetingId, title),
    meeting_id: meetingId,
    title,
    meeting_date: meetingDate,
    analyzed_at: analyzedAt,
    model_used: model
  };
}

/**
 * Analyze one meeting and write the results back
 */
export async function analyzeMeeting(deps: EnrichmentDeps, meetingId: string): Promise<MeetingAnalysisOutcome> {
  const { store, analyzer } = deps;
  const logger = deps.logger.child({ meetingId });
  const outcome: MeetingAnalysisOutcome = {
    meeting_id: meetingId,
    status: 'skipped',
    items_analyzed: 0,
    items_updated: 0,
    items_created: 0,
    errors: []
  };

  let items: AgendaItem[];
  try {
    items = await store.listItemsForMeeting(meetingId);
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Failed to fetch agenda items');
    outcome.status = 'failed';
    outcome.errors.push(`Store read failed: ${errorMessage(err)}`);
    return outcome;
  }

  if (items.length === 0) {
    logger.info('No items found for meeting, skipping');
    return outcome;
  }

  logger.info({ items: items.length }, 'Analyzing meeting');

  let result: AnalysisResult;
  try {
    result = await analyzer.analyze(buildAgendaText(items), 'agenda');
  } catch (err) {
    if (!(err instanceof AnalysisError)) {
      throw err;
    }
    logger.error({ error: err.message }, 'Analysis failed');
    outcome.status = 'failed';
    outcome.errors.push(`Analysis failed: ${err.message}`);
    return outcome;
  }

  if (result.error) {
    logger.warn({ error: result.error }, 'Analysis returned an error');
  }

  const byId = new Map(items.map(item => [item.item_id, item]));
  const byTitle = new Map<string, AgendaItem>();
  for (const item of items) {
    const key = normalizeTitle(item.title);
    if (!byTitle.has(key)) byTitle.set(key, item);
  }
  const matchStored = (analyzed: AnalyzedItem): AgendaItem | undefined =>
    (analyzed.item_id !== undefined ? byId.get(analyzed.item_id) : undefined) ??
    byTitle.get(normalizeTitle(analyzed.title));
  const meetingDate = items[0].meeting_date;
  const analyzedAt = new Date().toISOString();

  for (const analyzed of result.items) {
    const existing = matchStored(analyzed);
    const record = mergeAnalysis(meetingId, analyzed, existing, meetingDate, result.model, analyzedAt);
    try {
      await store.putAgendaItem(record);
      outcome.items_analyzed++;
      if (existing) {
        outcome.items_updated++;
      } else {
        outcome.items_created++;
      }
    } catch (err) {
      if (!(err instanceof RecordStoreError)) {
        throw err;
      }
      logger.error({ title: analyzed.title.slice(0, 50), error: err.message }, 'Failed to store analyzed item');
      outcome.errors.push(`Store write failed: ${err.message}`);
    }
  }

  outcome.status = 'analyzed';
  logger.info(
    { updated: outcome.items_updated, created: outcome.items_created, errors: outcome.errors.length },
    'Analysis complete'
  );
  return outcome;
}

/**
 * Analyze several meetings in order. One meeting's failure never stops the
 * rest.
 */
export async function analyzeMeetings(
  deps: EnrichmentDeps,
  meetingIds: string[],
  options: { delayMs?: number } = {}
): Promise<EnrichmentSummary> {
  const summary: EnrichmentSummary = { processed: 0, errors: 0, outcomes: [] };

  for (const [index, meetingId] of meetingIds.entries()) {
    let outcome: MeetingAnalysisOutcome;
    try {
      outcome = await analyzeMeeting(deps, meetingId);
    } catch (err) {
      deps.logger.error({ meetingId, error: errorMessage(err) }, 'Unexpected error analyzing meeting');
      outcome = {
        meeting_id: meetingId,
        status: 'failed',
        items_analyzed: 0,
        items_updated: 0,
        items_created: 0,
        errors: [errorMessage(err)]
      };
    }

    summary.outcomes.push(outcome);
    if (outcome.status === 'analyzed') summary.processed++;
    summary.errors += outcome.errors.length;

    // Rate limit between model calls
    if (options.delayMs && outcome.status === 'analyzed' && index < meetingIds.length - 1) {
      await sleep(options.delayMs);
    }
  }

  if (summary.errors > 0) {
    deps.logger.warn({ processed: summary.processed, errors: summary.errors }, 'Analysis completed with errors');
  }
  return summary;
}
