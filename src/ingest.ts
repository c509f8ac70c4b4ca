/**
 * Ingest meetings from Legistar into the record store
 *
 * Per meeting: persist the meeting, its document links and its agenda items,
 * then schedule analysis. Failures are isolated to the meeting (or item)
 * they occur in; only failing to list events aborts the run.
 */

import { errorMessage } from './errors.js';
import { toAgendaItemInput, toDocumentInputs, toMeetingInput, type SourceClient } from './legistar.js';
import type { Logger } from './logger.js';
import type { WorkQueue } from './queue.js';
import type { RecordStore } from './store/index.js';
import type { LegistarEvent, LegistarEventItem } from './types.js';

export interface IngestionDeps {
  source: SourceClient;
  store: RecordStore;
  queue: WorkQueue | null;
  logger: Logger;
  /** Value written to each meeting's `source` field */
  sourceName: string;
}

export interface IngestionSummary {
  fetched: number;
  stored: number;
  items_stored: number;
  documents_stored: number;
  scheduled: number;
  errors: number;
  aborted: boolean;
}

const EVENT_ID_PATTERN = /^-?\d+$/;

/**
 * Legistar event ids are integers; anything else cannot be used to fetch items
 */
export function parseEventId(meetingId: string): number | null {
  const trimmed = meetingId.trim();
  return EVENT_ID_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Start of the ingestion window: now minus the lookback
 */
export function ingestionStart(lookbackDays: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000);
}

/**
 * Queue analysis for a meeting. Never throws: ingestion stays correct even
 * if analysis is never scheduled.
 */
async function scheduleAnalysis(deps: IngestionDeps, meetingId: string): Promise<boolean> {
  if (!deps.queue) {
    deps.logger.warn({ meetingId }, 'Analysis queue not configured, skipping analysis');
    return false;
  }
  try {
    await deps.queue.send({ action: 'analyze_meeting', meeting_id: meetingId });
    deps.logger.info({ meetingId }, 'Queued analysis job');
    return true;
  } catch (err) {
    deps.logger.error({ meetingId, error: errorMessage(err) }, 'Failed to queue analysis');
    return false;
  }
}

async function ingestMeeting(
  deps: IngestionDeps,
  event: LegistarEvent,
  summary: IngestionSummary
): Promise<void> {
  const { store, source, logger } = deps;
  const input = toMeetingInput(event, deps.sourceName);

  let meetingId: string;
  try {
    meetingId = await store.putMeeting(input);
  } catch (err) {
    logger.error({ meetingId: input.meeting_id, error: errorMessage(err) }, 'Failed to store meeting');
    summary.errors++;
    return;
  }
  summary.stored++;

  for (const doc of toDocumentInputs(event, meetingId)) {
    try {
      await store.putDocument(doc);
      summary.documents_stored++;
    } catch (err) {
      logger.error({ meetingId, documentType: doc.document_type, error: errorMessage(err) }, 'Failed to store document');
      summary.errors++;
    }
  }

  const eventId = parseEventId(meetingId);
  let eventItems: LegistarEventItem[] = [];
  if (eventId === null) {
    logger.warn({ meetingId }, 'Meeting id is not a Legistar event id, skipping items');
  } else {
    try {
      eventItems = await source.listEventItems(eventId);
    } catch (err) {
      logger.error({ eventId, error: errorMessage(err) }, 'Failed to fetch agenda items');
      summary.errors++;
    }
  }

  const meetingDate = input.meeting_date ?? '';
  for (const eventItem of eventItems) {
    const item = toAgendaItemInput(eventItem, meetingId, meetingDate);
    if (!item) {
      continue;
    }
    try {
      await store.putIngestedItem(item);
      summary.items_stored++;
    } catch (err) {
      logger.error({ meetingId, title: item.title.slice(0, 50), error: errorMessage(err) }, 'Failed to store agenda item');
      summary.errors++;
    }
  }

  if (await scheduleAnalysis(deps, meetingId)) {
    summary.scheduled++;
  }
}

/**
 * Run one ingestion pass over events on or after `since`
 */
export async function runIngestion(deps: IngestionDeps, options: { since?: Date } = {}): Promise<IngestionSummary> {
  const summary: IngestionSummary = {
    fetched: 0,
    stored: 0,
    items_stored: 0,
    documents_stored: 0,
    scheduled: 0,
    errors: 0,
    aborted: false
  };

  let events: LegistarEvent[];
  try {
    events = await deps.source.listEvents(options.since);
  } catch (err) {
    deps.logger.error({ error: errorMessage(err) }, 'Failed to fetch meetings from Legistar');
    summary.aborted = true;
    return summary;
  }

  summary.fetched = events.length;
  deps.logger.info({ count: events.length, since: options.since?.toISOString() }, 'Fetched meetings from Legistar');

  for (const event of events) {
    await ingestMeeting(deps, event, summary);
  }

  deps.logger.info(
    {
      stored: summary.stored,
      items: summary.items_stored,
      documents: summary.documents_stored,
      scheduled: summary.scheduled,
      errors: summary.errors
    },
    'Ingestion complete'
  );
  return summary;
}
