/**
 * Dispatch trigger payloads (scheduled runs and queued work) to the
 * pipeline stages
 */

import { analyzeMeetings, type EnrichmentDeps } from './enrich.js';
import { errorMessage } from './errors.js';
import { ingestionStart, runIngestion, type IngestionDeps } from './ingest.js';
import { parseWorkMessage } from './queue.js';
import type { Logger } from './logger.js';
import type { WorkMessage } from './types.js';

export interface HandlerDeps {
  ingestion: IngestionDeps;
  enrichment: EnrichmentDeps;
  lookbackDays: number;
  logger: Logger;
}

export interface HandlerResult {
  status: 'ok' | 'ignored';
  action?: WorkMessage['action'];
  processed: number;
  errors: number;
}

/**
 * Handle one trigger payload. Partial failures are reported in the counts;
 * the call itself only fails for a malformed payload.
 */
export async function handleWorkMessage(payload: unknown, deps: HandlerDeps): Promise<HandlerResult> {
  let message: WorkMessage | null;
  try {
    message = parseWorkMessage(payload);
  } catch (err) {
    deps.logger.error({ error: errorMessage(err) }, 'Invalid work message');
    return { status: 'ok', processed: 0, errors: 1 };
  }

  if (!message) {
    deps.logger.debug({ payload }, 'Ignoring work message with unknown action');
    return { status: 'ignored', processed: 0, errors: 0 };
  }

  switch (message.action) {
    case 'ingest_meetings': {
      const summary = await runIngestion(deps.ingestion, { since: ingestionStart(deps.lookbackDays) });
      return { status: 'ok', action: message.action, processed: summary.stored, errors: summary.errors };
    }
    case 'analyze_meeting': {
      const summary = await analyzeMeetings(deps.enrichment, [message.meeting_id]);
      return { status: 'ok', action: message.action, processed: summary.processed, errors: summary.errors };
    }
  }
}
