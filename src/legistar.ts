/**
 * Legistar Web API client and record mapping
 *
 * Base URL: https://webapi.legistar.com/v1/{client}
 */

import { SourceApiError, errorMessage } from './errors.js';
import { SOURCE_RETRY_POLICY, withRetry, type RetryPolicy } from './retry.js';
import type { Logger } from './logger.js';
import type {
  AgendaItemInput,
  LegistarEvent,
  LegistarEventItem,
  MeetingDocumentInput,
  MeetingInput
} from './types.js';

export interface SourceClient {
  listEvents(since?: Date): Promise<LegistarEvent[]>;
  listEventItems(eventId: number): Promise<LegistarEventItem[]>;
}

export interface LegistarClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  retryPolicy?: RetryPolicy;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Legistar expects `datetime'2026-02-20T18:00:00'` without a zone suffix
 */
export function formatLegistarDate(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export class LegistarClient implements SourceClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: LegistarClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ component: 'legistar' });
    this.retryPolicy = options.retryPolicy ?? SOURCE_RETRY_POLICY;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep;
  }

  /**
   * Get events (meetings), optionally only those on or after `since`
   */
  async listEvents(since?: Date): Promise<LegistarEvent[]> {
    const url = new URL(`${this.baseUrl}/events`);
    if (since) {
      url.searchParams.set('$filter', `EventDate ge datetime'${formatLegistarDate(since)}'`);
    }
    return this.getJsonList<LegistarEvent>(url);
  }

  /**
   * Get agenda items for a specific event
   */
  async listEventItems(eventId: number): Promise<LegistarEventItem[]> {
    const url = new URL(`${this.baseUrl}/events/${eventId}/eventitems`);
    return this.getJsonList<LegistarEventItem>(url);
  }

  private async getJsonList<T>(url: URL): Promise<T[]> {
    const body = await withRetry(() => this.request(url), this.retryPolicy, {
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn(
          { url: url.toString(), attempt, delayMs, error: errorMessage(error) },
          'Legistar request failed, retrying'
        );
      }
    });

    if (!Array.isArray(body)) {
      throw new SourceApiError(`Expected a JSON array from ${url.pathname}`, {
        retryable: false,
        url: url.toString()
      });
    }
    return body;
  }

  /**
   * One GET with timeout; classifies failures for the retry policy
   */
  private async request(url: URL): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new SourceApiError(
        `Legistar request to ${url.pathname} failed: ${errorMessage(err)}`,
        { retryable: true, url: url.toString() },
        { cause: err }
      );
    }

    if (!response.ok) {
      // Release the connection before the retry opens a new one
      await response.body?.cancel().catch((err: unknown) => {
        this.logger.debug({ url: url.toString(), error: errorMessage(err) }, 'Could not discard error body');
      });
      throw new SourceApiError(`Legistar API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        retryable: response.status >= 500,
        url: url.toString()
      });
    }

    try {
      return await response.json();
    } catch (err) {
      // Only a malformed body is terminal; a timeout or reset mid-body is not
      if (err instanceof SyntaxError) {
        throw new SourceApiError(
          `Legistar returned invalid JSON for ${url.pathname}`,
          { status: response.status, retryable: false, url: url.toString() },
          { cause: err }
        );
      }
      throw new SourceApiError(
        `Legistar response from ${url.pathname} was interrupted: ${errorMessage(err)}`,
        { status: response.status, retryable: true, url: url.toString() },
        { cause: err }
      );
    }
  }
}

// =============================================================================
// MAPPING
// =============================================================================

function text(value: string | null | undefined, fallback: string = ''): string {
  return typeof value === 'string' && value !== '' ? value : fallback;
}

export function toMeetingInput(event: LegistarEvent, source: string): MeetingInput {
  const eventId = event.EventId;
  return {
    meeting_id: eventId !== undefined && eventId !== '' ? String(eventId) : undefined,
    source,
    body_name: text(event.EventBodyName, 'City Council'),
    title: text(event.EventBodyName, 'City Council Meeting'),
    meeting_date: text(event.EventDate),
    meeting_time: text(event.EventTime),
    location: text(event.EventLocation),
    url: text(event.EventInSiteURL)
  };
}

/**
 * Map a source item to a bare agenda item; null when the title is blank
 */
export function toAgendaItemInput(
  item: LegistarEventItem,
  meetingId: string,
  meetingDate: string
): AgendaItemInput | null {
  const title = item.EventItemTitle ?? '';
  if (title.trim() === '') {
    return null;
  }
  const sourceId = item.EventItemId;
  return {
    item_id: sourceId !== undefined && sourceId !== '' ? `${meetingId}-${sourceId}` : undefined,
    meeting_id: meetingId,
    title,
    topic: 'other',
    relevance: 1,
    summary: '',
    meeting_date: meetingDate
  };
}

export function toDocumentInputs(event: LegistarEvent, meetingId: string): MeetingDocumentInput[] {
  const bodyName = text(event.EventBodyName, 'City Council');
  const documents: MeetingDocumentInput[] = [];

  if (event.EventAgendaFile) {
    documents.push({
      document_id: `${meetingId}-agenda`,
      meeting_id: meetingId,
      document_type: 'agenda',
      url: event.EventAgendaFile,
      title: `${bodyName} Agenda`
    });
  }
  if (event.EventMinutesFile) {
    documents.push({
      document_id: `${meetingId}-minutes`,
      meeting_id: meetingId,
      document_type: 'minutes',
      url: event.EventMinutesFile,
      title: `${bodyName} Minutes`
    });
  }

  return documents;
}
