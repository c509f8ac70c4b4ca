/**
 * Type definitions for the meeting ingestion and enrichment pipeline
 */

// =============================================================================
// RAW DATA TYPES (from Legistar Web API)
// =============================================================================

export interface LegistarEvent {
  EventId?: number | string;
  EventBodyName?: string;
  EventDate?: string;
  EventTime?: string;
  EventLocation?: string;
  EventInSiteURL?: string;
  EventAgendaFile?: string | null;
  EventMinutesFile?: string | null;
  EventComment?: string | null;
}

export interface LegistarEventItem {
  EventItemId?: number | string;
  EventItemTitle?: string | null;
  EventItemAgendaNumber?: string | null;
  EventItemActionName?: string | null;
  EventItemMover?: string | null;
}

// =============================================================================
// ENUMERATIONS
// =============================================================================

export const TOPICS = [
  'housing',
  'zoning',
  'taxes',
  'budget',
  'transportation',
  'parks',
  'environment',
  'public_safety',
  'infrastructure',
  'development',
  'permits',
  'other'
] as const;

export type Topic = (typeof TOPICS)[number];

export const ITEM_STATUSES = [
  'first_reading',
  'final_reading',
  'hearing',
  'consent',
  'action',
  'informational'
] as const;

export type ItemStatus = (typeof ITEM_STATUSES)[number];

export const DECISIONS = ['approved', 'denied', 'deferred', 'pending'] as const;

export type Decision = (typeof DECISIONS)[number];

export type DocumentType = 'agenda' | 'minutes';

// =============================================================================
// STORED RECORDS
// =============================================================================

export interface Meeting {
  meeting_id: string;
  source: string;
  body_name: string;
  title: string;
  meeting_date: string;
  meeting_time: string;
  location: string;
  url: string;
  created_at: string;
}

export interface MeetingInput {
  meeting_id?: string;
  source?: string;
  body_name?: string;
  title?: string;
  meeting_date?: string;
  meeting_time?: string;
  location?: string;
  url?: string;
}

/** Model-derived fields of an agenda item. */
export interface ItemAnalysis {
  topic: Topic;
  relevance: number;
  summary: string;
  key_details: string[];
  why_it_matters: string;
  status: ItemStatus | null;
  decision: Decision | null;
  economic_axis: number;
  social_axis: number;
}

export interface AgendaItem extends ItemAnalysis {
  item_id: string;
  meeting_id: string;
  title: string;
  meeting_date: string;
  created_at: string;
  analyzed_at?: string;
  model_used?: string;
}

export interface AgendaItemInput extends Partial<ItemAnalysis> {
  item_id?: string;
  meeting_id: string;
  title: string;
  meeting_date?: string;
  created_at?: string;
  analyzed_at?: string;
  model_used?: string;
}

export interface MeetingDocument {
  document_id: string;
  meeting_id: string;
  document_type: DocumentType;
  url: string;
  title: string;
  created_at: string;
  processed: boolean;
}

export interface MeetingDocumentInput {
  document_id?: string;
  meeting_id: string;
  document_type: DocumentType;
  url: string;
  title?: string;
  processed?: boolean;
}

// =============================================================================
// ANALYSIS TYPES
// =============================================================================

export interface AnalyzedItem extends ItemAnalysis {
  title: string;
  /** Id of the stored item the analysis refers to, when the model echoed one */
  item_id?: string;
}

/**
 * Result of one analysis call. When `error` is set the model response could
 * not be parsed; `raw` then holds the start of the response and `items` is
 * whatever could be recovered (usually nothing).
 */
export interface AnalysisResult {
  summary: string;
  items: AnalyzedItem[];
  notable_items: string[];
  model: string;
  error?: string;
  raw?: string;
}

// =============================================================================
// WORK MESSAGES
// =============================================================================

export interface IngestMeetingsMessage {
  action: 'ingest_meetings';
}

export interface AnalyzeMeetingMessage {
  action: 'analyze_meeting';
  meeting_id: string;
}

export type WorkMessage = IngestMeetingsMessage | AnalyzeMeetingMessage;
