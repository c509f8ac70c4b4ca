/**
 * Record construction and normalisation
 *
 * Every agenda item written to the store passes through
 * `normalizeAgendaItem`, so the range and enumeration invariants hold for
 * all persisted items regardless of where the values came from.
 */

import { randomUUID } from 'node:crypto';
import {
  TOPICS,
  ITEM_STATUSES,
  DECISIONS,
  type AgendaItem,
  type AgendaItemInput,
  type AnalyzedItem,
  type Decision,
  type ItemAnalysis,
  type ItemStatus,
  type Meeting,
  type MeetingDocument,
  type MeetingDocumentInput,
  type MeetingInput,
  type Topic
} from './types.js';

export const RELEVANCE_RANGE = { min: 1, max: 5 } as const;
export const AXIS_RANGE = { min: -5, max: 5 } as const;

const topicSet: ReadonlySet<string> = new Set(TOPICS);
const statusSet: ReadonlySet<string> = new Set(ITEM_STATUSES);
const decisionSet: ReadonlySet<string> = new Set(DECISIONS);

function isTopic(value: string): value is Topic {
  return topicSet.has(value);
}

function isStatus(value: string): value is ItemStatus {
  return statusSet.has(value);
}

function isDecision(value: string): value is Decision {
  return decisionSet.has(value);
}

/**
 * Round to an integer and clamp into [min, max]; non-numeric input yields
 * the fallback
 */
export function clampInt(value: unknown, min: number, max: number, fallback: number): number {
  const num = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(num)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.round(num)));
}

function enumToken(value: unknown): string {
  return typeof value === 'string' ? value.trim().toLowerCase().replace(/[\s-]+/g, '_') : '';
}

export function toTopic(value: unknown): Topic {
  const token = enumToken(value);
  return isTopic(token) ? token : 'other';
}

export function toStatus(value: unknown): ItemStatus | null {
  const token = enumToken(value);
  return isStatus(token) ? token : null;
}

export function toDecision(value: unknown): Decision | null {
  const token = enumToken(value);
  return isDecision(token) ? token : null;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return typeof value === 'string' && value.trim() !== '' ? [value] : [];
  }
  return value.map(toText).filter(detail => detail.trim() !== '');
}

/**
 * Coerce loosely-typed analysis fields into a valid `ItemAnalysis`
 */
export function normalizeAnalysis(fields: Record<string, unknown>): ItemAnalysis {
  return {
    topic: toTopic(fields.topic),
    relevance: clampInt(fields.relevance, RELEVANCE_RANGE.min, RELEVANCE_RANGE.max, RELEVANCE_RANGE.min),
    summary: toText(fields.summary),
    key_details: toStringList(fields.key_details),
    why_it_matters: toText(fields.why_it_matters),
    status: toStatus(fields.status),
    decision: toDecision(fields.decision),
    economic_axis: clampInt(fields.economic_axis, AXIS_RANGE.min, AXIS_RANGE.max, 0),
    social_axis: clampInt(fields.social_axis, AXIS_RANGE.min, AXIS_RANGE.max, 0)
  };
}

/**
 * Normalise one item object from a model response. Returns null when the
 * item has no usable title.
 */
export function normalizeAnalyzedItem(value: unknown): AnalyzedItem | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  const fields: Record<string, unknown> = { ...value };
  const title = toText(fields.title).trim();
  if (title === '') {
    return null;
  }
  const item: AnalyzedItem = { title, ...normalizeAnalysis(fields) };
  const itemId = toText(fields.item_id).trim();
  if (itemId !== '') item.item_id = itemId;
  return item;
}

/**
 * Build a complete agenda item record with defaults applied
 */
export function normalizeAgendaItem(input: AgendaItemInput, now: Date = new Date()): AgendaItem {
  const item: AgendaItem = {
    item_id: input.item_id || randomUUID(),
    meeting_id: input.meeting_id,
    title: input.title,
    meeting_date: input.meeting_date ?? '',
    created_at: input.created_at ?? now.toISOString(),
    ...normalizeAnalysis({ ...input })
  };
  if (input.analyzed_at) item.analyzed_at = input.analyzed_at;
  if (input.model_used) item.model_used = input.model_used;
  return item;
}

export function buildMeeting(input: MeetingInput, now: Date = new Date()): Meeting {
  return {
    meeting_id: input.meeting_id || randomUUID(),
    source: input.source ?? '',
    body_name: input.body_name || 'City Council',
    title: input.title ?? '',
    meeting_date: input.meeting_date ?? '',
    meeting_time: input.meeting_time ?? '',
    location: input.location ?? '',
    url: input.url ?? '',
    created_at: now.toISOString()
  };
}

export function buildDocument(input: MeetingDocumentInput, now: Date = new Date()): MeetingDocument {
  return {
    document_id: input.document_id || randomUUID(),
    meeting_id: input.meeting_id,
    document_type: input.document_type,
    url: input.url,
    title: input.title ?? '',
    created_at: now.toISOString(),
    processed: input.processed ?? false
  };
}
