/**
 * In-process record store for local runs (STORE_DRIVER=memory) and tests.
 * Data lives for the lifetime of the process.
 */

import { buildDocument, buildMeeting, normalizeAgendaItem } from '../records.js';
import type {
  AgendaItem,
  AgendaItemInput,
  Meeting,
  MeetingDocument,
  MeetingDocumentInput,
  MeetingInput,
  Topic
} from '../types.js';
import { byDateDesc, type ListMeetingsOptions, type RecordStore } from './types.js';

const meetingOrder = byDateDesc<Meeting>(m => m.meeting_id);
const itemOrder = byDateDesc<AgendaItem>(i => i.item_id);

export class MemoryRecordStore implements RecordStore {
  readonly backend: string = 'memory';

  private readonly meetings = new Map<string, Meeting>();
  private readonly items = new Map<string, AgendaItem>();
  private readonly documents = new Map<string, MeetingDocument>();

  async putMeeting(input: MeetingInput): Promise<string> {
    const meeting = buildMeeting(input);
    this.meetings.set(meeting.meeting_id, meeting);
    return meeting.meeting_id;
  }

  async getMeeting(meetingId: string): Promise<Meeting | null> {
    const meeting = this.meetings.get(meetingId);
    return meeting ? structuredClone(meeting) : null;
  }

  async listMeetings(options: ListMeetingsOptions): Promise<Meeting[]> {
    const { body, limit } = options;
    return [...this.meetings.values()]
      .filter(m => body === undefined || m.body_name === body)
      .sort(meetingOrder)
      .slice(0, limit)
      .map(m => structuredClone(m));
  }

  async countMeetings(): Promise<number> {
    return this.meetings.size;
  }

  async putAgendaItem(input: AgendaItemInput): Promise<string> {
    const item = normalizeAgendaItem(input);
    this.items.set(item.item_id, item);
    return item.item_id;
  }

  async putIngestedItem(input: AgendaItemInput): Promise<string> {
    const item = normalizeAgendaItem(input);
    const existing = this.items.get(item.item_id);
    this.items.set(
      item.item_id,
      existing
        ? { ...existing, meeting_id: item.meeting_id, title: item.title, meeting_date: item.meeting_date }
        : item
    );
    return item.item_id;
  }

  async getAgendaItem(itemId: string): Promise<AgendaItem | null> {
    const item = this.items.get(itemId);
    return item ? structuredClone(item) : null;
  }

  async listItemsForMeeting(meetingId: string): Promise<AgendaItem[]> {
    return [...this.items.values()]
      .filter(i => i.meeting_id === meetingId)
      .map(i => structuredClone(i));
  }

  async listItemsByTopic(topic: Topic, limit: number): Promise<AgendaItem[]> {
    return [...this.items.values()]
      .filter(i => i.topic === topic)
      .sort(itemOrder)
      .slice(0, limit)
      .map(i => structuredClone(i));
  }

  async listRecentItems(limit: number): Promise<AgendaItem[]> {
    return [...this.items.values()]
      .sort(itemOrder)
      .slice(0, limit)
      .map(i => structuredClone(i));
  }

  async countAgendaItems(): Promise<number> {
    return this.items.size;
  }

  async putDocument(input: MeetingDocumentInput): Promise<string> {
    const document = buildDocument(input);
    this.documents.set(document.document_id, document);
    return document.document_id;
  }

  async getDocument(documentId: string): Promise<MeetingDocument | null> {
    const document = this.documents.get(documentId);
    return document ? structuredClone(document) : null;
  }

  async listDocumentsForMeeting(meetingId: string): Promise<MeetingDocument[]> {
    return [...this.documents.values()]
      .filter(d => d.meeting_id === meetingId)
      .map(d => structuredClone(d));
  }

  async ensureIndexes(): Promise<void> {}

  async close(): Promise<void> {}
}
