import type {
  AgendaItem,
  AgendaItemInput,
  Meeting,
  MeetingDocument,
  MeetingDocumentInput,
  MeetingInput,
  Topic
} from '../types.js';

export interface ListMeetingsOptions {
  /** Restrict to one governing body */
  body?: string;
  limit: number;
}

/**
 * Durable keyed storage for meetings, agenda items and documents.
 *
 * `put*` methods upsert by primary id (last writer wins) and return the id.
 * Date-ordered listings are newest first with ties broken by primary id.
 * Every driver failure surfaces as a `RecordStoreError`.
 */
export interface RecordStore {
  readonly backend: string;

  putMeeting(input: MeetingInput): Promise<string>;
  getMeeting(meetingId: string): Promise<Meeting | null>;
  listMeetings(options: ListMeetingsOptions): Promise<Meeting[]>;
  countMeetings(): Promise<number>;

  putAgendaItem(input: AgendaItemInput): Promise<string>;
  /**
   * Upsert the fields ingestion owns (`meeting_id`, `title`,
   * `meeting_date`). Analysis fields and `created_at` are only written when
   * the item is new, so stored analysis survives re-ingestion.
   */
  putIngestedItem(input: AgendaItemInput): Promise<string>;
  getAgendaItem(itemId: string): Promise<AgendaItem | null>;
  /** All items of a meeting, in store order */
  listItemsForMeeting(meetingId: string): Promise<AgendaItem[]>;
  listItemsByTopic(topic: Topic, limit: number): Promise<AgendaItem[]>;
  /** Most recent items by meeting date, at most `limit` */
  listRecentItems(limit: number): Promise<AgendaItem[]>;
  countAgendaItems(): Promise<number>;

  putDocument(input: MeetingDocumentInput): Promise<string>;
  getDocument(documentId: string): Promise<MeetingDocument | null>;
  listDocumentsForMeeting(meetingId: string): Promise<MeetingDocument[]>;

  ensureIndexes(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Newest meeting date first, then primary id ascending
 */
export function byDateDesc<T extends { meeting_date: string }>(idOf: (record: T) => string) {
  return (a: T, b: T): number => {
    if (a.meeting_date !== b.meeting_date) {
      return a.meeting_date < b.meeting_date ? 1 : -1;
    }
    const idA = idOf(a);
    const idB = idOf(b);
    return idA < idB ? -1 : idA > idB ? 1 : 0;
  };
}
