/**
 * MongoDB record store
 *
 * One collection per entity kind. Access paths are declared in
 * `ensureIndexes`; every read goes through one of them.
 */

import { MongoClient, type Collection, type Db, type Filter } from 'mongodb';
import { RecordStoreError, errorMessage } from '../errors.js';
import { buildDocument, buildMeeting, normalizeAgendaItem } from '../records.js';
import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type {
  AgendaItem,
  AgendaItemInput,
  Meeting,
  MeetingDocument,
  MeetingDocumentInput,
  MeetingInput,
  Topic
} from '../types.js';
import type { ListMeetingsOptions, RecordStore } from './types.js';

/** Cursor batch size for bounded range reads */
const PAGE_SIZE = 200;

const NO_ID = { projection: { _id: 0 } } as const;

export class MongoRecordStore implements RecordStore {
  readonly backend: string = 'mongodb';

  private readonly meetings: Collection<Meeting>;
  private readonly items: Collection<AgendaItem>;
  private readonly documents: Collection<MeetingDocument>;
  private readonly logger: Logger;

  constructor(
    db: Db,
    collections: AppConfig['store']['collections'],
    logger: Logger,
    private readonly client?: MongoClient
  ) {
    this.meetings = db.collection<Meeting>(collections.meetings);
    this.items = db.collection<AgendaItem>(collections.agendaItems);
    this.documents = db.collection<MeetingDocument>(collections.documents);
    this.logger = logger.child({ component: 'mongo-store' });
  }

  /**
   * Connect and return a store that owns the client
   */
  static async connect(config: AppConfig['store'], logger: Logger): Promise<MongoRecordStore> {
    const client = new MongoClient(config.mongoUri, { serverSelectionTimeoutMS: 5000 });
    try {
      await client.connect();
    } catch (err) {
      throw new RecordStoreError('connect', config.database, errorMessage(err), { cause: err });
    }
    logger.info({ database: config.database }, 'Connected to MongoDB');
    return new MongoRecordStore(client.db(config.database), config.collections, logger, client);
  }

  private async run<T>(
    operation: string,
    collection: { collectionName: string },
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RecordStoreError) {
        throw err;
      }
      this.logger.error({ operation, collection: collection.collectionName, error: errorMessage(err) }, 'Store operation failed');
      throw new RecordStoreError(operation, collection.collectionName, errorMessage(err), { cause: err });
    }
  }

  // --- Meetings ---

  async putMeeting(input: MeetingInput): Promise<string> {
    const meeting = buildMeeting(input);
    await this.run('replaceOne', this.meetings, () =>
      this.meetings.replaceOne({ meeting_id: meeting.meeting_id }, meeting, { upsert: true })
    );
    this.logger.debug({ meetingId: meeting.meeting_id }, 'Stored meeting');
    return meeting.meeting_id;
  }

  async getMeeting(meetingId: string): Promise<Meeting | null> {
    return this.run('findOne', this.meetings, () =>
      this.meetings.findOne({ meeting_id: meetingId }, NO_ID)
    );
  }

  async listMeetings(options: ListMeetingsOptions): Promise<Meeting[]> {
    const filter: Filter<Meeting> = options.body !== undefined ? { body_name: options.body } : {};
    return this.run('find', this.meetings, () =>
      this.meetings
        .find(filter, NO_ID)
        .sort({ meeting_date: -1, meeting_id: 1 })
        .limit(options.limit)
        .toArray()
    );
  }

  async countMeetings(): Promise<number> {
    return this.run('estimatedDocumentCount', this.meetings, () => this.meetings.estimatedDocumentCount());
  }

  // --- Agenda items ---

  async putAgendaItem(input: AgendaItemInput): Promise<string> {
    const item = normalizeAgendaItem(input);
    await this.run('replaceOne', this.items, () =>
      this.items.replaceOne({ item_id: item.item_id }, item, { upsert: true })
    );
    return item.item_id;
  }

  async putIngestedItem(input: AgendaItemInput): Promise<string> {
    const { item_id, meeting_id, title, meeting_date, ...onInsert } = normalizeAgendaItem(input);
    await this.run('updateOne', this.items, () =>
      this.items.updateOne(
        { item_id },
        { $set: { meeting_id, title, meeting_date }, $setOnInsert: onInsert },
        { upsert: true }
      )
    );
    return item_id;
  }

  async getAgendaItem(itemId: string): Promise<AgendaItem | null> {
    return this.run('findOne', this.items, () => this.items.findOne({ item_id: itemId }, NO_ID));
  }

  async listItemsForMeeting(meetingId: string): Promise<AgendaItem[]> {
    return this.run('find', this.items, () =>
      this.items.find({ meeting_id: meetingId }, NO_ID).toArray()
    );
  }

  async listItemsByTopic(topic: Topic, limit: number): Promise<AgendaItem[]> {
    return this.run('find', this.items, () =>
      this.items
        .find({ topic }, NO_ID)
        .sort({ meeting_date: -1, item_id: 1 })
        .limit(limit)
        .toArray()
    );
  }

  async listRecentItems(limit: number): Promise<AgendaItem[]> {
    return this.run('find', this.items, async () => {
      const cursor = this.items
        .find({}, NO_ID)
        .sort({ meeting_date: -1, item_id: 1 })
        .limit(limit)
        .batchSize(PAGE_SIZE);

      const results: AgendaItem[] = [];
      try {
        for await (const item of cursor) {
          results.push(item);
        }
      } finally {
        await cursor.close();
      }
      return results;
    });
  }

  async countAgendaItems(): Promise<number> {
    return this.run('estimatedDocumentCount', this.items, () => this.items.estimatedDocumentCount());
  }

  // --- Documents ---

  async putDocument(input: MeetingDocumentInput): Promise<string> {
    const document = buildDocument(input);
    await this.run('replaceOne', this.documents, () =>
      this.documents.replaceOne({ document_id: document.document_id }, document, { upsert: true })
    );
    return document.document_id;
  }

  async getDocument(documentId: string): Promise<MeetingDocument | null> {
    return this.run('findOne', this.documents, () =>
      this.documents.findOne({ document_id: documentId }, NO_ID)
    );
  }

  async listDocumentsForMeeting(meetingId: string): Promise<MeetingDocument[]> {
    return this.run('find', this.documents, () =>
      this.documents.find({ meeting_id: meetingId }, NO_ID).toArray()
    );
  }

  // --- Lifecycle ---

  async ensureIndexes(): Promise<void> {
    await this.run('createIndexes', this.meetings, () =>
      this.meetings.createIndexes([
        { key: { meeting_id: 1 }, name: 'meeting_id_unique', unique: true },
        { key: { body_name: 1, meeting_date: -1 }, name: 'body_date' },
        { key: { meeting_date: -1, meeting_id: 1 }, name: 'date' }
      ])
    );
    await this.run('createIndexes', this.items, () =>
      this.items.createIndexes([
        { key: { item_id: 1 }, name: 'item_id_unique', unique: true },
        { key: { meeting_id: 1 }, name: 'meeting' },
        { key: { topic: 1, meeting_date: -1 }, name: 'topic_date' },
        { key: { meeting_date: -1, item_id: 1 }, name: 'date' }
      ])
    );
    await this.run('createIndexes', this.documents, () =>
      this.documents.createIndexes([
        { key: { document_id: 1 }, name: 'document_id_unique', unique: true },
        { key: { meeting_id: 1 }, name: 'meeting' }
      ])
    );
    this.logger.info('Ensured record store indexes');
  }

  async close(): Promise<void> {
    await this.client?.close();
  }
}
