import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { MemoryRecordStore } from './memory.js';
import { MongoRecordStore } from './mongo.js';
import type { RecordStore } from './types.js';

export { MemoryRecordStore } from './memory.js';
export { MongoRecordStore } from './mongo.js';
export type { ListMeetingsOptions, RecordStore } from './types.js';

/**
 * Open the record store selected by STORE_DRIVER
 */
export async function createRecordStore(config: AppConfig['store'], logger: Logger): Promise<RecordStore> {
  if (config.driver === 'memory') {
    logger.warn('Using in-memory record store; data is lost when the process exits');
    return new MemoryRecordStore();
  }
  return MongoRecordStore.connect(config, logger);
}
