/**
 * Work messages and the queues that carry them
 */

import Bull from 'bull';
import { z } from 'zod';
import { InvalidWorkMessageError } from './errors.js';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import type { WorkMessage } from './types.js';

export interface WorkQueue {
  send(message: WorkMessage): Promise<void>;
  close(): Promise<void>;
}

/**
 * Holds messages in memory until drained. Used when ingestion and analysis
 * run in the same process.
 */
export class InlineWorkQueue implements WorkQueue {
  private readonly pending: WorkMessage[] = [];

  async send(message: WorkMessage): Promise<void> {
    this.pending.push(message);
  }

  get size(): number {
    return this.pending.length;
  }

  /** Remove and return everything queued so far */
  drain(): WorkMessage[] {
    return this.pending.splice(0, this.pending.length);
  }

  async close(): Promise<void> {}
}

export class BullWorkQueue implements WorkQueue {
  constructor(readonly queue: Bull.Queue<WorkMessage>) {}

  async send(message: WorkMessage): Promise<void> {
    await this.queue.add(message, { removeOnComplete: true, removeOnFail: 100 });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

/**
 * Bull queue on REDIS_URL, or null when no queue is configured
 */
export function createWorkQueue(config: AppConfig['queue'], logger: Logger): BullWorkQueue | null {
  if (!config.redisUrl) {
    return null;
  }
  const queue = new Bull<WorkMessage>(config.name, config.redisUrl);
  queue.on('error', (error) => {
    logger.error({ queue: config.name, error: error.message }, 'Work queue error');
  });
  return new BullWorkQueue(queue);
}

const ActionSchema = z.object({ action: z.string().optional() }).passthrough();

const AnalyzeMeetingSchema = z.object({
  action: z.literal('analyze_meeting'),
  meeting_id: z.string().trim().min(1)
});

/**
 * Interpret a trigger payload.
 *
 * An empty payload, or one without an action, is the scheduled trigger and
 * means a full ingestion pass. Unknown actions return null.
 */
export function parseWorkMessage(payload: unknown): WorkMessage | null {
  if (payload === undefined || payload === null || payload === '') {
    return { action: 'ingest_meetings' };
  }

  const envelope = ActionSchema.safeParse(payload);
  if (!envelope.success) {
    throw new InvalidWorkMessageError('Work message must be a JSON object');
  }

  switch (envelope.data.action) {
    case undefined:
    case 'ingest_meetings':
      return { action: 'ingest_meetings' };
    case 'analyze_meeting': {
      const parsed = AnalyzeMeetingSchema.safeParse(payload);
      if (!parsed.success) {
        throw new InvalidWorkMessageError('analyze_meeting requires a meeting_id');
      }
      return parsed.data;
    }
    default:
      return null;
  }
}
