/**
 * Queue consumer: runs queued work and the periodic ingestion trigger
 */

import { errorMessage } from './errors.js';
import { handleWorkMessage, type HandlerDeps } from './handlers.js';
import type { BullWorkQueue } from './queue.js';

export const SCHEDULED_INGEST_JOB_ID = 'scheduled-ingest';

export async function startWorker(
  workQueue: BullWorkQueue,
  deps: HandlerDeps,
  options: { ingestCron: string }
): Promise<void> {
  const { queue } = workQueue;

  queue
    .process(async (job) => {
      const result = await handleWorkMessage(job.data, deps);
      deps.logger.info({ jobId: job.id, ...result }, 'Work message handled');
      return result;
    })
    .catch((err: unknown) => {
      deps.logger.error({ error: errorMessage(err) }, 'Queue processor stopped');
    });

  await queue.add(
    { action: 'ingest_meetings' },
    { repeat: { cron: options.ingestCron }, jobId: SCHEDULED_INGEST_JOB_ID, removeOnComplete: true }
  );

  deps.logger.info({ queue: queue.name, ingestCron: options.ingestCron }, 'Worker started');
}
