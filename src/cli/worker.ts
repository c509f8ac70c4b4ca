#!/usr/bin/env node
/**
 * CLI for the queue worker: scheduled ingestion plus queued analysis
 *
 * Usage:
 *   npm run worker       # Requires REDIS_URL
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { createWorkQueue } from '../queue.js';
import { createAnalyzer, createRuntime, handlerDeps } from '../runtime.js';
import { startWorker } from '../worker.js';
import { createLogger } from '../logger.js';

async function work() {
  const config = loadConfig(process.env);
  const queue = createWorkQueue(config.queue, createLogger(config));
  if (!queue) {
    throw new Error('REDIS_URL is required to run the worker');
  }

  const runtime = await createRuntime(config, { queue });
  const shutdown = () => {
    runtime.logger.info('Shutting down worker');
    runtime.close().then(
      () => process.exit(0),
      (err: unknown) => {
        runtime.logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await startWorker(queue, handlerDeps(runtime, createAnalyzer(runtime)), {
    ingestCron: config.queue.ingestCron
  });
}

work().catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
