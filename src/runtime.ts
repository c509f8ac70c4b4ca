/**
 * Process wiring: build every client once and hand them to the pipeline
 */

import { createOpenAIAnalyzer, type Analyzer } from './analyze.js';
import { LegistarClient } from './legistar.js';
import { createLogger, type Logger } from './logger.js';
import { createWorkQueue, type WorkQueue } from './queue.js';
import { createRecordStore, type RecordStore } from './store/index.js';
import type { AppConfig } from './config.js';
import type { EnrichmentDeps } from './enrich.js';
import type { HandlerDeps } from './handlers.js';
import type { IngestionDeps } from './ingest.js';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  store: RecordStore;
  source: LegistarClient;
  queue: WorkQueue | null;
  close(): Promise<void>;
}

export async function createRuntime(
  config: AppConfig,
  options: { queue?: WorkQueue | null } = {}
): Promise<Runtime> {
  const logger = createLogger(config);
  const store = await createRecordStore(config.store, logger);
  const source = new LegistarClient({
    baseUrl: config.legistar.baseUrl,
    timeoutMs: config.legistar.timeoutMs,
    logger
  });
  const queue = options.queue !== undefined ? options.queue : createWorkQueue(config.queue, logger);

  return {
    config,
    logger,
    store,
    source,
    queue,
    async close() {
      await queue?.close();
      await store.close();
    }
  };
}

export function ingestionDeps(runtime: Runtime): IngestionDeps {
  return {
    source: runtime.source,
    store: runtime.store,
    queue: runtime.queue,
    logger: runtime.logger.child({ component: 'ingest' }),
    sourceName: runtime.config.legistar.client
  };
}

export function createAnalyzer(runtime: Runtime): Analyzer {
  return createOpenAIAnalyzer(runtime.config.openai, runtime.logger);
}

export function enrichmentDeps(runtime: Runtime, analyzer: Analyzer): EnrichmentDeps {
  return {
    store: runtime.store,
    analyzer,
    logger: runtime.logger.child({ component: 'enrich' })
  };
}

export function handlerDeps(runtime: Runtime, analyzer: Analyzer): HandlerDeps {
  return {
    ingestion: ingestionDeps(runtime),
    enrichment: enrichmentDeps(runtime, analyzer),
    lookbackDays: runtime.config.legistar.lookbackDays,
    logger: runtime.logger
  };
}
