/**
 * Council Brief
 *
 * Ingests city council meetings from Legistar, enriches agenda items with
 * model-generated analysis, and serves them through a read API with keyword
 * search.
 */

export { loadConfig, type AppConfig } from './config.js';
export { createLogger, createSilentLogger, type Logger } from './logger.js';
export * from './errors.js';
export { LegistarClient, type SourceClient } from './legistar.js';
export { createRecordStore, MemoryRecordStore, MongoRecordStore, type RecordStore } from './store/index.js';
export { Analyzer, OpenAIModelClient, createOpenAIAnalyzer, type ModelClient } from './analyze.js';
export { runIngestion, type IngestionSummary } from './ingest.js';
export { analyzeMeeting, analyzeMeetings, type EnrichmentSummary } from './enrich.js';
export { searchItems, searchStats, rankItems } from './search.js';
export { BullWorkQueue, InlineWorkQueue, parseWorkMessage, type WorkQueue } from './queue.js';
export { handleWorkMessage, type HandlerResult } from './handlers.js';
export { createApp } from './api/app.js';
export { createRuntime, type Runtime } from './runtime.js';
export * from './types.js';
