#!/usr/bin/env node
/**
 * CLI for ingesting meetings from Legistar
 *
 * Usage:
 *   npm run ingest                        # Use INGEST_LOOKBACK_DAYS
 *   npm run ingest -- --since 2025-01-01  # Ingest meetings on or after a date
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { ingestionStart, runIngestion } from '../ingest.js';
import { createRuntime, ingestionDeps } from '../runtime.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

async function ingest() {
  const config = loadConfig(process.env);
  const since = args.since ? new Date(String(args.since)) : ingestionStart(config.legistar.lookbackDays);
  if (Number.isNaN(since.getTime())) {
    throw new Error(`Invalid --since date: ${String(args.since)}`);
  }

  const runtime = await createRuntime(config);
  try {
    console.log(`Ingesting ${config.legistar.client} meetings since ${since.toISOString().slice(0, 10)}...`);
    const summary = await runIngestion(ingestionDeps(runtime), { since });
    console.log(`\nFetched: ${summary.fetched}`);
    console.log(`Meetings stored: ${summary.stored}`);
    console.log(`Items stored: ${summary.items_stored}`);
    console.log(`Documents stored: ${summary.documents_stored}`);
    console.log(`Analysis scheduled: ${summary.scheduled}`);
    console.log(`Errors: ${summary.errors}`);
    if (summary.aborted) {
      process.exitCode = 1;
    }
  } finally {
    await runtime.close();
  }
}

ingest().catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
