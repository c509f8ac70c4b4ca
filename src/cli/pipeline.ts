#!/usr/bin/env node
/**
 * CLI for running ingestion and analysis in one process, without a queue
 *
 * Usage:
 *   npm run pipeline                          # Ingest with INGEST_LOOKBACK_DAYS, then analyze
 *   npm run pipeline -- --since 2025-01-01
 *   npm run pipeline -- --skip-analysis       # Ingest only
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { analyzeMeetings } from '../enrich.js';
import { ingestionStart, runIngestion } from '../ingest.js';
import { InlineWorkQueue } from '../queue.js';
import { createAnalyzer, createRuntime, enrichmentDeps, ingestionDeps } from '../runtime.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));
const skipAnalysis = Boolean(args['skip-analysis']);

async function runPipeline() {
  const config = loadConfig(process.env);
  const since = args.since ? new Date(String(args.since)) : ingestionStart(config.legistar.lookbackDays);
  if (Number.isNaN(since.getTime())) {
    throw new Error(`Invalid --since date: ${String(args.since)}`);
  }

  const queue = new InlineWorkQueue();
  const runtime = await createRuntime(config, { queue });

  try {
    console.log(`\n========================================`);
    console.log(`Running pipeline for ${config.legistar.client}`);
    console.log(`========================================\n`);

    // Step 1: Ingest
    console.log(`[1/2] Ingesting meetings since ${since.toISOString().slice(0, 10)}...`);
    console.log('----------------------------------------');
    const ingestion = await runIngestion(ingestionDeps(runtime), { since });
    console.log(`Stored ${ingestion.stored} meeting(s), ${ingestion.items_stored} item(s), ${ingestion.errors} error(s)`);
    console.log('');

    if (ingestion.aborted) {
      throw new Error('Could not list meetings from Legistar');
    }

    // Step 2: Analyze
    const meetingIds = queue
      .drain()
      .flatMap(message => (message.action === 'analyze_meeting' ? [message.meeting_id] : []));

    if (skipAnalysis) {
      console.log(`[2/2] Skipping analysis (--skip-analysis)`);
      console.log('');
    } else {
      console.log(`[2/2] Analyzing ${meetingIds.length} meeting(s)...`);
      console.log('----------------------------------------');
      const enrichment = await analyzeMeetings(enrichmentDeps(runtime, createAnalyzer(runtime)), meetingIds, {
        delayMs: config.openai.delayMs
      });
      console.log(`Analyzed ${enrichment.processed} meeting(s), ${enrichment.errors} error(s)`);
      console.log('');
    }

    console.log(`========================================`);
    console.log(`Pipeline complete`);
    console.log(`========================================\n`);
  } finally {
    await runtime.close();
  }
}

runPipeline().catch((err) => {
  console.error('Pipeline error:', err.message);
  process.exit(1);
});
