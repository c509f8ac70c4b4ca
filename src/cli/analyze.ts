#!/usr/bin/env node
/**
 * CLI for analyzing stored meetings with the model
 *
 * Usage:
 *   npm run analyze -- --meeting 12345
 *   npm run analyze -- --meeting 12345,12346
 *   npm run analyze -- --recent 5          # Analyze the 5 most recent meetings
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { analyzeMeetings } from '../enrich.js';
import { createAnalyzer, createRuntime, enrichmentDeps } from '../runtime.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

const meetingIds = args.meeting
  ? String(args.meeting).split(',').map(id => id.trim()).filter(id => id !== '')
  : [];
const recent = args.recent ? parseInt(String(args.recent), 10) : undefined;

if (meetingIds.length === 0 && !recent) {
  console.error('Usage: npm run analyze -- --meeting <id[,id...]> | --recent <n>');
  process.exit(1);
}

async function analyze() {
  const config = loadConfig(process.env);
  const runtime = await createRuntime(config, { queue: null });
  try {
    const analyzer = createAnalyzer(runtime);
    const ids = meetingIds.length > 0
      ? meetingIds
      : (await runtime.store.listMeetings({ limit: recent ?? 1 })).map(m => m.meeting_id);

    console.log(`Analyzing ${ids.length} meeting(s) with ${config.openai.model}...`);
    const summary = await analyzeMeetings(enrichmentDeps(runtime, analyzer), ids, {
      delayMs: config.openai.delayMs
    });

    for (const outcome of summary.outcomes) {
      console.log(
        `  ${outcome.meeting_id}: ${outcome.status}` +
        ` (${outcome.items_updated} updated, ${outcome.items_created} new, ${outcome.errors.length} errors)`
      );
    }
    console.log(`\nProcessed: ${summary.processed}, errors: ${summary.errors}`);
  } finally {
    await runtime.close();
  }
}

analyze().catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
