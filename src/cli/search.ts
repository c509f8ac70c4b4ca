#!/usr/bin/env node
/**
 * CLI for keyword search over stored agenda items
 *
 * Usage:
 *   npm run search -- "rezoning monroe"
 *   npm run search -- "budget" --limit 5
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { createRuntime } from '../runtime.js';
import { searchItems } from '../search.js';
import { parseArgs } from '../utils.js';

const argv = process.argv.slice(2);
const args = parseArgs(argv);
const query = argv.filter(arg => !arg.startsWith('--') && arg !== args.limit).join(' ').trim();
const limit = args.limit ? parseInt(String(args.limit), 10) : 10;

if (!query) {
  console.error('Usage: npm run search -- <query> [--limit <n>]');
  process.exit(1);
}

async function search() {
  const runtime = await createRuntime(loadConfig(process.env), { queue: null });
  try {
    const results = await searchItems(runtime.store, query, { topK: limit });
    console.log(`${results.length} result(s) for "${query}"\n`);
    for (const item of results) {
      console.log(`[${item.search_score.toFixed(3)}] ${item.title}`);
      console.log(`    ${item.meeting_date || 'undated'} | ${item.topic} | relevance ${item.relevance}`);
      if (item.summary) {
        console.log(`    ${item.summary}`);
      }
    }
  } finally {
    await runtime.close();
  }
}

search().catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
