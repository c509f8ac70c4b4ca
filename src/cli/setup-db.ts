#!/usr/bin/env node
/**
 * CLI for creating the record store indexes
 *
 * Usage:
 *   npm run setup-db
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { createRuntime } from '../runtime.js';

async function setupDb() {
  const runtime = await createRuntime(loadConfig(process.env), { queue: null });
  try {
    await runtime.store.ensureIndexes();
    console.log(`Indexes ready (${runtime.store.backend})`);
  } finally {
    await runtime.close();
  }
}

setupDb().catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
