#!/usr/bin/env node
/**
 * CLI for serving the read API
 *
 * Usage:
 *   npm run serve
 *   npm run serve -- --port 8080
 */

import 'dotenv/config';
import { createApp } from '../api/app.js';
import { loadConfig } from '../config.js';
import { createRuntime } from '../runtime.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

async function serve() {
  const config = loadConfig(process.env);
  const port = args.port ? parseInt(String(args.port), 10) : config.port;
  const runtime = await createRuntime(config, { queue: null });

  const app = createApp({ store: runtime.store, logger: runtime.logger, config });
  const server = app.listen(port, () => {
    runtime.logger.info({ port, stage: config.stage, backend: runtime.store.backend }, 'API listening');
  });

  const shutdown = () => {
    server.close(() => {
      runtime.close().then(
        () => process.exit(0),
        (err: unknown) => {
          runtime.logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

serve().catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
