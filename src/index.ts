#!/usr/bin/env node
import 'dotenv/config';
import { resolveRunOptions, run } from './cli.js';
import { handleUnknownError } from './errors/index.js';
import { log } from './utils/log.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

async function main() {
  const options = resolveRunOptions(process.argv.slice(2));
  await run(options);
}

main().catch((error: unknown) => {
  log.error('Curation failed', handleUnknownError(error, 'Curation failed'));
  process.exitCode = 1;
});
