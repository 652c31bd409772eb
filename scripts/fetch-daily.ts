#!/usr/bin/env tsx
/**
 * Daily paper fetch job
 *
 * Fetches the newest arXiv papers and the HuggingFace Daily Papers list,
 * writes data/<date>.json and refreshes data/dates.json.
 *
 * Usage:
 *   npx tsx scripts/fetch-daily.ts [--date YYYY-MM-DD] [--skip-existing] [--data-dir PATH]
 *
 * Exit code 0 when a snapshot was written (even if one source failed), 1 otherwise.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load .env.local for local development, then .env
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config();

import { loadPipelineConfig } from '../src/config/pipeline';
import { logger } from '../src/lib/logger';
import { exitCodeFor, runDailyFetch } from '../src/lib/sync/daily-fetch';
import { parseFetchArgs } from '../src/lib/sync/fetch-args';

async function main() {
  const args = parseFetchArgs(process.argv.slice(2));
  const config = loadPipelineConfig(process.env, args.dataDir ? { dataDir: args.dataDir } : {});

  logger.info('[FETCH-DAILY-SCRIPT] Starting daily fetch...', {
    dataDir: config.dataDir,
    date: args.date,
  });

  const result = await runDailyFetch(config, {
    date: args.date,
    skipExisting: args.skipExisting,
  });

  console.log('\n' + '='.repeat(60));
  console.log(`Daily Papers: ${result.date}`);
  console.log('='.repeat(60));
  for (const source of result.sources) {
    console.log(`${source.source.padEnd(12)} ${source.ok ? `${source.fetched} papers` : `failed (${source.error})`}`);
  }
  if (result.skipped) {
    console.log('Snapshot already exists, nothing fetched');
  } else if (result.success) {
    console.log(`Papers written:  ${result.papersWritten}`);
    console.log(`Days in index:   ${result.indexSize}`);
    if (result.prunedDates.length > 0) {
      console.log(`Pruned:          ${result.prunedDates.join(', ')}`);
    }
  } else {
    console.log(`Failed:          ${result.error ?? 'unknown error'}`);
  }
  console.log('='.repeat(60) + '\n');

  const exitCode = exitCodeFor(result);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('[FETCH-DAILY-SCRIPT] Fatal error', error);
    process.exit(1);
  });
}
