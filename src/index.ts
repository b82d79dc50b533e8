#!/usr/bin/env node
/**
 * News Digest Aggregator
 *
 * Scheduled pipeline that:
 * 1. Pulls items from a search API, a social-link API and RSS/Atom feeds
 * 2. Filters them by recency, category and keyword, deduplicating by URL
 * 3. Summarizes each article once, caching summaries on disk by URL hash
 * 4. Renders an HTML digest and emails it
 *
 * Usage:
 *   node dist/index.js --service          - Run as service (cron scheduler)
 *   node dist/index.js --run              - Run digest once and exit
 *   node dist/index.js --run --dry-run    - Run once, write HTML instead of emailing
 *   node dist/index.js                    - Default: service mode
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { runDigest } from './pipeline.js';
import { startScheduler, stopScheduler } from './scheduler.js';

// Parse command line arguments
const args = process.argv.slice(2);
const isRunOnce = args.includes('--run');
const isService = args.includes('--service') || !isRunOnce;
const dryRun = args.includes('--dry-run');

async function executeOnce(): Promise<void> {
  const { entries, stats } = await runDigest({ dryRun });

  logger.info('');
  logger.info('Digest Complete:');
  logger.info(`  ✓ Sources:    ${stats.sources} (${stats.sourceErrors} failed)`);
  logger.info(`  ✓ Fetched:    ${stats.fetched} items`);
  logger.info(`  ✓ Dropped:    ${stats.dropped} malformed, ${stats.outOfScope} out of scope`);
  logger.info(`  ✓ Duplicates: ${stats.duplicates}`);
  logger.info(`  ✓ Summarized: ${stats.summarized} of ${entries.length} items`);
  if (stats.summaryErrors > 0) {
    logger.info(`  ⚠ Errors:     ${stats.summaryErrors}`);
  }
  logger.info(`  ⏱ Duration:   ${(stats.durationMs / 1000).toFixed(1)}s`);
}

async function main(): Promise<void> {
  logger.info(
    { env: config.app.env, mode: isService ? 'service' : 'run-once', dryRun },
    'Starting News Digest Aggregator'
  );

  if (isRunOnce) {
    await executeOnce();
    return;
  }

  startScheduler();

  const shutdown = (): void => {
    logger.info('Shutting down...');
    stopScheduler();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
