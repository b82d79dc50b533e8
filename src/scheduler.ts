/**
 * Scheduler
 *
 * Runs the digest on a cron schedule
 */

import cron, { type ScheduledTask } from 'node-cron';
import { runDigest } from './pipeline.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';

/**
 * Scheduler state
 */
let scheduledTask: ScheduledTask | null = null;
let isRunning = false;

/**
 * Execute digest with lock to prevent overlapping runs
 */
export async function executeScheduledRun(run: () => Promise<unknown> = runDigest): Promise<boolean> {
  if (isRunning) {
    logger.warn('Digest already running, skipping this execution');
    return false;
  }

  isRunning = true;
  const startTime = new Date();

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled digest starting');

  try {
    await run();
    logger.info(
      { startTime: startTime.toISOString(), endTime: new Date().toISOString() },
      'Scheduled digest completed'
    );
  } catch (error) {
    logger.error({ error }, 'Scheduled digest failed');
  } finally {
    isRunning = false;
  }

  return true;
}

/**
 * Start the scheduler
 */
export function startScheduler(): void {
  const cronExpression = config.scheduler.cronExpression;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone: config.scheduler.timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      void executeScheduledRun();
    },
    {
      timezone: config.scheduler.timezone,
    }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler
 */
export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }
}

/**
 * Check if scheduler is running
 */
export function isSchedulerRunning(): boolean {
  return scheduledTask !== null;
}

/**
 * Run scheduler as standalone process
 */
async function main(): Promise<void> {
  logger.info({ cron: config.scheduler.cronExpression, timezone: config.scheduler.timezone }, 'News Digest Scheduler');

  // Run once immediately on startup
  logger.info('Running initial digest...');
  await executeScheduledRun();

  startScheduler();

  logger.info('Scheduler running. Press Ctrl+C to stop.');

  process.on('SIGINT', () => {
    logger.info('Received SIGINT, shutting down...');
    stopScheduler();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    logger.info('Received SIGTERM, shutting down...');
    stopScheduler();
    process.exit(0);
  });
}

// Run if called directly
if (process.argv[1]?.endsWith('scheduler.ts') || process.argv[1]?.endsWith('scheduler.js')) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Scheduler failed');
    process.exit(1);
  });
}
