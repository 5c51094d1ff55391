import cron, { type ScheduledTask } from 'node-cron';
import mongoose from 'mongoose';
import type { AccountDeletionConfig } from '../config/accountConfig';
import type { AccountDeletionController } from '../controllers/accountDeletionController';
import type { AccountStore } from '../services/accountStore';
import { logger } from '../utils/logger';
import { resumePendingDeletions } from './accountDeletionRetry';

export const JOB_NAMES = ['account-deletion-retry'] as const;

export interface SchedulerDeps {
  controller: AccountDeletionController;
  store: AccountStore;
  config: AccountDeletionConfig;
}

let scheduledJobs: ScheduledTask[] = [];
let isShuttingDown = false;
let shutdownHandlersRegistered = false;

/**
 * Initialize all scheduled jobs
 * This should be called once when the application starts
 */
export function initializeScheduler(deps: SchedulerDeps): void {
  // Prevent duplicate initialization
  if (scheduledJobs.length > 0) {
    logger.warn('Scheduler already initialized, skipping...');
    return;
  }

  logger.info('Initializing job scheduler...');

  registerGracefulShutdown();

  // Account Deletion Retry - resumes stale pending_deletion accounts
  const deletionRetryJob = cron.schedule(deps.config.retryCron, async () => {
    logger.info('[Scheduler] Running account deletion retry job...');
    try {
      const result = await runDeletionRetry(deps);
      logger.info(`[Scheduler] Account deletion retry completed: ${result.processed} processed, ${result.completed} completed, ${result.failed} failed`);
    } catch (error) {
      logger.error('[Scheduler] Account deletion retry failed:', error);
    }
  }, {
    timezone: process.env.SCHEDULER_TIMEZONE ?? 'UTC',
  });
  scheduledJobs.push(deletionRetryJob);

  logger.info(`Scheduler initialized with ${scheduledJobs.length} jobs`);
}

/**
 * Stop all scheduled jobs
 * Useful for testing or graceful shutdown
 */
export function stopScheduler(): void {
  if (isShuttingDown) {
    logger.warn('Scheduler is already shutting down...');
    return;
  }

  isShuttingDown = true;
  logger.info('Stopping job scheduler...');

  for (const job of scheduledJobs) {
    void job.stop();
  }
  scheduledJobs = [];
  isShuttingDown = false;
  logger.info('Scheduler stopped');
}

/**
 * Register handlers for graceful shutdown on SIGTERM and SIGINT
 */
function registerGracefulShutdown(): void {
  if (shutdownHandlersRegistered) {
    return;
  }
  shutdownHandlersRegistered = true;

  const shutdownHandler = (signal: string) => {
    logger.info(`Received ${signal} signal. Initiating graceful shutdown...`);

    stopScheduler();

    mongoose
      .disconnect()
      .catch((error: unknown) => {
        logger.error('Error while disconnecting from MongoDB:', error);
      })
      .finally(() => {
        logger.info('Graceful shutdown complete. Exiting...');
        process.exit(0);
      });
  };

  // Handle SIGTERM (sent by container orchestrators like Docker/Kubernetes)
  process.on('SIGTERM', () => shutdownHandler('SIGTERM'));

  // Handle SIGINT (Ctrl+C in terminal)
  process.on('SIGINT', () => shutdownHandler('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection:', reason);
  });

  logger.info('Graceful shutdown handlers registered');
}

function runDeletionRetry({ controller, store, config }: SchedulerDeps) {
  return resumePendingDeletions(controller, store, {
    staleAfterMinutes: config.staleAfterMinutes,
    batchSize: config.sweepBatchSize,
  });
}

/**
 * Run a specific job manually
 */
export async function runJob(
  jobName: string,
  deps: SchedulerDeps
): Promise<{ success: boolean; result?: unknown; error?: string }> {
  switch (jobName) {
    case 'account-deletion-retry': {
      const result = await runDeletionRetry(deps);
      return { success: true, result };
    }
    default:
      return { success: false, error: `Unknown job: ${jobName}` };
  }
}

/**
 * Get scheduler status
 */
export function getSchedulerStatus(): {
  isRunning: boolean;
  jobsCount: number;
  jobs: string[];
} {
  return {
    isRunning: scheduledJobs.length > 0,
    jobsCount: scheduledJobs.length,
    jobs: [...JOB_NAMES],
  };
}
