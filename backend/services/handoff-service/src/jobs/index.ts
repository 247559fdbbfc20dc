/**
 * Job Queue Infrastructure
 *
 * Bull queues for delayed and recurring expiry work. Redis holds the jobs,
 * so a delayed job survives restarts and runs on whichever instance is up.
 */

import Bull, { Job, JobOptions, Queue } from 'bull';
import type { HandoffConfig } from '../config';
import { logger } from '../utils/logger';

export const QUEUE_NAMES = {
  HANDOFF_EXPIRY: 'handoff-expiry',
} as const;

const queues: Map<string, Queue> = new Map();
let redisOptions: Bull.QueueOptions['redis'] | null = null;

export function configureQueues(redis: HandoffConfig['redis']): void {
  redisOptions = {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
  };
}

export function getQueue(queueName: string): Queue {
  const existing = queues.get(queueName);
  if (existing) {
    return existing;
  }
  if (!redisOptions) {
    throw new Error('Job queues are not configured');
  }

  const queue = new Bull(queueName, {
    redis: redisOptions,
    defaultJobOptions: {
      removeOnComplete: 100,
      removeOnFail: 500,
      attempts: 3,
      backoff: {
        type: 'exponential',
        delay: 1000,
      },
    },
    settings: {
      lockDuration: 30000,
      lockRenewTime: 15000,
      stalledInterval: 30000,
      maxStalledCount: 1,
    },
  });

  queue.on('error', (error: Error) => {
    logger.error({ err: error, queue: queueName }, 'Queue error');
  });

  queue.on('failed', (job: Job, error: Error) => {
    logger.error(
      {
        jobId: job.id,
        jobName: job.name,
        queue: queueName,
        error: error.message,
        attempts: job.attemptsMade,
      },
      'Job failed'
    );
  });

  queue.on('stalled', (job: Job) => {
    logger.warn({ jobId: job.id, jobName: job.name, queue: queueName }, 'Job stalled');
  });

  queues.set(queueName, queue);
  logger.info({ queueName }, 'Job queue created');
  return queue;
}

export async function addJob<T>(queueName: string, jobName: string, data: T, options?: JobOptions): Promise<Job<T>> {
  const job = await getQueue(queueName).add(jobName, data, options);
  logger.debug({ jobId: job.id, jobName, queue: queueName }, 'Job added to queue');
  return job;
}

/**
 * Replaces any existing repeatable job with the same name.
 */
export async function scheduleRecurringJob<T>(
  queueName: string,
  jobName: string,
  data: T,
  cronExpression: string,
  options?: Omit<JobOptions, 'repeat'>
): Promise<void> {
  const queue = getQueue(queueName);

  const existingJobs = await queue.getRepeatableJobs();
  for (const job of existingJobs) {
    if (job.name === jobName) {
      await queue.removeRepeatableByKey(job.key);
    }
  }

  await queue.add(jobName, data, {
    ...options,
    repeat: { cron: cronExpression },
    jobId: `${jobName}-recurring`,
  });

  logger.info({ jobName, queue: queueName, cron: cronExpression }, 'Recurring job scheduled');
}

/**
 * Runs immediately when `runAt` has already passed.
 */
export async function scheduleJobAt<T>(
  queueName: string,
  jobName: string,
  data: T,
  runAt: Date,
  options?: JobOptions
): Promise<Job<T>> {
  const delay = runAt.getTime() - Date.now();
  return addJob(queueName, jobName, data, delay > 0 ? { ...options, delay } : options);
}

export async function closeAllQueues(): Promise<void> {
  logger.info('Closing all job queues...');

  await Promise.all(
    Array.from(queues.values()).map(async (queue) => {
      try {
        await queue.close();
      } catch (error) {
        logger.error({ err: error, queue: queue.name }, 'Error closing queue');
      }
    })
  );
  queues.clear();

  logger.info('All job queues closed');
}
