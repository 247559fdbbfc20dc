/**
 * Expiry Jobs
 *
 * One delayed job per operation fires at its deadline; a recurring sweep
 * covers restarts and lost timers. Both paths are compare-and-swap updates,
 * so duplicate runs are no-ops.
 */

import { createHash } from 'crypto';
import { Job } from 'bull';
import { ExpiryScheduler } from '../types/handoff.types';
import { ExpiryEnforcer } from '../services/expiry-enforcer.service';
import { createContextLogger } from '../utils/logger';
import { getQueue, QUEUE_NAMES, scheduleJobAt, scheduleRecurringJob } from './index';

export const JOB_TYPES = {
  EXPIRE_OPERATION: 'expire-operation',
  EXPIRE_TOKEN: 'expire-token',
  EXPIRY_SWEEP: 'expiry-sweep',
} as const;

interface ExpireOperationJobData {
  operationId: string;
}

interface ExpireTokenJobData {
  tokenId: string;
}

interface SweepJobData {
  scheduledAt: string;
}

const log = createContextLogger({ component: 'ExpiryJobs' });

export function operationExpiryJobId(operationId: string): string {
  return `expire:${operationId}`;
}

/** Token ids are bearer credentials and never appear in job ids. */
export function tokenExpiryJobId(tokenId: string): string {
  return `expire-token:${createHash('sha256').update(tokenId).digest('hex').slice(0, 32)}`;
}

export class BullExpiryScheduler implements ExpiryScheduler {
  async scheduleOperationExpiry(operationId: string, at: Date): Promise<void> {
    await scheduleJobAt<ExpireOperationJobData>(
      QUEUE_NAMES.HANDOFF_EXPIRY,
      JOB_TYPES.EXPIRE_OPERATION,
      { operationId },
      at,
      { jobId: operationExpiryJobId(operationId) }
    );
  }

  async scheduleTokenExpiry(tokenId: string, at: Date): Promise<void> {
    await scheduleJobAt<ExpireTokenJobData>(QUEUE_NAMES.HANDOFF_EXPIRY, JOB_TYPES.EXPIRE_TOKEN, { tokenId }, at, {
      jobId: tokenExpiryJobId(tokenId),
    });
  }
}

export function registerExpiryProcessors(enforcer: ExpiryEnforcer): void {
  const queue = getQueue(QUEUE_NAMES.HANDOFF_EXPIRY);

  queue
    .process(JOB_TYPES.EXPIRE_OPERATION, 5, async (job: Job<ExpireOperationJobData>) => {
      const result = await enforcer.expireOperation(job.data.operationId);
      return result.ok ? 'expired' : result.error;
    })
    .catch((error: unknown) => log.error({ err: error }, 'Operation expiry processor stopped'));

  queue
    .process(JOB_TYPES.EXPIRE_TOKEN, 5, async (job: Job<ExpireTokenJobData>) => {
      return (await enforcer.expireToken(job.data.tokenId)) ? 'expired' : 'skipped';
    })
    .catch((error: unknown) => log.error({ err: error }, 'Token expiry processor stopped'));

  queue
    .process(JOB_TYPES.EXPIRY_SWEEP, 1, async (_job: Job<SweepJobData>) => enforcer.sweep())
    .catch((error: unknown) => log.error({ err: error }, 'Expiry sweep processor stopped'));

  log.info('Expiry job processors registered');
}

export async function scheduleExpirySweep(cronExpression: string): Promise<void> {
  await scheduleRecurringJob<SweepJobData>(
    QUEUE_NAMES.HANDOFF_EXPIRY,
    JOB_TYPES.EXPIRY_SWEEP,
    { scheduledAt: new Date().toISOString() },
    cronExpression
  );
}
