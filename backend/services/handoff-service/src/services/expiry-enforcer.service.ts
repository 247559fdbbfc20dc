import { Clock, PendingOperation } from '../types/handoff.types';
import { HandoffStore } from '../store/handoff-store';
import { OperationStateMachine } from '../utils/operation-state-machine';
import { handoffMetrics } from '../utils/metrics';
import { Logger } from '../utils/logger';
import { isPastExpiry, TransitionRunner } from './operation-transitions';

export type ExpireResult =
  | { ok: true; operation: PendingOperation }
  | { ok: false; error: 'NotFound' | 'AlreadyTerminal' | 'NotDue' };

export interface SweepResult {
  operationsExpired: number;
  tokensExpired: number;
  failures: number;
}

/**
 * Moves operations and tokens past their deadline to expired. Every step is
 * a compare-and-swap, so running it on several instances at once is safe.
 */
export class ExpiryEnforcer {
  private readonly log: Logger;

  constructor(
    private readonly store: HandoffStore,
    private readonly runner: TransitionRunner,
    private readonly clock: Clock,
    private readonly batchSize: number,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'ExpiryEnforcer' });
  }

  async expireOperation(operationId: string): Promise<ExpireResult> {
    const result = await this.runner.run(async (repos, batch): Promise<ExpireResult> => {
      const operation = await repos.operations.findByIdForUpdate(operationId);
      if (!operation) {
        return { ok: false, error: 'NotFound' };
      }
      if (OperationStateMachine.isTerminalState(operation.state)) {
        return { ok: false, error: 'AlreadyTerminal' };
      }
      if (!isPastExpiry(operation, batch.now)) {
        return { ok: false, error: 'NotDue' };
      }
      return { ok: true, operation: await batch.expire(operation) };
    });

    if (result.ok) {
      handoffMetrics.expirations.inc({ resource: 'operation' });
      this.log.info({ operationId }, 'Operation expired');
    }
    return result;
  }

  async expireToken(tokenId: string): Promise<boolean> {
    const expired = await this.store.tokens.markExpired(tokenId, this.clock.now());
    if (expired) {
      handoffMetrics.expirations.inc({ resource: 'token' });
    }
    return expired;
  }

  /**
   * Catches everything a scheduled job missed, such as deadlines that
   * passed while no instance was running.
   */
  async sweep(limit: number = this.batchSize): Promise<SweepResult> {
    const now = this.clock.now();
    const due = await this.store.operations.findDueForExpiry(now, limit);

    let operationsExpired = 0;
    let failures = 0;
    for (const operation of due) {
      try {
        const result = await this.expireOperation(operation.id);
        if (result.ok) operationsExpired++;
      } catch (error) {
        failures++;
        this.log.error({ err: error, operationId: operation.id }, 'Failed to expire operation');
      }
    }

    const tokens = await this.store.transaction((repos) => repos.tokens.expireDue(now, limit));
    if (tokens.length > 0) {
      handoffMetrics.expirations.inc({ resource: 'token' }, tokens.length);
    }

    const result = { operationsExpired, tokensExpired: tokens.length, failures };
    if (operationsExpired > 0 || tokens.length > 0 || failures > 0) {
      this.log.info(result, 'Expiry sweep finished');
    }
    return result;
  }
}
