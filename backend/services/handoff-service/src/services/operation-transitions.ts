import { Clock, OperationState, PendingOperation, StatusEvent } from '../types/handoff.types';
import { HandoffRepositories, HandoffStore } from '../store/handoff-store';
import { OperationStateMachine } from '../utils/operation-state-machine';
import { ConcurrentModificationError, InvalidStateTransitionError } from '../errors/domain-errors';
import type { StatusPublisher } from './status-publisher.service';

export interface AppliedTransition {
  fromState: OperationState | null;
  event: StatusEvent;
}

export interface TransitionOptions {
  terminalReason?: string | null;
  /** Recorded on the operation with the first step that sets it */
  counterpartyActorId?: string | null;
  actorId: string | null;
}

/**
 * Thrown when an operation's version moved between read and write; the
 * caller's transaction rolls back and is retried.
 */
export class StaleVersionError extends Error {
  constructor(public readonly operationId: string) {
    super(`Operation ${operationId} version changed`);
    this.name = 'StaleVersionError';
  }
}

export const EXPIRED_REASON = 'expired';

export function toStatusEvent(operation: PendingOperation): StatusEvent {
  return {
    operationId: operation.id,
    state: operation.state,
    terminalReason: operation.terminalReason,
    updatedAt: operation.updatedAt,
    version: operation.version,
  };
}

export function isPastExpiry(operation: PendingOperation, now: Date): boolean {
  return now.getTime() >= operation.expiresAt.getTime();
}

/**
 * Applies transitions inside one ledger transaction and records the
 * resulting status events for publication after commit.
 */
export class TransitionBatch {
  readonly applied: AppliedTransition[] = [];

  constructor(
    private readonly repos: HandoffRepositories,
    readonly now: Date
  ) {}

  /** Inserts a new operation as version 1 of its history. */
  async create(operation: PendingOperation, actorId: string): Promise<PendingOperation> {
    await this.repos.operations.insert(operation);
    await this.repos.transitions.append({
      operationId: operation.id,
      version: operation.version,
      fromState: null,
      toState: operation.state,
      terminalReason: null,
      actorId,
      occurredAt: this.now,
    });
    this.applied.push({ fromState: null, event: toStatusEvent(operation) });
    return operation;
  }

  async apply(operation: PendingOperation, to: OperationState, options: TransitionOptions): Promise<PendingOperation> {
    if (!OperationStateMachine.canTransition(operation.state, to)) {
      throw new InvalidStateTransitionError(operation.state, to);
    }

    const terminal = OperationStateMachine.isTerminalState(to);
    const patch = {
      state: to,
      version: operation.version + 1,
      terminalReason: terminal ? options.terminalReason ?? null : null,
      counterpartyActorId:
        options.counterpartyActorId === undefined ? operation.counterpartyActorId : options.counterpartyActorId,
      updatedAt: this.now,
    };

    const updated = await this.repos.operations.update(operation.id, operation.version, patch);
    if (!updated) {
      throw new StaleVersionError(operation.id);
    }

    await this.repos.transitions.append({
      operationId: operation.id,
      version: updated.version,
      fromState: operation.state,
      toState: to,
      terminalReason: updated.terminalReason,
      actorId: options.actorId,
      occurredAt: this.now,
    });

    // a transfer that ends without completing must leave no redeemable token
    if (terminal && to !== 'completed' && updated.kind.type === 'transfer') {
      if (to === 'expired') {
        await this.repos.tokens.markExpired(updated.kind.tokenId, this.now);
      } else {
        await this.repos.tokens.revoke(updated.kind.tokenId, this.now);
      }
    }

    this.applied.push({ fromState: operation.state, event: toStatusEvent(updated) });
    return updated;
  }

  /**
   * Walks the shortest legal path to `target`, one recorded transition per
   * step. The counterparty and reason options apply to the first and last
   * steps respectively.
   */
  async advanceTo(
    operation: PendingOperation,
    target: OperationState,
    options: TransitionOptions
  ): Promise<PendingOperation> {
    const path = OperationStateMachine.pathTo(operation.state, target);
    if (path === null) {
      throw new InvalidStateTransitionError(operation.state, target);
    }

    let current = operation;
    for (const [index, state] of path.entries()) {
      current = await this.apply(current, state, {
        actorId: options.actorId,
        counterpartyActorId: index === 0 ? options.counterpartyActorId : undefined,
        terminalReason: index === path.length - 1 ? options.terminalReason : null,
      });
    }
    return current;
  }

  expire(operation: PendingOperation): Promise<PendingOperation> {
    return this.apply(operation, 'expired', { terminalReason: EXPIRED_REASON, actorId: null });
  }
}

const MAX_ATTEMPTS = 3;

// serialization_failure, deadlock_detected
const TRANSIENT_PG_CODES = new Set(['40001', '40P01']);

/** Postgres aborted the transaction over lock contention; a fresh attempt may succeed. */
export function isTransientConflict(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && typeof error.code === 'string' && TRANSIENT_PG_CODES.has(error.code)
  );
}

/**
 * Runs ledger work in a transaction, retrying from scratch when an operation
 * version goes stale or the database reports a deadlock, and publishes the
 * applied transitions after commit.
 */
export class TransitionRunner {
  constructor(
    private readonly store: HandoffStore,
    private readonly clock: Clock,
    private readonly publisher: StatusPublisher
  ) {}

  async run<T>(work: (repos: HandoffRepositories, batch: TransitionBatch) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        const { result, applied } = await this.store.transaction(async (repos) => {
          const batch = new TransitionBatch(repos, this.clock.now());
          const result = await work(repos, batch);
          return { result, applied: batch.applied };
        });
        await this.publisher.publishApplied(applied);
        return result;
      } catch (error) {
        if (!(error instanceof StaleVersionError) && !isTransientConflict(error)) {
          throw error;
        }
        if (attempt >= MAX_ATTEMPTS) {
          throw new ConcurrentModificationError(error instanceof StaleVersionError ? error.operationId : undefined);
        }
      }
    }
  }
}
