import { v4 as uuidv4 } from 'uuid';
import {
  Clock,
  ExpiryScheduler,
  OperationState,
  PendingOperation,
  TransferToken,
} from '../types/handoff.types';
import { HandoffRepositories, HandoffStore } from '../store/handoff-store';
import { OperationStateMachine } from '../utils/operation-state-machine';
import { Logger } from '../utils/logger';
import { IssueError, resolveTtl, TransferTokenService } from './transfer-token.service';
import { isPastExpiry, TransitionBatch, TransitionRunner } from './operation-transitions';

export type RelayError =
  | 'NotFound'
  | 'NotAuthorized'
  | 'AlreadyTerminal'
  | 'Expired'
  | 'InvalidState'
  | 'WrongKind'
  | 'SelfTransfer'
  | 'CounterpartyNotFound';

export type OperationResult =
  | { ok: true; operation: PendingOperation }
  | { ok: false; error: RelayError; state?: OperationState };

export type CreateOperationInput =
  | {
      kind: 'payment';
      counterpartyActorId: string;
      subjectRef: string;
      amountCents: number;
      currency: string;
      ttlSeconds?: number;
    }
  | { kind: 'transfer'; ticketId: string; counterpartyActorId?: string; ttlSeconds?: number };

export type CreateError = IssueError | 'CounterpartyNotFound' | 'SelfTransfer';

export type CreateResult =
  | { ok: true; operation: PendingOperation; token: TransferToken | null }
  | { ok: false; error: CreateError };

export interface OperationWindowConfig {
  operationTtlSeconds: number;
  transferTokenTtlSeconds: number;
  maxTtlSeconds: number;
}

type Guard = (operation: PendingOperation) => boolean;

type Loaded = { ok: true; operation: PendingOperation } | { ok: false; error: RelayError; state?: OperationState };

/**
 * Loads and row-locks an operation for mutation. Authorization is checked
 * before anything else; a non-terminal operation found past its deadline is
 * expired on the spot and reported as `Expired`.
 */
export async function loadForTransition(
  repos: HandoffRepositories,
  batch: TransitionBatch,
  operationId: string,
  authorize: Guard
): Promise<Loaded> {
  const operation = await repos.operations.findByIdForUpdate(operationId);
  if (!operation) {
    return { ok: false, error: 'NotFound' };
  }
  if (!authorize(operation)) {
    return { ok: false, error: 'NotAuthorized' };
  }
  if (OperationStateMachine.isTerminalState(operation.state)) {
    return { ok: false, error: 'AlreadyTerminal', state: operation.state };
  }
  if (isPastExpiry(operation, batch.now)) {
    await batch.expire(operation);
    return { ok: false, error: 'Expired', state: 'expired' };
  }
  return { ok: true, operation };
}

const isInitiator =
  (actorId: string): Guard =>
  (operation) =>
    operation.initiatorActorId === actorId;

const isCounterparty =
  (actorId: string): Guard =>
  (operation) =>
    operation.counterpartyActorId === actorId;

/**
 * The relay between initiator and counterparty devices. Every state change
 * goes through a version compare-and-swap, is recorded in the transition
 * history and is published once committed.
 */
export class PendingOperationService {
  private readonly log: Logger;

  constructor(
    private readonly store: HandoffStore,
    private readonly runner: TransitionRunner,
    private readonly tokens: TransferTokenService,
    private readonly scheduler: ExpiryScheduler,
    private readonly clock: Clock,
    private readonly windows: OperationWindowConfig,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'PendingOperationService' });
  }

  async createOperation(initiatorActorId: string, input: CreateOperationInput): Promise<CreateResult> {
    const fallbackTtl =
      input.kind === 'payment' ? this.windows.operationTtlSeconds : this.windows.transferTokenTtlSeconds;
    const ttl = resolveTtl(input.ttlSeconds, fallbackTtl, this.windows.maxTtlSeconds);

    if (input.counterpartyActorId === initiatorActorId) {
      return { ok: false, error: 'SelfTransfer' };
    }

    const result = await this.runner.run(async (repos, batch): Promise<CreateResult> => {
      const now = batch.now;
      const expiresAt = new Date(now.getTime() + ttl * 1000);
      const counterpartyActorId = input.counterpartyActorId ?? null;

      if (counterpartyActorId !== null && !(await repos.actors.findById(counterpartyActorId))) {
        return { ok: false, error: 'CounterpartyNotFound' };
      }

      const base = {
        id: uuidv4(),
        initiatorActorId,
        counterpartyActorId,
        version: 1,
        terminalReason: null,
        createdAt: now,
        updatedAt: now,
        expiresAt,
      };

      switch (input.kind) {
        case 'payment': {
          const operation = await batch.create(
            {
              ...base,
              kind: { type: 'payment', amountCents: input.amountCents, currency: input.currency },
              subjectRef: input.subjectRef,
              state: 'pending',
            },
            initiatorActorId
          );
          return { ok: true, operation, token: null };
        }
        case 'transfer': {
          const issued = await this.tokens.issueWithin(repos, input.ticketId, initiatorActorId, now, expiresAt);
          if (!issued.ok) {
            return issued;
          }
          const operation = await batch.create(
            {
              ...base,
              kind: { type: 'transfer', tokenId: issued.token.id },
              subjectRef: input.ticketId,
              state: counterpartyActorId === null ? 'waiting' : 'pending',
            },
            initiatorActorId
          );
          return { ok: true, operation, token: issued.token };
        }
      }
    });

    if (result.ok) {
      this.log.info(
        { operationId: result.operation.id, kind: result.operation.kind.type, state: result.operation.state },
        'Pending operation created'
      );
      if (result.token) {
        await this.tokens.afterIssue(result.token);
      }
      await this.scheduleExpiry(result.operation);
    }
    return result;
  }

  /** waiting → pending once the initiator has discovered the counterparty. */
  attachCounterparty(
    operationId: string,
    initiatorActorId: string,
    counterpartyActorId: string
  ): Promise<OperationResult> {
    return this.runner.run(async (repos, batch): Promise<OperationResult> => {
      const loaded = await loadForTransition(repos, batch, operationId, isInitiator(initiatorActorId));
      if (!loaded.ok) return loaded;
      const { operation } = loaded;

      if (operation.state !== 'waiting') {
        return { ok: false, error: 'InvalidState', state: operation.state };
      }
      if (counterpartyActorId === initiatorActorId) {
        return { ok: false, error: 'SelfTransfer', state: operation.state };
      }
      if (!(await repos.actors.findById(counterpartyActorId))) {
        return { ok: false, error: 'CounterpartyNotFound', state: operation.state };
      }

      const updated = await batch.apply(operation, 'pending', {
        counterpartyActorId,
        actorId: initiatorActorId,
      });
      return { ok: true, operation: updated };
    });
  }

  /** pending → processing, sent by the counterparty device. */
  acknowledge(operationId: string, counterpartyActorId: string): Promise<OperationResult> {
    return this.runner.run(async (repos, batch): Promise<OperationResult> => {
      const loaded = await loadForTransition(repos, batch, operationId, isCounterparty(counterpartyActorId));
      if (!loaded.ok) return loaded;
      const { operation } = loaded;

      if (operation.state === 'processing') {
        return { ok: true, operation };
      }
      if (operation.state !== 'pending') {
        return { ok: false, error: 'InvalidState', state: operation.state };
      }
      const updated = await batch.apply(operation, 'processing', { actorId: counterpartyActorId });
      return { ok: true, operation: updated };
    });
  }

  /**
   * Completes a payment and writes its ledger record in the same
   * transaction. Repeating it for a completed operation returns the
   * current snapshot.
   */
  completePayment(operationId: string, counterpartyActorId: string, paymentReference: string): Promise<OperationResult> {
    return this.runner.run(async (repos, batch): Promise<OperationResult> => {
      const existing = await repos.operations.findById(operationId);
      if (existing && existing.state === 'completed' && existing.counterpartyActorId === counterpartyActorId) {
        return { ok: true, operation: existing };
      }

      const loaded = await loadForTransition(repos, batch, operationId, isCounterparty(counterpartyActorId));
      if (!loaded.ok) return loaded;
      const { operation } = loaded;

      if (operation.kind.type !== 'payment') {
        return { ok: false, error: 'WrongKind', state: operation.state };
      }
      const { amountCents, currency } = operation.kind;

      const completed = await batch.advanceTo(operation, 'completed', { actorId: counterpartyActorId });
      await repos.payments.insert({
        id: uuidv4(),
        operationId: operation.id,
        payerActorId: counterpartyActorId,
        payeeActorId: operation.initiatorActorId,
        amountCents,
        currency,
        paymentReference,
        createdAt: batch.now,
      });
      return { ok: true, operation: completed };
    });
  }

  /** The counterparty reports an error; the reason is shown to the initiator. */
  fail(operationId: string, counterpartyActorId: string, reason: string): Promise<OperationResult> {
    return this.runner.run(async (repos, batch): Promise<OperationResult> => {
      const loaded = await loadForTransition(repos, batch, operationId, isCounterparty(counterpartyActorId));
      if (!loaded.ok) return loaded;
      const { operation } = loaded;

      if (!OperationStateMachine.canTransition(operation.state, 'failed')) {
        return { ok: false, error: 'InvalidState', state: operation.state };
      }
      const updated = await batch.apply(operation, 'failed', {
        terminalReason: reason,
        actorId: counterpartyActorId,
      });
      return { ok: true, operation: updated };
    });
  }

  /**
   * Initiator abort from any non-terminal state. A transfer's token is
   * revoked in the same transaction.
   */
  cancel(operationId: string, initiatorActorId: string): Promise<OperationResult> {
    return this.runner.run(async (repos, batch): Promise<OperationResult> => {
      const loaded = await loadForTransition(repos, batch, operationId, isInitiator(initiatorActorId));
      if (!loaded.ok) return loaded;

      const updated = await batch.apply(loaded.operation, 'cancelled', {
        terminalReason: 'cancelled by initiator',
        actorId: initiatorActorId,
      });
      this.log.info({ operationId }, 'Pending operation cancelled');
      return { ok: true, operation: updated };
    });
  }

  /** Read-only; visible to the initiator and the counterparty only. */
  async getSnapshot(operationId: string, actorId: string): Promise<OperationResult> {
    const operation = await this.store.operations.findById(operationId);
    if (!operation) {
      return { ok: false, error: 'NotFound' };
    }
    if (operation.initiatorActorId !== actorId && operation.counterpartyActorId !== actorId) {
      return { ok: false, error: 'NotAuthorized' };
    }
    return { ok: true, operation };
  }

  /** Live operations addressed to the caller, newest first. */
  async listIncoming(counterpartyActorId: string): Promise<PendingOperation[]> {
    const now = this.clock.now();
    const operations = await this.store.operations.listActiveForCounterparty(counterpartyActorId);
    return operations.filter((operation) => !isPastExpiry(operation, now));
  }

  private async scheduleExpiry(operation: PendingOperation): Promise<void> {
    try {
      await this.scheduler.scheduleOperationExpiry(operation.id, operation.expiresAt);
    } catch (error) {
      this.log.warn({ err: error, operationId: operation.id }, 'Operation expiry not scheduled; sweep will expire it');
    }
  }
}
