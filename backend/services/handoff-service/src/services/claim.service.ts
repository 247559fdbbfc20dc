import { v4 as uuidv4 } from 'uuid';
import { Actor, Clock, PendingOperation, Ticket } from '../types/handoff.types';
import { HandoffRepositories, HandoffStore, normalizeEmail } from '../store/handoff-store';
import { OperationStateMachine } from '../utils/operation-state-machine';
import { ActorNotFoundError } from '../errors/domain-errors';
import { Logger } from '../utils/logger';
import { RedeemError, RedeemResult, TransferTokenService } from './transfer-token.service';
import { TransitionBatch, TransitionRunner } from './operation-transitions';
import { loadForTransition, RelayError } from './pending-operation.service';

/** A live operation with an attached counterparty accepts claims from that actor only */
export type ClaimError = RedeemError | 'NotCounterparty';

export type ClaimResult =
  | { ok: true; branch: 'registered'; ticket: Ticket; operation: PendingOperation | null }
  | { ok: false; error: ClaimError };

export type LookupResult = { branch: 'registered'; actor: Actor } | { branch: 'unregistered'; email: string };

export type DeliveryResult =
  | { ok: true; branch: 'registered' | 'unregistered'; operation: PendingOperation; ticket: Ticket }
  | { ok: false; error: RelayError | RedeemError };

export interface AttachResult {
  attached: number;
  tickets: Ticket[];
}

/** A claim outcome plus the redemption attempt behind it, if one was made */
interface Attempt<T> {
  result: T;
  redemption: RedeemResult | null;
}

const NOT_OWNER_REASON = 'ticket is no longer owned by the initiator';

/**
 * Settles the operation behind a token whose redemption failed: an expired
 * token expires the operation, a token consumed against a ticket the holder
 * no longer owns fails it.
 */
async function settleRejectedClaim(
  batch: TransitionBatch,
  operation: PendingOperation | null,
  error: RedeemError,
  claimantActorId: string | null
): Promise<void> {
  if (!operation || OperationStateMachine.isTerminalState(operation.state)) return;
  if (error === 'Expired') {
    await batch.expire(operation);
  } else if (error === 'NotOwner') {
    await batch.advanceTo(operation, 'failed', {
      terminalReason: NOT_OWNER_REASON,
      counterpartyActorId: claimantActorId ?? undefined,
      actorId: claimantActorId,
    });
  }
}

export class ClaimService {
  private readonly log: Logger;

  constructor(
    private readonly store: HandoffStore,
    private readonly runner: TransitionRunner,
    private readonly tokens: TransferTokenService,
    private readonly clock: Clock,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'ClaimService' });
  }

  /**
   * Redeems a transfer token for the caller and walks the operation to
   * completed along legal edges. The caller becomes the counterparty unless
   * one is already attached, in which case only that actor may claim and the
   * token stays live for them.
   */
  async claimByToken(tokenId: string, claimantActorId: string): Promise<ClaimResult> {
    const { result, redemption } = await this.runner.run(async (repos, batch): Promise<Attempt<ClaimResult>> => {
      const operation = await repos.operations.findByTokenIdForUpdate(tokenId);
      if (
        operation &&
        !OperationStateMachine.isTerminalState(operation.state) &&
        operation.counterpartyActorId !== null &&
        operation.counterpartyActorId !== claimantActorId
      ) {
        return { result: { ok: false, error: 'NotCounterparty' }, redemption: null };
      }

      const redeemed = await this.tokens.redeemWithin(
        repos,
        tokenId,
        { type: 'actor', actorId: claimantActorId },
        batch.now
      );

      if (!redeemed.ok) {
        await settleRejectedClaim(batch, operation, redeemed.error, claimantActorId);
        return { result: redeemed, redemption: redeemed };
      }
      if (!operation || OperationStateMachine.isTerminalState(operation.state)) {
        return {
          result: { ok: true, branch: 'registered', ticket: redeemed.ticket, operation },
          redemption: redeemed,
        };
      }

      const completed = await batch.advanceTo(operation, 'completed', {
        counterpartyActorId: claimantActorId,
        actorId: claimantActorId,
      });
      return {
        result: { ok: true, branch: 'registered', ticket: redeemed.ticket, operation: completed },
        redemption: redeemed,
      };
    });

    if (redemption) {
      this.tokens.recordOutcome(redemption);
    }
    if (result.ok) {
      this.log.info({ ticketId: result.ticket.id, operationId: result.operation?.id }, 'Ticket claimed');
    } else {
      this.log.info({ error: result.error }, 'Claim rejected');
    }
    return result;
  }

  async claimByEmailLookup(email: string): Promise<LookupResult> {
    const normalized = normalizeEmail(email);
    const actor = await this.store.actors.findByEmail(normalized);
    return actor ? { branch: 'registered', actor } : { branch: 'unregistered', email: normalized };
  }

  /**
   * Completes a transfer without proximity. A registered email receives the
   * ticket directly; otherwise the ticket is held against the email and a
   * deferred delivery is queued for the first login.
   */
  async deliverToEmail(operationId: string, initiatorActorId: string, email: string): Promise<DeliveryResult> {
    const normalized = normalizeEmail(email);
    const { result, redemption } = await this.runner.run(async (repos, batch): Promise<Attempt<DeliveryResult>> => {
      const loaded = await loadForTransition(
        repos,
        batch,
        operationId,
        (operation) => operation.initiatorActorId === initiatorActorId
      );
      if (!loaded.ok) return { result: { ok: false, error: loaded.error }, redemption: null };
      const { operation } = loaded;

      if (operation.kind.type !== 'transfer') {
        return { result: { ok: false, error: 'WrongKind' }, redemption: null };
      }

      const actor = await repos.actors.findByEmail(normalized);
      if (actor && actor.id === initiatorActorId) {
        return { result: { ok: false, error: 'SelfTransfer' }, redemption: null };
      }

      const redeemed = await this.tokens.redeemWithin(
        repos,
        operation.kind.tokenId,
        actor ? { type: 'actor', actorId: actor.id } : { type: 'email', email: normalized },
        batch.now
      );
      if (!redeemed.ok) {
        await settleRejectedClaim(batch, operation, redeemed.error, actor ? actor.id : null);
        return { result: redeemed, redemption: redeemed };
      }

      const completed = await batch.advanceTo(operation, 'completed', {
        counterpartyActorId: actor ? actor.id : operation.counterpartyActorId,
        actorId: initiatorActorId,
      });

      if (!actor) {
        await this.queueDelivery(repos, normalized, redeemed.ticket.id, operation.id, batch.now);
      }
      return {
        result: {
          ok: true,
          branch: actor ? 'registered' : 'unregistered',
          operation: completed,
          ticket: redeemed.ticket,
        },
        redemption: redeemed,
      };
    });

    if (redemption) {
      this.tokens.recordOutcome(redemption);
    }
    if (result.ok) {
      this.log.info({ operationId, branch: result.branch }, 'Transfer delivered by email');
    }
    return result;
  }

  /**
   * Hands every ticket held against the actor's email to the actor.
   */
  async attachDeferredDeliveries(actorId: string): Promise<AttachResult> {
    const now = this.clock.now();
    const result = await this.store.transaction(async (repos) => {
      const actor = await repos.actors.findById(actorId);
      if (!actor) {
        throw new ActorNotFoundError(actorId);
      }

      const email = normalizeEmail(actor.email);
      const queued = await repos.deliveries.listQueuedForEmail(email);
      const tickets: Ticket[] = [];
      for (const delivery of queued) {
        if (delivery.ticketId !== null) {
          const ticket = await repos.tickets.attachEmailOwned(delivery.ticketId, email, actorId);
          if (ticket) {
            tickets.push(ticket);
          }
        }
        await repos.deliveries.markAttached(delivery.id, actorId, now);
      }
      return { attached: tickets.length, tickets };
    });

    if (result.attached > 0) {
      this.log.info({ actorId, attached: result.attached }, 'Deferred deliveries attached');
    }
    return result;
  }

  private async queueDelivery(
    repos: HandoffRepositories,
    email: string,
    ticketId: string,
    operationId: string,
    now: Date
  ): Promise<void> {
    await repos.deliveries.insert({
      id: uuidv4(),
      email,
      ticketId,
      operationId,
      status: 'queued',
      attachedActorId: null,
      createdAt: now,
      attachedAt: null,
    });
  }
}
