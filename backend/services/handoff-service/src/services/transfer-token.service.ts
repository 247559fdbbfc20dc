import { randomBytes } from 'crypto';
import { Clock, ExpiryScheduler, Ticket, TransferToken } from '../types/handoff.types';
import { HandoffRepositories, HandoffStore } from '../store/handoff-store';
import { TtlOutOfRangeError } from '../errors/domain-errors';
import { handoffMetrics } from '../utils/metrics';
import { Logger } from '../utils/logger';

export type IssueError = 'TicketNotFound' | 'NotOwner' | 'AlreadyListedOrPending';

export type IssueResult = { ok: true; token: TransferToken } | { ok: false; error: IssueError };

export type RedeemError = 'NotFound' | 'Revoked' | 'AlreadyRedeemed' | 'Expired' | 'NotOwner' | 'SelfTransfer';

export type RedeemResult = { ok: true; token: TransferToken; ticket: Ticket } | { ok: false; error: RedeemError };

/** Who receives the ticket: a registered actor, or an email with no account yet */
export type Recipient = { type: 'actor'; actorId: string } | { type: 'email'; email: string };

export interface TokenWindowConfig {
  transferTokenTtlSeconds: number;
  maxTtlSeconds: number;
}

const TOKEN_BYTES = 32;

export function generateTokenId(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

export function resolveTtl(ttlSeconds: number | undefined, fallback: number, max: number): number {
  const ttl = ttlSeconds ?? fallback;
  if (!Number.isInteger(ttl) || ttl < 1 || ttl > max) {
    throw new TtlOutOfRangeError(ttl, max);
  }
  return ttl;
}

function classifyDeadToken(token: TransferToken, now: Date): RedeemError | null {
  if (token.redeemed) return 'AlreadyRedeemed';
  if (token.revokedAt !== null) return 'Revoked';
  if (token.expiredAt !== null || now.getTime() >= token.expiresAt.getTime()) return 'Expired';
  return null;
}

/**
 * Issues and redeems single-use transfer tokens. `redeem` is the only path
 * that consumes a token; it compare-and-swaps the token row and then the
 * ticket owner, so concurrent claims have exactly one winner.
 */
export class TransferTokenService {
  private readonly log: Logger;

  constructor(
    private readonly store: HandoffStore,
    private readonly scheduler: ExpiryScheduler,
    private readonly clock: Clock,
    private readonly windows: TokenWindowConfig,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'TransferTokenService' });
  }

  async issue(ticketId: string, holderActorId: string, ttlSeconds?: number): Promise<IssueResult> {
    const now = this.clock.now();
    const ttl = resolveTtl(ttlSeconds, this.windows.transferTokenTtlSeconds, this.windows.maxTtlSeconds);
    const expiresAt = new Date(now.getTime() + ttl * 1000);

    const result = await this.store.transaction((repos) =>
      this.issueWithin(repos, ticketId, holderActorId, now, expiresAt)
    );

    if (result.ok) {
      await this.afterIssue(result.token);
    }
    return result;
  }

  /**
   * Issues inside a caller's transaction. The caller runs `afterIssue` once
   * the transaction commits.
   */
  async issueWithin(
    repos: HandoffRepositories,
    ticketId: string,
    holderActorId: string,
    now: Date,
    expiresAt: Date
  ): Promise<IssueResult> {
    // concurrent issues for one ticket queue here until the first commits
    const ticket = await repos.tickets.findByIdForUpdate(ticketId);
    if (!ticket) {
      return { ok: false, error: 'TicketNotFound' };
    }
    if (ticket.ownerActorId !== holderActorId) {
      return { ok: false, error: 'NotOwner' };
    }

    const [liveToken, activeOperation] = await Promise.all([
      repos.tokens.findLiveForTicket(ticketId, now),
      repos.operations.findActiveForTicket(ticketId),
    ]);
    if (liveToken || (activeOperation && now.getTime() < activeOperation.expiresAt.getTime())) {
      return { ok: false, error: 'AlreadyListedOrPending' };
    }

    const token: TransferToken = {
      id: generateTokenId(),
      ticketId,
      holderActorId,
      issuedAt: now,
      expiresAt,
      redeemed: false,
      redeemedBy: null,
      redeemedByEmail: null,
      redeemedAt: null,
      revokedAt: null,
      expiredAt: null,
    };
    await repos.tokens.insert(token);
    return { ok: true, token };
  }

  async afterIssue(token: TransferToken): Promise<void> {
    handoffMetrics.tokensIssued.inc();
    this.log.info({ ticketId: token.ticketId, expiresAt: token.expiresAt.toISOString() }, 'Transfer token issued');
    try {
      await this.scheduler.scheduleTokenExpiry(token.id, token.expiresAt);
    } catch (error) {
      this.log.warn({ err: error, ticketId: token.ticketId }, 'Token expiry not scheduled; sweep will expire it');
    }
  }

  async redeem(tokenId: string, claimantActorId: string): Promise<RedeemResult> {
    const now = this.clock.now();
    const result = await this.store.transaction((repos) =>
      this.redeemWithin(repos, tokenId, { type: 'actor', actorId: claimantActorId }, now)
    );
    this.recordOutcome(result);
    return result;
  }

  async redeemWithin(
    repos: HandoffRepositories,
    tokenId: string,
    recipient: Recipient,
    now: Date
  ): Promise<RedeemResult> {
    const token = await repos.tokens.findById(tokenId);
    if (!token) {
      return { ok: false, error: 'NotFound' };
    }
    const dead = classifyDeadToken(token, now);
    if (dead) {
      return { ok: false, error: dead };
    }

    const ticket = await repos.tickets.findById(token.ticketId);
    if (!ticket) {
      return { ok: false, error: 'NotFound' };
    }
    if (recipient.type === 'actor' && (recipient.actorId === token.holderActorId || recipient.actorId === ticket.ownerActorId)) {
      return { ok: false, error: 'SelfTransfer' };
    }

    const redeemed = await repos.tokens.markRedeemed(token.id, {
      redeemedBy: recipient.type === 'actor' ? recipient.actorId : null,
      redeemedByEmail: recipient.type === 'email' ? recipient.email : null,
      redeemedAt: now,
    });
    if (!redeemed) {
      const latest = await repos.tokens.findById(token.id);
      return { ok: false, error: (latest && classifyDeadToken(latest, now)) || 'AlreadyRedeemed' };
    }

    const transferred = await repos.tickets.transferOwnership(
      ticket.id,
      token.holderActorId,
      recipient.type === 'actor'
        ? { ownerActorId: recipient.actorId, ownerEmail: null }
        : { ownerActorId: null, ownerEmail: recipient.email }
    );
    if (!transferred) {
      // token stays consumed
      return { ok: false, error: 'NotOwner' };
    }

    return {
      ok: true,
      token: {
        ...token,
        redeemed: true,
        redeemedBy: recipient.type === 'actor' ? recipient.actorId : null,
        redeemedByEmail: recipient.type === 'email' ? recipient.email : null,
        redeemedAt: now,
      },
      ticket: transferred,
    };
  }

  recordOutcome(result: RedeemResult): void {
    handoffMetrics.tokenRedemptions.inc({ outcome: result.ok ? 'redeemed' : result.error });
  }
}
