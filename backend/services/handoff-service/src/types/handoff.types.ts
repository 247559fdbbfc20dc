import type { OperationState } from '@handoff/sdk';

export type { OperationState, TerminalState } from '@handoff/sdk';

export type OperationKind =
  | { type: 'payment'; amountCents: number; currency: string }
  | { type: 'transfer'; tokenId: string };

export interface PendingOperation {
  id: string;
  kind: OperationKind;
  initiatorActorId: string;
  counterpartyActorId: string | null;
  /** Ticket id for transfers, charge-intent reference for payments */
  subjectRef: string;
  state: OperationState;
  version: number;
  terminalReason: string | null;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

export interface TransferToken {
  id: string;
  ticketId: string;
  holderActorId: string;
  issuedAt: Date;
  expiresAt: Date;
  redeemed: boolean;
  redeemedBy: string | null;
  redeemedByEmail: string | null;
  redeemedAt: Date | null;
  revokedAt: Date | null;
  expiredAt: Date | null;
}

export interface Ticket {
  id: string;
  ticketNumber: string;
  eventId: string;
  ownerActorId: string | null;
  ownerEmail: string | null;
  version: number;
}

export interface Actor {
  id: string;
  email: string;
  displayName: string | null;
}

export interface OperationTransition {
  operationId: string;
  version: number;
  fromState: OperationState | null;
  toState: OperationState;
  terminalReason: string | null;
  actorId: string | null;
  occurredAt: Date;
}

export interface PaymentRecord {
  id: string;
  operationId: string;
  payerActorId: string;
  payeeActorId: string;
  amountCents: number;
  currency: string;
  paymentReference: string;
  createdAt: Date;
}

export type DeliveryStatus = 'queued' | 'attached';

export interface DeferredDelivery {
  id: string;
  email: string;
  ticketId: string | null;
  operationId: string | null;
  status: DeliveryStatus;
  attachedActorId: string | null;
  createdAt: Date;
  attachedAt: Date | null;
}

/**
 * Status change emitted after a transition commits.
 */
export interface StatusEvent {
  operationId: string;
  state: OperationState;
  terminalReason: string | null;
  updatedAt: Date;
  version: number;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface AuthenticatedActor {
  id: string;
  email: string | null;
}

/**
 * Arranges for expiry to run at a resource's deadline. The recurring sweep
 * catches anything a scheduler misses.
 */
export interface ExpiryScheduler {
  scheduleOperationExpiry(operationId: string, at: Date): Promise<void>;
  scheduleTokenExpiry(tokenId: string, at: Date): Promise<void>;
}
