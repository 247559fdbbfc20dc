import type {
  Actor,
  DeferredDelivery,
  OperationState,
  OperationTransition,
  PaymentRecord,
  PendingOperation,
  Ticket,
  TransferToken,
} from '../types/handoff.types';

export interface TicketRepository {
  findById(id: string): Promise<Ticket | null>;
  /** Reads the ticket and holds its row lock until the transaction ends. */
  findByIdForUpdate(id: string): Promise<Ticket | null>;
  /**
   * Compare-and-swap on the owner. Returns null when the ticket is no longer
   * owned by `expectedOwnerActorId`.
   */
  transferOwnership(
    ticketId: string,
    expectedOwnerActorId: string,
    next: { ownerActorId: string | null; ownerEmail: string | null }
  ): Promise<Ticket | null>;
  /** Hands an email-owned ticket to the actor that registered with that email. */
  attachEmailOwned(ticketId: string, email: string, actorId: string): Promise<Ticket | null>;
}

export interface ActorRepository {
  findById(id: string): Promise<Actor | null>;
  findByEmail(email: string): Promise<Actor | null>;
}

export interface TokenRedemption {
  redeemedBy: string | null;
  redeemedByEmail: string | null;
  redeemedAt: Date;
}

export interface TokenRepository {
  insert(token: TransferToken): Promise<void>;
  findById(id: string): Promise<TransferToken | null>;
  /** Not redeemed, not revoked, not expired at `now`. */
  findLiveForTicket(ticketId: string, now: Date): Promise<TransferToken | null>;
  /** Compare-and-swap; false unless the token was live at `redeemedAt`. */
  markRedeemed(id: string, redemption: TokenRedemption): Promise<boolean>;
  revoke(id: string, at: Date): Promise<boolean>;
  /** Marks a single unredeemed, unrevoked token expired once it is due. */
  markExpired(id: string, now: Date): Promise<boolean>;
  expireDue(now: Date, limit: number): Promise<TransferToken[]>;
}

export interface OperationPatch {
  state: OperationState;
  version: number;
  terminalReason: string | null;
  counterpartyActorId: string | null;
  updatedAt: Date;
}

export interface OperationRepository {
  insert(operation: PendingOperation): Promise<void>;
  findById(id: string): Promise<PendingOperation | null>;
  findByTokenId(tokenId: string): Promise<PendingOperation | null>;
  /**
   * Row-locking reads. Work that touches an operation and its token locks
   * the operation first.
   */
  findByIdForUpdate(id: string): Promise<PendingOperation | null>;
  findByTokenIdForUpdate(tokenId: string): Promise<PendingOperation | null>;
  findActiveForTicket(ticketId: string): Promise<PendingOperation | null>;
  listActiveForCounterparty(actorId: string): Promise<PendingOperation[]>;
  /** Version compare-and-swap. Null when `expectedVersion` is stale. */
  update(id: string, expectedVersion: number, patch: OperationPatch): Promise<PendingOperation | null>;
  findDueForExpiry(now: Date, limit: number): Promise<PendingOperation[]>;
}

export interface TransitionRepository {
  append(transition: OperationTransition): Promise<void>;
  listAfter(operationId: string, afterVersion: number): Promise<OperationTransition[]>;
}

export interface PaymentRepository {
  insert(record: PaymentRecord): Promise<void>;
  findByOperationId(operationId: string): Promise<PaymentRecord | null>;
}

export interface DeliveryRepository {
  insert(delivery: DeferredDelivery): Promise<void>;
  listQueuedForEmail(email: string): Promise<DeferredDelivery[]>;
  markAttached(id: string, actorId: string, at: Date): Promise<boolean>;
}

export interface HandoffRepositories {
  tickets: TicketRepository;
  actors: ActorRepository;
  tokens: TokenRepository;
  operations: OperationRepository;
  transitions: TransitionRepository;
  payments: PaymentRepository;
  deliveries: DeliveryRepository;
}

/**
 * Ledger access. `transaction` runs `work` atomically: either every write
 * inside it commits or none does.
 */
export interface HandoffStore extends HandoffRepositories {
  transaction<T>(work: (repos: HandoffRepositories) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
