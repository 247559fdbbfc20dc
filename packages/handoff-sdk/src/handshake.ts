import { MutationOptions } from './client/http-client';
import { ClaimResponse, CreatedOperation, OperationSnapshot, TransferTokenView } from './types/api';
import { Operations } from './resources/operations';
import { Transfers } from './resources/transfers';
import { StatusSubscription } from './realtime/status-subscription';
import { BroadcastHandle, broadcastPayload, DiscoverySession } from './proximity/discovery-session';
import { PayloadFormat } from './proximity/payload';
import { ProximityTransport, TransportUnavailable } from './proximity/transport';
import { SDKLogger } from './utils/logger';
import { HandoffError } from './errors';

type Cancelled = { ok: false; error: 'cancelled' };

export interface PaymentRequestParams {
  subjectRef: string;
  amountCents: number;
  currency: string;
  ttlSeconds?: number;
  signal?: AbortSignal;
}

export interface TransferOfferParams {
  ticketId: string;
  ttlSeconds?: number;
  format?: PayloadFormat;
  signal?: AbortSignal;
}

export interface TransferOffer {
  ok: true;
  operation: OperationSnapshot;
  token: TransferTokenView;
  status: StatusSubscription;
  /** Null when proximity is unavailable; fall back to QR or email delivery */
  broadcast: BroadcastHandle | null;
}

/**
 * Device-side drivers for the two handshakes. Each discovery step is a
 * cancellable session; relay mutations carry an idempotency key so the HTTP
 * client may retry them.
 */
export class Handshake {
  constructor(
    private readonly operations: Operations,
    private readonly transfers: Transfers,
    private readonly subscribe: (operationId: string) => StatusSubscription,
    private readonly newKey: () => string,
    private readonly logger: SDKLogger
  ) {}

  /**
   * Vendor side: read a customer's identity payload and raise a payment
   * request addressed to them.
   */
  async requestPayment(
    transport: ProximityTransport,
    params: PaymentRequestParams
  ): Promise<{ ok: true; operation: OperationSnapshot; status: StatusSubscription } | TransportUnavailable | Cancelled> {
    const listening = await DiscoverySession.listen(transport, {
      accept: ['customer-identity'],
      signal: params.signal,
      logger: this.logger,
    });
    if (!listening.ok) {
      return listening;
    }

    const discovered = await listening.session.first();
    if (!discovered) {
      return { ok: false, error: 'cancelled' };
    }

    this.logger.debug({ format: discovered.format }, 'customer identity discovered');
    const created = await this.operations.create(
      {
        kind: 'payment',
        counterparty_actor_id: discovered.payload.subjectId,
        subject_ref: params.subjectRef,
        amount_cents: params.amountCents,
        currency: params.currency,
        ttl_seconds: params.ttlSeconds,
      },
      this.idempotent()
    );

    return { ok: true, operation: created.operation, status: this.subscribe(created.operation.operation_id) };
  }

  /**
   * Customer side: offer the caller's identity to a nearby vendor device.
   */
  async presentIdentity(
    transport: ProximityTransport,
    actorId: string,
    options: { format?: PayloadFormat; signal?: AbortSignal } = {}
  ): Promise<{ ok: true; handle: BroadcastHandle } | TransportUnavailable> {
    return broadcastPayload(
      transport,
      { kind: 'customer-identity', subjectId: actorId },
      { ...options, logger: this.logger }
    );
  }

  /**
   * Holder side: open a transfer and broadcast its claim token until the
   * operation reaches a terminal state.
   */
  async offerTransfer(transport: ProximityTransport, params: TransferOfferParams): Promise<TransferOffer> {
    const created: CreatedOperation = await this.operations.create(
      { kind: 'transfer', ticket_id: params.ticketId, ttl_seconds: params.ttlSeconds },
      this.idempotent()
    );
    const token = created.transfer_token;
    if (!token) {
      throw new HandoffError(
        `Relay returned transfer ${created.operation.operation_id} without a token`,
        undefined,
        'TRANSFER_TOKEN_MISSING',
        { operation_id: created.operation.operation_id }
      );
    }

    const status = this.subscribe(created.operation.operation_id);
    const broadcasting = await broadcastPayload(
      transport,
      { kind: 'ticket-claim', subjectId: token.token, correlationHint: created.operation.operation_id },
      { format: params.format, signal: params.signal, logger: this.logger }
    );

    let broadcast: BroadcastHandle | null = null;
    if (broadcasting.ok) {
      const handle = broadcasting.handle;
      broadcast = handle;
      void status.ended.then(() => handle.stop());
    } else {
      this.logger.debug({ operationId: created.operation.operation_id }, 'proximity unavailable, offer needs a fallback');
    }

    return { ok: true, operation: created.operation, token, status, broadcast };
  }

  /**
   * Recipient side: read a claim payload and redeem it.
   */
  async receiveTransfer(
    transport: ProximityTransport,
    options: { signal?: AbortSignal } = {}
  ): Promise<{ ok: true; result: ClaimResponse } | TransportUnavailable | Cancelled> {
    const listening = await DiscoverySession.listen(transport, {
      accept: ['ticket-claim'],
      signal: options.signal,
      logger: this.logger,
    });
    if (!listening.ok) {
      return listening;
    }

    const discovered = await listening.session.first();
    if (!discovered) {
      return { ok: false, error: 'cancelled' };
    }

    const result = await this.transfers.claim(discovered.payload.subjectId, this.idempotent());
    return { ok: true, result };
  }

  private idempotent(): MutationOptions {
    return { idempotencyKey: this.newKey() };
  }
}
