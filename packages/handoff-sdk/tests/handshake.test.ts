import { HandoffSDK } from '../src/handoff';
import { HandoffError } from '../src/errors';
import { decodePayload, encodePayload } from '../src/proximity/payload';
import { describeClaimError, describeOutcome, describeStatus } from '../src/messages';
import { createSDKLogger } from '../src/utils/logger';
import { createFakeAxios, Responder } from './helpers/fake-axios';
import { FakeRealtime, stateMessage } from './helpers/fake-realtime';
import { InMemoryTransport } from './helpers/in-memory-transport';

function operation(overrides: Record<string, unknown>) {
  return {
    operation_id: 'op-1',
    kind: { type: 'transfer', ticket_id: 'tkt-1' },
    initiator_actor_id: 'holder-1',
    counterparty_actor_id: null,
    subject_ref: 'tkt-1',
    state: 'waiting',
    version: 1,
    terminal_reason: null,
    created_at: '2026-01-01T12:00:00.000Z',
    updated_at: '2026-01-01T12:00:00.000Z',
    expires_at: '2026-01-01T12:05:00.000Z',
    ...overrides,
  };
}

function setup(responder: Responder) {
  const fake = createFakeAxios(responder);
  const realtime = new FakeRealtime();
  const sdk = new HandoffSDK(
    { accessToken: 'test-token', retryBaseDelay: 0 },
    { axios: fake.instance, connector: realtime.connector, logger: createSDKLogger(false) }
  );
  return { sdk, realtime, requests: fake.requests, transport: new InMemoryTransport() };
}

describe('Handshake.offerTransfer', () => {
  it('broadcasts the claim token until the transfer settles', async () => {
    const { sdk, realtime, requests, transport } = setup(() => ({
      status: 201,
      data: {
        success: true,
        data: {
          operation: operation({}),
          transfer_token: {
            token: 'tokenValue_1',
            ticket_id: 'tkt-1',
            issued_at: '2026-01-01T12:00:00.000Z',
            expires_at: '2026-01-01T12:05:00.000Z',
          },
        },
      },
    }));

    const offer = await sdk.handshake.offerTransfer(transport, { ticketId: 'tkt-1', ttlSeconds: 300 });

    expect(requests[0]).toMatchObject({
      method: 'POST',
      url: '/operations',
      body: { kind: 'transfer', ticket_id: 'tkt-1', ttl_seconds: 300 },
    });
    expect(typeof requests[0].idempotencyKey).toBe('string');
    expect(decodePayload(transport.broadcasts[0])).toEqual({
      ok: true,
      payload: { kind: 'ticket-claim', subjectId: 'tokenValue_1', correlationHint: 'op-1' },
      format: 'tagged',
    });

    const connection = realtime.latest();
    connection.open();
    connection.status(stateMessage('op-1', 1, 'waiting'));
    connection.status(stateMessage('op-1', 4, 'completed'));

    const final = await offer.status.settled();
    expect(final?.state).toBe('completed');
    expect(offer.broadcast).not.toBeNull();
    await expect(offer.broadcast?.finished).resolves.toBeNull();
    expect(transport.broadcastSignals[0].aborted).toBe(true);
  });

  it('still opens the transfer when proximity is unavailable', async () => {
    const { sdk, transport } = setup(() => ({
      status: 201,
      data: {
        success: true,
        data: {
          operation: operation({}),
          transfer_token: {
            token: 'tokenValue_2',
            ticket_id: 'tkt-1',
            issued_at: '2026-01-01T12:00:00.000Z',
            expires_at: '2026-01-01T12:05:00.000Z',
          },
        },
      },
    }));
    transport.available = false;

    const offer = await sdk.handshake.offerTransfer(transport, { ticketId: 'tkt-1' });
    expect(offer.broadcast).toBeNull();
    expect(offer.token.token).toBe('tokenValue_2');
    offer.status.close();
  });

  it('stops broadcasting once the caller stops following the status', async () => {
    const { sdk, realtime, transport } = setup(() => ({
      status: 201,
      data: {
        success: true,
        data: {
          operation: operation({}),
          transfer_token: {
            token: 'tokenValue_3',
            ticket_id: 'tkt-1',
            issued_at: '2026-01-01T12:00:00.000Z',
            expires_at: '2026-01-01T12:05:00.000Z',
          },
        },
      },
    }));

    const offer = await sdk.handshake.offerTransfer(transport, { ticketId: 'tkt-1' });
    const connection = realtime.latest();
    connection.open();
    connection.status(stateMessage('op-1', 1, 'waiting'));

    for await (const message of offer.status) {
      expect(message.state).toBe('waiting');
      break;
    }

    await expect(offer.broadcast?.finished).resolves.toBeNull();
    expect(transport.broadcastSignals[0].aborted).toBe(true);
    expect(connection.closed).toBe(true);
  });

  it('rejects a transfer the relay opened without a token', async () => {
    const { sdk, transport, realtime } = setup(() => ({
      status: 201,
      data: { success: true, data: { operation: operation({}), transfer_token: null } },
    }));

    const offering = sdk.handshake.offerTransfer(transport, { ticketId: 'tkt-1' });

    await expect(offering).rejects.toBeInstanceOf(HandoffError);
    await expect(offering).rejects.toMatchObject({
      code: 'TRANSFER_TOKEN_MISSING',
      details: { operation_id: 'op-1' },
    });
    expect(transport.broadcasts).toHaveLength(0);
    expect(realtime.connections).toHaveLength(0);
  });
});

describe('Handshake.requestPayment', () => {
  it('creates a payment addressed to the discovered customer', async () => {
    const { sdk, requests, transport } = setup(() => ({
      status: 201,
      data: {
        success: true,
        data: {
          operation: operation({
            kind: { type: 'payment', amount_cents: 2500, currency: 'USD' },
            counterparty_actor_id: 'customer-5',
            subject_ref: 'charge-9',
            state: 'pending',
          }),
          transfer_token: null,
        },
      },
    }));

    const pending = sdk.handshake.requestPayment(transport, { subjectRef: 'charge-9', amountCents: 2500, currency: 'USD' });
    await new Promise((resolve) => setImmediate(resolve));
    transport.emit(encodePayload({ kind: 'customer-identity', subjectId: 'customer-5' }, 'uri'));

    const result = await pending;
    if (!result.ok) {
      throw new Error(`unexpected ${result.error}`);
    }
    expect(requests[0].body).toEqual({
      kind: 'payment',
      counterparty_actor_id: 'customer-5',
      subject_ref: 'charge-9',
      amount_cents: 2500,
      currency: 'USD',
    });
    expect(result.operation.state).toBe('pending');
    result.status.close();
  });

  it('returns cancelled when the vendor stops listening', async () => {
    const { sdk, requests, transport } = setup(() => ({ status: 500, data: {} }));
    const controller = new AbortController();

    const pending = sdk.handshake.requestPayment(transport, {
      subjectRef: 'charge-9',
      amountCents: 100,
      currency: 'USD',
      signal: controller.signal,
    });
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();

    await expect(pending).resolves.toEqual({ ok: false, error: 'cancelled' });
    expect(requests).toHaveLength(0);
  });
});

describe('Handshake.receiveTransfer', () => {
  it('claims the token read from the holder', async () => {
    const claimed = {
      ticket: { id: 'tkt-1', ticket_number: 'A-1', event_id: 'evt-1', owner_actor_id: 'recipient-1' },
      branch: 'registered',
      operation_id: 'op-1',
    };
    const { sdk, requests, transport } = setup(() => ({ status: 200, data: claimed }));

    const pending = sdk.handshake.receiveTransfer(transport);
    await new Promise((resolve) => setImmediate(resolve));
    transport.emit('HANDOFF_PAY:someone');
    transport.emit('HANDOFF_CLAIM:tokenValue_1#op-1');

    await expect(pending).resolves.toEqual({ ok: true, result: claimed });
    expect(requests[0].body).toEqual({ transfer_token: 'tokenValue_1' });
  });
});

describe('outcome messages', () => {
  it('gives each terminal state its own message', () => {
    const messages = (['completed', 'failed', 'cancelled', 'expired'] as const).map((state) =>
      describeOutcome(state, 'card declined', 'payment')
    );
    expect(new Set(messages).size).toBe(4);
  });

  it('carries the failure reason through', () => {
    expect(describeOutcome('failed', 'card declined', 'payment')).toBe('Payment failed: card declined.');
    expect(describeStatus(stateMessage('op-1', 3, 'failed', 'ticket already claimed'))).toBe(
      'Transfer failed: ticket already claimed.'
    );
  });

  it('describes claim rejections', () => {
    expect(describeClaimError('already_redeemed')).toBe('This ticket has already been claimed.');
  });
});
