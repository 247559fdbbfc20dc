import { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app';
import { ALICE, bearer, BOB, CAROL, createHarness, EVENT_ID, Harness, TICKET_ID } from '../fakes/harness';

describe('Handoff API', () => {
  let h: Harness;
  let app: FastifyInstance;

  beforeEach(async () => {
    h = createHarness();
    app = await buildApp(h.container);
  });

  afterEach(async () => {
    await app.close();
  });

  async function offerTransfer(): Promise<{ operationId: string; token: string }> {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/operations',
      headers: bearer(h.config, ALICE),
      payload: { kind: 'transfer', ticket_id: TICKET_ID },
    });
    expect(response.statusCode).toBe(201);
    const body = response.json();
    return { operationId: body.data.operation.operation_id, token: body.data.transfer_token.token };
  }

  function claim(token: string, actor = BOB) {
    return app.inject({
      method: 'POST',
      url: '/api/v1/claim',
      headers: bearer(h.config, actor),
      payload: { transfer_token: token },
    });
  }

  describe('proximity transfer', () => {
    it('moves the ticket to the claimant and completes the operation', async () => {
      const { operationId, token } = await offerTransfer();

      const claimed = await claim(token);

      expect(claimed.statusCode).toBe(200);
      expect(claimed.json()).toEqual({
        ticket: { id: TICKET_ID, ticket_number: 'TKT-a001', event_id: EVENT_ID, owner_actor_id: BOB.id },
        branch: 'registered',
        operation_id: operationId,
      });

      const snapshot = await app.inject({
        method: 'GET',
        url: `/api/v1/operations/${operationId}`,
        headers: bearer(h.config, ALICE),
      });
      expect(snapshot.json().data).toMatchObject({
        operation_id: operationId,
        kind: { type: 'transfer', ticket_id: TICKET_ID },
        state: 'completed',
        counterparty_actor_id: BOB.id,
        version: 4,
        terminal_reason: null,
      });
    });

    it('answers a second claim with already_redeemed', async () => {
      const { token } = await offerTransfer();
      await claim(token);

      const second = await claim(token, CAROL);

      expect(second.statusCode).toBe(409);
      expect(second.json()).toEqual({
        ticket: null,
        error: { code: 'already_redeemed', message: 'Transfer token was already redeemed' },
      });
    });

    it('answers a lapsed token with expired', async () => {
      const { operationId, token } = await offerTransfer();
      h.clock.advanceSeconds(301);

      const response = await claim(token);

      expect(response.statusCode).toBe(410);
      expect(response.json()).toEqual({
        ticket: null,
        error: { code: 'expired', message: 'Transfer token has expired' },
      });
      expect(h.store.operation(operationId)?.state).toBe('expired');
    });

    it('answers a claim after cancellation with cancelled', async () => {
      const { operationId, token } = await offerTransfer();

      const cancelled = await app.inject({
        method: 'POST',
        url: `/api/v1/operations/${operationId}/cancel`,
        headers: bearer(h.config, ALICE),
      });
      expect(cancelled.json().data).toMatchObject({ state: 'cancelled', terminal_reason: 'cancelled by initiator' });

      const response = await claim(token);
      expect(response.statusCode).toBe(409);
      expect(response.json().error).toEqual({ code: 'cancelled', message: 'Transfer was cancelled by the sender' });
    });

    it('answers a claim by someone other than the addressed recipient with not_counterparty', async () => {
      const offered = await app.inject({
        method: 'POST',
        url: '/api/v1/operations',
        headers: bearer(h.config, ALICE),
        payload: { kind: 'transfer', ticket_id: TICKET_ID, counterparty_actor_id: BOB.id },
      });
      const token: string = offered.json().data.transfer_token.token;

      const response = await claim(token, CAROL);

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        ticket: null,
        error: { code: 'not_counterparty', message: 'Transfer is addressed to another recipient' },
      });
      expect((await claim(token, BOB)).statusCode).toBe(200);
    });

    it('rejects malformed tokens before touching the ledger', async () => {
      const response = await claim('not a token');

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
    });
  });

  describe('payment handshake', () => {
    it('runs pending, processing and completed with the counterparty', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/api/v1/operations',
        headers: bearer(h.config, ALICE),
        payload: {
          kind: 'payment',
          counterparty_actor_id: BOB.id,
          subject_ref: 'charge-intent-7',
          amount_cents: 1299,
          currency: 'usd',
        },
      });
      expect(created.statusCode).toBe(201);
      const { operation, transfer_token } = created.json().data;
      expect(transfer_token).toBeNull();
      expect(operation).toMatchObject({
        kind: { type: 'payment', amount_cents: 1299, currency: 'USD' },
        state: 'pending',
        expires_at: '2026-03-01T12:05:00.000Z',
      });

      const incoming = await app.inject({
        method: 'GET',
        url: '/api/v1/operations/incoming',
        headers: bearer(h.config, BOB),
      });
      expect(incoming.json().data.map((o: { operation_id: string }) => o.operation_id)).toEqual([
        operation.operation_id,
      ]);

      const acknowledged = await app.inject({
        method: 'POST',
        url: `/api/v1/operations/${operation.operation_id}/acknowledge`,
        headers: bearer(h.config, BOB),
      });
      expect(acknowledged.json().data.state).toBe('processing');

      const completed = await app.inject({
        method: 'POST',
        url: `/api/v1/operations/${operation.operation_id}/complete`,
        headers: bearer(h.config, BOB),
        payload: { payment_reference: 'pay-ref-7' },
      });
      expect(completed.statusCode).toBe(200);
      expect(completed.json().data).toMatchObject({ state: 'completed', version: 3 });
      expect(h.store.allPayments()).toHaveLength(1);
    });

    it('hides operations from non-participants', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/api/v1/operations',
        headers: bearer(h.config, ALICE),
        payload: {
          kind: 'payment',
          counterparty_actor_id: BOB.id,
          subject_ref: 'charge-intent-8',
          amount_cents: 100,
          currency: 'EUR',
        },
      });

      const response = await app.inject({
        method: 'GET',
        url: `/api/v1/operations/${created.json().data.operation.operation_id}`,
        headers: bearer(h.config, CAROL),
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'NOT_AUTHORIZED', message: 'Not a participant of this operation' },
      });
    });

    it('reports an operation that lapsed before acknowledgement', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/api/v1/operations',
        headers: bearer(h.config, ALICE),
        payload: {
          kind: 'payment',
          counterparty_actor_id: BOB.id,
          subject_ref: 'charge-intent-9',
          amount_cents: 100,
          currency: 'EUR',
          ttl_seconds: 30,
        },
      });
      h.clock.advanceSeconds(30);

      const response = await app.inject({
        method: 'POST',
        url: `/api/v1/operations/${created.json().data.operation.operation_id}/acknowledge`,
        headers: bearer(h.config, BOB),
      });

      expect(response.statusCode).toBe(410);
      expect(response.json().error).toEqual({ code: 'OPERATION_EXPIRED', message: 'Operation has expired' });
    });
  });

  describe('email delivery', () => {
    it('holds the ticket for an unregistered recipient', async () => {
      const { operationId } = await offerTransfer();

      const lookup = await app.inject({
        method: 'POST',
        url: '/api/v1/claims/lookup',
        headers: bearer(h.config, ALICE),
        payload: { email: 'dave@example.com' },
      });
      expect(lookup.json().data).toEqual({ branch: 'unregistered', email: 'dave@example.com' });

      const delivered = await app.inject({
        method: 'POST',
        url: `/api/v1/operations/${operationId}/deliver`,
        headers: bearer(h.config, ALICE),
        payload: { email: 'dave@example.com' },
      });

      expect(delivered.statusCode).toBe(200);
      expect(delivered.json().data).toMatchObject({
        branch: 'unregistered',
        operation: { state: 'completed' },
        ticket: { id: TICKET_ID, owner_actor_id: null },
      });
    });
  });

  describe('request guards', () => {
    it('requires a bearer token', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/operations/incoming' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'UNAUTHENTICATED', message: 'Authentication required' },
      });
    });

    it('validates path parameters', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/operations/not-a-uuid',
        headers: bearer(h.config, ALICE),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid path parameters' });
    });

    it('rejects bodies that do not match the operation kind', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/operations',
        headers: bearer(h.config, ALICE),
        payload: { kind: 'payment', counterparty_actor_id: BOB.id, subject_ref: 'charge-intent-1', currency: 'USD' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.details).toEqual([{ field: 'amount_cents', message: '"amount_cents" is required' }]);
    });

    it('replays a repeated idempotent request', async () => {
      const headers = { ...bearer(h.config, ALICE), 'idempotency-key': '3f1c9a52-6d0e-4b8a-9f57-2a8e1c4d7b90' };
      const payload = { kind: 'transfer', ticket_id: TICKET_ID };

      const first = await app.inject({ method: 'POST', url: '/api/v1/operations', headers, payload });
      const second = await app.inject({ method: 'POST', url: '/api/v1/operations', headers, payload });

      expect(first.statusCode).toBe(201);
      expect(second.statusCode).toBe(201);
      expect(second.headers['idempotent-replayed']).toBe('true');
      expect(second.json()).toEqual(first.json());
      expect(h.bus.published).toHaveLength(1);
    });

    it('rejects idempotency keys that are not UUIDs', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/operations',
        headers: { ...bearer(h.config, ALICE), 'idempotency-key': 'again' },
        payload: { kind: 'transfer', ticket_id: TICKET_ID },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('IDEMPOTENCY_KEY_INVALID');
    });

    it('runs without replay protection when the idempotency store is down', async () => {
      h.idempotency.failing = true;

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/operations',
        headers: { ...bearer(h.config, ALICE), 'idempotency-key': '3f1c9a52-6d0e-4b8a-9f57-2a8e1c4d7b91' },
        payload: { kind: 'transfer', ticket_id: TICKET_ID },
      });

      expect(response.statusCode).toBe(201);
    });
  });

  describe('operational endpoints', () => {
    it('reports readiness', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ready', checks: { store: { healthy: true } } });
    });

    it('exposes prometheus metrics', async () => {
      const response = await app.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('# TYPE handoff_operation_state_transitions_total counter');
    });
  });
});
