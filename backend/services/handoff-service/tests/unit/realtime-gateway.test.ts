import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { parseClientMessage, RealtimeClient } from '../../src/realtime/websocket';
import { ALICE, accessToken, BOB, CAROL, createHarness, Harness } from '../fakes/harness';

class RecordingClient implements RealtimeClient {
  readonly frames: unknown[] = [];
  closed: { code: number; reason: string } | null = null;

  send(data: string): void {
    this.frames.push(JSON.parse(data));
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }
}

async function waitFor(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !condition(); i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
  if (!condition()) throw new Error('condition not met');
}

function upgradeRequest(url: string, authorization?: string): IncomingMessage {
  const request = new IncomingMessage(new Socket());
  request.url = url;
  if (authorization) {
    request.headers.authorization = authorization;
  }
  return request;
}

describe('parseClientMessage', () => {
  it('accepts subscribe with an optional resume version', () => {
    expect(parseClientMessage('{"action":"subscribe","operation_id":"op-1"}')).toEqual({
      action: 'subscribe',
      operation_id: 'op-1',
    });
    expect(parseClientMessage('{"action":"subscribe","operation_id":"op-1","after_version":3}')).toEqual({
      action: 'subscribe',
      operation_id: 'op-1',
      after_version: 3,
    });
  });

  it('accepts unsubscribe', () => {
    expect(parseClientMessage('{"action":"unsubscribe","operation_id":"op-1"}')).toEqual({
      action: 'unsubscribe',
      operation_id: 'op-1',
    });
  });

  it('rejects anything else', () => {
    expect(parseClientMessage('{"action":"subscribe"}')).toBeNull();
    expect(parseClientMessage('{"action":"subscribe","operation_id":"op-1","after_version":-1}')).toBeNull();
    expect(parseClientMessage('{"action":"publish","operation_id":"op-1"}')).toBeNull();
    expect(parseClientMessage('[')).toBeNull();
  });
});

describe('RealtimeGateway', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(async () => {
    await h.cradle.realtimeGateway.close();
  });

  async function payment(): Promise<string> {
    const result = await h.cradle.pendingOperationService.createOperation(ALICE.id, {
      kind: 'payment',
      counterpartyActorId: BOB.id,
      subjectRef: 'charge-intent-1',
      amountCents: 750,
      currency: 'USD',
    });
    if (!result.ok) throw new Error('create failed');
    return result.operation.id;
  }

  it('streams the snapshot and every change to a participant', async () => {
    const id = await payment();
    const gateway = h.cradle.realtimeGateway;
    const client = new RecordingClient();
    const connectionId = gateway.connect(client, { id: ALICE.id, email: ALICE.email });

    await gateway.handleMessage(connectionId, JSON.stringify({ action: 'subscribe', operation_id: id }));
    await waitFor(() => client.frames.length === 2);
    await h.cradle.pendingOperationService.completePayment(id, BOB.id, 'pay-ref-1');
    await waitFor(() => client.frames.length === 4);

    expect(client.frames).toEqual([
      { type: 'subscribed', operation_id: id },
      {
        type: 'status',
        data: {
          operation_id: id,
          state: 'pending',
          terminal_reason: null,
          updated_at: '2026-03-01T12:00:00.000Z',
          version: 1,
        },
      },
      { type: 'status', data: expect.objectContaining({ state: 'processing', version: 2 }) },
      { type: 'status', data: expect.objectContaining({ state: 'completed', version: 3 }) },
    ]);
    await waitFor(() => h.bus.listenerCount(id) === 0);
  });

  it('refuses operations the caller is not part of', async () => {
    const id = await payment();
    const client = new RecordingClient();
    const connectionId = h.cradle.realtimeGateway.connect(client, { id: CAROL.id, email: null });

    await h.cradle.realtimeGateway.handleMessage(connectionId, JSON.stringify({ action: 'subscribe', operation_id: id }));
    await h.cradle.realtimeGateway.handleMessage(
      connectionId,
      JSON.stringify({ action: 'subscribe', operation_id: 'missing' })
    );

    expect(client.frames).toEqual([
      {
        type: 'error',
        operation_id: id,
        error: { code: 'NOT_AUTHORIZED', message: `Cannot subscribe to operation ${id}` },
      },
      {
        type: 'error',
        operation_id: 'missing',
        error: { code: 'OPERATION_NOT_FOUND', message: 'Cannot subscribe to operation missing' },
      },
    ]);
    expect(h.bus.listenerCount(id)).toBe(0);
  });

  it('answers malformed frames with an error', async () => {
    const client = new RecordingClient();
    const connectionId = h.cradle.realtimeGateway.connect(client, { id: BOB.id, email: null });

    await h.cradle.realtimeGateway.handleMessage(connectionId, 'hello');

    expect(client.frames).toEqual([
      { type: 'error', error: { code: 'INVALID_MESSAGE', message: 'Expected {action, operation_id}' } },
    ]);
  });

  it('releases subscriptions on unsubscribe and disconnect', async () => {
    const id = await payment();
    const gateway = h.cradle.realtimeGateway;
    const first = gateway.connect(new RecordingClient(), { id: BOB.id, email: null });
    const second = gateway.connect(new RecordingClient(), { id: ALICE.id, email: null });

    await gateway.handleMessage(first, JSON.stringify({ action: 'subscribe', operation_id: id }));
    await gateway.handleMessage(second, JSON.stringify({ action: 'subscribe', operation_id: id }));
    expect(h.bus.listenerCount(id)).toBe(2);

    await gateway.handleMessage(first, JSON.stringify({ action: 'unsubscribe', operation_id: id }));
    expect(h.bus.listenerCount(id)).toBe(1);

    gateway.disconnect(second);
    expect(h.bus.listenerCount(id)).toBe(0);
    expect(gateway.connectionCount).toBe(1);
  });

  it('closes every client on shutdown', async () => {
    const client = new RecordingClient();
    h.cradle.realtimeGateway.connect(client, { id: BOB.id, email: null });

    await h.cradle.realtimeGateway.close();

    expect(client.closed).toEqual({ code: 1001, reason: 'server shutting down' });
    expect(h.cradle.realtimeGateway.connectionCount).toBe(0);
  });

  describe('authenticate', () => {
    it('accepts a bearer header', () => {
      const token = accessToken(h.config, BOB);
      expect(h.cradle.realtimeGateway.authenticate(upgradeRequest('/api/v1/realtime', `Bearer ${token}`))).toEqual({
        id: BOB.id,
        email: BOB.email,
      });
    });

    it('accepts an access_token query parameter', () => {
      const token = accessToken(h.config, ALICE);
      expect(h.cradle.realtimeGateway.authenticate(upgradeRequest(`/api/v1/realtime?access_token=${token}`))).toEqual({
        id: ALICE.id,
        email: ALICE.email,
      });
    });

    it('rejects tokens signed with another secret', () => {
      const token = accessToken(h.config, ALICE, 'another-test-secret-that-is-long-enough');
      expect(h.cradle.realtimeGateway.authenticate(upgradeRequest('/api/v1/realtime', `Bearer ${token}`))).toBeNull();
      expect(h.cradle.realtimeGateway.authenticate(upgradeRequest('/api/v1/realtime'))).toBeNull();
    });
  });
});
