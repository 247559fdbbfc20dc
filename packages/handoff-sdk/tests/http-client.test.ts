import { HandoffSDK } from '../src/handoff';
import { ConfigurationError, ConflictError, NotFoundError, ServerError } from '../src/errors';
import { RetryError } from '../src/utils/retry';
import { createSDKLogger } from '../src/utils/logger';
import { createFakeAxios, Responder } from './helpers/fake-axios';
import { FakeRealtime } from './helpers/fake-realtime';

const snapshot = {
  operation_id: 'op-1',
  kind: { type: 'payment', amount_cents: 1500, currency: 'USD' },
  initiator_actor_id: 'vendor-1',
  counterparty_actor_id: 'customer-1',
  subject_ref: 'charge-1',
  state: 'pending',
  version: 1,
  terminal_reason: null,
  created_at: '2026-01-01T12:00:00.000Z',
  updated_at: '2026-01-01T12:00:00.000Z',
  expires_at: '2026-01-01T12:05:00.000Z',
};

function createSDK(responder: Responder) {
  const fake = createFakeAxios(responder);
  const sdk = new HandoffSDK(
    { accessToken: 'test-token', maxRetries: 2, retryBaseDelay: 0 },
    { axios: fake.instance, connector: new FakeRealtime().connector, logger: createSDKLogger(false) }
  );
  return { sdk, requests: fake.requests };
}

describe('HandoffSDK configuration', () => {
  it('requires an access token', () => {
    expect(() => new HandoffSDK({ accessToken: '' })).toThrow(ConfigurationError);
  });

  it('derives the API and realtime URLs from the base URL', () => {
    const sdk = new HandoffSDK({ accessToken: 'test-token', baseUrl: 'https://relay.example.test/' });
    expect(sdk.getConfig().baseUrl).toBe('https://relay.example.test/api/v1');
    expect(sdk.getConfig().realtimeUrl).toBe('wss://relay.example.test/api/v1/realtime');
  });
});

describe('HTTPClient retry policy', () => {
  it('sends the bearer token', async () => {
    const { sdk, requests } = createSDK(() => ({ status: 200, data: { success: true, data: snapshot } }));
    await sdk.operations.get('op-1');
    expect(requests[0]).toMatchObject({ method: 'GET', url: '/operations/op-1', authorization: 'Bearer test-token' });
  });

  it('retries reads on transient failures', async () => {
    const { sdk, requests } = createSDK((_request, index) =>
      index === 0 ? { status: 503, data: { success: false, error: { code: 'UNAVAILABLE', message: 'busy' } } } :
      index === 1 ? 'network-error' :
      { status: 200, data: { success: true, data: snapshot } }
    );

    await expect(sdk.operations.get('op-1')).resolves.toEqual(snapshot);
    expect(requests).toHaveLength(3);
  });

  it('gives up on reads after maxRetries', async () => {
    const { sdk, requests } = createSDK(() => ({ status: 502, data: {} }));
    await expect(sdk.operations.incoming()).rejects.toBeInstanceOf(RetryError);
    expect(requests).toHaveLength(3);
  });

  it('does not retry reads on client errors', async () => {
    const { sdk, requests } = createSDK(() => ({
      status: 404,
      data: { success: false, error: { code: 'OPERATION_NOT_FOUND', message: 'Operation op-1 not found' } },
    }));
    await expect(sdk.operations.get('op-1')).rejects.toBeInstanceOf(NotFoundError);
    expect(requests).toHaveLength(1);
  });

  it('sends a mutation without an idempotency key exactly once', async () => {
    const { sdk, requests } = createSDK(() => ({ status: 503, data: {} }));
    await expect(sdk.operations.cancel('op-1')).rejects.toBeInstanceOf(ServerError);
    expect(requests).toHaveLength(1);
  });

  it('retries a keyed mutation with the same key', async () => {
    const { sdk, requests } = createSDK((_request, index) =>
      index === 0 ? 'network-error' : { status: 200, data: { success: true, data: { ...snapshot, state: 'cancelled' } } }
    );

    const result = await sdk.operations.cancel('op-1', { idempotencyKey: 'key-1' });
    expect(result.state).toBe('cancelled');
    expect(requests.map((request) => request.idempotencyKey)).toEqual(['key-1', 'key-1']);
  });

  it('maps state conflicts to ConflictError with the relay code', async () => {
    const { sdk } = createSDK(() => ({
      status: 409,
      data: { success: false, error: { code: 'OPERATION_TERMINAL', message: 'Operation op-1 is already completed' } },
    }));

    const failure = await sdk.operations.acknowledge('op-1').then(
      () => null,
      (error: unknown) => error
    );
    expect(failure).toBeInstanceOf(ConflictError);
    expect(failure instanceof ConflictError && failure.code).toBe('OPERATION_TERMINAL');
  });
});

describe('Transfers.claim', () => {
  it('returns rejected claims as results', async () => {
    const body = { ticket: null, error: { code: 'expired', message: 'Transfer token has expired' } };
    const { sdk, requests } = createSDK(() => ({ status: 410, data: body }));

    await expect(sdk.transfers.claim('tok-1')).resolves.toEqual(body);
    expect(requests[0]).toMatchObject({ method: 'POST', url: '/claim', body: { transfer_token: 'tok-1' } });
  });
});
