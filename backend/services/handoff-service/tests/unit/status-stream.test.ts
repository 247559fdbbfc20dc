import { OperationNotFoundError } from '../../src/errors/domain-errors';
import { StatusEvent } from '../../src/types/handoff.types';
import { StatusStream } from '../../src/services/status-publisher.service';
import { parseStatusEvent, toStateChangedMessage } from '../../src/utils/status-message';
import { ALICE, BOB, createHarness, Harness } from '../fakes/harness';

async function drain(stream: StatusStream): Promise<Array<[number, string]>> {
  const seen: Array<[number, string]> = [];
  for await (const event of stream) {
    seen.push([event.version, event.state]);
  }
  return seen;
}

describe('StatusStream', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  async function payment(): Promise<string> {
    const result = await h.cradle.pendingOperationService.createOperation(ALICE.id, {
      kind: 'payment',
      counterpartyActorId: BOB.id,
      subjectRef: 'charge-intent-1',
      amountCents: 500,
      currency: 'USD',
    });
    if (!result.ok) throw new Error('create failed');
    return result.operation.id;
  }

  it('starts with the current snapshot and follows until a terminal state', async () => {
    const id = await payment();
    const stream = h.cradle.statusPublisher.subscribe(id);
    await stream.settled();

    await h.cradle.pendingOperationService.acknowledge(id, BOB.id);
    await h.cradle.pendingOperationService.completePayment(id, BOB.id, 'pay-ref-1');

    expect(await drain(stream)).toEqual([
      [1, 'pending'],
      [2, 'processing'],
      [3, 'completed'],
    ]);
    expect(stream.isFinished).toBe(true);
    expect(h.bus.listenerCount(id)).toBe(0);
  });

  it('replays missed transitions on resubscribe', async () => {
    const id = await payment();
    await h.cradle.pendingOperationService.acknowledge(id, BOB.id);

    const stream = h.cradle.statusPublisher.subscribe(id, 1);
    await stream.settled();
    await h.cradle.pendingOperationService.cancel(id, ALICE.id);

    expect(await drain(stream)).toEqual([
      [2, 'processing'],
      [3, 'cancelled'],
    ]);
  });

  it('fills a gap from history when a live message was lost', async () => {
    const id = await payment();
    const stream = h.cradle.statusPublisher.subscribe(id);
    await stream.settled();

    h.bus.hold();
    await h.cradle.pendingOperationService.acknowledge(id, BOB.id);
    await h.cradle.pendingOperationService.completePayment(id, BOB.id, 'pay-ref-1');
    const held = h.bus.release();
    h.bus.emit(held[held.length - 1]);

    expect(await drain(stream)).toEqual([
      [1, 'pending'],
      [2, 'processing'],
      [3, 'completed'],
    ]);
  });

  it('drops repeated versions', async () => {
    const id = await payment();
    const stream = h.cradle.statusPublisher.subscribe(id);
    await stream.settled();
    await h.cradle.pendingOperationService.acknowledge(id, BOB.id);
    h.bus.emit(h.bus.published[1]);
    await stream.settled();

    expect(stream.lastDeliveredVersion).toBe(2);
    stream.close();
    expect(await drain(stream)).toEqual([
      [1, 'pending'],
      [2, 'processing'],
    ]);
  });

  it('ends at once for a client already holding the terminal version', async () => {
    const id = await payment();
    await h.cradle.pendingOperationService.cancel(id, ALICE.id);

    const stream = h.cradle.statusPublisher.subscribe(id, 2);

    expect(await drain(stream)).toEqual([]);
  });

  it('fails for an unknown operation', async () => {
    const stream = h.cradle.statusPublisher.subscribe('missing');
    await expect(drain(stream)).rejects.toThrow(OperationNotFoundError);
    expect(h.bus.listenerCount('missing')).toBe(0);
  });
});

describe('status messages', () => {
  const event: StatusEvent = {
    operationId: 'op-1',
    state: 'failed',
    terminalReason: 'card declined',
    updatedAt: new Date('2026-03-01T12:00:00.000Z'),
    version: 4,
  };

  it('uses the wire field names', () => {
    expect(toStateChangedMessage(event)).toEqual({
      operation_id: 'op-1',
      state: 'failed',
      terminal_reason: 'card declined',
      updated_at: '2026-03-01T12:00:00.000Z',
      version: 4,
    });
  });

  it('parses what it produces', () => {
    expect(parseStatusEvent(JSON.stringify(toStateChangedMessage(event)))).toEqual(event);
  });

  it('rejects malformed messages', () => {
    expect(parseStatusEvent('not json')).toBeNull();
    expect(parseStatusEvent('{"operation_id":"op-1","state":"done","updated_at":"2026-03-01T12:00:00.000Z","version":1}')).toBeNull();
    expect(parseStatusEvent('{"operation_id":"op-1","state":"pending","updated_at":"yesterday","version":1}')).toBeNull();
    expect(parseStatusEvent('{"operation_id":"op-1","state":"pending","updated_at":"2026-03-01T12:00:00.000Z","version":1.5}')).toBeNull();
  });
});
