import type Redis from 'ioredis';
import { AsyncChannel } from '@handoff/sdk';
import { OperationTransition, StatusEvent } from '../types/handoff.types';
import { HandoffStore } from '../store/handoff-store';
import { OperationStateMachine } from '../utils/operation-state-machine';
import { OperationNotFoundError } from '../errors/domain-errors';
import { parseStatusEvent, toStateChangedMessage } from '../utils/status-message';
import { handoffMetrics } from '../utils/metrics';
import { Logger } from '../utils/logger';
import { AppliedTransition, toStatusEvent } from './operation-transitions';

export type StatusListener = (event: StatusEvent) => void;

/**
 * Fan-out of status events across relay instances.
 */
export interface StatusBus {
  publish(event: StatusEvent): Promise<void>;
  /** Returns the function that removes the listener. */
  subscribe(operationId: string, listener: StatusListener): () => void;
  close(): Promise<void>;
}

export const STATUS_CHANNEL_PREFIX = 'handoff:operation:';

export function statusChannel(operationId: string): string {
  return `${STATUS_CHANNEL_PREFIX}${operationId}`;
}

/**
 * Every instance pattern-subscribes once and dispatches to its local
 * listeners, so a status change committed on one instance reaches devices
 * connected to any other.
 */
export class RedisStatusBus implements StatusBus {
  private readonly listeners = new Map<string, Set<StatusListener>>();
  private readonly log: Logger;

  constructor(
    private readonly pub: Redis,
    private readonly sub: Redis,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'RedisStatusBus' });
    this.sub.on('pmessage', (_pattern: string, channel: string, message: string) => {
      this.dispatch(channel, message);
    });
  }

  async start(): Promise<void> {
    await this.sub.psubscribe(`${STATUS_CHANNEL_PREFIX}*`);
    this.log.info('Subscribed to operation status channels');
  }

  async publish(event: StatusEvent): Promise<void> {
    await this.pub.publish(statusChannel(event.operationId), JSON.stringify(toStateChangedMessage(event)));
  }

  subscribe(operationId: string, listener: StatusListener): () => void {
    let set = this.listeners.get(operationId);
    if (!set) {
      set = new Set();
      this.listeners.set(operationId, set);
    }
    set.add(listener);

    return () => {
      const current = this.listeners.get(operationId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) {
        this.listeners.delete(operationId);
      }
    };
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await this.sub.punsubscribe();
  }

  private dispatch(channel: string, message: string): void {
    if (!channel.startsWith(STATUS_CHANNEL_PREFIX)) return;
    const event = parseStatusEvent(message);
    if (!event) {
      this.log.warn({ channel }, 'Dropping malformed status message');
      return;
    }
    const set = this.listeners.get(event.operationId);
    if (!set) return;
    for (const listener of [...set]) {
      listener(event);
    }
  }
}

function transitionEvent(transition: OperationTransition): StatusEvent {
  return {
    operationId: transition.operationId,
    state: transition.toState,
    terminalReason: transition.terminalReason,
    updatedAt: transition.occurredAt,
    version: transition.version,
  };
}

/**
 * Ordered status events for one operation. The listener is registered before
 * the snapshot is read so nothing committed in between is lost; versions at
 * or below the last delivered one are dropped and gaps are filled from the
 * transition history. Iteration ends after a terminal state.
 */
export class StatusStream implements AsyncIterable<StatusEvent> {
  private readonly channel = new AsyncChannel<StatusEvent>();
  private queue: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;
  private finished = false;
  private lastVersion: number;

  constructor(
    readonly operationId: string,
    afterVersion: number,
    private readonly bus: StatusBus,
    private readonly store: HandoffStore,
    private readonly log: Logger
  ) {
    this.lastVersion = afterVersion;
  }

  get lastDeliveredVersion(): number {
    return this.lastVersion;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  start(): this {
    this.unsubscribe = this.bus.subscribe(this.operationId, (event) => {
      this.enqueue(() => this.onLive(event));
    });
    handoffMetrics.realtimeSubscribers.inc();
    this.enqueue(() => this.prime());
    return this;
  }

  /** Resolves once every queued delivery has run */
  settled(): Promise<void> {
    return this.queue;
  }

  close(): void {
    this.end(null);
  }

  [Symbol.asyncIterator](): AsyncIterator<StatusEvent> {
    return {
      next: () => this.channel.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private enqueue(task: () => Promise<void>): void {
    this.queue = this.queue.then(async () => {
      if (this.finished) return;
      try {
        await task();
      } catch (error) {
        this.log.error({ err: error, operationId: this.operationId }, 'Status stream failed');
        this.end(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  private async prime(): Promise<void> {
    const operation = await this.store.operations.findById(this.operationId);
    if (!operation) {
      this.end(new OperationNotFoundError(this.operationId));
      return;
    }

    if (this.lastVersion === 0) {
      this.deliver(toStatusEvent(operation));
      return;
    }
    if (operation.version > this.lastVersion) {
      await this.backfill();
      return;
    }
    if (OperationStateMachine.isTerminalState(operation.state)) {
      this.end(null);
    }
  }

  private async onLive(event: StatusEvent): Promise<void> {
    if (event.version <= this.lastVersion) return;
    if (event.version > this.lastVersion + 1) {
      await this.backfill();
    }
    if (!this.finished && event.version > this.lastVersion) {
      this.deliver(event);
    }
  }

  private async backfill(): Promise<void> {
    const history = await this.store.transitions.listAfter(this.operationId, this.lastVersion);
    for (const transition of history) {
      if (this.finished) return;
      if (transition.version > this.lastVersion) {
        this.deliver(transitionEvent(transition));
      }
    }
  }

  private deliver(event: StatusEvent): void {
    this.channel.push(event);
    this.lastVersion = event.version;
    if (OperationStateMachine.isTerminalState(event.state)) {
      this.end(null);
    }
  }

  private end(error: Error | null): void {
    if (this.finished) return;
    this.finished = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    handoffMetrics.realtimeSubscribers.dec();
    if (error) {
      this.channel.fail(error);
    } else {
      this.channel.close();
    }
  }
}

/**
 * Publishes committed transitions and opens ordered status streams.
 */
export class StatusPublisher {
  private readonly log: Logger;

  constructor(
    private readonly bus: StatusBus,
    private readonly store: HandoffStore,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'StatusPublisher' });
  }

  async publish(event: StatusEvent): Promise<void> {
    await this.bus.publish(event);
  }

  /**
   * Called after the ledger transaction commits. A failed publish is logged;
   * subscribers recover the missing version from history on the next event
   * or on reconnect.
   */
  async publishApplied(applied: AppliedTransition[]): Promise<void> {
    for (const { fromState, event } of applied) {
      handoffMetrics.stateTransitions.inc({ from_state: fromState ?? 'none', to_state: event.state });
      try {
        await this.bus.publish(event);
      } catch (error) {
        this.log.error(
          { err: error, operationId: event.operationId, version: event.version },
          'Failed to publish status change'
        );
      }
    }
  }

  subscribe(operationId: string, afterVersion = 0): StatusStream {
    return new StatusStream(operationId, afterVersion, this.bus, this.store, this.log).start();
  }
}
