import {
  isOperationState,
  isTerminalState,
  RealtimeClientMessage,
  RealtimeServerMessage,
  StateChangedMessage,
} from '../types/api';
import { HandoffError, NetworkError } from '../errors';
import { AsyncChannel } from '../utils/channel';
import { backoffDelay } from '../utils/retry';
import { SDKLogger } from '../utils/logger';
import { RealtimeConnection, RealtimeConnector } from './connection';

export interface StatusSubscriptionOptions {
  operationId: string;
  connector: RealtimeConnector;
  logger: SDKLogger;
  maxReconnectAttempts?: number;
  reconnectBaseDelay?: number;
  reconnectMaxDelay?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toStateChanged(value: unknown): StateChangedMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const { operation_id, state, terminal_reason, updated_at, version } = value;
  if (
    typeof operation_id !== 'string' ||
    !isOperationState(state) ||
    typeof updated_at !== 'string' ||
    typeof version !== 'number'
  ) {
    return null;
  }

  let reason: string | null = null;
  if (typeof terminal_reason === 'string') {
    reason = terminal_reason;
  } else if (terminal_reason !== undefined && terminal_reason !== null) {
    return null;
  }
  return { operation_id, state, terminal_reason: reason, updated_at, version };
}

export function parseServerMessage(text: string): RealtimeServerMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }

  switch (parsed.type) {
    case 'status': {
      const data = toStateChanged(parsed.data);
      return data ? { type: 'status', data } : null;
    }
    case 'subscribed':
      return typeof parsed.operation_id === 'string' ? { type: 'subscribed', operation_id: parsed.operation_id } : null;
    case 'error': {
      const error = parsed.error;
      if (!isRecord(error) || typeof error.code !== 'string' || typeof error.message !== 'string') {
        return null;
      }
      return {
        type: 'error',
        operation_id: typeof parsed.operation_id === 'string' ? parsed.operation_id : undefined,
        error: { code: error.code, message: error.message },
      };
    }
    default:
      return null;
  }
}

/**
 * Status stream for one operation.
 *
 * The relay answers every subscribe with the current snapshot (or, on
 * resubscribe, the transitions after the last version seen) before live
 * updates. Versions are strictly increasing; repeats are dropped. A dropped
 * connection is re-established with backoff. The stream ends after a
 * terminal state or `close()`.
 */
export class StatusSubscription implements AsyncIterable<StateChangedMessage> {
  private readonly channel = new AsyncChannel<StateChangedMessage>();
  private connection: RealtimeConnection | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private lastVersion = 0;
  private attempts = 0;
  private closed = false;
  private latest: StateChangedMessage | null = null;
  private resolveEnded: (() => void) | null = null;

  /** Resolves once the stream has ended for any reason */
  readonly ended: Promise<void> = new Promise((resolve) => {
    this.resolveEnded = resolve;
  });

  constructor(private readonly options: StatusSubscriptionOptions) {}

  get operationId(): string {
    return this.options.operationId;
  }

  get current(): StateChangedMessage | null {
    return this.latest;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  start(): this {
    if (!this.closed && !this.connection) {
      this.connect();
    }
    return this;
  }

  /**
   * Drain the stream and return the final message seen.
   */
  async settled(): Promise<StateChangedMessage | null> {
    let last: StateChangedMessage | null = this.latest;
    for await (const message of this) {
      last = message;
    }
    return last;
  }

  close(): void {
    this.shutdown();
    this.channel.close();
  }

  /** Leaving a `for await` loop early closes the subscription. */
  [Symbol.asyncIterator](): AsyncIterator<StateChangedMessage> {
    return this.channel.iterator(() => this.close());
  }

  private connect(): void {
    const { operationId, connector, logger } = this.options;

    const connection = connector({
      onOpen: () => {
        const message: RealtimeClientMessage =
          this.lastVersion > 0
            ? { action: 'subscribe', operation_id: operationId, after_version: this.lastVersion }
            : { action: 'subscribe', operation_id: operationId };
        connection.send(JSON.stringify(message));
      },
      onMessage: (text) => this.handleMessage(text),
      onClose: (reason) => this.handleDisconnect(connection, reason),
    });

    this.connection = connection;
    logger.debug({ operationId, attempt: this.attempts }, 'realtime connecting');
  }

  private handleMessage(text: string): void {
    if (this.closed) {
      return;
    }

    const message = parseServerMessage(text);
    if (!message) {
      this.options.logger.debug({ text }, 'ignoring unrecognised realtime frame');
      return;
    }

    switch (message.type) {
      case 'subscribed':
        this.attempts = 0;
        return;
      case 'error':
        if (message.operation_id === undefined || message.operation_id === this.operationId) {
          this.shutdown();
          this.channel.fail(new HandoffError(message.error.message, undefined, message.error.code));
        }
        return;
      case 'status':
        this.deliver(message.data);
        return;
    }
  }

  private deliver(message: StateChangedMessage): void {
    if (message.operation_id !== this.operationId || message.version <= this.lastVersion) {
      return;
    }

    this.attempts = 0;
    this.lastVersion = message.version;
    this.latest = message;
    this.channel.push(message);

    if (isTerminalState(message.state)) {
      this.close();
    }
  }

  private handleDisconnect(connection: RealtimeConnection, reason: string): void {
    if (this.closed || connection !== this.connection) {
      return;
    }
    this.connection = null;

    const {
      logger,
      maxReconnectAttempts = 5,
      reconnectBaseDelay = 500,
      reconnectMaxDelay = 10000,
    } = this.options;

    if (this.attempts >= maxReconnectAttempts) {
      logger.warn({ operationId: this.operationId, reason }, 'realtime connection lost, giving up');
      this.shutdown();
      this.channel.fail(new NetworkError('Realtime connection lost', { reason, attempts: this.attempts }));
      return;
    }

    const delay = backoffDelay(this.attempts, reconnectBaseDelay, reconnectMaxDelay);
    this.attempts += 1;
    logger.debug({ operationId: this.operationId, reason, delay }, 'realtime reconnect scheduled');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.closed) {
        this.connect();
      }
    }, delay);
  }

  private shutdown(): void {
    this.closed = true;
    this.resolveEnded?.();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const connection = this.connection;
    this.connection = null;
    connection?.close();
  }
}
