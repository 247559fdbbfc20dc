import { RealtimeConnection, RealtimeConnector, RealtimeHandlers } from '../../src/realtime/connection';
import { StateChangedMessage } from '../../src/types/api';

export class FakeConnection implements RealtimeConnection {
  readonly sent: unknown[] = [];
  closed = false;

  constructor(private readonly handlers: RealtimeHandlers) {}

  send(text: string): void {
    this.sent.push(JSON.parse(text));
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.handlers.onOpen();
  }

  status(data: StateChangedMessage): void {
    this.handlers.onMessage(JSON.stringify({ type: 'status', data }));
  }

  raw(text: string): void {
    this.handlers.onMessage(text);
  }

  drop(reason: string = '1006'): void {
    this.handlers.onClose(reason);
  }
}

export class FakeRealtime {
  readonly connections: FakeConnection[] = [];

  readonly connector: RealtimeConnector = (handlers) => {
    const connection = new FakeConnection(handlers);
    this.connections.push(connection);
    return connection;
  };

  latest(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) {
      throw new Error('no realtime connection opened');
    }
    return connection;
  }
}

export function stateMessage(
  operationId: string,
  version: number,
  state: StateChangedMessage['state'],
  terminalReason: string | null = null
): StateChangedMessage {
  return {
    operation_id: operationId,
    state,
    terminal_reason: terminalReason,
    updated_at: new Date(Date.UTC(2026, 0, 1, 12, 0, version)).toISOString(),
    version,
  };
}

export function tick(ms: number = 5): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
