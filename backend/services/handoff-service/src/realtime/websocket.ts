import { IncomingMessage, Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { rawDataToString, RealtimeClientMessage, RealtimeServerMessage } from '@handoff/sdk';
import type { HandoffConfig } from '../config';
import { AuthenticatedActor } from '../types/handoff.types';
import { StatusPublisher, StatusStream } from '../services/status-publisher.service';
import { PendingOperationService } from '../services/pending-operation.service';
import { bearerToken, verifyAccessToken } from '../middleware/auth.middleware';
import { DomainError } from '../errors/domain-errors';
import { isRecord, toStateChangedMessage } from '../utils/status-message';
import { Logger } from '../utils/logger';

export const REALTIME_PATH = '/api/v1/realtime';

/** Close code sent when the upgrade carries no valid access token */
export const UNAUTHORIZED_CLOSE_CODE = 4401;

export interface RealtimeClient {
  send(data: string): void;
  close(code: number, reason: string): void;
}

interface Connection {
  id: string;
  actor: AuthenticatedActor;
  client: RealtimeClient;
  subscriptions: Map<string, StatusStream>;
}

export function parseClientMessage(text: string): RealtimeClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.operation_id !== 'string' || parsed.operation_id.length === 0) {
    return null;
  }

  const operationId = parsed.operation_id;
  switch (parsed.action) {
    case 'subscribe': {
      const after = parsed.after_version;
      if (after === undefined) {
        return { action: 'subscribe', operation_id: operationId };
      }
      if (typeof after !== 'number' || !Number.isInteger(after) || after < 0) {
        return null;
      }
      return { action: 'subscribe', operation_id: operationId, after_version: after };
    }
    case 'unsubscribe':
      return { action: 'unsubscribe', operation_id: operationId };
    default:
      return null;
  }
}

function tokenFromQuery(url: string | undefined): string | null {
  if (!url) return null;
  const token = new URL(url, 'http://localhost').searchParams.get('access_token');
  return token && token.length > 0 ? token : null;
}

/**
 * Device-facing realtime endpoint. Each subscription is a status stream for
 * one operation the caller participates in; it ends after a terminal state
 * or when the socket closes.
 */
export class RealtimeGateway {
  private wss: WebSocketServer | null = null;
  private readonly connections: Map<string, Connection> = new Map();
  private readonly alive: WeakMap<WebSocket, boolean> = new WeakMap();
  private heartbeat: NodeJS.Timeout | null = null;
  private readonly log: Logger;

  constructor(
    private readonly publisher: StatusPublisher,
    private readonly operations: PendingOperationService,
    private readonly auth: HandoffConfig['auth'],
    private readonly heartbeatMs: number,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'RealtimeGateway' });
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  attach(server: Server): void {
    this.wss = new WebSocketServer({ server, path: REALTIME_PATH });
    this.wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
      this.handleSocket(ws, request);
    });
    this.startHeartbeat();
    this.log.info({ path: REALTIME_PATH }, 'Realtime server initialized');
  }

  authenticate(request: IncomingMessage): AuthenticatedActor | null {
    const token = bearerToken(request.headers.authorization) ?? tokenFromQuery(request.url);
    return token ? verifyAccessToken(token, this.auth) : null;
  }

  connect(client: RealtimeClient, actor: AuthenticatedActor): string {
    const id = uuidv4();
    this.connections.set(id, { id, actor, client, subscriptions: new Map() });
    this.log.debug({ connectionId: id, actorId: actor.id }, 'Realtime connection established');
    return id;
  }

  async handleMessage(connectionId: string, text: string): Promise<void> {
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    const message = parseClientMessage(text);
    if (!message) {
      this.send(connection, {
        type: 'error',
        error: { code: 'INVALID_MESSAGE', message: 'Expected {action, operation_id}' },
      });
      return;
    }

    switch (message.action) {
      case 'subscribe':
        await this.subscribe(connection, message.operation_id, message.after_version ?? 0);
        return;
      case 'unsubscribe':
        connection.subscriptions.get(message.operation_id)?.close();
        connection.subscriptions.delete(message.operation_id);
        return;
    }
  }

  disconnect(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    for (const stream of connection.subscriptions.values()) {
      stream.close();
    }
    connection.subscriptions.clear();
    this.connections.delete(connectionId);
    this.log.debug({ connectionId }, 'Realtime connection closed');
  }

  async close(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    for (const id of [...this.connections.keys()]) {
      this.connections.get(id)?.client.close(1001, 'server shutting down');
      this.disconnect(id);
    }

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
    }
  }

  private async subscribe(connection: Connection, operationId: string, afterVersion: number): Promise<void> {
    const snapshot = await this.operations.getSnapshot(operationId, connection.actor.id);
    if (!snapshot.ok) {
      const code = snapshot.error === 'NotFound' ? 'OPERATION_NOT_FOUND' : 'NOT_AUTHORIZED';
      this.send(connection, {
        type: 'error',
        operation_id: operationId,
        error: { code, message: `Cannot subscribe to operation ${operationId}` },
      });
      return;
    }
    if (!this.connections.has(connection.id)) return;

    connection.subscriptions.get(operationId)?.close();
    const stream = this.publisher.subscribe(operationId, afterVersion);
    connection.subscriptions.set(operationId, stream);
    this.send(connection, { type: 'subscribed', operation_id: operationId });
    void this.pump(connection, stream);
  }

  private async pump(connection: Connection, stream: StatusStream): Promise<void> {
    try {
      for await (const event of stream) {
        this.send(connection, { type: 'status', data: toStateChangedMessage(event) });
      }
    } catch (error) {
      this.log.warn({ err: error, operationId: stream.operationId }, 'Status stream ended with an error');
      this.send(connection, {
        type: 'error',
        operation_id: stream.operationId,
        error: {
          code: error instanceof DomainError ? error.code : 'STREAM_FAILED',
          message: error instanceof Error ? error.message : 'Status stream failed',
        },
      });
    } finally {
      if (connection.subscriptions.get(stream.operationId) === stream) {
        connection.subscriptions.delete(stream.operationId);
      }
    }
  }

  private send(connection: Connection, message: RealtimeServerMessage): void {
    try {
      connection.client.send(JSON.stringify(message));
    } catch (error) {
      this.log.warn({ err: error, connectionId: connection.id }, 'Failed to send realtime message');
    }
  }

  private handleSocket(ws: WebSocket, request: IncomingMessage): void {
    const actor = this.authenticate(request);
    if (!actor) {
      ws.close(UNAUTHORIZED_CLOSE_CODE, 'unauthorized');
      return;
    }

    const connectionId = this.connect(
      {
        send: (data) => ws.send(data),
        close: (code, reason) => ws.close(code, reason),
      },
      actor
    );
    this.alive.set(ws, true);

    ws.on('message', (data) => {
      this.handleMessage(connectionId, rawDataToString(data)).catch((error: unknown) => {
        this.log.error({ err: error, connectionId }, 'Failed to handle realtime message');
      });
    });
    ws.on('pong', () => {
      this.alive.set(ws, true);
    });
    ws.on('close', () => {
      this.disconnect(connectionId);
    });
    ws.on('error', (error) => {
      this.log.error({ err: error, connectionId }, 'Realtime socket error');
      this.disconnect(connectionId);
    });
  }

  private startHeartbeat(): void {
    this.heartbeat = setInterval(() => {
      if (!this.wss) return;
      for (const ws of this.wss.clients) {
        if (this.alive.get(ws) === false) {
          ws.terminate();
          continue;
        }
        this.alive.set(ws, false);
        ws.ping();
      }
    }, this.heartbeatMs);
    this.heartbeat.unref();
  }
}
