import WebSocket from 'ws';
import { SDKLogger } from '../utils/logger';

export interface RealtimeConnection {
  send(text: string): void;
  close(): void;
}

/**
 * Callbacks fire asynchronously, after the connector has returned.
 */
export interface RealtimeHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(reason: string): void;
}

export type RealtimeConnector = (handlers: RealtimeHandlers) => RealtimeConnection;

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export function createWebSocketConnector(url: string, accessToken: string, logger: SDKLogger): RealtimeConnector {
  return (handlers) => {
    const socket = new WebSocket(url, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });

    socket.on('open', () => handlers.onOpen());
    socket.on('message', (data) => handlers.onMessage(rawDataToString(data)));
    socket.on('error', (error) => logger.debug({ err: error }, 'realtime socket error'));
    socket.on('close', (code, reason) => handlers.onClose(`${code} ${reason.toString('utf8')}`.trim()));

    return {
      send: (text) => socket.send(text),
      close: () => socket.close(),
    };
  };
}
