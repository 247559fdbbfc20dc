import { AsyncChannel } from '../../src/utils/channel';
import { ProximityTransport } from '../../src/proximity/transport';

/**
 * Proximity transport that lives in process. `emit` simulates a peer's frame
 * coming into range; `broadcasts` records what this device offered.
 */
export class InMemoryTransport implements ProximityTransport {
  available = true;
  readonly broadcasts: Uint8Array[] = [];
  readonly broadcastSignals: AbortSignal[] = [];
  private readonly readers: AsyncChannel<Uint8Array>[] = [];
  private failure: Error | null = null;

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  read(signal: AbortSignal): AsyncIterable<Uint8Array> {
    const channel = new AsyncChannel<Uint8Array>();
    if (this.failure) {
      channel.fail(this.failure);
      return channel;
    }
    this.readers.push(channel);
    signal.addEventListener('abort', () => channel.close(), { once: true });
    return channel;
  }

  broadcast(frame: Uint8Array, signal: AbortSignal): Promise<void> {
    this.broadcasts.push(frame);
    this.broadcastSignals.push(signal);
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  emit(frame: Uint8Array | string): void {
    const bytes = typeof frame === 'string' ? new TextEncoder().encode(frame) : frame;
    for (const reader of this.readers) {
      reader.push(bytes);
    }
  }

  breakReaders(error: Error): void {
    this.failure = error;
    for (const reader of this.readers) {
      reader.fail(error);
    }
  }

  get activeReaders(): number {
    return this.readers.filter((reader) => !reader.isClosed).length;
  }
}
