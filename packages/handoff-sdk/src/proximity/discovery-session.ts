import { AsyncChannel } from '../utils/channel';
import { SDKLogger } from '../utils/logger';
import { decodePayload, encodePayload, PayloadFormat, PayloadKind, ProximityPayload } from './payload';
import { ProximityTransport, TransportUnavailable } from './transport';

export interface DiscoveredPayload {
  payload: ProximityPayload;
  format: PayloadFormat;
  receivedAt: Date;
}

export interface ListenOptions {
  /** Payload kinds to surface; others are dropped. Defaults to every kind. */
  accept?: readonly PayloadKind[];
  signal?: AbortSignal;
  logger?: SDKLogger;
}

export interface BroadcastOptions {
  format?: PayloadFormat;
  signal?: AbortSignal;
  logger?: SDKLogger;
}

export interface BroadcastHandle {
  stop(): void;
  /** Resolves when the transport stops broadcasting, with the failure if it broke */
  readonly finished: Promise<Error | null>;
}

const ALL_KINDS: readonly PayloadKind[] = ['customer-identity', 'ticket-claim'];

/**
 * One proximity listener. A reader task decodes frames and pushes accepted
 * payloads onto a channel; the consumer iterates the session. Malformed
 * frames are counted and skipped. Cancelling stops the reader and ends
 * iteration without touching anything server side.
 */
export class DiscoverySession implements AsyncIterable<DiscoveredPayload> {
  private readonly controller = new AbortController();
  private readonly channel = new AsyncChannel<DiscoveredPayload>();
  private malformed = 0;
  private ignored = 0;
  private releaseSignal: (() => void) | null = null;
  readonly finished: Promise<void>;

  private constructor(
    private readonly transport: ProximityTransport,
    private readonly accept: readonly PayloadKind[],
    private readonly logger?: SDKLogger
  ) {
    this.finished = this.pump();
  }

  static async listen(
    transport: ProximityTransport,
    options: ListenOptions = {}
  ): Promise<{ ok: true; session: DiscoverySession } | TransportUnavailable> {
    if (!(await transport.isAvailable())) {
      return { ok: false, error: 'transport-unavailable' };
    }

    const session = new DiscoverySession(transport, options.accept ?? ALL_KINDS, options.logger);
    if (options.signal) {
      session.follow(options.signal);
    }
    return { ok: true, session };
  }

  get malformedFrames(): number {
    return this.malformed;
  }

  get ignoredFrames(): number {
    return this.ignored;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Wait for the next accepted payload. Null once the session has ended.
   */
  async next(): Promise<DiscoveredPayload | null> {
    const result = await this.channel.next();
    return result.done ? null : result.value;
  }

  /**
   * Wait for one payload, then stop listening.
   */
  async first(): Promise<DiscoveredPayload | null> {
    try {
      return await this.next();
    } finally {
      this.cancel();
    }
  }

  cancel(): void {
    this.detach();
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
    this.channel.close();
  }

  /** Leaving a `for await` loop early cancels the session. */
  [Symbol.asyncIterator](): AsyncIterator<DiscoveredPayload> {
    return this.channel.iterator(() => this.cancel());
  }

  private follow(signal: AbortSignal): void {
    if (signal.aborted) {
      this.cancel();
      return;
    }
    const onAbort = () => this.cancel();
    signal.addEventListener('abort', onAbort, { once: true });
    this.releaseSignal = () => signal.removeEventListener('abort', onAbort);
  }

  private detach(): void {
    this.releaseSignal?.();
    this.releaseSignal = null;
  }

  private async pump(): Promise<void> {
    const signal = this.controller.signal;
    try {
      for await (const frame of this.transport.read(signal)) {
        if (signal.aborted) {
          break;
        }

        const result = decodePayload(frame);
        if (!result.ok) {
          this.malformed += 1;
          this.logger?.debug({ reason: result.reason, bytes: frame.length }, 'ignoring malformed proximity frame');
          continue;
        }
        if (!this.accept.includes(result.payload.kind)) {
          this.ignored += 1;
          continue;
        }

        this.channel.push({ payload: result.payload, format: result.format, receivedAt: new Date() });
      }
      this.channel.close();
    } catch (error) {
      if (signal.aborted) {
        this.channel.close();
        return;
      }
      this.logger?.warn({ err: error }, 'proximity reader failed');
      this.channel.fail(error instanceof Error ? error : new Error(String(error)));
    } finally {
      this.detach();
    }
  }
}

/**
 * Start offering a payload to nearby readers until stopped or the signal aborts.
 */
export async function broadcastPayload(
  transport: ProximityTransport,
  payload: ProximityPayload,
  options: BroadcastOptions = {}
): Promise<{ ok: true; handle: BroadcastHandle } | TransportUnavailable> {
  if (!(await transport.isAvailable())) {
    return { ok: false, error: 'transport-unavailable' };
  }

  const frame = encodePayload(payload, options.format);
  const controller = new AbortController();
  const { signal } = options;
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  const finished = transport
    .broadcast(frame, controller.signal)
    .then(
      () => null,
      (error: unknown) => {
        options.logger?.warn({ err: error }, 'proximity broadcast failed');
        return error instanceof Error ? error : new Error(String(error));
      }
    )
    .finally(() => signal?.removeEventListener('abort', onAbort));

  return {
    ok: true,
    handle: {
      stop: () => controller.abort(),
      finished,
    },
  };
}
