/**
 * Short-range proximity channel (NFC, BLE beacon, ...). The radio and OS
 * binding live outside the SDK; hosts adapt theirs to this interface.
 */
export interface ProximityTransport {
  /** Hardware present and enabled */
  isAvailable(): Promise<boolean>;

  /** Frames read from peers in range. Ends when the signal aborts. */
  read(signal: AbortSignal): AsyncIterable<Uint8Array>;

  /** Offer a frame to nearby readers. Resolves once the signal aborts. */
  broadcast(frame: Uint8Array, signal: AbortSignal): Promise<void>;
}

export type TransportUnavailable = { ok: false; error: 'transport-unavailable' };
