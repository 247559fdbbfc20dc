// Main SDK export
export { HandoffSDK, resolveConfig } from './handoff';
export type { SDKDependencies, SubscribeOptions } from './handoff';

export type { SDKConfig, ResolvedSDKConfig } from './types/config';
export { ENVIRONMENTS, API_PREFIX } from './types/config';
export * from './types/api';

export {
  HandoffError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
  ConflictError,
  RateLimitError,
  ServerError,
  NetworkError,
  TimeoutError,
  ConfigurationError,
  handleAPIError,
} from './errors';

export { HTTPClient } from './client/http-client';
export type { MutationOptions } from './client/http-client';
export { Operations } from './resources/operations';
export { Transfers } from './resources/transfers';
export { Handshake } from './handshake';
export type { PaymentRequestParams, TransferOfferParams, TransferOffer } from './handshake';

// Proximity
export {
  encodePayload,
  decodePayload,
  payloadToUri,
  PayloadEncodeError,
  MAX_FRAME_BYTES,
  PAYMENT_NAMESPACE,
  CLAIM_NAMESPACE,
  URI_PREFIXES,
} from './proximity/payload';
export type { ProximityPayload, PayloadKind, PayloadFormat, DecodeResult } from './proximity/payload';
export {
  encodeQrFallback,
  decodeQrFallback,
  renderQrFallback,
  QR_PAYLOAD_TYPE,
  QR_PAYLOAD_VERSION,
} from './proximity/qr-fallback';
export type { TicketRef, QrDecodeResult, QrDecodeError } from './proximity/qr-fallback';
export type { ProximityTransport, TransportUnavailable } from './proximity/transport';
export { DiscoverySession, broadcastPayload } from './proximity/discovery-session';
export type { DiscoveredPayload, ListenOptions, BroadcastOptions, BroadcastHandle } from './proximity/discovery-session';

// Realtime
export { StatusSubscription, parseServerMessage } from './realtime/status-subscription';
export { createWebSocketConnector, rawDataToString } from './realtime/connection';
export type { RealtimeConnection, RealtimeConnector, RealtimeHandlers } from './realtime/connection';

export { describeOutcome, describeStatus, describeClaimError } from './messages';

export { AsyncChannel } from './utils/channel';
export { retryWithBackoff, backoffDelay, isTransientError, RetryError, sleep } from './utils/retry';
export { createSDKLogger } from './utils/logger';
export type { SDKLogger } from './utils/logger';

import { HandoffSDK } from './handoff';
export default HandoffSDK;
