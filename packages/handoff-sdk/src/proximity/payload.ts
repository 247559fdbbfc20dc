import uriPrefixes from './uri-prefixes.json';

export type PayloadKind = 'customer-identity' | 'ticket-claim';

export type PayloadFormat = 'tagged' | 'uri' | 'raw';

export interface ProximityPayload {
  kind: PayloadKind;
  /** Broadcasting actor id (customer-identity) or transfer token (ticket-claim) */
  subjectId: string;
  correlationHint?: string;
}

export type DecodeResult =
  | { ok: true; payload: ProximityPayload; format: PayloadFormat }
  | { ok: false; error: 'Malformed'; reason: string };

export class PayloadEncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadEncodeError';
  }
}

/** Practical frame limit of short-range tags and beacons */
export const MAX_FRAME_BYTES = 1024;

export const PAYMENT_NAMESPACE = 'HANDOFF_PAY';
export const CLAIM_NAMESPACE = 'HANDOFF_CLAIM';

export const URI_ORIGIN = 'https://handoff.link';
export const URI_PATH = '/tap/v1';

/** Identifier index 0 means "no prefix" */
export const URI_PREFIXES: readonly string[] = uriPrefixes;

const SUBJECT_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]{0,127}$/;
const HINT_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;
const TAGGED_PATTERN = /^(HANDOFF_PAY|HANDOFF_CLAIM):([^#]*)(?:#([\s\S]*))?$/;

const NAMESPACE_BY_KIND: Record<PayloadKind, string> = {
  'customer-identity': PAYMENT_NAMESPACE,
  'ticket-claim': CLAIM_NAMESPACE,
};

const URI_KIND_PARAM: Record<PayloadKind, string> = {
  'customer-identity': 'pay',
  'ticket-claim': 'claim',
};

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

function assertEncodable(payload: ProximityPayload): void {
  if (!SUBJECT_PATTERN.test(payload.subjectId)) {
    throw new PayloadEncodeError(`Invalid subject id: ${JSON.stringify(payload.subjectId)}`);
  }
  if (payload.correlationHint !== undefined && !HINT_PATTERN.test(payload.correlationHint)) {
    throw new PayloadEncodeError(`Invalid correlation hint: ${JSON.stringify(payload.correlationHint)}`);
  }
}

function withinFrame(bytes: Uint8Array): Uint8Array {
  if (bytes.length > MAX_FRAME_BYTES) {
    throw new PayloadEncodeError(`Encoded payload is ${bytes.length} bytes, limit is ${MAX_FRAME_BYTES}`);
  }
  return bytes;
}

export function payloadToUri(payload: ProximityPayload): string {
  let uri = `${URI_ORIGIN}${URI_PATH}?k=${URI_KIND_PARAM[payload.kind]}&s=${payload.subjectId}`;
  if (payload.correlationHint !== undefined) {
    uri += `&h=${payload.correlationHint}`;
  }
  return uri;
}

function longestPrefixIndex(uri: string): number {
  let best = 0;
  for (let index = 1; index < URI_PREFIXES.length; index++) {
    const prefix = URI_PREFIXES[index];
    if (uri.startsWith(prefix) && prefix.length > URI_PREFIXES[best].length) {
      best = index;
    }
  }
  return best;
}

/**
 * Encode a payload into a proximity frame. Deterministic: the same payload and
 * format always produce the same bytes.
 */
export function encodePayload(payload: ProximityPayload, format: PayloadFormat = 'tagged'): Uint8Array {
  assertEncodable(payload);

  switch (format) {
    case 'tagged': {
      const hint = payload.correlationHint !== undefined ? `#${payload.correlationHint}` : '';
      return withinFrame(encoder.encode(`${NAMESPACE_BY_KIND[payload.kind]}:${payload.subjectId}${hint}`));
    }
    case 'uri': {
      const uri = payloadToUri(payload);
      const index = longestPrefixIndex(uri);
      const suffix = encoder.encode(uri.slice(URI_PREFIXES[index].length));
      const frame = new Uint8Array(suffix.length + 1);
      frame[0] = index;
      frame.set(suffix, 1);
      return withinFrame(frame);
    }
    case 'raw': {
      if (payload.kind !== 'ticket-claim' || payload.correlationHint !== undefined) {
        throw new PayloadEncodeError('Raw frames carry only a bare ticket-claim subject');
      }
      return withinFrame(encoder.encode(payload.subjectId));
    }
  }
}

function malformed(reason: string): DecodeResult {
  return { ok: false, error: 'Malformed', reason };
}

function buildPayload(kind: PayloadKind, subjectId: string, hint: string | null | undefined): ProximityPayload | null {
  if (!SUBJECT_PATTERN.test(subjectId)) {
    return null;
  }
  if (hint === null || hint === undefined) {
    return { kind, subjectId };
  }
  if (!HINT_PATTERN.test(hint)) {
    return null;
  }
  return { kind, subjectId, correlationHint: hint };
}

function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

function decodeTagged(text: string): DecodeResult | null {
  const match = TAGGED_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const kind: PayloadKind = match[1] === PAYMENT_NAMESPACE ? 'customer-identity' : 'ticket-claim';
  const payload = buildPayload(kind, match[2], match[3]);
  return payload ? { ok: true, payload, format: 'tagged' } : malformed('tagged record has an invalid subject or hint');
}

function decodeUri(bytes: Uint8Array): DecodeResult | null {
  const index = bytes[0];
  if (index >= URI_PREFIXES.length) {
    return null;
  }

  const suffix = decodeUtf8(bytes.subarray(1));
  if (suffix === null) {
    return malformed('uri record suffix is not valid UTF-8');
  }

  let url: URL;
  try {
    url = new URL(URI_PREFIXES[index] + suffix);
  } catch {
    return malformed('uri record does not form a valid URI');
  }

  if (url.origin !== URI_ORIGIN || url.pathname !== URI_PATH) {
    return malformed(`unrecognised uri ${url.origin}${url.pathname}`);
  }

  const kindParam = url.searchParams.get('k');
  const kind: PayloadKind | null =
    kindParam === 'pay' ? 'customer-identity' : kindParam === 'claim' ? 'ticket-claim' : null;
  const subjectId = url.searchParams.get('s');
  if (kind === null || subjectId === null) {
    return malformed('uri record is missing its kind or subject');
  }

  const payload = buildPayload(kind, subjectId, url.searchParams.get('h'));
  return payload ? { ok: true, payload, format: 'uri' } : malformed('uri record has an invalid subject or hint');
}

/**
 * Decode a proximity frame. Tries the tagged text form, then the URI record,
 * then bare text. Never throws.
 */
export function decodePayload(bytes: Uint8Array): DecodeResult {
  if (bytes.length === 0) {
    return malformed('empty frame');
  }
  if (bytes.length > MAX_FRAME_BYTES) {
    return malformed(`frame of ${bytes.length} bytes exceeds ${MAX_FRAME_BYTES}`);
  }

  const text = decodeUtf8(bytes);
  if (text !== null) {
    const tagged = decodeTagged(text);
    if (tagged) {
      return tagged;
    }
  }

  const uri = decodeUri(bytes);
  if (uri && uri.ok) {
    return uri;
  }

  if (text === null) {
    return uri ?? malformed('frame is not valid UTF-8');
  }

  const subjectId = text.trim();
  if (SUBJECT_PATTERN.test(subjectId)) {
    return { ok: true, payload: { kind: 'ticket-claim', subjectId }, format: 'raw' };
  }
  return uri ?? malformed('frame matches no known format');
}
