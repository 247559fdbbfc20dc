import {
  decodePayload,
  encodePayload,
  MAX_FRAME_BYTES,
  PayloadEncodeError,
  ProximityPayload,
  URI_PREFIXES,
} from '../src/proximity/payload';

const text = (value: string) => new TextEncoder().encode(value);
const asText = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

// Small deterministic PRNG so the fuzz cases are reproducible
function mulberry32(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('URI prefix table', () => {
  it('has the 36 standard identifiers with index 0 meaning no prefix', () => {
    expect(URI_PREFIXES).toHaveLength(36);
    expect(URI_PREFIXES[0]).toBe('');
    expect(URI_PREFIXES[4]).toBe('https://');
    expect(URI_PREFIXES[35]).toBe('urn:nfc:');
  });
});

describe('encodePayload', () => {
  it('writes tagged text with the payment namespace and hint', () => {
    const bytes = encodePayload({ kind: 'customer-identity', subjectId: 'user-42', correlationHint: 'op1' });
    expect(asText(bytes)).toBe('HANDOFF_PAY:user-42#op1');
  });

  it('writes tagged text with the claim namespace', () => {
    const bytes = encodePayload({ kind: 'ticket-claim', subjectId: 'tok_abc' }, 'tagged');
    expect(asText(bytes)).toBe('HANDOFF_CLAIM:tok_abc');
  });

  it('compresses the URI form with the longest matching prefix', () => {
    const bytes = encodePayload({ kind: 'ticket-claim', subjectId: 'tok_123' }, 'uri');
    expect(bytes[0]).toBe(4);
    expect(asText(bytes.subarray(1))).toBe('handoff.link/tap/v1?k=claim&s=tok_123');
  });

  it('is deterministic', () => {
    const payload: ProximityPayload = { kind: 'customer-identity', subjectId: 'u1', correlationHint: 'h' };
    expect(encodePayload(payload, 'uri')).toEqual(encodePayload(payload, 'uri'));
  });

  it('writes the raw form as the bare subject', () => {
    expect(asText(encodePayload({ kind: 'ticket-claim', subjectId: 'TKT-001' }, 'raw'))).toBe('TKT-001');
  });

  it('refuses payloads the raw form cannot represent', () => {
    expect(() => encodePayload({ kind: 'customer-identity', subjectId: 'u1' }, 'raw')).toThrow(PayloadEncodeError);
    expect(() => encodePayload({ kind: 'ticket-claim', subjectId: 'u1', correlationHint: 'x' }, 'raw')).toThrow(
      PayloadEncodeError
    );
  });

  it('refuses subjects outside the identifier alphabet', () => {
    expect(() => encodePayload({ kind: 'ticket-claim', subjectId: 'has space' })).toThrow(PayloadEncodeError);
    expect(() => encodePayload({ kind: 'ticket-claim', subjectId: '' })).toThrow(PayloadEncodeError);
    expect(() => encodePayload({ kind: 'ticket-claim', subjectId: 'a#b' })).toThrow(PayloadEncodeError);
  });
});

describe('decodePayload', () => {
  const payloads: ProximityPayload[] = [
    { kind: 'customer-identity', subjectId: 'user-42' },
    { kind: 'customer-identity', subjectId: 'user-42', correlationHint: 'op-7' },
    { kind: 'ticket-claim', subjectId: 'Zx9_-tokenValue' },
    { kind: 'ticket-claim', subjectId: 'tok.1', correlationHint: '3f2c9a' },
  ];

  it.each(payloads)('round-trips %o through the tagged and URI forms', (payload) => {
    expect(decodePayload(encodePayload(payload, 'tagged'))).toEqual({ ok: true, payload, format: 'tagged' });
    expect(decodePayload(encodePayload(payload, 'uri'))).toEqual({ ok: true, payload, format: 'uri' });
  });

  it('round-trips the raw form', () => {
    const payload: ProximityPayload = { kind: 'ticket-claim', subjectId: 'TKT-001' };
    expect(decodePayload(encodePayload(payload, 'raw'))).toEqual({ ok: true, payload, format: 'raw' });
  });

  it('accepts raw text with surrounding whitespace', () => {
    expect(decodePayload(text('  TKT-001 \n'))).toEqual({
      ok: true,
      payload: { kind: 'ticket-claim', subjectId: 'TKT-001' },
      format: 'raw',
    });
  });

  it('rejects the handoff URI over plain http', () => {
    const suffix = text('handoff.link/tap/v1?k=pay&s=user-9');
    const frame = new Uint8Array(suffix.length + 1);
    frame[0] = 3; // http://
    frame.set(suffix, 1);
    const result = decodePayload(frame);
    expect(result).toEqual({ ok: false, error: 'Malformed', reason: 'unrecognised uri http://handoff.link/tap/v1' });
  });

  it('rejects URI records for other hosts', () => {
    const suffix = text('example.com/x');
    const frame = new Uint8Array(suffix.length + 1);
    frame[0] = 4;
    frame.set(suffix, 1);
    expect(decodePayload(frame)).toEqual({
      ok: false,
      error: 'Malformed',
      reason: 'unrecognised uri https://example.com/x',
    });
  });

  it('rejects a tag with an empty subject', () => {
    expect(decodePayload(text('HANDOFF_PAY:'))).toEqual({
      ok: false,
      error: 'Malformed',
      reason: 'tagged record has an invalid subject or hint',
    });
  });

  it('prefers the tag over the raw form', () => {
    const result = decodePayload(text('HANDOFF_CLAIM:abc'));
    expect(result.ok && result.format).toBe('tagged');
  });

  it('returns Malformed for empty, oversized and non UTF-8 frames', () => {
    expect(decodePayload(new Uint8Array(0))).toEqual({ ok: false, error: 'Malformed', reason: 'empty frame' });
    expect(decodePayload(new Uint8Array(MAX_FRAME_BYTES + 1).fill(65))).toEqual({
      ok: false,
      error: 'Malformed',
      reason: `frame of ${MAX_FRAME_BYTES + 1} bytes exceeds ${MAX_FRAME_BYTES}`,
    });
    expect(decodePayload(new Uint8Array([0xff, 0xfe]))).toEqual({
      ok: false,
      error: 'Malformed',
      reason: 'frame is not valid UTF-8',
    });
  });

  it('returns Malformed for text matching no format', () => {
    expect(decodePayload(text('hello world'))).toEqual({
      ok: false,
      error: 'Malformed',
      reason: 'frame matches no known format',
    });
  });

  it('never throws on arbitrary bytes', () => {
    const random = mulberry32(20261019);
    for (let run = 0; run < 2000; run++) {
      const length = Math.floor(random() * 80);
      const frame = new Uint8Array(length);
      for (let i = 0; i < length; i++) {
        frame[i] = Math.floor(random() * 256);
      }
      // Bias some frames towards the URI branch
      if (length > 0 && run % 3 === 0) {
        frame[0] = Math.floor(random() * 36);
      }

      const result = decodePayload(frame);
      expect(typeof result.ok).toBe('boolean');
      if (result.ok) {
        expect(result.payload.subjectId.length).toBeGreaterThan(0);
      }
    }
  });

  it('never throws on truncated frames', () => {
    const frame = encodePayload({ kind: 'customer-identity', subjectId: 'user-42', correlationHint: 'op' }, 'uri');
    for (let cut = 0; cut <= frame.length; cut++) {
      expect(() => decodePayload(frame.subarray(0, cut))).not.toThrow();
    }
  });
});
