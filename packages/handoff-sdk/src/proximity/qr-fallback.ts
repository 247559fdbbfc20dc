import QRCode from 'qrcode';

export const QR_PAYLOAD_TYPE = 'handoff.ticket';
export const QR_PAYLOAD_VERSION = 1;

export interface TicketRef {
  ticketId: string;
  ticketNumber: string;
  eventId: string;
}

export type QrDecodeError = 'Malformed' | 'UnknownType' | 'UnsupportedVersion';

export type QrDecodeResult =
  | { ok: true; ticketRef: TicketRef }
  | { ok: false; error: QrDecodeError; reason: string };

/**
 * JSON carried by the QR code shown when proximity discovery is unavailable.
 * Key order is fixed so the same ticket always renders the same code.
 */
export function encodeQrFallback(ticketRef: TicketRef): string {
  return JSON.stringify({
    type: QR_PAYLOAD_TYPE,
    version: QR_PAYLOAD_VERSION,
    ticket_id: ticketRef.ticketId,
    ticket_number: ticketRef.ticketNumber,
    event_id: ticketRef.eventId,
  });
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

export function decodeQrFallback(text: string): QrDecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, error: 'Malformed', reason: 'not JSON' };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: 'Malformed', reason: 'not a JSON object' };
  }

  const record: Record<string, unknown> = { ...parsed };
  if (record.type !== QR_PAYLOAD_TYPE) {
    return { ok: false, error: 'UnknownType', reason: `unknown type ${JSON.stringify(record.type)}` };
  }
  if (record.version !== QR_PAYLOAD_VERSION) {
    return {
      ok: false,
      error: 'UnsupportedVersion',
      reason: `unsupported version ${JSON.stringify(record.version)}`,
    };
  }

  const { ticket_id, ticket_number, event_id } = record;
  if (!nonEmptyString(ticket_id) || !nonEmptyString(ticket_number) || !nonEmptyString(event_id)) {
    return { ok: false, error: 'Malformed', reason: 'ticket_id, ticket_number and event_id are required strings' };
  }

  return { ok: true, ticketRef: { ticketId: ticket_id, ticketNumber: ticket_number, eventId: event_id } };
}

/**
 * Render the fallback payload as a PNG data URL.
 */
export function renderQrFallback(ticketRef: TicketRef, width: number = 320): Promise<string> {
  return QRCode.toDataURL(encodeQrFallback(ticketRef), {
    errorCorrectionLevel: 'M',
    margin: 2,
    width,
  });
}
