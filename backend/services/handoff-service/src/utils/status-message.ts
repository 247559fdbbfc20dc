import { isOperationState, StateChangedMessage } from '@handoff/sdk';
import { StatusEvent } from '../types/handoff.types';

export function toStateChangedMessage(event: StatusEvent): StateChangedMessage {
  return {
    operation_id: event.operationId,
    state: event.state,
    terminal_reason: event.terminalReason,
    updated_at: event.updatedAt.toISOString(),
    version: event.version,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parses a status message received from another relay instance. Null for
 * anything that is not a well-formed message.
 */
export function parseStatusEvent(text: string): StatusEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }

  const { operation_id, state, terminal_reason, updated_at, version } = parsed;
  if (
    typeof operation_id !== 'string' ||
    !isOperationState(state) ||
    typeof updated_at !== 'string' ||
    typeof version !== 'number' ||
    !Number.isInteger(version)
  ) {
    return null;
  }
  const updatedAt = new Date(updated_at);
  if (Number.isNaN(updatedAt.getTime())) {
    return null;
  }

  return {
    operationId: operation_id,
    state,
    terminalReason: typeof terminal_reason === 'string' ? terminal_reason : null,
    updatedAt,
    version,
  };
}
