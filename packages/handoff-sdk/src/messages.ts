import { ClaimErrorCode, OperationKindView, StateChangedMessage, TerminalState, isTerminalState } from './types/api';

const COMPLETED: Record<OperationKindView['type'], string> = {
  payment: 'Payment complete.',
  transfer: 'Transfer complete. The ticket now belongs to the recipient.',
};

/**
 * User-facing message for a terminal state. Each terminal state reads
 * differently; failures carry the reason reported by the relay.
 */
export function describeOutcome(
  state: TerminalState,
  terminalReason: string | null | undefined,
  kind: OperationKindView['type'] = 'transfer'
): string {
  switch (state) {
    case 'completed':
      return COMPLETED[kind];
    case 'failed':
      return `${kind === 'payment' ? 'Payment' : 'Transfer'} failed: ${terminalReason || 'the other device reported an error'}.`;
    case 'cancelled':
      return `${kind === 'payment' ? 'Payment request' : 'Transfer'} was cancelled before it finished.`;
    case 'expired':
      return 'Time ran out before the other device responded. Start a new handoff to try again.';
  }
}

export function describeStatus(message: StateChangedMessage, kind?: OperationKindView['type']): string {
  if (isTerminalState(message.state)) {
    return describeOutcome(message.state, message.terminal_reason, kind);
  }
  switch (message.state) {
    case 'waiting':
      return 'Hold the devices together to connect.';
    case 'pending':
      return 'Connected. Waiting for the other device to confirm.';
    case 'processing':
      return 'Confirming...';
  }
}

const CLAIM_ERRORS: Record<ClaimErrorCode, string> = {
  expired: 'This transfer link has expired. Ask the sender for a new one.',
  already_redeemed: 'This ticket has already been claimed.',
  not_found: 'This transfer link is not valid.',
  cancelled: 'The sender cancelled this transfer.',
  not_owner: 'The sender no longer owns this ticket.',
  self_transfer: 'You already own this ticket.',
  not_counterparty: 'This transfer is addressed to someone else.',
};

export function describeClaimError(code: ClaimErrorCode): string {
  return CLAIM_ERRORS[code];
}
