import { ClaimErrorCode } from '@handoff/sdk';
import { OperationState } from '../types/handoff.types';
import type { CreateError, RelayError } from '../services/pending-operation.service';
import type { RedeemError } from '../services/transfer-token.service';
import type { ClaimError } from '../services/claim.service';
import { DomainError } from './domain-errors';

/**
 * Maps relay result errors onto HTTP errors.
 */
export function relayError(error: RelayError | CreateError, state?: OperationState): DomainError {
  switch (error) {
    case 'NotFound':
      return new DomainError('Operation not found', 'OPERATION_NOT_FOUND', 404);
    case 'NotAuthorized':
      return new DomainError('Not a participant of this operation', 'NOT_AUTHORIZED', 403);
    case 'AlreadyTerminal':
      return new DomainError(`Operation is already ${state ?? 'finished'}`, 'OPERATION_TERMINAL', 409, { state });
    case 'Expired':
      return new DomainError('Operation has expired', 'OPERATION_EXPIRED', 410);
    case 'InvalidState':
      return new DomainError(`Operation cannot do that while ${state ?? 'in its current state'}`, 'INVALID_STATE', 409, {
        state,
      });
    case 'WrongKind':
      return new DomainError('Operation kind does not support this action', 'WRONG_OPERATION_KIND', 400);
    case 'SelfTransfer':
      return new DomainError('Initiator and counterparty must differ', 'SELF_TRANSFER', 400);
    case 'CounterpartyNotFound':
      return new DomainError('Counterparty not found', 'COUNTERPARTY_NOT_FOUND', 404);
    case 'TicketNotFound':
      return new DomainError('Ticket not found', 'TICKET_NOT_FOUND', 404);
    case 'NotOwner':
      return new DomainError('Caller does not own this ticket', 'NOT_OWNER', 403);
    case 'AlreadyListedOrPending':
      return new DomainError('Ticket already has a live transfer', 'ALREADY_LISTED_OR_PENDING', 409);
  }
}

export const CLAIM_ERRORS: Record<ClaimError, { code: ClaimErrorCode; status: number; message: string }> = {
  NotFound: { code: 'not_found', status: 404, message: 'Transfer token not found' },
  Expired: { code: 'expired', status: 410, message: 'Transfer token has expired' },
  AlreadyRedeemed: { code: 'already_redeemed', status: 409, message: 'Transfer token was already redeemed' },
  Revoked: { code: 'cancelled', status: 409, message: 'Transfer was cancelled by the sender' },
  NotOwner: { code: 'not_owner', status: 409, message: 'Sender no longer owns this ticket' },
  SelfTransfer: { code: 'self_transfer', status: 409, message: 'You already own this ticket' },
  NotCounterparty: { code: 'not_counterparty', status: 403, message: 'Transfer is addressed to another recipient' },
};

export function redeemError(error: RedeemError): DomainError {
  const mapped = CLAIM_ERRORS[error];
  return new DomainError(mapped.message, mapped.code.toUpperCase(), mapped.status);
}

/** Errors from an email delivery, which may come from the relay or the redemption. */
export function deliveryError(error: RelayError | RedeemError, state?: OperationState): DomainError {
  switch (error) {
    case 'Revoked':
    case 'AlreadyRedeemed':
      return redeemError(error);
    default:
      return relayError(error, state);
  }
}
