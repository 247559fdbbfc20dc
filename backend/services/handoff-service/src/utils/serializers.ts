import { OperationKindView, OperationSnapshot, TicketView, TransferTokenView } from '@handoff/sdk';
import { PendingOperation, Ticket, TransferToken } from '../types/handoff.types';

function kindView(operation: PendingOperation): OperationKindView {
  switch (operation.kind.type) {
    case 'payment':
      return { type: 'payment', amount_cents: operation.kind.amountCents, currency: operation.kind.currency };
    case 'transfer':
      return { type: 'transfer', ticket_id: operation.subjectRef };
  }
}

export function toOperationSnapshot(operation: PendingOperation): OperationSnapshot {
  return {
    operation_id: operation.id,
    kind: kindView(operation),
    initiator_actor_id: operation.initiatorActorId,
    counterparty_actor_id: operation.counterpartyActorId,
    subject_ref: operation.subjectRef,
    state: operation.state,
    version: operation.version,
    terminal_reason: operation.terminalReason,
    created_at: operation.createdAt.toISOString(),
    updated_at: operation.updatedAt.toISOString(),
    expires_at: operation.expiresAt.toISOString(),
  };
}

export function toTransferTokenView(token: TransferToken): TransferTokenView {
  return {
    token: token.id,
    ticket_id: token.ticketId,
    issued_at: token.issuedAt.toISOString(),
    expires_at: token.expiresAt.toISOString(),
  };
}

export function toTicketView(ticket: Ticket): TicketView {
  return {
    id: ticket.id,
    ticket_number: ticket.ticketNumber,
    event_id: ticket.eventId,
    owner_actor_id: ticket.ownerActorId,
  };
}
