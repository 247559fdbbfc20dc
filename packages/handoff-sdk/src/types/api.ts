/**
 * Wire contract shared by the relay and device SDK.
 * Field names are snake_case on the wire.
 */

export const OPERATION_STATES = [
  'waiting',
  'pending',
  'processing',
  'completed',
  'failed',
  'cancelled',
  'expired',
] as const;

export type OperationState = (typeof OPERATION_STATES)[number];

export type TerminalState = Extract<OperationState, 'completed' | 'failed' | 'cancelled' | 'expired'>;

export const TERMINAL_STATES: readonly TerminalState[] = ['completed', 'failed', 'cancelled', 'expired'];

export function isOperationState(value: unknown): value is OperationState {
  return typeof value === 'string' && (OPERATION_STATES as readonly string[]).includes(value);
}

export function isTerminalState(state: OperationState): state is TerminalState {
  return (TERMINAL_STATES as readonly OperationState[]).includes(state);
}

/**
 * Standard API response
 */
export interface APIResponse<T> {
  success: boolean;
  data: T;
}

export interface APIErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type OperationKindView =
  | { type: 'payment'; amount_cents: number; currency: string }
  | { type: 'transfer'; ticket_id: string };

export interface OperationSnapshot {
  operation_id: string;
  kind: OperationKindView;
  initiator_actor_id: string;
  counterparty_actor_id: string | null;
  subject_ref: string;
  state: OperationState;
  version: number;
  terminal_reason: string | null;
  created_at: string;
  updated_at: string;
  expires_at: string;
}

/**
 * Realtime status message, one per transition.
 */
export interface StateChangedMessage {
  operation_id: string;
  state: OperationState;
  terminal_reason?: string | null;
  updated_at: string;
  version: number;
}

export interface TransferTokenView {
  token: string;
  ticket_id: string;
  issued_at: string;
  expires_at: string;
}

export interface CreatePaymentOperationParams {
  kind: 'payment';
  counterparty_actor_id: string;
  subject_ref: string;
  amount_cents: number;
  currency: string;
  ttl_seconds?: number;
}

export interface CreateTransferOperationParams {
  kind: 'transfer';
  ticket_id: string;
  counterparty_actor_id?: string;
  ttl_seconds?: number;
}

export type CreateOperationParams = CreatePaymentOperationParams | CreateTransferOperationParams;

export interface CreatedOperation {
  operation: OperationSnapshot;
  transfer_token: TransferTokenView | null;
}

export interface TicketView {
  id: string;
  ticket_number: string;
  event_id: string;
  owner_actor_id: string | null;
}

export type CounterpartyBranch = 'registered' | 'unregistered';

export const CLAIM_ERROR_CODES = [
  'expired',
  'already_redeemed',
  'not_found',
  'cancelled',
  'not_owner',
  'self_transfer',
  'not_counterparty',
] as const;

export type ClaimErrorCode = (typeof CLAIM_ERROR_CODES)[number];

export type ClaimResponse =
  | { ticket: TicketView; branch: CounterpartyBranch; operation_id: string | null }
  | { ticket: null; error: { code: ClaimErrorCode; message: string } };

export type LookupResponse =
  | { branch: 'registered'; actor: { id: string; display_name: string | null } }
  | { branch: 'unregistered'; email: string };

export interface DeliveryResponse {
  branch: CounterpartyBranch;
  operation: OperationSnapshot;
  ticket: TicketView;
}

export interface AttachDeliveriesResponse {
  attached: number;
  tickets: TicketView[];
}

/** Client -> relay realtime frames */
export type RealtimeClientMessage =
  | { action: 'subscribe'; operation_id: string; after_version?: number }
  | { action: 'unsubscribe'; operation_id: string };

/** Relay -> client realtime frames */
export type RealtimeServerMessage =
  | { type: 'status'; data: StateChangedMessage }
  | { type: 'subscribed'; operation_id: string }
  | { type: 'error'; operation_id?: string; error: { code: string; message: string } };
