import { Knex } from 'knex';
import { isOperationState } from '@handoff/sdk';
import { OperationKind, OperationState, PendingOperation } from '../types/handoff.types';
import { OperationPatch, OperationRepository } from '../store/handoff-store';
import { DomainError } from '../errors/domain-errors';

interface PendingOperationRow {
  id: string;
  kind: 'payment' | 'transfer';
  amount_cents: number | null;
  currency: string | null;
  token_id: string | null;
  initiator_actor_id: string;
  counterparty_actor_id: string | null;
  subject_ref: string;
  state: string;
  version: number;
  terminal_reason: string | null;
  created_at: Date;
  updated_at: Date;
  expires_at: Date;
}

const TABLE = 'pending_operations';
const ACTIVE_STATES: OperationState[] = ['waiting', 'pending', 'processing'];

export class PendingOperationModel implements OperationRepository {
  constructor(private readonly db: Knex) {}

  async insert(operation: PendingOperation): Promise<void> {
    await this.db<PendingOperationRow>(TABLE).insert(toRow(operation));
  }

  async findById(id: string): Promise<PendingOperation | null> {
    const row = await this.db<PendingOperationRow>(TABLE).where({ id }).first();
    return row ? mapToOperation(row) : null;
  }

  async findByTokenId(tokenId: string): Promise<PendingOperation | null> {
    const row = await this.db<PendingOperationRow>(TABLE).where({ token_id: tokenId }).first();
    return row ? mapToOperation(row) : null;
  }

  async findByIdForUpdate(id: string): Promise<PendingOperation | null> {
    const row = await this.db<PendingOperationRow>(TABLE).where({ id }).forUpdate().first();
    return row ? mapToOperation(row) : null;
  }

  async findByTokenIdForUpdate(tokenId: string): Promise<PendingOperation | null> {
    const row = await this.db<PendingOperationRow>(TABLE).where({ token_id: tokenId }).forUpdate().first();
    return row ? mapToOperation(row) : null;
  }

  async findActiveForTicket(ticketId: string): Promise<PendingOperation | null> {
    const row = await this.db<PendingOperationRow>(TABLE)
      .where({ kind: 'transfer', subject_ref: ticketId })
      .whereIn('state', ACTIVE_STATES)
      .first();
    return row ? mapToOperation(row) : null;
  }

  async listActiveForCounterparty(actorId: string): Promise<PendingOperation[]> {
    const rows = await this.db<PendingOperationRow>(TABLE)
      .where({ counterparty_actor_id: actorId })
      .whereIn('state', ACTIVE_STATES)
      .orderBy('created_at', 'desc');
    return rows.map(mapToOperation);
  }

  async update(id: string, expectedVersion: number, patch: OperationPatch): Promise<PendingOperation | null> {
    const rows = await this.db<PendingOperationRow>(TABLE)
      .where({ id, version: expectedVersion })
      .update({
        state: patch.state,
        version: patch.version,
        terminal_reason: patch.terminalReason,
        counterparty_actor_id: patch.counterpartyActorId,
        updated_at: patch.updatedAt,
      })
      .returning('*');
    return rows.length > 0 ? mapToOperation(rows[0]) : null;
  }

  async findDueForExpiry(now: Date, limit: number): Promise<PendingOperation[]> {
    const rows = await this.db<PendingOperationRow>(TABLE)
      .whereIn('state', ACTIVE_STATES)
      .where('expires_at', '<=', now)
      .orderBy('expires_at', 'asc')
      .limit(limit);
    return rows.map(mapToOperation);
  }
}

function toRow(operation: PendingOperation): PendingOperationRow {
  const base = {
    id: operation.id,
    initiator_actor_id: operation.initiatorActorId,
    counterparty_actor_id: operation.counterpartyActorId,
    subject_ref: operation.subjectRef,
    state: operation.state,
    version: operation.version,
    terminal_reason: operation.terminalReason,
    created_at: operation.createdAt,
    updated_at: operation.updatedAt,
    expires_at: operation.expiresAt,
  };
  switch (operation.kind.type) {
    case 'payment':
      return {
        ...base,
        kind: 'payment',
        amount_cents: operation.kind.amountCents,
        currency: operation.kind.currency,
        token_id: null,
      };
    case 'transfer':
      return { ...base, kind: 'transfer', amount_cents: null, currency: null, token_id: operation.kind.tokenId };
  }
}

function mapToKind(row: PendingOperationRow): OperationKind {
  if (row.kind === 'payment' && row.amount_cents !== null && row.currency !== null) {
    return { type: 'payment', amountCents: row.amount_cents, currency: row.currency };
  }
  if (row.kind === 'transfer' && row.token_id !== null) {
    return { type: 'transfer', tokenId: row.token_id };
  }
  throw new DomainError(`Operation ${row.id} has an inconsistent ${row.kind} row`, 'CORRUPT_OPERATION', 500);
}

export function mapToOperation(row: PendingOperationRow): PendingOperation {
  if (!isOperationState(row.state)) {
    throw new DomainError(`Operation ${row.id} has unknown state ${row.state}`, 'CORRUPT_OPERATION', 500);
  }
  return {
    id: row.id,
    kind: mapToKind(row),
    initiatorActorId: row.initiator_actor_id,
    counterpartyActorId: row.counterparty_actor_id,
    subjectRef: row.subject_ref,
    state: row.state,
    version: row.version,
    terminalReason: row.terminal_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    expiresAt: row.expires_at,
  };
}
