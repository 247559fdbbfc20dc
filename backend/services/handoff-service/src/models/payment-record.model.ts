import { Knex } from 'knex';
import { PaymentRecord } from '../types/handoff.types';
import { PaymentRepository } from '../store/handoff-store';

interface PaymentRecordRow {
  id: string;
  operation_id: string;
  payer_actor_id: string;
  payee_actor_id: string;
  amount_cents: number;
  currency: string;
  payment_reference: string;
  created_at: Date;
}

export class PaymentRecordModel implements PaymentRepository {
  constructor(private readonly db: Knex) {}

  async insert(record: PaymentRecord): Promise<void> {
    await this.db<PaymentRecordRow>('payment_records').insert({
      id: record.id,
      operation_id: record.operationId,
      payer_actor_id: record.payerActorId,
      payee_actor_id: record.payeeActorId,
      amount_cents: record.amountCents,
      currency: record.currency,
      payment_reference: record.paymentReference,
      created_at: record.createdAt,
    });
  }

  async findByOperationId(operationId: string): Promise<PaymentRecord | null> {
    const row = await this.db<PaymentRecordRow>('payment_records').where({ operation_id: operationId }).first();
    if (!row) return null;
    return {
      id: row.id,
      operationId: row.operation_id,
      payerActorId: row.payer_actor_id,
      payeeActorId: row.payee_actor_id,
      amountCents: row.amount_cents,
      currency: row.currency,
      paymentReference: row.payment_reference,
      createdAt: row.created_at,
    };
  }
}
