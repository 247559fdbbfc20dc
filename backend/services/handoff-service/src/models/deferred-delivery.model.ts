import { Knex } from 'knex';
import { DeferredDelivery, DeliveryStatus } from '../types/handoff.types';
import { DeliveryRepository, normalizeEmail } from '../store/handoff-store';

interface DeferredDeliveryRow {
  id: string;
  email: string;
  ticket_id: string | null;
  operation_id: string | null;
  status: DeliveryStatus;
  attached_actor_id: string | null;
  created_at: Date;
  attached_at: Date | null;
}

const TABLE = 'deferred_deliveries';

export class DeferredDeliveryModel implements DeliveryRepository {
  constructor(private readonly db: Knex) {}

  async insert(delivery: DeferredDelivery): Promise<void> {
    await this.db<DeferredDeliveryRow>(TABLE).insert({
      id: delivery.id,
      email: normalizeEmail(delivery.email),
      ticket_id: delivery.ticketId,
      operation_id: delivery.operationId,
      status: delivery.status,
      attached_actor_id: delivery.attachedActorId,
      created_at: delivery.createdAt,
      attached_at: delivery.attachedAt,
    });
  }

  async listQueuedForEmail(email: string): Promise<DeferredDelivery[]> {
    const rows = await this.db<DeferredDeliveryRow>(TABLE)
      .where({ email: normalizeEmail(email), status: 'queued' })
      .orderBy('created_at', 'asc');
    return rows.map((row) => ({
      id: row.id,
      email: row.email,
      ticketId: row.ticket_id,
      operationId: row.operation_id,
      status: row.status,
      attachedActorId: row.attached_actor_id,
      createdAt: row.created_at,
      attachedAt: row.attached_at,
    }));
  }

  async markAttached(id: string, actorId: string, at: Date): Promise<boolean> {
    const updated = await this.db<DeferredDeliveryRow>(TABLE)
      .where({ id, status: 'queued' })
      .update({ status: 'attached', attached_actor_id: actorId, attached_at: at });
    return updated === 1;
  }
}
