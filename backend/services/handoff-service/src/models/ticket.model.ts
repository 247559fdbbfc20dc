import { Knex } from 'knex';
import { Ticket } from '../types/handoff.types';
import { TicketRepository } from '../store/handoff-store';

export interface TicketRow {
  id: string;
  ticket_number: string;
  event_id: string;
  owner_actor_id: string | null;
  owner_email: string | null;
  version: number;
  updated_at: Date;
}

const TABLE = 'tickets';

export class TicketModel implements TicketRepository {
  constructor(private readonly db: Knex) {}

  async findById(id: string): Promise<Ticket | null> {
    const row = await this.db<TicketRow>(TABLE).where({ id }).first();
    return row ? mapToTicket(row) : null;
  }

  async findByIdForUpdate(id: string): Promise<Ticket | null> {
    const row = await this.db<TicketRow>(TABLE).where({ id }).forUpdate().first();
    return row ? mapToTicket(row) : null;
  }

  async transferOwnership(
    ticketId: string,
    expectedOwnerActorId: string,
    next: { ownerActorId: string | null; ownerEmail: string | null }
  ): Promise<Ticket | null> {
    const rows = await this.db<TicketRow>(TABLE)
      .where({ id: ticketId, owner_actor_id: expectedOwnerActorId })
      .update({
        owner_actor_id: next.ownerActorId,
        owner_email: next.ownerEmail,
        version: this.db.raw('version + 1'),
        updated_at: this.db.fn.now(),
      })
      .returning('*');
    return rows.length > 0 ? mapToTicket(rows[0]) : null;
  }

  async attachEmailOwned(ticketId: string, email: string, actorId: string): Promise<Ticket | null> {
    const rows = await this.db<TicketRow>(TABLE)
      .where({ id: ticketId, owner_email: email })
      .whereNull('owner_actor_id')
      .update({
        owner_actor_id: actorId,
        version: this.db.raw('version + 1'),
        updated_at: this.db.fn.now(),
      })
      .returning('*');
    return rows.length > 0 ? mapToTicket(rows[0]) : null;
  }
}

export function mapToTicket(row: TicketRow): Ticket {
  return {
    id: row.id,
    ticketNumber: row.ticket_number,
    eventId: row.event_id,
    ownerActorId: row.owner_actor_id,
    ownerEmail: row.owner_email,
    version: row.version,
  };
}
