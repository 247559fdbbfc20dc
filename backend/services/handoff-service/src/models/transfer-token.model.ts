import { Knex } from 'knex';
import { TransferToken } from '../types/handoff.types';
import { TokenRedemption, TokenRepository } from '../store/handoff-store';

interface TransferTokenRow {
  id: string;
  ticket_id: string;
  holder_actor_id: string;
  issued_at: Date;
  expires_at: Date;
  redeemed: boolean;
  redeemed_by: string | null;
  redeemed_by_email: string | null;
  redeemed_at: Date | null;
  revoked_at: Date | null;
  expired_at: Date | null;
}

const TABLE = 'transfer_tokens';

export class TransferTokenModel implements TokenRepository {
  constructor(private readonly db: Knex) {}

  async insert(token: TransferToken): Promise<void> {
    await this.db<TransferTokenRow>(TABLE).insert(toRow(token));
  }

  async findById(id: string): Promise<TransferToken | null> {
    const row = await this.db<TransferTokenRow>(TABLE).where({ id }).first();
    return row ? mapToToken(row) : null;
  }

  async findLiveForTicket(ticketId: string, now: Date): Promise<TransferToken | null> {
    const row = await this.live(now).where({ ticket_id: ticketId }).first();
    return row ? mapToToken(row) : null;
  }

  async markRedeemed(id: string, redemption: TokenRedemption): Promise<boolean> {
    const updated = await this.live(redemption.redeemedAt)
      .where({ id })
      .update({
        redeemed: true,
        redeemed_by: redemption.redeemedBy,
        redeemed_by_email: redemption.redeemedByEmail,
        redeemed_at: redemption.redeemedAt,
      });
    return updated === 1;
  }

  async revoke(id: string, at: Date): Promise<boolean> {
    const updated = await this.db<TransferTokenRow>(TABLE)
      .where({ id, redeemed: false })
      .whereNull('revoked_at')
      .update({ revoked_at: at });
    return updated === 1;
  }

  async markExpired(id: string, now: Date): Promise<boolean> {
    const updated = await this.db<TransferTokenRow>(TABLE)
      .where({ id, redeemed: false })
      .whereNull('revoked_at')
      .whereNull('expired_at')
      .where('expires_at', '<=', now)
      .update({ expired_at: now });
    return updated === 1;
  }

  async expireDue(now: Date, limit: number): Promise<TransferToken[]> {
    const due = this.db<TransferTokenRow>(TABLE)
      .select('id')
      .where({ redeemed: false })
      .whereNull('revoked_at')
      .whereNull('expired_at')
      .where('expires_at', '<=', now)
      .orderBy('expires_at', 'asc')
      .limit(limit)
      .forUpdate()
      .skipLocked();

    const rows = await this.db<TransferTokenRow>(TABLE)
      .whereIn('id', due)
      .update({ expired_at: now })
      .returning('*');
    return rows.map(mapToToken);
  }

  private live(now: Date) {
    return this.db<TransferTokenRow>(TABLE)
      .where({ redeemed: false })
      .whereNull('revoked_at')
      .whereNull('expired_at')
      .where('expires_at', '>', now);
  }
}

function toRow(token: TransferToken): TransferTokenRow {
  return {
    id: token.id,
    ticket_id: token.ticketId,
    holder_actor_id: token.holderActorId,
    issued_at: token.issuedAt,
    expires_at: token.expiresAt,
    redeemed: token.redeemed,
    redeemed_by: token.redeemedBy,
    redeemed_by_email: token.redeemedByEmail,
    redeemed_at: token.redeemedAt,
    revoked_at: token.revokedAt,
    expired_at: token.expiredAt,
  };
}

function mapToToken(row: TransferTokenRow): TransferToken {
  return {
    id: row.id,
    ticketId: row.ticket_id,
    holderActorId: row.holder_actor_id,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    redeemed: row.redeemed,
    redeemedBy: row.redeemed_by,
    redeemedByEmail: row.redeemed_by_email,
    redeemedAt: row.redeemed_at,
    revokedAt: row.revoked_at,
    expiredAt: row.expired_at,
  };
}
