import { Knex } from 'knex';
import { Actor } from '../types/handoff.types';
import { ActorRepository, normalizeEmail } from '../store/handoff-store';

interface ActorRow {
  id: string;
  email: string;
  display_name: string | null;
}

export class ActorModel implements ActorRepository {
  constructor(private readonly db: Knex) {}

  async findById(id: string): Promise<Actor | null> {
    const row = await this.db<ActorRow>('actors').where({ id }).first();
    return row ? mapToActor(row) : null;
  }

  async findByEmail(email: string): Promise<Actor | null> {
    const row = await this.db<ActorRow>('actors').where({ email: normalizeEmail(email) }).first();
    return row ? mapToActor(row) : null;
  }
}

function mapToActor(row: ActorRow): Actor {
  return { id: row.id, email: row.email, displayName: row.display_name };
}
