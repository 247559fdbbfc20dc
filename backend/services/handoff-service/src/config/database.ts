import knex, { Knex } from 'knex';
import type { HandoffConfig } from './index';

export function createDatabaseConnection(database: HandoffConfig['database']): Knex {
  return knex({
    client: 'pg',
    connection: {
      host: database.host,
      port: database.port,
      user: database.user,
      password: database.password,
      database: database.database,
    },
    pool: {
      min: database.pool.min,
      max: database.pool.max,
    },
    acquireConnectionTimeout: 10000,
  });
}
