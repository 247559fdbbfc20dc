import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.raw('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

  await knex.schema.createTable('actors', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.string('email', 255).notNullable().unique();
    table.string('display_name', 255).nullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('tickets', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.string('ticket_number', 64).notNullable().unique();
    table.uuid('event_id').notNullable();
    table.uuid('owner_actor_id').nullable().references('id').inTable('actors').onDelete('RESTRICT');
    table.string('owner_email', 255).nullable();
    table.integer('version').notNullable().defaultTo(1);
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.index(['owner_actor_id']);
    table.index(['owner_email']);
  });

  await knex.schema.createTable('transfer_tokens', (table) => {
    table.string('id', 128).primary();
    table.uuid('ticket_id').notNullable().references('id').inTable('tickets').onDelete('CASCADE');
    table.uuid('holder_actor_id').notNullable().references('id').inTable('actors').onDelete('RESTRICT');
    table.timestamp('issued_at').notNullable();
    table.timestamp('expires_at').notNullable();
    table.boolean('redeemed').notNullable().defaultTo(false);
    table.uuid('redeemed_by').nullable().references('id').inTable('actors');
    table.string('redeemed_by_email', 255).nullable();
    table.timestamp('redeemed_at').nullable();
    table.timestamp('revoked_at').nullable();
    table.timestamp('expired_at').nullable();

    table.index(['ticket_id', 'expires_at']);
    table.index(['expires_at']);
  });

  await knex.schema.createTable('pending_operations', (table) => {
    table.uuid('id').primary();
    table.string('kind', 16).notNullable();
    table.integer('amount_cents').nullable();
    table.string('currency', 3).nullable();
    table.string('token_id', 128).nullable().unique().references('id').inTable('transfer_tokens');
    table.uuid('initiator_actor_id').notNullable().references('id').inTable('actors').onDelete('RESTRICT');
    table.uuid('counterparty_actor_id').nullable().references('id').inTable('actors').onDelete('RESTRICT');
    table.string('subject_ref', 255).notNullable();
    table.string('state', 16).notNullable();
    table.integer('version').notNullable().defaultTo(1);
    table.text('terminal_reason').nullable();
    table.timestamp('created_at').notNullable();
    table.timestamp('updated_at').notNullable();
    table.timestamp('expires_at').notNullable();

    table.index(['state', 'expires_at']);
    table.index(['counterparty_actor_id', 'state']);
    table.index(['subject_ref', 'state']);
  });

  await knex.raw(`
    ALTER TABLE pending_operations
    ADD CONSTRAINT pending_operations_kind_check CHECK (kind IN ('payment', 'transfer'))
  `);
  await knex.raw(`
    ALTER TABLE pending_operations
    ADD CONSTRAINT pending_operations_state_check
    CHECK (state IN ('waiting', 'pending', 'processing', 'completed', 'failed', 'cancelled', 'expired'))
  `);

  await knex.schema.createTable('operation_transitions', (table) => {
    table.uuid('operation_id').notNullable().references('id').inTable('pending_operations').onDelete('CASCADE');
    table.integer('version').notNullable();
    table.string('from_state', 16).nullable();
    table.string('to_state', 16).notNullable();
    table.text('terminal_reason').nullable();
    table.uuid('actor_id').nullable();
    table.timestamp('occurred_at').notNullable();

    table.primary(['operation_id', 'version']);
  });

  await knex.schema.createTable('payment_records', (table) => {
    table.uuid('id').primary();
    table.uuid('operation_id').notNullable().unique().references('id').inTable('pending_operations');
    table.uuid('payer_actor_id').notNullable().references('id').inTable('actors');
    table.uuid('payee_actor_id').notNullable().references('id').inTable('actors');
    table.integer('amount_cents').notNullable();
    table.string('currency', 3).notNullable();
    table.string('payment_reference', 255).notNullable();
    table.timestamp('created_at').notNullable();
  });

  await knex.schema.createTable('deferred_deliveries', (table) => {
    table.uuid('id').primary();
    table.string('email', 255).notNullable();
    table.uuid('ticket_id').nullable().references('id').inTable('tickets').onDelete('CASCADE');
    table.uuid('operation_id').nullable().references('id').inTable('pending_operations');
    table.string('status', 16).notNullable().defaultTo('queued');
    table.uuid('attached_actor_id').nullable().references('id').inTable('actors');
    table.timestamp('created_at').notNullable();
    table.timestamp('attached_at').nullable();

    table.index(['email', 'status']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('deferred_deliveries');
  await knex.schema.dropTableIfExists('payment_records');
  await knex.schema.dropTableIfExists('operation_transitions');
  await knex.schema.dropTableIfExists('pending_operations');
  await knex.schema.dropTableIfExists('transfer_tokens');
  await knex.schema.dropTableIfExists('tickets');
  await knex.schema.dropTableIfExists('actors');
}
