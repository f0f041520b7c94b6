/**
 * @ticketdesk/db - Storage Schema
 *
 * Creates the `tickets` and `comments` tables and their indexes when they are
 * missing. Safe to run on every start: an existing store is opened as is.
 */

import type { Knex } from 'knex';
import { logger } from '@ticketdesk/core';
import {
  DEFAULT_TICKET_PRIORITY,
  DEFAULT_TICKET_STATUS,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
} from '@ticketdesk/types';

export const TICKETS_TABLE = 'tickets';
export const COMMENTS_TABLE = 'comments';

export const TICKET_INDEXES = [
  { name: 'idx_tickets_status', column: 'status' },
  { name: 'idx_tickets_priority', column: 'priority' },
  { name: 'idx_tickets_assignee', column: 'assignee' },
] as const;

async function createTicketsTable(trx: Knex.Transaction): Promise<void> {
  await trx.schema.createTable(TICKETS_TABLE, (table) => {
    table.increments('id');
    table.text('title').notNullable();
    table.text('description');
    // enu() renders a CHECK (... IN (...)) constraint on both SQLite and PostgreSQL
    table.enu('status', [...TICKET_STATUSES]).notNullable().defaultTo(DEFAULT_TICKET_STATUS);
    table.enu('priority', [...TICKET_PRIORITIES]).notNullable().defaultTo(DEFAULT_TICKET_PRIORITY);
    table.text('requester');
    table.text('assignee');
    table.text('tags');
    table.text('created_at').notNullable();
    table.text('updated_at').notNullable();
  });
}

async function createCommentsTable(trx: Knex.Transaction): Promise<void> {
  await trx.schema.createTable(COMMENTS_TABLE, (table) => {
    table.increments('id');
    table
      .integer('ticket_id')
      .notNullable()
      .references('id')
      .inTable(TICKETS_TABLE)
      .onDelete('CASCADE');
    table.text('author');
    table.text('body').notNullable();
    table.text('created_at').notNullable();
  });
}

export async function initializeSchema(knex: Knex): Promise<void> {
  await knex.transaction(async (trx) => {
    if (!(await trx.schema.hasTable(TICKETS_TABLE))) {
      await createTicketsTable(trx);
      logger.info(`[db/schema] Created table ${TICKETS_TABLE}`);
    }

    if (!(await trx.schema.hasTable(COMMENTS_TABLE))) {
      await createCommentsTable(trx);
      logger.info(`[db/schema] Created table ${COMMENTS_TABLE}`);
    }

    for (const index of TICKET_INDEXES) {
      await trx.raw('CREATE INDEX IF NOT EXISTS ?? ON ?? (??)', [index.name, TICKETS_TABLE, index.column]);
    }
  });
}
