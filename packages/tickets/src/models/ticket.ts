/**
 * @ticketdesk/tickets - Ticket Model
 *
 * Data access for ticket rows. Every method takes the handle (or an open
 * transaction) explicitly, plus the write timestamp where it writes.
 * Callers validate input; this layer trusts it.
 */

import type { Knex } from 'knex';
import { logger } from '@ticketdesk/core';
import { TICKETS_TABLE } from '@ticketdesk/db';
import {
  DEFAULT_TICKET_PRIORITY,
  DEFAULT_TICKET_STATUS,
  TICKET_COLUMNS,
  type CreateTicketInput,
  type ITicket,
  type ITicketRecord,
  type TicketPatch,
} from '@ticketdesk/types';

function toTicket(record: ITicketRecord): ITicket {
  return { ...record, description: record.description ?? '' };
}

/** Keeps the keys whose value is not `undefined`. */
function presentFields(patch: TicketPatch): TicketPatch {
  const changes: TicketPatch = {};
  if (patch.title !== undefined) changes.title = patch.title;
  if (patch.description !== undefined) changes.description = patch.description;
  if (patch.status !== undefined) changes.status = patch.status;
  if (patch.priority !== undefined) changes.priority = patch.priority;
  if (patch.requester !== undefined) changes.requester = patch.requester;
  if (patch.assignee !== undefined) changes.assignee = patch.assignee;
  if (patch.tags !== undefined) changes.tags = patch.tags;
  return changes;
}

const Ticket = {
  /**
   * Insert a ticket. `created_at` and `updated_at` both take `now`.
   */
  create: async (knexOrTrx: Knex | Knex.Transaction, candidate: CreateTicketInput, now: string): Promise<number> => {
    const [inserted] = await knexOrTrx<ITicketRecord>(TICKETS_TABLE)
      .insert({
        title: candidate.title,
        description: candidate.description ?? '',
        status: candidate.status ?? DEFAULT_TICKET_STATUS,
        priority: candidate.priority ?? DEFAULT_TICKET_PRIORITY,
        requester: candidate.requester ?? null,
        assignee: candidate.assignee ?? null,
        tags: candidate.tags ?? null,
        created_at: now,
        updated_at: now,
      })
      .returning('id');

    if (!inserted) {
      throw new Error('Failed to get id from inserted ticket');
    }

    logger.debug('[tickets/ticket] Inserted ticket', { id: inserted.id });
    return inserted.id;
  },

  get: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<ITicket | null> => {
    const record = await knexOrTrx<ITicketRecord>(TICKETS_TABLE)
      .select([...TICKET_COLUMNS])
      .where({ id })
      .first();

    return record ? toTicket(record) : null;
  },

  /**
   * Apply a sparse patch. Keys holding `undefined` are ignored; `null` clears
   * a nullable column. Returns false when the patch is empty (nothing is
   * written) or no row has that id.
   */
  update: async (
    knexOrTrx: Knex | Knex.Transaction,
    id: number,
    patch: TicketPatch,
    now: string
  ): Promise<boolean> => {
    const changes = presentFields(patch);
    if (Object.keys(changes).length === 0) {
      return false;
    }

    const updated = await knexOrTrx<ITicketRecord>(TICKETS_TABLE)
      .where({ id })
      .update({ ...changes, updated_at: now });

    logger.debug('[tickets/ticket] Updated ticket', { id, fields: Object.keys(changes), affected: updated });
    return updated > 0;
  },

  /**
   * Every ticket by ascending id, with stored values as they are.
   */
  getAll: async (knexOrTrx: Knex | Knex.Transaction): Promise<ITicketRecord[]> => {
    return knexOrTrx<ITicketRecord>(TICKETS_TABLE)
      .select([...TICKET_COLUMNS])
      .orderBy('id', 'asc');
  },
};

export default Ticket;
