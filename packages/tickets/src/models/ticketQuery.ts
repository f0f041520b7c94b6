/**
 * @ticketdesk/tickets - Ticket listing and search
 *
 * Two separate read views over `tickets`:
 * - `list` filters by equality and sorts for triage (status, then priority,
 *   then newest first);
 * - `search` matches a substring in title, description or tags and sorts by
 *   last update only.
 */

import type { Knex } from 'knex';
import { TICKETS_TABLE } from '@ticketdesk/db';
import {
  TICKET_LIST_COLUMNS,
  type ITicketListFilters,
  type ITicketListItem,
  type ITicketRecord,
} from '@ticketdesk/types';
import {
  PRIORITY_RANK,
  PRIORITY_RANK_FALLBACK,
  STATUS_RANK,
  STATUS_RANK_FALLBACK,
  rankCaseExpression,
} from '../lib/ticketRanking';

export const SEARCH_COLUMNS = ['title', 'description', 'tags'] as const;

const LIKE_ESCAPE = '!';

/** Escapes LIKE wildcards so the query matches literally. */
export function escapeLikePattern(query: string): string {
  return query.replace(/[!%_]/g, (char) => `${LIKE_ESCAPE}${char}`);
}

const TicketQuery = {
  list: async (knexOrTrx: Knex | Knex.Transaction, filters: ITicketListFilters = {}): Promise<ITicketListItem[]> => {
    const statusOrder = rankCaseExpression('status', STATUS_RANK, STATUS_RANK_FALLBACK);
    const priorityOrder = rankCaseExpression('priority', PRIORITY_RANK, PRIORITY_RANK_FALLBACK);

    const query = knexOrTrx<ITicketRecord>(TICKETS_TABLE).select([...TICKET_LIST_COLUMNS]);

    // null, undefined and '' all mean "any value"
    if (filters.status) {
      query.where('status', filters.status);
    }
    if (filters.priority) {
      query.where('priority', filters.priority);
    }
    if (filters.assignee) {
      query.where('assignee', filters.assignee);
    }

    return query
      .orderByRaw(statusOrder.sql, statusOrder.bindings)
      .orderByRaw(priorityOrder.sql, priorityOrder.bindings)
      .orderBy('created_at', 'desc')
      .orderBy('id', 'desc');
  },

  /**
   * Case-insensitive substring search. Both sides go through `lower()`, so
   * the result is the same on SQLite and PostgreSQL.
   */
  search: async (knexOrTrx: Knex | Knex.Transaction, query: string): Promise<ITicketListItem[]> => {
    const pattern = `%${escapeLikePattern(query)}%`;

    return knexOrTrx<ITicketRecord>(TICKETS_TABLE)
      .select([...TICKET_LIST_COLUMNS])
      .where((builder) => {
        for (const column of SEARCH_COLUMNS) {
          builder.orWhereRaw(`lower(??) like lower(?) escape '${LIKE_ESCAPE}'`, [column, pattern]);
        }
      })
      .orderBy('updated_at', 'desc')
      .orderBy('id', 'desc');
  },
};

export default TicketQuery;
