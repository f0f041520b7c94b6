import type { Knex } from 'knex';
import Papa from 'papaparse';
import { TICKET_COLUMNS } from '@ticketdesk/types';
import Ticket from '../models/ticket';

export const EXPORT_FILE_NAME = 'tickets_export.csv';
export const EXPORT_MIME_TYPE = 'text/csv';

/**
 * Snapshot of every ticket as UTF-8 CSV: a header of the stored column names,
 * then one row per ticket by ascending id. NULL becomes an empty cell.
 */
export async function exportAll(knexOrTrx: Knex | Knex.Transaction): Promise<Buffer> {
  const tickets = await Ticket.getAll(knexOrTrx);

  const csv = Papa.unparse(
    {
      fields: [...TICKET_COLUMNS],
      data: tickets.map((ticket) => TICKET_COLUMNS.map((column) => ticket[column])),
    },
    { newline: '\n' }
  );

  return Buffer.from(csv, 'utf8');
}
