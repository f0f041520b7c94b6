export const TICKET_STATUSES = ['open', 'in_progress', 'closed'] as const;
export const TICKET_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

export const DEFAULT_TICKET_STATUS: TicketStatus = 'open';
export const DEFAULT_TICKET_PRIORITY: TicketPriority = 'medium';

/**
 * Stored column order of the `tickets` table. The export writes its header in
 * this order.
 */
export const TICKET_COLUMNS = [
  'id',
  'title',
  'description',
  'status',
  'priority',
  'requester',
  'assignee',
  'tags',
  'created_at',
  'updated_at',
] as const;

export type TicketColumn = (typeof TICKET_COLUMNS)[number];

export interface ITicket {
  id: number;
  title: string;
  description: string;
  status: TicketStatus;
  priority: TicketPriority;
  requester: string | null;
  assignee: string | null;
  tags: string | null; // comma-separated, stored verbatim
  created_at: string;
  updated_at: string;
}

/**
 * A row as the store hands it back. `description` may be NULL in stores
 * created by earlier versions of the schema.
 */
export interface ITicketRecord extends Omit<ITicket, 'description'> {
  description: string | null;
}

/** Row shape returned by listing and search. */
export type ITicketListItem = Pick<
  ITicket,
  'id' | 'title' | 'status' | 'priority' | 'assignee' | 'requester' | 'tags' | 'created_at' | 'updated_at'
>;

export const TICKET_LIST_COLUMNS = [
  'id',
  'title',
  'status',
  'priority',
  'assignee',
  'requester',
  'tags',
  'created_at',
  'updated_at',
] as const satisfies readonly (keyof ITicketListItem)[];

export interface CreateTicketInput {
  title: string;
  description?: string | null;
  status?: TicketStatus;
  priority?: TicketPriority;
  requester?: string | null;
  assignee?: string | null;
  tags?: string | null;
}

/** Fields an update may touch. Presence of a key, not its value, decides whether it is written. */
export type TicketPatch = Partial<
  Pick<ITicket, 'title' | 'status' | 'priority' | 'requester' | 'assignee' | 'tags'> & {
    description: string | null;
  }
>;

export type TicketPatchField = keyof TicketPatch;

export const TICKET_PATCH_FIELDS = [
  'title',
  'description',
  'status',
  'priority',
  'requester',
  'assignee',
  'tags',
] as const satisfies readonly TicketPatchField[];

/**
 * Equality filters for listing. An absent, null or empty value matches every
 * ticket.
 */
export interface ITicketListFilters {
  status?: TicketStatus | null;
  priority?: TicketPriority | null;
  assignee?: string | null;
}
