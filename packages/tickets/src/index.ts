/**
 * @ticketdesk/tickets
 *
 * Ticket and comment repositories, listing and search, CSV export, and the
 * TicketingService facade over them.
 */

// Models
export { default as Ticket } from './models/ticket';
export { default as Comment } from './models/comment';
export { default as TicketQuery, escapeLikePattern, SEARCH_COLUMNS } from './models/ticketQuery';

// Schemas
export * from './schemas/ticket.schema';

// Lib utilities
export * from './lib/ticketRanking';
export * from './lib/ticketPatch';
export { exportAll, EXPORT_FILE_NAME, EXPORT_MIME_TYPE } from './lib/ticketExport';

// Services
export { TicketingService, openTicketingService } from './services/ticketingService';
export type {
  BrowseTicketsRequest,
  OpenTicketingServiceOptions,
  TicketingServiceOptions,
} from './services/ticketingService';

// Re-export ticket types from @ticketdesk/types
export type {
  ITicket,
  ITicketRecord,
  ITicketListItem,
  ITicketListFilters,
  CreateTicketInput,
  TicketPatch,
  IComment,
  CreateCommentInput,
} from '@ticketdesk/types';
