/**
 * @ticketdesk/tickets - TicketingService
 *
 * The entry point a presentation shell calls. Validates required fields,
 * stamps writes from an injected clock, runs each write in its own
 * transaction (retrying transient lock errors) and maps driver failures onto
 * the AppError taxonomy. Failures are logged here once and re-thrown.
 */

import type { Knex } from 'knex';
import {
  AppError,
  ValidationError,
  formatUtcTimestamp,
  getConfig,
  logger,
  monotonicClock,
  systemClock,
  withRetry,
  type Clock,
  type DatabaseConfig,
} from '@ticketdesk/core';
import {
  createConnection,
  initializeSchema,
  isTransientStorageError,
  storageErrorCode,
  translateStorageError,
} from '@ticketdesk/db';
import type {
  CreateTicketInput,
  IComment,
  ITicket,
  ITicketListFilters,
  ITicketListItem,
  TicketPatch,
} from '@ticketdesk/types';
import Comment from '../models/comment';
import Ticket from '../models/ticket';
import TicketQuery from '../models/ticketQuery';
import { exportAll } from '../lib/ticketExport';
import {
  createCommentSchema,
  createTicketSchema,
  ticketUpdateSchema,
  validateData,
} from '../schemas/ticket.schema';

/**
 * Error-level entries carry the error class and codes only: driver messages
 * embed the SQL and its bound ticket text, which goes to debug.
 */
function logFailure(operation: string, error: unknown): void {
  if (error instanceof ValidationError) {
    logger.warn(`[TicketingService] ${operation} rejected`, { issues: error.issues });
    return;
  }

  const summary =
    error instanceof AppError
      ? { name: error.name, code: error.code, details: error.details }
      : { name: error instanceof Error ? error.name : typeof error, code: storageErrorCode(error) };

  logger.error(`[TicketingService] ${operation} failed`, summary);
  logger.debug(
    `[TicketingService] ${operation} failure detail`,
    error instanceof Error ? error : { error: String(error) }
  );
}

export interface BrowseTicketsRequest {
  query?: string | null;
  filters?: ITicketListFilters;
}

export interface TicketingServiceOptions {
  /** Destroy the knex handle on `close()`. */
  ownsConnection?: boolean;
}

export class TicketingService {
  private readonly clock: Clock;
  private readonly ownsConnection: boolean;

  constructor(
    private readonly knex: Knex,
    clock: Clock = systemClock,
    options: TicketingServiceOptions = {}
  ) {
    this.clock = monotonicClock(clock);
    this.ownsConnection = options.ownsConnection ?? false;
  }

  private timestamp(): string {
    return formatUtcTimestamp(this.clock.now());
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(work, isTransientStorageError);
    } catch (error) {
      const translated = translateStorageError(error);
      logFailure(operation, translated);
      throw translated;
    }
  }

  async createTicket(fields: CreateTicketInput): Promise<number> {
    const id = await this.run('createTicket', async () => {
      const input = validateData(createTicketSchema, fields);
      return this.knex.transaction((trx) => Ticket.create(trx, input, this.timestamp()));
    });

    logger.info(`[TicketingService] Created ticket ${id}`);
    return id;
  }

  async getTicket(id: number): Promise<ITicket | null> {
    return this.run('getTicket', () => Ticket.get(this.knex, id));
  }

  async listTickets(filters: ITicketListFilters = {}): Promise<ITicketListItem[]> {
    return this.run('listTickets', () => TicketQuery.list(this.knex, filters));
  }

  async searchTickets(query: string): Promise<ITicketListItem[]> {
    return this.run('searchTickets', () => TicketQuery.search(this.knex, query));
  }

  /**
   * A non-blank query searches and ignores the filters; a blank one lists
   * with the filters.
   */
  async browseTickets(request: BrowseTicketsRequest = {}): Promise<ITicketListItem[]> {
    const query = request.query?.trim() ?? '';
    if (query) {
      return this.searchTickets(query);
    }

    const filters = request.filters ?? {};
    return this.listTickets({ ...filters, assignee: filters.assignee?.trim() || null });
  }

  /**
   * Returns false for an unknown id or an empty patch; neither is an error.
   */
  async updateTicket(id: number, patch: TicketPatch): Promise<boolean> {
    const updated = await this.run('updateTicket', async () => {
      const changes = validateData(ticketUpdateSchema, patch);
      return this.knex.transaction((trx) => Ticket.update(trx, id, changes, this.timestamp()));
    });

    if (updated) {
      logger.info(`[TicketingService] Updated ticket ${id}`);
    }
    return updated;
  }

  async addComment(ticketId: number, author: string | null | undefined, body: string): Promise<number> {
    const id = await this.run('addComment', async () => {
      const input = validateData(createCommentSchema, { ticketId, author, body });
      return this.knex.transaction((trx) => Comment.append(trx, input, this.timestamp()));
    });

    logger.info(`[TicketingService] Added comment ${id} to ticket ${ticketId}`);
    return id;
  }

  async listComments(ticketId: number): Promise<IComment[]> {
    return this.run('listComments', () => Comment.listFor(this.knex, ticketId));
  }

  async exportAll(): Promise<Buffer> {
    return this.run('exportAll', () => exportAll(this.knex));
  }

  async close(): Promise<void> {
    if (this.ownsConnection) {
      await this.knex.destroy();
    }
  }
}

export interface OpenTicketingServiceOptions {
  database?: DatabaseConfig;
  clock?: Clock;
}

/**
 * Opens the store (from the environment unless a database config is given),
 * creates any missing tables and returns a service that owns the handle.
 */
export async function openTicketingService(options: OpenTicketingServiceOptions = {}): Promise<TicketingService> {
  const knex = createConnection(options.database ?? getConfig().database);

  try {
    await initializeSchema(knex);
  } catch (error) {
    const translated = translateStorageError(error);
    logFailure('initializeSchema', translated);
    await knex.destroy();
    throw translated;
  }

  return new TicketingService(knex, options.clock, { ownsConnection: true });
}
