import { describe, expect, expectTypeOf, it } from 'vitest';
import {
  TICKET_COLUMNS,
  TICKET_LIST_COLUMNS,
  TICKET_PATCH_FIELDS,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  type ITicket,
  type TicketPatch,
  type TicketStatus,
} from './ticket.interfaces';

describe('ticket interfaces', () => {
  it('lists the enum values in storage order', () => {
    expect(TICKET_STATUSES).toEqual(['open', 'in_progress', 'closed']);
    expect(TICKET_PRIORITIES).toEqual(['low', 'medium', 'high', 'urgent']);
  });

  it('covers every ticket field in the stored column list', () => {
    expectTypeOf<(typeof TICKET_COLUMNS)[number]>().toEqualTypeOf<keyof ITicket>();
    expect(TICKET_COLUMNS).toHaveLength(10);
  });

  it('keeps list and patch columns within the ticket fields', () => {
    expect(TICKET_LIST_COLUMNS.every((column) => TICKET_COLUMNS.includes(column))).toBe(true);
    expect(TICKET_PATCH_FIELDS).not.toContain('id');
    expect(TICKET_PATCH_FIELDS).not.toContain('created_at');
    expect(TICKET_PATCH_FIELDS).not.toContain('updated_at');
  });

  it('allows clearing nullable fields in a patch', () => {
    expectTypeOf<{ assignee: null }>().toMatchTypeOf<TicketPatch>();
    expectTypeOf<{ status: TicketStatus }>().toMatchTypeOf<TicketPatch>();
  });
});
