import { z } from 'zod';
import { ValidationError } from '@ticketdesk/core';
import type { TicketPriority, TicketStatus } from '@ticketdesk/types';

// Enum membership is checked by the store's CHECK constraint, not here.
const statusField = z.custom<TicketStatus>((value) => typeof value === 'string', 'Status must be a string');
const priorityField = z.custom<TicketPriority>((value) => typeof value === 'string', 'Priority must be a string');

const nonBlank = (message: string) => z.string().refine((value) => value.trim().length > 0, message);

const optionalText = z.string().nullable().optional();

export const createTicketSchema = z.object({
  title: nonBlank('Title is required'),
  description: optionalText,
  status: statusField.optional(),
  priority: priorityField.optional(),
  requester: optionalText,
  assignee: optionalText,
  tags: optionalText,
});

export const ticketUpdateSchema = createTicketSchema.partial();

export const createCommentSchema = z.object({
  ticketId: z.number().int('Ticket ID must be an integer'),
  author: optionalText,
  body: nonBlank('Comment body is required'),
});

/**
 * Validates data against a Zod schema, collecting every failing field into a
 * single ValidationError.
 */
export function validateData<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`));
  }
  return result.data;
}
