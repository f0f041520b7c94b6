import type { CreateTicketInput, ITicket, TicketPatch, TicketPriority, TicketStatus } from '@ticketdesk/types';

/** Values of the edit form, as typed. Blank text fields mean "unset". */
export interface TicketEditForm {
  title: string;
  description: string;
  status: TicketStatus;
  priority: TicketPriority;
  tags: string;
  assignee: string;
  requester?: string;
}

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Normalises a new-ticket form: title and description trimmed; requester,
 * assignee and tags trimmed, with blanks stored as NULL.
 */
export function cleanTicketInput(input: CreateTicketInput): CreateTicketInput {
  return {
    ...input,
    title: input.title.trim(),
    description: input.description?.trim() ?? '',
    requester: blankToNull(input.requester),
    assignee: blankToNull(input.assignee),
    tags: blankToNull(input.tags),
  };
}

/**
 * The sparse patch for an edit form: only fields whose normalised value
 * differs from the current ticket. An untouched form gives `{}`.
 */
export function buildTicketPatch(current: ITicket, edited: TicketEditForm): TicketPatch {
  const patch: TicketPatch = {};

  const title = edited.title.trim();
  if (title !== current.title) patch.title = title;

  const description = edited.description.trim();
  if (description !== current.description) patch.description = description;

  if (edited.status !== current.status) patch.status = edited.status;
  if (edited.priority !== current.priority) patch.priority = edited.priority;

  const tags = blankToNull(edited.tags);
  if (tags !== blankToNull(current.tags)) patch.tags = tags;

  const assignee = blankToNull(edited.assignee);
  if (assignee !== blankToNull(current.assignee)) patch.assignee = assignee;

  if (edited.requester !== undefined) {
    const requester = blankToNull(edited.requester);
    if (requester !== blankToNull(current.requester)) patch.requester = requester;
  }

  return patch;
}
