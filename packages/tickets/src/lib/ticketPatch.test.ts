import { describe, expect, it } from 'vitest';
import type { ITicket } from '@ticketdesk/types';
import { buildTicketPatch, cleanTicketInput, type TicketEditForm } from './ticketPatch';

const current: ITicket = {
  id: 7,
  title: 'VPN drops',
  description: 'Every hour',
  status: 'open',
  priority: 'high',
  requester: 'ana',
  assignee: null,
  tags: 'network',
  created_at: '2024-03-01T09:00:00Z',
  updated_at: '2024-03-01T09:00:00Z',
};

const untouched: TicketEditForm = {
  title: 'VPN drops',
  description: 'Every hour',
  status: 'open',
  priority: 'high',
  tags: 'network',
  assignee: '',
};

describe('cleanTicketInput', () => {
  it('trims text and stores blank optional fields as null', () => {
    expect(
      cleanTicketInput({
        title: '  Printer jammed ',
        description: ' Tray 2\n',
        requester: '   ',
        assignee: ' sam ',
        tags: '',
        priority: 'urgent',
      })
    ).toEqual({
      title: 'Printer jammed',
      description: 'Tray 2',
      requester: null,
      assignee: 'sam',
      tags: null,
      priority: 'urgent',
    });
  });

  it('defaults a missing description to an empty string', () => {
    expect(cleanTicketInput({ title: 'x' }).description).toBe('');
  });
});

describe('buildTicketPatch', () => {
  it('returns an empty patch for an untouched form', () => {
    expect(buildTicketPatch(current, untouched)).toEqual({});
  });

  it('ignores whitespace-only differences', () => {
    expect(buildTicketPatch(current, { ...untouched, title: ' VPN drops ', tags: ' network', assignee: '  ' })).toEqual(
      {}
    );
  });

  it('collects changed fields', () => {
    expect(
      buildTicketPatch(current, { ...untouched, status: 'closed', assignee: 'kim ', tags: '', description: '' })
    ).toEqual({ status: 'closed', assignee: 'kim', tags: null, description: '' });
  });

  it('compares the requester only when the form carries it', () => {
    expect(buildTicketPatch(current, { ...untouched, requester: 'ana' })).toEqual({});
    expect(buildTicketPatch(current, { ...untouched, requester: '' })).toEqual({ requester: null });
  });
});
