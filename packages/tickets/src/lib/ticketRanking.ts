// Fixed triage order for ticket listings: lower rank sorts first.

import type { TicketPriority, TicketStatus } from '@ticketdesk/types';

export const STATUS_RANK: Record<TicketStatus, number> = {
  open: 0,
  in_progress: 1,
  closed: 2,
};

export const PRIORITY_RANK: Record<TicketPriority, number> = {
  urgent: 0,
  high: 1,
  medium: 2,
  low: 3,
};

// ELSE branch for values outside the tables
export const STATUS_RANK_FALLBACK = 2;
export const PRIORITY_RANK_FALLBACK = 3;

export interface RankExpression {
  sql: string;
  bindings: string[];
}

/**
 * Renders a rank table as `CASE <column> WHEN ? THEN <n> ... ELSE <fallback> END`
 * for `orderByRaw`. Values are bound; ranks are integer literals.
 */
export function rankCaseExpression(column: string, ranks: Record<string, number>, fallback: number): RankExpression {
  const entries = Object.entries(ranks);
  const branches = entries.map(([, rank]) => `WHEN ? THEN ${Math.trunc(rank)}`).join(' ');

  return {
    sql: `CASE ?? ${branches} ELSE ${Math.trunc(fallback)} END`,
    bindings: [column, ...entries.map(([value]) => value)],
  };
}
