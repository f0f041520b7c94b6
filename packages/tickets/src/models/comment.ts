import type { Knex } from 'knex';
import { logger } from '@ticketdesk/core';
import { COMMENTS_TABLE } from '@ticketdesk/db';
import type { CreateCommentInput, IComment } from '@ticketdesk/types';

const COMMENT_COLUMNS = ['id', 'ticket_id', 'author', 'body', 'created_at'] as const;

const Comment = {
  /**
   * The ticket is not looked up first: the foreign key rejects a comment on
   * a missing ticket.
   */
  append: async (knexOrTrx: Knex | Knex.Transaction, input: CreateCommentInput, now: string): Promise<number> => {
    const [inserted] = await knexOrTrx<IComment>(COMMENTS_TABLE)
      .insert({
        ticket_id: input.ticketId,
        author: input.author ?? null,
        body: input.body,
        created_at: now,
      })
      .returning('id');

    if (!inserted) {
      throw new Error('Failed to get id from inserted comment');
    }

    logger.debug('[tickets/comment] Inserted comment', { id: inserted.id, ticketId: input.ticketId });
    return inserted.id;
  },

  listFor: async (knexOrTrx: Knex | Knex.Transaction, ticketId: number): Promise<IComment[]> => {
    return knexOrTrx<IComment>(COMMENTS_TABLE)
      .select([...COMMENT_COLUMNS])
      .where({ ticket_id: ticketId })
      .orderBy('id', 'asc');
  },
};

export default Comment;
