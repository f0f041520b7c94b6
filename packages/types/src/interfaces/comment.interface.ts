export interface IComment {
  id: number;
  ticket_id: number;
  author: string | null;
  body: string;
  created_at: string;
}

export interface CreateCommentInput {
  ticketId: number;
  author?: string | null;
  body: string;
}
