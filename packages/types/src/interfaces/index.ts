export * from './ticket.interfaces';
export * from './comment.interface';
