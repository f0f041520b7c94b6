/**
 * @ticketdesk/types
 *
 * Entity interfaces and enum tables shared by every package.
 */

export * from './interfaces';
