import type { Clock } from '@ticketdesk/core';

export interface SteppingClock extends Clock {
  /** Moves the next reading by `seconds` (may be negative). */
  advance(seconds: number): void;
}

/**
 * Fake clock for tests: each reading is `stepSeconds` after the previous one,
 * starting at `start`.
 */
export function steppingClock(start: string = '2024-03-01T09:00:00Z', stepSeconds: number = 1): SteppingClock {
  let next = new Date(start).getTime();

  return {
    now() {
      const current = new Date(next);
      next += stepSeconds * 1000;
      return current;
    },
    advance(seconds: number) {
      next += seconds * 1000;
    },
  };
}
