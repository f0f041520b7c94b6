/**
 * Timestamps are persisted as second-precision UTC ISO-8601 text
 * (`2024-03-01T09:30:00Z`), which sorts chronologically as plain text.
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Wraps a clock so that it never goes backwards: if the source reports an
 * instant earlier than one already handed out, the earlier high-water mark is
 * returned instead.
 */
export function monotonicClock(source: Clock): Clock {
  let last = Number.NEGATIVE_INFINITY;

  return {
    now() {
      const current = Math.max(source.now().getTime(), last);
      last = current;
      return new Date(current);
    },
  };
}
