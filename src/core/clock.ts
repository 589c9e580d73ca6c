/**
 * Wall-clock source used for record and audit timestamps.
 * Tests substitute a fixed or stepping clock.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Timestamp for a version bump: the clock's current time, or one
 * millisecond past the previous value when the clock has not moved beyond it.
 */
export function nextTimestamp(previous: string, now: Date): string {
  const prev = Date.parse(previous);
  const next = now.getTime() > prev ? now.getTime() : prev + 1;
  return new Date(next).toISOString();
}
