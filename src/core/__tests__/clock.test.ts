/**
 * Tests for timestamp advancement.
 */

import { describe, it, expect } from 'vitest';
import { nextTimestamp, systemClock } from '../clock.js';

describe('nextTimestamp', () => {
  const previous = '2026-03-01T09:00:00.000Z';

  it('uses the clock when it is ahead of the previous value', () => {
    expect(nextTimestamp(previous, new Date('2026-03-01T09:00:05.000Z'))).toBe('2026-03-01T09:00:05.000Z');
  });

  it('adds one millisecond when the clock equals the previous value', () => {
    expect(nextTimestamp(previous, new Date(previous))).toBe('2026-03-01T09:00:00.001Z');
  });

  it('adds one millisecond when the clock went backwards', () => {
    expect(nextTimestamp(previous, new Date('2026-03-01T08:59:00.000Z'))).toBe('2026-03-01T09:00:00.001Z');
  });
});

describe('systemClock', () => {
  it('returns the current time', () => {
    const before = Date.now();
    const now = systemClock.now().getTime();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(Date.now());
  });
});
