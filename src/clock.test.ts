import { describe, it, expect } from 'vitest';
import {
  SystemClock,
  FixedClock,
  ManualClock,
  type Clock,
  epochSeconds,
  formatLocalTime,
  formatLocalDateTime,
  startOfLocalDay,
} from './clock.js';

describe('SystemClock', () => {
  it('now() returns approximately the current time', () => {
    const clock: Clock = new SystemClock();
    const before = Date.now();
    const now = clock.now();
    const after = Date.now();
    expect(now.getTime()).toBeGreaterThanOrEqual(before);
    expect(now.getTime()).toBeLessThanOrEqual(after);
  });
});

describe('FixedClock', () => {
  it('now() always returns the fixed instant', () => {
    const date = new Date('2024-06-15T12:30:00Z');
    const clock = new FixedClock(date);
    expect(clock.now().getTime()).toBe(date.getTime());
    expect(clock.now().getTime()).toBe(date.getTime());
  });

  it('is not affected by mutating the constructor argument', () => {
    const date = new Date('2024-06-15T12:30:00Z');
    const clock = new FixedClock(date);
    date.setUTCFullYear(2030);
    expect(clock.now().toISOString()).toBe('2024-06-15T12:30:00.000Z');
  });
});

describe('ManualClock', () => {
  it('advances by the requested amount', () => {
    const clock = new ManualClock(new Date('2024-06-15T12:30:00Z'));
    clock.advance(45_000);
    expect(clock.now().toISOString()).toBe('2024-06-15T12:30:45.000Z');
  });

  it('can be set to an arbitrary instant', () => {
    const clock = new ManualClock(new Date('2024-06-15T12:30:00Z'));
    clock.set(new Date('2024-06-16T00:00:00Z'));
    expect(clock.now().toISOString()).toBe('2024-06-16T00:00:00.000Z');
  });
});

describe('helpers', () => {
  it('epochSeconds keeps fractional milliseconds', () => {
    expect(epochSeconds(new Date(1_700_000_000_500))).toBe(1_700_000_000.5);
  });

  it('formatLocalTime zero-pads each field', () => {
    expect(formatLocalTime(new Date(2024, 0, 2, 3, 4, 5))).toBe('03:04:05');
  });

  it('formatLocalDateTime renders the local date and time', () => {
    expect(formatLocalDateTime(new Date(2024, 8, 30, 14, 30, 0))).toBe('2024-09-30 14:30:00');
  });

  it('startOfLocalDay drops the time of day', () => {
    const start = startOfLocalDay(new Date(2024, 5, 15, 23, 59, 59, 999));
    expect(start.getTime()).toBe(new Date(2024, 5, 15).getTime());
  });
});
