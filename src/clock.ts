/**
 * Clock abstraction.
 *
 * - `now()` returns the current instant as a `Date`.
 * - Helpers derive epoch seconds, local wall-clock strings and the start of
 *   the local calendar day from whatever clock is injected.
 */
export interface Clock {
  now(): Date;
}

/** Real wall-clock backed by `Date.now()`. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/** Clock frozen at a specific instant. */
export class FixedClock implements Clock {
  private readonly _now: Date;

  constructor(now: Date) {
    this._now = new Date(now.getTime());
  }

  now(): Date {
    return new Date(this._now.getTime());
  }
}

/** Clock that only moves when told to. Useful for TTL and breaker tests. */
export class ManualClock implements Clock {
  private _ms: number;

  constructor(start: Date) {
    this._ms = start.getTime();
  }

  now(): Date {
    return new Date(this._ms);
  }

  advance(ms: number): void {
    this._ms += ms;
  }

  set(at: Date): void {
    this._ms = at.getTime();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Epoch seconds (fractional) for a date. */
export function epochSeconds(at: Date): number {
  return at.getTime() / 1000;
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/** Local wall-clock time as "HH:MM:SS". */
export function formatLocalTime(at: Date): string {
  return `${pad2(at.getHours())}:${pad2(at.getMinutes())}:${pad2(at.getSeconds())}`;
}

/** Local date and time as "YYYY-MM-DD HH:MM:SS". */
export function formatLocalDateTime(at: Date): string {
  const date = `${at.getFullYear()}-${pad2(at.getMonth() + 1)}-${pad2(at.getDate())}`;
  return `${date} ${formatLocalTime(at)}`;
}

/** Midnight at the start of the local calendar day containing `at`. */
export function startOfLocalDay(at: Date): Date {
  return new Date(at.getFullYear(), at.getMonth(), at.getDate(), 0, 0, 0, 0);
}
