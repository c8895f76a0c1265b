/**
 * Duration parsing for human-readable intervals like "30s", "5m", "7d".
 *
 * All durations are represented as milliseconds (number).
 */

const MS_PER_SECOND = 1_000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const UNIT_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: MS_PER_SECOND,
  m: MS_PER_MINUTE,
  h: MS_PER_HOUR,
  d: MS_PER_DAY,
};

const DURATION_RE = /^(\d+)(ms|s|m|h|d)$/;

/**
 * Parse a duration string into milliseconds.
 *
 * Supported units: `ms`, `s`, `m`, `h`, `d`. Input is case-insensitive and
 * trimmed; the numeric part must be a non-negative integer.
 *
 * @throws {Error} on empty input, unknown units or non-integer amounts.
 */
export function parseDuration(s: string): number {
  const trimmed = s.trim().toLowerCase();
  if (trimmed.length === 0) {
    throw new Error('Duration string must not be empty');
  }

  const match = DURATION_RE.exec(trimmed);
  if (match === null) {
    throw new Error(`Invalid duration '${s}': expected an integer followed by ms, s, m, h, or d`);
  }

  const amount = Number(match[1]);
  const ms = amount * UNIT_MULTIPLIERS[match[2]];
  if (!Number.isSafeInteger(ms)) {
    throw new Error(`Duration '${s}' is too large`);
  }
  return ms;
}

/**
 * Read a duration from a loosely-typed config value.
 *
 * Strings go through {@link parseDuration}; bare non-negative numbers are
 * taken as seconds. Anything else yields `fallback`.
 */
export function durationValue(raw: unknown, fallback: number): number {
  if (typeof raw === 'string') {
    return parseDuration(raw);
  }
  if (typeof raw === 'number' && Number.isFinite(raw) && raw >= 0) {
    return Math.round(raw * MS_PER_SECOND);
  }
  return fallback;
}

/**
 * Format milliseconds using the largest unit that divides evenly.
 *
 * @example
 * formatDuration(7 * 86400_000) // "7d"
 * formatDuration(90_000)        // "90s"
 * formatDuration(1_500)         // "1500ms"
 */
export function formatDuration(ms: number): string {
  if (ms === 0) {
    return '0s';
  }
  for (const unit of ['d', 'h', 'm', 's'] as const) {
    const size = UNIT_MULTIPLIERS[unit];
    if (ms >= size && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }
  return `${ms}ms`;
}
