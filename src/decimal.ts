import { Decimal } from 'decimal.js';

// Quotes arrive as binary floats; do the unit conversions and rounding in
// decimal so 550.125 rounds to 550.13 rather than 550.12.
Decimal.set({ precision: 29, rounding: Decimal.ROUND_HALF_UP });

export { Decimal };

/** Round to `dp` decimal places (half-up) and return a plain number. */
export function roundTo(value: number | Decimal, dp: number): number {
  return new Decimal(value).toDecimalPlaces(dp).toNumber();
}

/** Round to two decimal places, the common currency unit for quotes. */
export function round2(value: number | Decimal): number {
  return roundTo(value, 2);
}

/** Convert an integer amount of the minor unit (e.g. cents) to major units. */
export function fromMinorUnits(value: number, scale: number = 100): number {
  return new Decimal(value).div(scale).toNumber();
}

/**
 * Percent change of `change` relative to `previousClose`.
 *
 * Returns 0 when `previousClose` is zero.
 */
export function percentOf(change: number, previousClose: number): number {
  if (previousClose === 0) {
    return 0;
  }
  return new Decimal(change).div(previousClose).mul(100).toNumber();
}
