import { Decimal, round2 } from '../decimal.js';
import type { Quote } from './models.js';

export interface HistorySummary {
  readonly high_24h: number;
  readonly low_24h: number;
  readonly avg_24h: number;
  /** Spread between the buffered high and low. */
  readonly volatility: number;
  readonly count: number;
}

/**
 * Summary statistics over buffered quotes, or null when there are none.
 */
export function summarize(quotes: readonly Pick<Quote, 'price'>[]): HistorySummary | null {
  if (quotes.length === 0) {
    return null;
  }

  const prices = quotes.map((q) => new Decimal(q.price));
  const high = Decimal.max(...prices);
  const low = Decimal.min(...prices);
  const mean = Decimal.sum(...prices).div(prices.length);

  return {
    high_24h: round2(high),
    low_24h: round2(low),
    avg_24h: round2(mean),
    volatility: round2(high.minus(low)),
    count: quotes.length,
  };
}
