/**
 * Profit calculators and the holdings valuation.
 *
 * All arithmetic runs in decimal and is rounded once at the end, so totals are
 * computed from unrounded row values.
 */

import { formatLocalDateTime } from '../clock.js';
import { Decimal, round2, roundTo } from '../decimal.js';
import { EXPIRED_MARKER, ERROR_SOURCE, type FundQuote, annotateSource } from '../market-data/models.js';
import {
  DEFAULT_FEE_RATE,
  PROFIT_TARGETS,
  type Holding,
  type HoldingRow,
  type HoldingsResponse,
  type HoldingsSummary,
  type TargetPrice,
} from './models.js';

// ---------------------------------------------------------------------------
// Gold calculator
// ---------------------------------------------------------------------------

/**
 * Sell prices that realise each profit target after the sell fee:
 * `sell = buy * (1 + target) / (1 - fee)`.
 */
export function calculateTargetPrices(
  buyPrice: number,
  feeRate: number = DEFAULT_FEE_RATE,
): TargetPrice[] {
  const buy = new Decimal(buyPrice);
  const keep = new Decimal(1).minus(feeRate);
  return PROFIT_TARGETS.map((target) => {
    const rate = new Decimal(target).div(100);
    const sell = buy.mul(rate.plus(1)).div(keep);
    return {
      target_percent: target,
      sell_price: round2(sell),
      profit_amount: round2(buy.mul(rate)),
      actual_multiplier: roundTo(sell.div(buy), 4),
    };
  });
}

/**
 * Profit rate (percent) of selling at `currentPrice` after the fee.
 * Returns 0 for a non-positive buy price.
 */
export function calculateCurrentProfit(
  buyPrice: number,
  currentPrice: number,
  feeRate: number = DEFAULT_FEE_RATE,
): number {
  if (buyPrice <= 0) {
    return 0;
  }
  const received = new Decimal(currentPrice).mul(new Decimal(1).minus(feeRate));
  return round2(received.minus(buyPrice).div(buyPrice).mul(100));
}

// ---------------------------------------------------------------------------
// Holdings valuation
// ---------------------------------------------------------------------------

interface RowTotals {
  cost: Decimal;
  value: Decimal;
  today: Decimal;
}

function pickQuote(
  code: string,
  fetched: ReadonlyMap<string, FundQuote | null>,
  previous: ReadonlyMap<string, FundQuote | null>,
): FundQuote | null {
  const fresh = fetched.get(code) ?? null;
  if (fresh !== null && fresh.price > 0) {
    return fresh;
  }
  const cached = previous.get(code) ?? null;
  if (cached !== null && cached.price > 0) {
    return annotateSource(cached, EXPIRED_MARKER);
  }
  return null;
}

function valueRow(holding: Holding, quote: FundQuote | null): { row: HoldingRow; totals: RowTotals } {
  const shares = new Decimal(holding.shares);
  const cost = new Decimal(holding.cost_price).mul(shares);

  if (quote === null) {
    return {
      row: {
        ...holding,
        price: holding.cost_price,
        nav: 0,
        change_percent: 0,
        cost_value: round2(cost),
        market_value: round2(cost),
        profit: 0,
        profit_rate: 0,
        today_profit: 0,
        time_str: '--',
        source: ERROR_SOURCE,
        error: 'No quote available',
      },
      totals: { cost, value: cost, today: new Decimal(0) },
    };
  }

  const value = new Decimal(quote.price).mul(shares);
  const profit = value.minus(cost);
  const today = new Decimal(quote.change).mul(shares);
  return {
    row: {
      ...holding,
      price: quote.price,
      nav: quote.nav,
      change_percent: quote.change_percent,
      cost_value: round2(cost),
      market_value: round2(value),
      profit: round2(profit),
      profit_rate: cost.isZero() ? 0 : round2(profit.div(cost).mul(100)),
      today_profit: round2(today),
      time_str: quote.time_str,
      source: quote.source,
    },
    totals: { cost, value, today },
  };
}

/**
 * Value every holding against the freshly fetched quotes, falling back to
 * previously cached quotes (tagged expired) for codes that failed.
 */
export function buildHoldingsResponse(
  holdings: readonly Holding[],
  fetched: ReadonlyMap<string, FundQuote | null>,
  previous: ReadonlyMap<string, FundQuote | null>,
  at: Date,
): HoldingsResponse {
  let totalCost = new Decimal(0);
  let totalValue = new Decimal(0);
  let totalToday = new Decimal(0);
  const data: HoldingRow[] = [];

  for (const holding of holdings) {
    const { row, totals } = valueRow(holding, pickQuote(holding.code, fetched, previous));
    data.push(row);
    totalCost = totalCost.plus(totals.cost);
    totalValue = totalValue.plus(totals.value);
    totalToday = totalToday.plus(totals.today);
  }

  const totalProfit = totalValue.minus(totalCost);
  const summary: HoldingsSummary = {
    total_cost: round2(totalCost),
    total_value: round2(totalValue),
    total_profit: round2(totalProfit),
    total_profit_rate: totalCost.isZero() ? 0 : round2(totalProfit.div(totalCost).mul(100)),
    total_today_profit: round2(totalToday),
    count: holdings.length,
  };

  return { success: true, data, summary, last_update: formatLocalDateTime(at) };
}
