/**
 * Gold price services: latest quote, buffered history and the profit
 * calculator.
 */

import { fetchErrorMessage } from '../market-data/errors.js';
import type { Quote } from '../market-data/models.js';
import { summarize } from '../market-data/summary.js';
import { calculateCurrentProfit, calculateTargetPrices } from '../portfolio/calculator.js';
import { GOLD_SYMBOL, type MarketContext } from './context.js';
import { type CalculateOutput, type Failure, type PriceOutput, type ServiceResult, fail, ok } from './types.js';

async function fetchAndRecord(ctx: MarketContext): Promise<ServiceResult<Quote>> {
  const outcome = await ctx.goldFetcher.fetch(GOLD_SYMBOL);
  if (outcome.value === null) {
    return fail(fetchErrorMessage(outcome.error));
  }
  ctx.history.append(outcome.value);
  await ctx.persist();
  return ok(outcome.value);
}

/**
 * Latest gold quote.
 *
 * Served from the history buffer; when the newest point is older than
 * `cache.price_stale` a live fetch is attempted and, on success, recorded.
 * With an empty buffer the live fetch is mandatory and its failure is
 * returned verbatim.
 */
export async function getPrice(ctx: MarketContext): Promise<ServiceResult<PriceOutput>> {
  const latest = ctx.history.latest();

  if (latest === null) {
    return fetchAndRecord(ctx);
  }

  let current: Quote = latest;
  const ageMs = ctx.clock.now().getTime() - latest.timestamp * 1000;
  if (ageMs > ctx.config.cache.price_stale) {
    const live = await fetchAndRecord(ctx);
    if (live.success) {
      current = live.data;
    } else {
      ctx.logger.debug({ reason: live.message }, 'Live refresh failed, serving buffered quote');
    }
  }

  const summary = summarize(ctx.history.toArray());
  return ok(summary === null ? { ...current } : { ...current, ...summary });
}

/** Buffered quotes, oldest first. */
export function getHistory(ctx: MarketContext): ServiceResult<Quote[]> {
  return ok(ctx.history.toArray());
}

export interface CalculateInput {
  buy_price: number;
  current_price?: number;
}

/** Target sell prices and the current profit rate for a purchase price. */
export function calculate(input: CalculateInput): CalculateOutput | Failure {
  if (!Number.isFinite(input.buy_price) || input.buy_price <= 0) {
    return fail('Buy price must be greater than 0');
  }
  return {
    success: true,
    targets: calculateTargetPrices(input.buy_price),
    current_profit: calculateCurrentProfit(input.buy_price, input.current_price ?? 0),
  };
}
