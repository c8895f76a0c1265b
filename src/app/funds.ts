/**
 * Fund watchlist services.
 */

import { fetchErrorMessage } from '../market-data/errors.js';
import type { FundPortfolio, FundQuote } from '../market-data/models.js';
import type { MarketContext } from './context.js';
import { type ServiceResult, fail, ok } from './types.js';

const FUND_CODE = /^\d{6}$/;

/** Whether `code` looks like a fund code (six digits). */
export function isFundCode(code: string): boolean {
  return FUND_CODE.test(code);
}

// ---------------------------------------------------------------------------
// Quotes
// ---------------------------------------------------------------------------

/**
 * Quotes for every watchlist fund, in watchlist order.
 *
 * In fast mode, stale cached quotes are served immediately and refreshed in
 * the background.
 */
export async function getFunds(
  ctx: MarketContext,
  options: { fast: boolean },
): Promise<ServiceResult<FundQuote[]>> {
  const codes = [...ctx.watchlist];
  const quotes = await ctx.fundCache.getMany(codes, options.fast);
  const data: FundQuote[] = [];
  for (const code of codes) {
    const quote = quotes.get(code);
    if (quote !== undefined) {
      data.push(quote);
    }
  }
  return ok(data);
}

/**
 * Add a fund to the watchlist after confirming it can be fetched.
 */
export async function addFund(ctx: MarketContext, rawCode: string): Promise<ServiceResult<FundQuote>> {
  const code = rawCode.trim();
  if (!isFundCode(code)) {
    return fail('Invalid fund code (expected 6 digits)');
  }
  if (ctx.watchlist.includes(code)) {
    return fail('Fund is already in the watchlist');
  }

  const outcome = await ctx.fundCache.fetchOne(code);
  if (outcome.value === null) {
    ctx.logger.info({ code, reason: outcome.error }, 'Rejected fund that could not be fetched');
    return fail('Could not load data for this fund, check the code');
  }

  // Re-check: another caller may have added it while we were fetching.
  if (!ctx.watchlist.includes(code)) {
    ctx.watchlist.push(code);
  }
  await ctx.persist();
  return ok(outcome.value);
}

export async function deleteFund(ctx: MarketContext, code: string): Promise<ServiceResult<{ code: string }>> {
  const index = ctx.watchlist.indexOf(code);
  if (index === -1) {
    return fail('Fund not found');
  }
  ctx.watchlist.splice(index, 1);
  ctx.fundCache.delete(code);
  await ctx.persist();
  return ok({ code });
}

// ---------------------------------------------------------------------------
// Portfolio breakdown
// ---------------------------------------------------------------------------

/**
 * Top stock positions of a fund.
 *
 * A persisted breakdown younger than `cache.portfolio_ttl` is reused unless
 * `refresh` is set. When fetching fails, any persisted copy is returned.
 */
export async function getFundPortfolio(
  ctx: MarketContext,
  code: string,
  options: { refresh: boolean },
): Promise<ServiceResult<FundPortfolio>> {
  const cached = ctx.portfolios[code];
  const nowSeconds = ctx.clock.now().getTime() / 1000;
  if (
    !options.refresh &&
    cached !== undefined &&
    (nowSeconds - cached.timestamp) * 1000 < ctx.config.cache.portfolio_ttl
  ) {
    return ok(cached);
  }

  const outcome = await ctx.portfolioFetcher.fetch(code);
  if (outcome.value !== null) {
    ctx.portfolios = { ...ctx.portfolios, [code]: outcome.value };
    await ctx.persist();
    return ok(outcome.value);
  }

  const fallback = ctx.portfolios[code];
  if (fallback !== undefined) {
    ctx.logger.warn({ code, reason: outcome.error }, 'Serving saved portfolio after fetch failure');
    return ok(fallback);
  }
  return fail(`Failed to load fund portfolio: ${fetchErrorMessage(outcome.error)}`);
}
