/**
 * Fund holdings services.
 *
 * Every mutation invalidates the memoized valuation before persisting, so a
 * read that follows a successful write never sees the old holdings.
 */

import type { Holding, HoldingsResponse } from '../portfolio/models.js';
import type { MarketContext } from './context.js';
import { isFundCode } from './funds.js';
import { type ServiceResult, fail, ok } from './types.js';

export function getHoldings(
  ctx: MarketContext,
  options: { fast: boolean; refresh: boolean },
): Promise<HoldingsResponse> {
  return ctx.holdingsCache.get({ fast: options.fast, force: options.refresh });
}

export interface HoldingInput {
  code: string;
  cost_price: unknown;
  shares: unknown;
  note?: string;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Add a holding, or replace the existing one for the same code.
 *
 * The display name comes from a live fund fetch, falling back to
 * `Fund <code>`.
 */
export async function saveHolding(ctx: MarketContext, input: HoldingInput): Promise<ServiceResult<Holding>> {
  const code = input.code.trim();
  if (!isFundCode(code)) {
    return fail('Invalid fund code (expected 6 digits)');
  }

  const costPrice = toNumber(input.cost_price);
  const shares = toNumber(input.shares);
  if (costPrice === null || shares === null) {
    return fail('Cost price or shares is not a number');
  }
  if (costPrice <= 0 || shares <= 0) {
    return fail('Cost price and shares must be greater than 0');
  }

  const outcome = await ctx.fundCache.fetchOne(code);
  const name = outcome.value?.name ?? `Fund ${code}`;

  const holding: Holding = { code, name, cost_price: costPrice, shares, note: (input.note ?? '').trim() };
  const index = ctx.holdings.findIndex((h) => h.code === code);
  if (index === -1) {
    ctx.holdings.push(holding);
  } else {
    ctx.holdings[index] = holding;
  }
  ctx.holdingsCache.invalidate();

  await ctx.persist();
  return ok(holding);
}

export async function deleteHolding(ctx: MarketContext, code: string): Promise<ServiceResult<{ code: string }>> {
  const remaining = ctx.holdings.filter((h) => h.code !== code);
  if (remaining.length === ctx.holdings.length) {
    return fail('Holding not found');
  }
  ctx.holdings = remaining;
  ctx.holdingsCache.invalidate();

  await ctx.persist();
  return ok({ code });
}
