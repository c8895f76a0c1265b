/**
 * End-to-end service tests.
 *
 * Every service runs against a real `MarketContext` with in-memory storage,
 * a manual clock and in-process adapters keyed by request key.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ManualClock } from '../clock.js';
import { defaultConfig } from '../config.js';
import type { QuoteAdapter } from '../market-data/adapters/index.js';
import type { FundPortfolio, FundQuote, Quote } from '../market-data/models.js';
import type { SourceDescriptor } from '../market-data/sources.js';
import { FixedIdGenerator } from '../models/id-generator.js';
import { MemoryStateStore } from '../storage/memory.js';
import { GOLD_SYMBOL, MarketContext } from './context.js';
import { addFund, deleteFund, getFundPortfolio, getFunds } from './funds.js';
import { deleteHolding, getHoldings, saveHolding } from './holdings.js';
import { calculate, getHistory, getPrice } from './price.js';
import { addRecord, clearRecords, getRecords, getSettings, updateSettings } from './settings.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date(2024, 8, 30, 10, 0, 0);
const NOW_SECONDS = NOW.getTime() / 1000;
const ALL_FAILED = 'All available data sources failed, check the network or try again later';

/** Adapter answering from a table; keys not in the table fail. */
class TableAdapter<T> implements QuoteAdapter<T> {
  readonly type = 'stub';
  readonly table = new Map<string, T>();
  calls: string[] = [];

  async fetch(_source: SourceDescriptor, key: string): Promise<T | null> {
    this.calls.push(key);
    return this.table.get(key) ?? null;
  }
}

function goldQuote(price: number, timestamp = NOW_SECONDS): Quote {
  return {
    price,
    open: 548,
    high: price,
    low: 548,
    yesterday_close: 548,
    change: price - 548,
    change_percent: 0,
    timestamp,
    time_str: '10:00:00',
    source: 'stub',
  };
}

function fundQuote(code: string, name: string, price: number, change: number): FundQuote {
  return {
    code,
    name,
    price,
    nav: price - change,
    change,
    change_percent: 0,
    timestamp: NOW_SECONDS,
    time_str: '2024-09-30 10:00',
    source: 'stub',
  };
}

function portfolio(code: string, timestamp: number): FundPortfolio {
  return {
    code,
    timestamp,
    report_period: '2024-06-30',
    holdings_info: { '600519': { name: 'Stock A', weight: 9.5 } },
    source: 'stub',
  };
}

interface Harness {
  ctx: MarketContext;
  store: MemoryStateStore;
  clock: ManualClock;
  gold: TableAdapter<Quote>;
  funds: TableAdapter<FundQuote>;
  portfolios: TableAdapter<FundPortfolio>;
}

function harness(): Harness {
  const config = defaultConfig();
  const stub = [{ name: 'stub', type: 'stub', enabled: true, timeout: 1000 }];
  config.sources = { gold: stub, fund: stub, portfolio: stub };
  // Keep failing stubs from tripping the breaker mid-test.
  config.breaker.max_fail_count = 100;

  const store = new MemoryStateStore();
  const clock = new ManualClock(NOW);
  const gold = new TableAdapter<Quote>();
  const funds = new TableAdapter<FundQuote>();
  const portfolios = new TableAdapter<FundPortfolio>();
  const ctx = new MarketContext({
    config,
    store,
    clock,
    ids: new FixedIdGenerator(['rec-1', 'rec-2']),
    adapters: { gold: [gold], fund: [funds], portfolio: [portfolios] },
  });
  return { ctx, store, clock, gold, funds, portfolios };
}

// ---------------------------------------------------------------------------
// Gold price
// ---------------------------------------------------------------------------

describe('price services', () => {
  let h: Harness;

  beforeEach(() => {
    h = harness();
  });

  it('fetches and records when the buffer is empty', async () => {
    h.gold.table.set(GOLD_SYMBOL, goldQuote(550.5));

    const result = await getPrice(h.ctx);

    expect(result).toEqual({ success: true, data: goldQuote(550.5) });
    expect(h.ctx.history.size).toBe(1);
    expect(h.store.saveCount).toBe(1);
  });

  it('returns the fetch failure when nothing is buffered', async () => {
    expect(await getPrice(h.ctx)).toEqual({ success: false, message: ALL_FAILED });
  });

  it('serves a recent buffered quote with the summary', async () => {
    h.ctx.history.append(goldQuote(549, NOW_SECONDS - 20));
    h.ctx.history.append(goldQuote(551, NOW_SECONDS - 10));

    const result = await getPrice(h.ctx);

    expect(h.gold.calls).toEqual([]);
    expect(result).toEqual({
      success: true,
      data: {
        ...goldQuote(551, NOW_SECONDS - 10),
        high_24h: 551,
        low_24h: 549,
        avg_24h: 550,
        volatility: 2,
        count: 2,
      },
    });
  });

  it('falls back to the buffered quote when a live refresh fails', async () => {
    h.ctx.history.append(goldQuote(549, NOW_SECONDS - 60));

    const result = await getPrice(h.ctx);

    expect(h.gold.calls).toEqual([GOLD_SYMBOL]);
    expect(result.success && result.data.price).toBe(549);
  });

  it('replaces an old buffered quote with a live one', async () => {
    h.ctx.history.append(goldQuote(549, NOW_SECONDS - 60));
    h.gold.table.set(GOLD_SYMBOL, goldQuote(552));

    const result = await getPrice(h.ctx);

    expect(result.success && result.data.price).toBe(552);
    expect(result.success && result.data.count).toBe(2);
  });

  it('getHistory returns buffered quotes oldest first', () => {
    h.ctx.history.append(goldQuote(549, 1));
    h.ctx.history.append(goldQuote(550, 2));

    const result = getHistory(h.ctx);

    expect(result.success && result.data.map((q) => q.price)).toEqual([549, 550]);
  });

  it('calculate validates the buy price', () => {
    expect(calculate({ buy_price: 0 })).toEqual({
      success: false,
      message: 'Buy price must be greater than 0',
    });

    const result = calculate({ buy_price: 500, current_price: 550 });
    expect(result.success && result.current_profit).toBe(9.45);
    expect(result.success && result.targets).toHaveLength(5);
  });
});

// ---------------------------------------------------------------------------
// Funds
// ---------------------------------------------------------------------------

describe('fund services', () => {
  let h: Harness;

  beforeEach(() => {
    h = harness();
    h.funds.table.set('000001', fundQuote('000001', 'Fund A', 1.1, 0.05));
    h.funds.table.set('110022', fundQuote('110022', 'Fund B', 2.5, -0.1));
  });

  it('rejects malformed codes', async () => {
    expect(await addFund(h.ctx, '12345')).toEqual({
      success: false,
      message: 'Invalid fund code (expected 6 digits)',
    });
    expect(h.funds.calls).toEqual([]);
  });

  it('adds a fetchable fund once', async () => {
    const added = await addFund(h.ctx, ' 000001 ');

    expect(added.success && added.data.name).toBe('Fund A');
    expect(h.ctx.watchlist).toEqual(['000001']);
    expect(h.store.saveCount).toBe(1);
    expect(await addFund(h.ctx, '000001')).toEqual({
      success: false,
      message: 'Fund is already in the watchlist',
    });
  });

  it('rejects a fund that cannot be fetched', async () => {
    expect(await addFund(h.ctx, '999999')).toEqual({
      success: false,
      message: 'Could not load data for this fund, check the code',
    });
    expect(h.ctx.watchlist).toEqual([]);
  });

  it('lists watchlist quotes in order and reuses fresh ones', async () => {
    await addFund(h.ctx, '110022');
    await addFund(h.ctx, '000001');
    h.funds.calls = [];

    const result = await getFunds(h.ctx, { fast: false });

    expect(result.success && result.data.map((q) => q.code)).toEqual(['110022', '000001']);
    expect(h.funds.calls).toEqual([]);
  });

  it('returns a placeholder for a fund that fails with nothing cached', async () => {
    h.ctx.watchlist.push('999999');

    const result = await getFunds(h.ctx, { fast: false });

    expect(result.success && result.data[0]).toMatchObject({
      code: '999999',
      price: 0,
      source: 'Error',
      error: ALL_FAILED,
    });
  });

  it('serves the previous quote tagged expired when a refetch fails', async () => {
    await addFund(h.ctx, '000001');
    h.funds.table.delete('000001');
    h.clock.advance(200_000);

    const result = await getFunds(h.ctx, { fast: false });

    expect(result.success && result.data[0].source).toBe('stub(expired)');
  });

  it('deletes funds', async () => {
    await addFund(h.ctx, '000001');

    expect(await deleteFund(h.ctx, '000001')).toEqual({ success: true, data: { code: '000001' } });
    expect(h.ctx.watchlist).toEqual([]);
    expect(h.ctx.fundCache.get('000001')).toBeNull();
    expect(await deleteFund(h.ctx, '000001')).toEqual({ success: false, message: 'Fund not found' });
  });

  it('reuses a saved portfolio within its ttl', async () => {
    h.portfolios.table.set('000001', portfolio('000001', NOW_SECONDS));

    const first = await getFundPortfolio(h.ctx, '000001', { refresh: false });
    const second = await getFundPortfolio(h.ctx, '000001', { refresh: false });

    expect(first).toEqual({ success: true, data: portfolio('000001', NOW_SECONDS) });
    expect(second).toEqual(first);
    expect(h.portfolios.calls).toEqual(['000001']);
    expect(h.ctx.portfolios['000001']).toEqual(portfolio('000001', NOW_SECONDS));
  });

  it('falls back to the saved portfolio when a refresh fails', async () => {
    h.ctx.portfolios['000001'] = portfolio('000001', NOW_SECONDS - 30 * 86_400);

    const result = await getFundPortfolio(h.ctx, '000001', { refresh: true });

    expect(result).toEqual({ success: true, data: portfolio('000001', NOW_SECONDS - 30 * 86_400) });
  });

  it('reports a portfolio failure with nothing saved', async () => {
    expect(await getFundPortfolio(h.ctx, '000001', { refresh: false })).toEqual({
      success: false,
      message: `Failed to load fund portfolio: ${ALL_FAILED}`,
    });
  });
});

// ---------------------------------------------------------------------------
// Holdings
// ---------------------------------------------------------------------------

describe('holding services', () => {
  let h: Harness;

  beforeEach(() => {
    h = harness();
    h.funds.table.set('000001', fundQuote('000001', 'Fund A', 1.1, 0.05));
  });

  it('validates input', async () => {
    expect(await saveHolding(h.ctx, { code: 'abc', cost_price: 1, shares: 1 })).toEqual({
      success: false,
      message: 'Invalid fund code (expected 6 digits)',
    });
    expect(await saveHolding(h.ctx, { code: '000001', cost_price: 'x', shares: 1 })).toEqual({
      success: false,
      message: 'Cost price or shares is not a number',
    });
    expect(await saveHolding(h.ctx, { code: '000001', cost_price: 1, shares: 0 })).toEqual({
      success: false,
      message: 'Cost price and shares must be greater than 0',
    });
    expect(h.ctx.holdings).toEqual([]);
  });

  it('saves a holding named after its fund and values it', async () => {
    const saved = await saveHolding(h.ctx, { code: '000001', cost_price: '1.0', shares: 1000, note: ' core ' });

    expect(saved).toEqual({
      success: true,
      data: { code: '000001', name: 'Fund A', cost_price: 1, shares: 1000, note: 'core' },
    });

    const response = await getHoldings(h.ctx, { fast: false, refresh: false });
    expect(response.data[0]).toMatchObject({ market_value: 1100, profit: 100, today_profit: 50 });
    expect(response.summary.total_profit_rate).toBe(10);
    expect(response.last_update).toBe('2024-09-30 10:00:00');
  });

  it('falls back to a generic name when the fund cannot be fetched', async () => {
    const saved = await saveHolding(h.ctx, { code: '999999', cost_price: 2, shares: 10 });

    expect(saved.success && saved.data.name).toBe('Fund 999999');
  });

  it('replaces an existing holding and invalidates the valuation', async () => {
    await saveHolding(h.ctx, { code: '000001', cost_price: 1, shares: 1000 });
    await getHoldings(h.ctx, { fast: true, refresh: false });

    await saveHolding(h.ctx, { code: '000001', cost_price: 1, shares: 2000 });
    const response = await getHoldings(h.ctx, { fast: true, refresh: false });

    expect(h.ctx.holdings).toHaveLength(1);
    expect(response.summary.total_value).toBe(2200);
  });

  it('adding a second fund invalidates a cached valuation', async () => {
    h.funds.table.set('110022', fundQuote('110022', 'Fund B', 2.5, -0.1));
    await saveHolding(h.ctx, { code: '000001', cost_price: 1, shares: 1000 });
    expect((await getHoldings(h.ctx, { fast: true, refresh: false })).summary.count).toBe(1);

    await saveHolding(h.ctx, { code: '110022', cost_price: 2, shares: 100 });
    const response = await getHoldings(h.ctx, { fast: true, refresh: false });

    expect(response.data.map((row) => row.code)).toEqual(['000001', '110022']);
    expect(response.summary.total_value).toBe(1350);
  });

  it('deletes holdings and invalidates a cached valuation', async () => {
    await saveHolding(h.ctx, { code: '000001', cost_price: 1, shares: 1000 });
    expect((await getHoldings(h.ctx, { fast: true, refresh: false })).summary.count).toBe(1);
    expect(h.ctx.holdingsCache.peek()).not.toBeNull();

    expect(await deleteHolding(h.ctx, '000001')).toEqual({ success: true, data: { code: '000001' } });
    expect(h.ctx.holdingsCache.peek()).toBeNull();
    expect((await getHoldings(h.ctx, { fast: true, refresh: false })).summary.count).toBe(0);
    expect(await deleteHolding(h.ctx, '000001')).toEqual({ success: false, message: 'Holding not found' });
  });
});

// ---------------------------------------------------------------------------
// Settings and records
// ---------------------------------------------------------------------------

describe('settings services', () => {
  let h: Harness;

  beforeEach(() => {
    h = harness();
  });

  it('merges and persists alert settings', async () => {
    const updated = await updateSettings(h.ctx, { high: 560, enabled: true });

    expect(updated).toEqual({
      success: true,
      data: { high: 560, low: 0, enabled: true, trading_events_enabled: true },
    });
    expect(getSettings(h.ctx)).toEqual(updated);
    expect((await h.store.load())?.alert_settings.high).toBe(560);
  });

  it('rejects negative thresholds', async () => {
    expect(await updateSettings(h.ctx, { low: -1 })).toEqual({
      success: false,
      message: "Alert 'low' must be a non-negative number",
    });
    expect(h.store.saveCount).toBe(0);
  });

  it('adds, lists and clears records', async () => {
    await addRecord(h.ctx, { price: 550, note: 'open' });
    await addRecord(h.ctx, { price: 551 });

    const listed = getRecords(h.ctx);
    expect(listed.success && listed.data.map((r) => r.id)).toEqual(['rec-1', 'rec-2']);
    expect(listed.success && listed.data[0].time_str).toBe('2024-09-30 10:00:00');

    expect(await clearRecords(h.ctx)).toEqual({ success: true, data: { cleared: 2 } });
    expect((await h.store.load())?.manual_records).toEqual([]);
  });
});
