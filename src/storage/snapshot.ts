/**
 * Decoding of persisted state.
 *
 * The state file is hand-editable and may come from older versions, so
 * decoding is lenient: missing sections take defaults and malformed entries
 * are dropped rather than failing the whole load.
 */

import type { FundPortfolio, PortfolioPosition, Quote } from '../market-data/models.js';
import { type IdGenerator, UuidIdGenerator } from '../models/id-generator.js';
import { AlertSettings, type AlertSettingsType, type ManualRecordType } from '../models/record.js';
import type { Holding } from '../portfolio/models.js';
import type { StateSnapshot } from './storage.js';

type Obj = Record<string, unknown>;

function isObj(value: unknown): value is Obj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numOr<T>(value: unknown, fallback: T): number | T {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function strOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function emptySnapshot(): StateSnapshot {
  return {
    manual_records: [],
    price_history: [],
    alert_settings: AlertSettings.defaults(),
    fund_watchlist: [],
    fund_holdings: [],
    fund_portfolios: {},
  };
}

// ---------------------------------------------------------------------------
// Entry decoders
// ---------------------------------------------------------------------------

export function decodeQuote(raw: unknown): Quote | null {
  if (!isObj(raw)) return null;
  const price = numOr(raw.price, 0);
  const timestamp = numOr(raw.timestamp, null);
  if (!(price > 0) || timestamp === null) return null;
  return {
    price,
    open: numOr(raw.open, 0),
    high: numOr(raw.high, 0),
    low: numOr(raw.low, 0),
    yesterday_close: numOr(raw.yesterday_close, 0),
    change: numOr(raw.change, 0),
    change_percent: numOr(raw.change_percent, 0),
    timestamp,
    time_str: strOr(raw.time_str, ''),
    source: strOr(raw.source, ''),
  };
}

export function decodeHolding(raw: unknown): Holding | null {
  if (!isObj(raw) || typeof raw.code !== 'string') return null;
  const costPrice = numOr(raw.cost_price, 0);
  const shares = numOr(raw.shares, 0);
  if (!(costPrice > 0) || !(shares > 0)) return null;
  return {
    code: raw.code,
    name: strOr(raw.name, `Fund ${raw.code}`),
    cost_price: costPrice,
    shares,
    note: strOr(raw.note, ''),
  };
}

/** Records saved before ids existed get a fresh one. */
export function decodeRecord(raw: unknown, ids: IdGenerator): ManualRecordType | null {
  if (!isObj(raw)) return null;
  const timestamp = numOr(raw.timestamp, null);
  if (timestamp === null) return null;
  return {
    id: typeof raw.id === 'string' && raw.id !== '' ? raw.id : ids.newId(),
    price: numOr(raw.price, null),
    buy_price: numOr(raw.buy_price, null),
    profit: numOr(raw.profit, null),
    timestamp,
    time_str: strOr(raw.time_str, ''),
    note: strOr(raw.note, ''),
  };
}

export function decodeAlertSettings(raw: unknown): AlertSettingsType {
  const defaults = AlertSettings.defaults();
  if (!isObj(raw)) return defaults;
  return {
    high: numOr(raw.high, defaults.high),
    low: numOr(raw.low, defaults.low),
    enabled: typeof raw.enabled === 'boolean' ? raw.enabled : defaults.enabled,
    trading_events_enabled:
      typeof raw.trading_events_enabled === 'boolean'
        ? raw.trading_events_enabled
        : defaults.trading_events_enabled,
  };
}

export function decodePortfolio(code: string, raw: unknown): FundPortfolio | null {
  if (!isObj(raw)) return null;
  const timestamp = numOr(raw.timestamp, null);
  if (timestamp === null || !isObj(raw.holdings_info)) return null;

  const holdingsInfo: Record<string, PortfolioPosition> = {};
  for (const [stock, position] of Object.entries(raw.holdings_info)) {
    if (isObj(position)) {
      holdingsInfo[stock] = { name: strOr(position.name, stock), weight: numOr(position.weight, 0) };
    }
  }
  return {
    code,
    timestamp,
    report_period: strOr(raw.report_period, ''),
    holdings_info: holdingsInfo,
    source: strOr(raw.source, ''),
  };
}

// ---------------------------------------------------------------------------
// decodeSnapshot
// ---------------------------------------------------------------------------

function present<T>(value: T | null): value is T {
  return value !== null;
}

export function decodeSnapshot(raw: unknown, ids: IdGenerator = new UuidIdGenerator()): StateSnapshot {
  if (!isObj(raw)) {
    throw new Error('State file root must be a JSON object');
  }

  const watchlist: string[] = [];
  for (const code of list(raw.fund_watchlist)) {
    if (typeof code === 'string' && !watchlist.includes(code)) {
      watchlist.push(code);
    }
  }

  const portfolios: Record<string, FundPortfolio> = {};
  if (isObj(raw.fund_portfolios)) {
    for (const [code, entry] of Object.entries(raw.fund_portfolios)) {
      const portfolio = decodePortfolio(code, entry);
      if (portfolio !== null) {
        portfolios[code] = portfolio;
      }
    }
  }

  return {
    manual_records: list(raw.manual_records)
      .map((r) => decodeRecord(r, ids))
      .filter(present),
    price_history: list(raw.price_history).map(decodeQuote).filter(present),
    alert_settings: decodeAlertSettings(raw.alert_settings),
    fund_watchlist: watchlist,
    fund_holdings: list(raw.fund_holdings).map(decodeHolding).filter(present),
    fund_portfolios: portfolios,
  };
}
