/**
 * Fund holdings model types.
 *
 * Holdings are the user's positions; rows and the summary are derived from
 * them and the latest fund quotes on every recompute.
 */

// ---------------------------------------------------------------------------
// Holding
// ---------------------------------------------------------------------------

/** One position in a fund, as entered by the user. */
export interface Holding {
  code: string;
  name: string;
  /** Average cost per share. */
  cost_price: number;
  shares: number;
  note: string;
}

// ---------------------------------------------------------------------------
// Derived rows
// ---------------------------------------------------------------------------

export interface HoldingRow {
  readonly code: string;
  readonly name: string;
  readonly cost_price: number;
  readonly shares: number;
  readonly note: string;
  /** Intraday estimate per share; the cost price when no quote is available. */
  readonly price: number;
  readonly nav: number;
  readonly change_percent: number;
  readonly cost_value: number;
  readonly market_value: number;
  readonly profit: number;
  readonly profit_rate: number;
  /** Estimated gain since the last published NAV. */
  readonly today_profit: number;
  readonly time_str: string;
  readonly source: string;
  readonly error?: string;
}

export interface HoldingsSummary {
  readonly total_cost: number;
  readonly total_value: number;
  readonly total_profit: number;
  readonly total_profit_rate: number;
  readonly total_today_profit: number;
  readonly count: number;
}

export interface HoldingsResponse {
  readonly success: true;
  readonly data: HoldingRow[];
  readonly summary: HoldingsSummary;
  /** Local "YYYY-MM-DD HH:MM:SS" of the recompute. */
  readonly last_update: string;
  /** Set when served from cache past its fresh TTL. */
  readonly stale?: boolean;
}

// ---------------------------------------------------------------------------
// Calculator results
// ---------------------------------------------------------------------------

export interface TargetPrice {
  readonly target_percent: number;
  readonly sell_price: number;
  readonly profit_amount: number;
  readonly actual_multiplier: number;
}

/** Profit targets offered by the calculator, in percent. */
export const PROFIT_TARGETS: readonly number[] = [5, 10, 15, 20, 30];

/** Sell-side fee rate charged on redemption. */
export const DEFAULT_FEE_RATE = 0.005;
