import type { FundPortfolio, Quote } from '../market-data/models.js';
import type { AlertSettingsType, ManualRecordType } from '../models/record.js';
import type { Holding } from '../portfolio/models.js';

// ---------------------------------------------------------------------------
// StateSnapshot
// ---------------------------------------------------------------------------

/**
 * Everything that survives a restart. Live quote caches and breaker state are
 * deliberately absent.
 */
export interface StateSnapshot {
  manual_records: ManualRecordType[];
  price_history: Quote[];
  alert_settings: AlertSettingsType;
  fund_watchlist: string[];
  fund_holdings: Holding[];
  fund_portfolios: Record<string, FundPortfolio>;
}

// ---------------------------------------------------------------------------
// StateStore
// ---------------------------------------------------------------------------

/**
 * Whole-snapshot persistence.
 */
export interface StateStore {
  /** The last saved snapshot, or null when nothing was saved yet. */
  load(): Promise<StateSnapshot | null>;
  save(snapshot: StateSnapshot): Promise<void>;
}
