/**
 * Process-wide market state.
 *
 * One `MarketContext` is built at startup and handed to every service
 * function. It owns the source registries, fetchers, caches, the price
 * history buffer, the poller and the persisted user state.
 *
 * State is only mutated in synchronous sections between awaits, so no
 * network call ever runs while a mutation is half-applied.
 */

import { type Clock, SystemClock, startOfLocalDay } from '../clock.js';
import type { Config } from '../config.js';
import { type Logger, errorFields, silentLogger } from '../logger.js';
import {
  type HttpFetch,
  type QuoteAdapter,
  fundAdapters,
  goldAdapters,
  portfolioAdapters,
} from '../market-data/adapters/index.js';
import { FailoverFetcher } from '../market-data/failover.js';
import { TimeSeriesBuffer } from '../market-data/history.js';
import {
  type FundPortfolio,
  type FundQuote,
  type Quote,
  failedFundQuote,
} from '../market-data/models.js';
import { BackgroundPoller, type Sleep } from '../market-data/poller.js';
import { QuoteCache } from '../market-data/quote-cache.js';
import { RefreshCoordinator } from '../market-data/refresh.js';
import { SourceRegistry } from '../market-data/sources.js';
import { type IdGenerator, UuidIdGenerator } from '../models/id-generator.js';
import { AlertSettings, type AlertSettingsType, ManualRecord, type ManualRecordType } from '../models/record.js';
import { buildHoldingsResponse } from '../portfolio/calculator.js';
import { HoldingsCache } from '../portfolio/holdings-cache.js';
import type { Holding, HoldingsResponse } from '../portfolio/models.js';
import type { StateSnapshot, StateStore } from '../storage/storage.js';

/** Symbol polled for the gold price (Au99.99 on the Shanghai Gold Exchange). */
export const GOLD_SYMBOL = 'AU9999';

export const FUNDS_SCOPE = 'funds';
export const HOLDINGS_SCOPE = 'holdings';

export interface MarketContextOptions {
  config: Config;
  store: StateStore;
  http?: HttpFetch;
  clock?: Clock;
  logger?: Logger;
  ids?: IdGenerator;
  /** Poller sleep; tests pass one that resolves immediately or on demand. */
  sleep?: Sleep;
  /** Replace the HTTP adapters of a source kind, e.g. with in-process stubs. */
  adapters?: {
    gold?: QuoteAdapter<Quote>[];
    fund?: QuoteAdapter<FundQuote>[];
    portfolio?: QuoteAdapter<FundPortfolio>[];
  };
}

export class MarketContext {
  readonly config: Config;
  readonly store: StateStore;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly ids: IdGenerator;

  readonly refresh: RefreshCoordinator;
  readonly goldFetcher: FailoverFetcher<Quote>;
  readonly fundFetcher: FailoverFetcher<FundQuote>;
  readonly portfolioFetcher: FailoverFetcher<FundPortfolio>;
  readonly fundCache: QuoteCache<FundQuote>;
  readonly holdingsCache: HoldingsCache;
  readonly history: TimeSeriesBuffer<Quote>;
  readonly poller: BackgroundPoller;

  watchlist: string[] = [];
  holdings: Holding[] = [];
  portfolios: Record<string, FundPortfolio> = {};
  records: ManualRecordType[] = [];
  alertSettings: AlertSettingsType = AlertSettings.defaults();

  constructor(options: MarketContextOptions) {
    const { config } = options;
    this.config = config;
    this.store = options.store;
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? silentLogger();
    this.ids = options.ids ?? new UuidIdGenerator();

    const adapterDeps = {
      http: options.http ?? fetch,
      clock: this.clock,
      logger: this.logger.child({ component: 'adapter' }),
    };
    const registry = (sources: Config['sources']['gold']) =>
      new SourceRegistry(sources, config.breaker, this.clock, this.logger.child({ component: 'breaker' }));

    const fetchLogger = this.logger.child({ component: 'failover' });
    this.goldFetcher = new FailoverFetcher(
      registry(config.sources.gold),
      options.adapters?.gold ?? goldAdapters(adapterDeps),
      fetchLogger,
    );
    this.fundFetcher = new FailoverFetcher(
      registry(config.sources.fund),
      options.adapters?.fund ?? fundAdapters(adapterDeps),
      fetchLogger,
    );
    this.portfolioFetcher = new FailoverFetcher(
      registry(config.sources.portfolio),
      options.adapters?.portfolio ?? portfolioAdapters(adapterDeps),
      fetchLogger,
    );

    this.refresh = new RefreshCoordinator(this.logger.child({ component: 'refresh' }));

    this.fundCache = new QuoteCache<FundQuote>({
      scope: FUNDS_SCOPE,
      ttl: { fresh: config.cache.fund_fresh, stale: config.cache.fund_stale },
      fetcher: this.fundFetcher,
      refresh: this.refresh,
      maxWorkers: config.fetch.max_workers,
      placeholder: failedFundQuote,
      clock: this.clock,
      logger: this.logger.child({ component: 'fund-cache' }),
    });

    this.holdingsCache = new HoldingsCache({
      scope: HOLDINGS_SCOPE,
      ttl: { fresh: config.cache.holdings_fresh, stale: config.cache.holdings_stale },
      refresh: this.refresh,
      compute: () => this.#computeHoldings(),
      clock: this.clock,
      logger: this.logger.child({ component: 'holdings-cache' }),
    });

    this.history = new TimeSeriesBuffer<Quote>(config.history.capacity);

    this.poller = new BackgroundPoller({
      key: GOLD_SYMBOL,
      fetcher: this.goldFetcher,
      buffer: this.history,
      persist: async () => {
        await this.persist();
      },
      interval: config.history.poll_interval,
      errorBackoff: config.history.error_backoff,
      logger: this.logger.child({ component: 'poller' }),
      ...(options.sleep !== undefined ? { sleep: options.sleep } : {}),
    });
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Load the persisted snapshot, then prune it so data from a previous day
   * is never visible. Returns whether a snapshot was found.
   */
  async load(): Promise<boolean> {
    const snapshot = await this.store.load();
    if (snapshot === null) {
      this.logger.info('No saved state found, starting empty');
      return false;
    }

    this.records = [...snapshot.manual_records];
    this.history.replace(snapshot.price_history);
    this.alertSettings = { ...snapshot.alert_settings };
    this.watchlist = [...snapshot.fund_watchlist];
    this.holdings = snapshot.fund_holdings.map((h) => ({ ...h }));
    this.portfolios = { ...snapshot.fund_portfolios };
    this.holdingsCache.invalidate();
    this.prune();

    this.logger.info(
      {
        records: this.records.length,
        history: this.history.size,
        watchlist: this.watchlist.length,
        holdings: this.holdings.length,
        portfolios: Object.keys(this.portfolios).length,
      },
      'Loaded saved state',
    );
    return true;
  }

  /**
   * Drop price history from before the start of today and manual records
   * older than the configured retention.
   */
  prune(): void {
    const now = this.clock.now();
    const cutoff = startOfLocalDay(now).getTime() / 1000;
    const droppedHistory = this.history.pruneBefore(cutoff);
    const keepDays = this.config.history.records_keep_days;
    const before = this.records.length;
    this.records = this.records.filter((r) => !ManualRecord.isExpired(r, now, keepDays));
    const droppedRecords = before - this.records.length;
    if (droppedHistory > 0 || droppedRecords > 0) {
      this.logger.debug({ droppedHistory, droppedRecords }, 'Pruned expired state');
    }
  }

  snapshot(): StateSnapshot {
    return {
      manual_records: [...this.records],
      price_history: this.history.toArray(),
      alert_settings: { ...this.alertSettings },
      fund_watchlist: [...this.watchlist],
      fund_holdings: this.holdings.map((h) => ({ ...h })),
      fund_portfolios: { ...this.portfolios },
    };
  }

  /**
   * Prune and save. A failed save is logged and reported as `false`; it
   * never propagates to the caller.
   */
  async persist(): Promise<boolean> {
    this.prune();
    const snapshot = this.snapshot();
    try {
      await this.store.save(snapshot);
      return true;
    } catch (err: unknown) {
      this.logger.error(errorFields(err), 'Failed to save state');
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Stop the poller and wait for background refreshes to finish. */
  async shutdown(): Promise<void> {
    await this.poller.stop();
    await this.refresh.settledAll();
  }

  // -------------------------------------------------------------------------
  // Holdings valuation
  // -------------------------------------------------------------------------

  async #computeHoldings(): Promise<HoldingsResponse> {
    const holdings = this.holdings.map((h) => ({ ...h }));
    const codes = [...new Set(holdings.map((h) => h.code))];

    const previous = new Map<string, FundQuote | null>();
    for (const code of codes) {
      previous.set(code, this.fundCache.get(code)?.value ?? null);
    }

    const fetched = new Map<string, FundQuote | null>();
    if (codes.length > 0) {
      const outcomes = await this.fundCache.fetchMany(codes);
      for (const [code, outcome] of outcomes) {
        fetched.set(code, outcome?.value ?? null);
      }
    }

    return buildHoldingsResponse(holdings, fetched, previous, this.clock.now());
  }
}
