/**
 * pricewatch: gold and mutual fund price acquisition with failover sources,
 * circuit breaking and a two-tier quote cache.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Core utilities
// ---------------------------------------------------------------------------

export {
  type Clock,
  SystemClock,
  FixedClock,
  ManualClock,
  epochSeconds,
  formatLocalTime,
  formatLocalDateTime,
  startOfLocalDay,
} from './clock.js';
export { parseDuration, formatDuration } from './duration.js';
export { roundTo, round2, percentOf } from './decimal.js';
export {
  type Config,
  type ResolvedConfig,
  type SourceKind,
  type SourceConfig,
  type BreakerConfig,
  type CacheConfig,
  type HistoryConfig,
  type FetchConfig,
  SOURCE_KINDS,
  DEFAULT_SOURCES,
  defaultConfig,
  parseConfig,
  resolveDataDir,
} from './config.js';
export { type Logger, type LogLevel, createLogger, silentLogger } from './logger.js';

// ---------------------------------------------------------------------------
// Market data
// ---------------------------------------------------------------------------

export {
  type Quote,
  type FundQuote,
  type FundPortfolio,
  type PortfolioPosition,
  type Sourced,
  STALE_MARKER,
  EXPIRED_MARKER,
  ERROR_SOURCE,
  annotateSource,
  failedFundQuote,
} from './market-data/models.js';
export { AdapterError, type FetchErrorReason, fetchErrorMessage } from './market-data/errors.js';
export {
  type SourceDescriptor,
  type SourceStatus,
  SourceRegistry,
} from './market-data/sources.js';
export {
  type HttpFetch,
  type QuoteAdapter,
  type AdapterDeps,
  goldAdapters,
  fundAdapters,
  portfolioAdapters,
} from './market-data/adapters/index.js';
export { type FetchOutcome, type KeyedFetcher, FailoverFetcher } from './market-data/failover.js';
export {
  type Freshness,
  type TtlPair,
  type CacheEntry,
  type QuoteCacheOptions,
  QuoteCache,
  classifyAge,
} from './market-data/quote-cache.js';
export { RefreshCoordinator } from './market-data/refresh.js';
export { mapWithConcurrency } from './market-data/pool.js';
export { TimeSeriesBuffer } from './market-data/history.js';
export { type HistorySummary, summarize } from './market-data/summary.js';
export {
  type Sleep,
  type BackgroundPollerOptions,
  BackgroundPoller,
  abortableSleep,
} from './market-data/poller.js';

// ---------------------------------------------------------------------------
// Models & portfolio
// ---------------------------------------------------------------------------

export { type IdGenerator, UuidIdGenerator, FixedIdGenerator } from './models/id-generator.js';
export {
  ManualRecord,
  AlertSettings,
  type ManualRecordType,
  type ManualRecordInput,
  type AlertSettingsType,
} from './models/record.js';
export {
  type Holding,
  type HoldingRow,
  type HoldingsSummary,
  type HoldingsResponse,
  type TargetPrice,
  PROFIT_TARGETS,
  DEFAULT_FEE_RATE,
} from './portfolio/models.js';
export {
  calculateTargetPrices,
  calculateCurrentProfit,
  buildHoldingsResponse,
} from './portfolio/calculator.js';
export { type HoldingsCacheOptions, HoldingsCache } from './portfolio/holdings-cache.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

export { type StateSnapshot, type StateStore } from './storage/storage.js';
export { emptySnapshot, decodeSnapshot } from './storage/snapshot.js';
export { MemoryStateStore } from './storage/memory.js';
export { JsonFileStateStore } from './storage/json-file.js';

// ---------------------------------------------------------------------------
// Application services
// ---------------------------------------------------------------------------

export { type ServiceResult, type Failure } from './app/types.js';
export { type MarketContextOptions, MarketContext, GOLD_SYMBOL } from './app/context.js';
export { defaultConfigPath, loadConfig, stateFilePath } from './app/config.js';
export { getPrice, getHistory, calculate } from './app/price.js';
export { getFunds, addFund, deleteFund, getFundPortfolio, isFundCode } from './app/funds.js';
export { getHoldings, saveHolding, deleteHolding, type HoldingInput } from './app/holdings.js';
export {
  getSettings,
  updateSettings,
  addRecord,
  getRecords,
  clearRecords,
} from './app/settings.js';
