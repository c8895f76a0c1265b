import { type Clock, SystemClock, epochSeconds, formatLocalDateTime } from '../clock.js';
import { type IdGenerator, UuidIdGenerator } from './id-generator.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A price snapshot the user chose to keep. */
export interface ManualRecordType {
  readonly id: string;
  readonly price: number | null;
  readonly buy_price: number | null;
  readonly profit: number | null;
  /** Epoch seconds. */
  readonly timestamp: number;
  readonly time_str: string;
  readonly note: string;
}

export interface ManualRecordInput {
  price?: number | null;
  buy_price?: number | null;
  profit?: number | null;
  note?: string;
}

export interface AlertSettingsType {
  /** Alert when the price rises to this level; 0 disables. */
  high: number;
  /** Alert when the price falls to this level; 0 disables. */
  low: number;
  enabled: boolean;
  trading_events_enabled: boolean;
}

// ---------------------------------------------------------------------------
// ManualRecord namespace
// ---------------------------------------------------------------------------

const SECONDS_PER_DAY = 86_400;

export const ManualRecord = {
  /**
   * Create a record stamped with the current time.
   */
  new(input: ManualRecordInput): ManualRecordType {
    return ManualRecord.newWith(new UuidIdGenerator(), new SystemClock(), input);
  },

  /**
   * Create a record using injected id and time sources.
   */
  newWith(ids: IdGenerator, clock: Clock, input: ManualRecordInput): ManualRecordType {
    const now = clock.now();
    return {
      id: ids.newId(),
      price: input.price ?? null,
      buy_price: input.buy_price ?? null,
      profit: input.profit ?? null,
      timestamp: epochSeconds(now),
      time_str: formatLocalDateTime(now),
      note: input.note ?? '',
    };
  },

  /**
   * Whether the record is older than `keepDays` at `now`.
   */
  isExpired(record: ManualRecordType, now: Date, keepDays: number): boolean {
    return record.timestamp <= epochSeconds(now) - keepDays * SECONDS_PER_DAY;
  },
} as const;

// ---------------------------------------------------------------------------
// AlertSettings namespace
// ---------------------------------------------------------------------------

export const AlertSettings = {
  defaults(): AlertSettingsType {
    return { high: 0, low: 0, enabled: false, trading_events_enabled: true };
  },

  /**
   * Overlay the provided fields on `current`.
   */
  merge(current: AlertSettingsType, patch: Partial<AlertSettingsType>): AlertSettingsType {
    return {
      high: patch.high ?? current.high,
      low: patch.low ?? current.low,
      enabled: patch.enabled ?? current.enabled,
      trading_events_enabled: patch.trading_events_enabled ?? current.trading_events_enabled,
    };
  },
} as const;
