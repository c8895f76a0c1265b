/**
 * Result shapes returned by the service functions.
 *
 * Failures are returned, not thrown, so a caller (CLI or HTTP layer) can
 * render them as JSON unchanged. Field names use snake_case to match the
 * persisted and wire formats.
 */

import type { Quote } from '../market-data/models.js';
import type { HistorySummary } from '../market-data/summary.js';
import type { TargetPrice } from '../portfolio/models.js';

export interface Failure {
  success: false;
  message: string;
}

export type ServiceResult<T> = { success: true; data: T } | Failure;

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail(message: string): Failure {
  return { success: false, message };
}

// ---------------------------------------------------------------------------
// Price
// ---------------------------------------------------------------------------

/** Latest quote with the buffered summary merged in when there is one. */
export type PriceOutput = Quote & Partial<HistorySummary>;

export interface CalculateOutput {
  success: true;
  targets: TargetPrice[];
  current_profit: number;
}
