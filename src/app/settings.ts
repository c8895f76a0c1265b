/**
 * Alert settings and manual price records.
 */

import {
  AlertSettings,
  ManualRecord,
  type AlertSettingsType,
  type ManualRecordInput,
  type ManualRecordType,
} from '../models/record.js';
import type { MarketContext } from './context.js';
import { type ServiceResult, fail, ok } from './types.js';

// ---------------------------------------------------------------------------
// Alert settings
// ---------------------------------------------------------------------------

export function getSettings(ctx: MarketContext): ServiceResult<AlertSettingsType> {
  return ok({ ...ctx.alertSettings });
}

export async function updateSettings(
  ctx: MarketContext,
  patch: Partial<AlertSettingsType>,
): Promise<ServiceResult<AlertSettingsType>> {
  for (const key of ['high', 'low'] as const) {
    const value = patch[key];
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      return fail(`Alert '${key}' must be a non-negative number`);
    }
  }
  ctx.alertSettings = AlertSettings.merge(ctx.alertSettings, patch);
  await ctx.persist();
  return ok({ ...ctx.alertSettings });
}

// ---------------------------------------------------------------------------
// Manual records
// ---------------------------------------------------------------------------

export async function addRecord(
  ctx: MarketContext,
  input: ManualRecordInput,
): Promise<ServiceResult<ManualRecordType>> {
  const record = ManualRecord.newWith(ctx.ids, ctx.clock, input);
  ctx.records.push(record);
  await ctx.persist();
  return ok(record);
}

export function getRecords(ctx: MarketContext): ServiceResult<ManualRecordType[]> {
  return ok([...ctx.records]);
}

export async function clearRecords(ctx: MarketContext): Promise<ServiceResult<{ cleared: number }>> {
  const cleared = ctx.records.length;
  ctx.records = [];
  await ctx.persist();
  return ok({ cleared });
}
