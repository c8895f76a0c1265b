import { epochSeconds } from '../../clock.js';
import { percentOf, round2, roundTo } from '../../decimal.js';
import { AdapterError } from '../errors.js';
import type { FundQuote } from '../models.js';
import type { SourceDescriptor } from '../sources.js';
import { HttpAdapter, num, quotedPayload } from './http.js';

/**
 * Sina fund valuation: `var hq_str_fu_000001="name,15:00:00,estimate,nav,
 * accumulated,?,percent,2024-09-30";`. A blank percent is derived from the
 * estimate and the last NAV.
 */
export function parseSinaFundQuote(source: string, text: string, code: string, at: Date): FundQuote {
  const parts = quotedPayload(source, text).split(',');
  if (parts.length < 8) {
    throw new AdapterError(source, `expected at least 8 fields, got ${parts.length}`);
  }

  const estimate = num(parts[2]);
  if (!(estimate > 0)) {
    throw new AdapterError(source, `invalid estimate ${estimate}`);
  }
  const nav = num(parts[3], estimate);
  const change = estimate - nav;
  return {
    code,
    name: parts[0].trim() === '' ? code : parts[0].trim(),
    price: roundTo(estimate, 4),
    nav: roundTo(nav, 4),
    change: roundTo(change, 4),
    change_percent: round2(num(parts[6], percentOf(change, nav))),
    timestamp: epochSeconds(at),
    time_str: `${parts[7].trim()} ${parts[1].trim()}`.trim(),
    source,
  };
}

export class SinaFundAdapter extends HttpAdapter<FundQuote> {
  readonly type = 'sina_fund';

  protected async load(source: SourceDescriptor, code: string): Promise<FundQuote> {
    const url = `https://hq.sinajs.cn/list=fu_${encodeURIComponent(code)}`;
    const text = await this.getText(source, url, {
      headers: { Referer: 'https://finance.sina.com.cn' },
      defaultCharset: 'gbk',
    });
    return parseSinaFundQuote(source.name, text, code, this.deps.clock.now());
  }
}
