import { epochSeconds } from '../../clock.js';
import { percentOf, round2, roundTo } from '../../decimal.js';
import { AdapterError } from '../errors.js';
import type { FundQuote } from '../models.js';
import type { SourceDescriptor } from '../sources.js';
import { HttpAdapter, isJsonObject, jsonpPayload, num } from './http.js';

/**
 * Fund valuation feed: `jsonpgz({"fundcode":"000001","name":"...",
 * "dwjz":"1.0510","gsz":"1.0632","gszzl":"1.16","gztime":"2024-09-30 15:00"});`.
 *
 * `gsz` is the intraday estimate, `dwjz` the last published NAV and `gszzl`
 * the estimated change percent. Unknown codes answer `jsonpgz();`.
 */
export function parseFundgzQuote(source: string, text: string, code: string, at: Date): FundQuote {
  const body = jsonpPayload(source, text);
  if (!isJsonObject(body)) {
    throw new AdapterError(source, 'payload is not an object');
  }

  const estimate = num(body.gsz);
  if (!(estimate > 0)) {
    throw new AdapterError(source, `invalid estimate ${estimate}`);
  }
  const nav = num(body.dwjz, estimate);
  const change = estimate - nav;
  return {
    code: typeof body.fundcode === 'string' ? body.fundcode : code,
    name: typeof body.name === 'string' ? body.name : code,
    price: roundTo(estimate, 4),
    nav: roundTo(nav, 4),
    change: roundTo(change, 4),
    change_percent: round2(num(body.gszzl, percentOf(change, nav))),
    timestamp: epochSeconds(at),
    time_str: typeof body.gztime === 'string' ? body.gztime : '--',
    source,
  };
}

export class FundgzAdapter extends HttpAdapter<FundQuote> {
  readonly type = 'fundgz';

  protected async load(source: SourceDescriptor, code: string): Promise<FundQuote> {
    const now = this.deps.clock.now();
    const url = `https://fundgz.1234567.com.cn/js/${encodeURIComponent(code)}.js?rt=${now.getTime()}`;
    const text = await this.getText(source, url);
    return parseFundgzQuote(source.name, text, code, now);
  }
}
