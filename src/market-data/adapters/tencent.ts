import { errorFields } from '../../logger.js';
import { AdapterError } from '../errors.js';
import type { Quote } from '../models.js';
import type { SourceDescriptor } from '../sources.js';
import { HttpAdapter, type RawQuote, buildQuote, num, quotedPayload } from './http.js';

const FULL_QUOTE_TIMEOUT = 2_000;

/**
 * Tencent simple quote: `v_s_shau9999="1~name~code~price~change~percent~...";`.
 *
 * The simple form has no open/high/low, so those default to the last price
 * and the previous close is derived from the change.
 */
export function parseTencentSimple(source: string, text: string): RawQuote {
  const parts = quotedPayload(source, text).split('~');
  if (parts.length < 6) {
    throw new AdapterError(source, `expected at least 6 fields, got ${parts.length}`);
  }
  const price = num(parts[3]);
  const change = num(parts[4]);
  return {
    price,
    change,
    change_percent: num(parts[5]),
    open: price,
    high: price,
    low: price,
    yesterday_close: price - change,
  };
}

/**
 * Overlay the full quote (`v_shau9999="..."`) onto a simple reading: index 4
 * is the previous close, 5 the open, 33 the high and 34 the low. A payload
 * with too few fields leaves the reading unchanged.
 */
export function mergeTencentFull(raw: RawQuote, source: string, text: string): RawQuote {
  const parts = quotedPayload(source, text).split('~');
  if (parts.length <= 34) {
    return raw;
  }
  return {
    ...raw,
    yesterday_close: num(parts[4], raw.yesterday_close),
    open: num(parts[5], raw.open),
    high: num(parts[33], raw.high),
    low: num(parts[34], raw.low),
  };
}

export class TencentAdapter extends HttpAdapter<Quote> {
  readonly type = 'tencent';

  protected async load(source: SourceDescriptor, key: string): Promise<Quote> {
    const symbol = `sh${key.toLowerCase()}`;
    const simple = await this.getText(source, `http://qt.gtimg.cn/q=s_${symbol}`, {
      defaultCharset: 'gbk',
    });
    let raw = parseTencentSimple(source.name, simple);

    // The full quote only adds detail; a failure here keeps the simple reading.
    try {
      const full = await this.getText(source, `http://qt.gtimg.cn/q=${symbol}`, {
        defaultCharset: 'gbk',
        timeout: Math.min(FULL_QUOTE_TIMEOUT, source.timeout),
      });
      raw = mergeTencentFull(raw, source.name, full);
    } catch (err: unknown) {
      this.deps.logger.debug({ source: source.name, ...errorFields(err) }, 'Full quote unavailable');
    }

    return buildQuote(source.name, raw, this.deps.clock.now());
  }
}
