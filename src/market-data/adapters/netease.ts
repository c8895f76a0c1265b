import { AdapterError } from '../errors.js';
import type { Quote } from '../models.js';
import type { SourceDescriptor } from '../sources.js';
import { HttpAdapter, buildQuote, isJsonObject, jsonpPayload, num } from './http.js';

/**
 * Netease feed: `_ntes_quote_callback({"118AU9999": {...}});`.
 *
 * `percent` is a fraction (0.0123 for 1.23 %); `updown` is the absolute change.
 */
export function parseNeteaseQuote(source: string, text: string, feedCode: string, at: Date): Quote {
  const body = jsonpPayload(source, text);
  if (!isJsonObject(body)) {
    throw new AdapterError(source, 'payload is not an object');
  }
  const d = body[feedCode];
  if (!isJsonObject(d)) {
    throw new AdapterError(source, `no entry for ${feedCode}`);
  }

  const price = num(d.price);
  return buildQuote(
    source,
    {
      price,
      open: num(d.open, price),
      high: num(d.high, price),
      low: num(d.low, price),
      yesterday_close: num(d.yestclose, price),
      change: num(d.updown),
      change_percent: num(d.percent) * 100,
    },
    at,
  );
}

export class NeteaseAdapter extends HttpAdapter<Quote> {
  readonly type = 'netease';

  protected async load(source: SourceDescriptor, key: string): Promise<Quote> {
    const feedCode = `118${key}`;
    const url = `http://api.money.126.net/data/feed/${encodeURIComponent(feedCode)},money.api`;
    const text = await this.getText(source, url);
    return parseNeteaseQuote(source.name, text, feedCode, this.deps.clock.now());
  }
}
