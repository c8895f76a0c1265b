import { fromMinorUnits } from '../../decimal.js';
import { AdapterError } from '../errors.js';
import type { Quote } from '../models.js';
import type { SourceDescriptor } from '../sources.js';
import { HttpAdapter, buildQuote, isJsonObject, num } from './http.js';

/**
 * Eastmoney push API.
 *
 * Fixed-field JSON where prices are integer cents: f43 last, f44 high,
 * f45 low, f46 open, f60 previous close, f170 change percent in hundredths.
 */
export function parseEastmoneyQuote(source: string, body: unknown, at: Date): Quote {
  if (!isJsonObject(body) || !isJsonObject(body.data)) {
    throw new AdapterError(source, 'response has no data object');
  }
  const d = body.data;
  const price = fromMinorUnits(num(d.f43));
  const yesterdayClose = fromMinorUnits(num(d.f60));
  return buildQuote(
    source,
    {
      price,
      open: fromMinorUnits(num(d.f46)),
      high: fromMinorUnits(num(d.f44)),
      low: fromMinorUnits(num(d.f45)),
      yesterday_close: yesterdayClose,
      change: price - yesterdayClose,
      change_percent: fromMinorUnits(num(d.f170)),
    },
    at,
  );
}

export class EastmoneyAdapter extends HttpAdapter<Quote> {
  readonly type = 'eastmoney';

  protected async load(source: SourceDescriptor, key: string): Promise<Quote> {
    const url =
      `https://push2.eastmoney.com/api/qt/stock/get?secid=118.${encodeURIComponent(key)}` +
      '&fields=f43,f44,f45,f46,f60,f170';
    const body = await this.getJson(source, url);
    return parseEastmoneyQuote(source.name, body, this.deps.clock.now());
  }
}
