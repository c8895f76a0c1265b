import type { Quote } from '../models.js';
import { AdapterError } from '../errors.js';
import type { SourceDescriptor } from '../sources.js';
import { HttpAdapter, buildQuote, num, quotedPayload } from './http.js';

/**
 * Sina gold quote: `var hq_str_gds_AU9999="...";` with comma-separated
 * fields. Index 1 is the last price, then previous close, open, high, low.
 * Empty fields fall back to the last price.
 */
export function parseSinaQuote(source: string, text: string, at: Date): Quote {
  const parts = quotedPayload(source, text).split(',');
  if (parts.length < 8) {
    throw new AdapterError(source, `expected at least 8 fields, got ${parts.length}`);
  }

  const price = num(parts[1]);
  const yesterdayClose = num(parts[2], price);
  return buildQuote(
    source,
    {
      price,
      yesterday_close: yesterdayClose,
      open: num(parts[3], price),
      high: num(parts[4], price),
      low: num(parts[5], price),
      change: price - yesterdayClose,
    },
    at,
  );
}

export class SinaAdapter extends HttpAdapter<Quote> {
  readonly type = 'sina';

  protected async load(source: SourceDescriptor, key: string): Promise<Quote> {
    const url = `https://hq.sinajs.cn/list=gds_${encodeURIComponent(key)}`;
    const text = await this.getText(source, url, {
      headers: { Referer: 'https://finance.sina.com.cn' },
      defaultCharset: 'gbk',
    });
    return parseSinaQuote(source.name, text, this.deps.clock.now());
  }
}
