import { epochSeconds } from '../../clock.js';
import { round2 } from '../../decimal.js';
import { AdapterError } from '../errors.js';
import type { FundPortfolio, PortfolioPosition } from '../models.js';
import type { SourceDescriptor } from '../sources.js';
import { HttpAdapter, isJsonObject, num } from './http.js';

/**
 * Eastmoney fund position report:
 * `{ "Datas": { "fundStocks": [{ "GPDM": "600519", "GPJC": "...", "JZBL": "9.12" }] },
 *    "Expansion": "2024-09-30" }`.
 *
 * An empty stock list is valid (bond and money-market funds).
 */
export function parseEastmoneyPortfolio(
  source: string,
  body: unknown,
  code: string,
  at: Date,
): FundPortfolio {
  if (!isJsonObject(body) || !isJsonObject(body.Datas)) {
    throw new AdapterError(source, 'response has no Datas object');
  }
  const stocks = body.Datas.fundStocks ?? [];
  if (!Array.isArray(stocks)) {
    throw new AdapterError(source, 'fundStocks is not a list');
  }

  const holdings: Record<string, PortfolioPosition> = {};
  for (const stock of stocks) {
    if (!isJsonObject(stock) || typeof stock.GPDM !== 'string' || stock.GPDM === '') {
      continue;
    }
    holdings[stock.GPDM] = {
      name: typeof stock.GPJC === 'string' ? stock.GPJC : stock.GPDM,
      weight: round2(num(stock.JZBL)),
    };
  }

  return {
    code,
    timestamp: epochSeconds(at),
    report_period: typeof body.Expansion === 'string' ? body.Expansion : '',
    holdings_info: holdings,
    source,
  };
}

export class EastmoneyPortfolioAdapter extends HttpAdapter<FundPortfolio> {
  readonly type = 'eastmoney_portfolio';

  protected async load(source: SourceDescriptor, code: string): Promise<FundPortfolio> {
    const url =
      'https://fundmobapi.eastmoney.com/FundMNewApi/FundMNInverstPosition' +
      `?FCODE=${encodeURIComponent(code)}&deviceid=pricewatch&plat=Android&product=EFund&version=6.4.4`;
    const body = await this.getJson(source, url);
    return parseEastmoneyPortfolio(source.name, body, code, this.deps.clock.now());
  }
}
