/**
 * Adapter sets per source kind, keyed by `SourceDescriptor.type`.
 */

import type { FundPortfolio, FundQuote, Quote } from '../models.js';
import type { AdapterDeps, QuoteAdapter } from './http.js';
import { EastmoneyAdapter } from './eastmoney.js';
import { SinaAdapter } from './sina.js';
import { TencentAdapter } from './tencent.js';
import { NeteaseAdapter } from './netease.js';
import { FundgzAdapter } from './fundgz.js';
import { SinaFundAdapter } from './sina-fund.js';
import { EastmoneyPortfolioAdapter } from './eastmoney-portfolio.js';

export type { AdapterDeps, HttpFetch, QuoteAdapter } from './http.js';

export function goldAdapters(deps: AdapterDeps): QuoteAdapter<Quote>[] {
  return [
    new EastmoneyAdapter(deps),
    new SinaAdapter(deps),
    new TencentAdapter(deps),
    new NeteaseAdapter(deps),
  ];
}

export function fundAdapters(deps: AdapterDeps): QuoteAdapter<FundQuote>[] {
  return [new FundgzAdapter(deps), new SinaFundAdapter(deps)];
}

export function portfolioAdapters(deps: AdapterDeps): QuoteAdapter<FundPortfolio>[] {
  return [new EastmoneyPortfolioAdapter(deps)];
}
