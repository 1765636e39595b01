/**
 * Yahoo Finance client over the public chart, quoteSummary and options endpoints
 */

import { createChildLogger } from '@/utils/logger';
import type { HistoryPeriod } from '@/core/config';
import { JsonHttpClient, type HttpClientOptions } from '../http_client';
import type {
  YahooChartResponse,
  YahooChartResult,
  YahooOptionsResponse,
  YahooQuoteSummary,
  YahooQuoteSummaryResponse,
} from './types';

const logger = createChildLogger('yahoo');

const CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const SUMMARY_URL = 'https://query2.finance.yahoo.com/v10/finance/quoteSummary';
const OPTIONS_URL = 'https://query2.finance.yahoo.com/v7/finance/options';

const SUMMARY_MODULES = [
  'financialData',
  'defaultKeyStatistics',
  'summaryDetail',
  'summaryProfile',
  'calendarEvents',
  'quoteType',
].join(',');

export type YahooOptionsResult = NonNullable<
  NonNullable<YahooOptionsResponse['optionChain']>['result']
>[number];

export class YahooClient extends JsonHttpClient {
  constructor(options: HttpClientOptions = {}) {
    super('yahoo', logger, options);
  }

  protected override headers(): Record<string, string> {
    return {
      Accept: 'application/json',
      'User-Agent': 'Mozilla/5.0 (compatible; leaps-desk/0.1)',
    };
  }

  async fetchChart(symbol: string, range: HistoryPeriod | '1d' | '5d', interval: string = '1d'): Promise<YahooChartResult | null> {
    const url = new URL(`${CHART_URL}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('range', range);
    url.searchParams.set('interval', interval);

    const data = await this.fetchWithRetry<YahooChartResponse>(url, { symbol, method: 'chart' });
    return data.chart?.result?.[0] ?? null;
  }

  async fetchQuoteSummary(symbol: string): Promise<YahooQuoteSummary | null> {
    const url = new URL(`${SUMMARY_URL}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('modules', SUMMARY_MODULES);

    const data = await this.fetchWithRetry<YahooQuoteSummaryResponse>(url, {
      symbol,
      method: 'quoteSummary',
    });
    return data.quoteSummary?.result?.[0] ?? null;
  }

  /** Options for one expiry (epoch seconds), or the nearest one when omitted. */
  async fetchOptions(symbol: string, expiration?: number): Promise<YahooOptionsResult | null> {
    const url = new URL(`${OPTIONS_URL}/${encodeURIComponent(symbol)}`);
    if (expiration !== undefined) {
      url.searchParams.set('date', String(expiration));
    }

    const data = await this.fetchWithRetry<YahooOptionsResponse>(url, { symbol, method: 'options' });
    return data.optionChain?.result?.[0] ?? null;
  }
}
