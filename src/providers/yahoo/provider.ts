/**
 * Yahoo Finance capability provider: broadest coverage for history,
 * fundamentals, earnings dates and asset classification.
 */

import { createChildLogger } from '@/utils/logger';
import type { HistoryPeriod } from '@/core/config';
import { daysUntil, formatDate } from '@/core/time';
import type { AssetType, FundamentalsData, OhlcvBar, OptionChainRow } from '@/types/market';
import type {
  AssetTypeSource,
  DirectQuoteSource,
  EarningsDateSource,
  FundamentalsSource,
  OhlcvSource,
  OptionsChainSource,
} from '../types';
import type { YahooClient } from './client';
import type { YahooChartResult, YahooOptionContract, YahooRawValue } from './types';

const logger = createChildLogger('yahoo_provider');

function raw(value: YahooRawValue | undefined): number | null {
  return typeof value?.raw === 'number' && Number.isFinite(value.raw) ? value.raw : null;
}

function finite(value: number | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function epochToDate(seconds: number): string {
  return formatDate(new Date(seconds * 1000));
}

export function chartToBars(chart: YahooChartResult): OhlcvBar[] {
  const timestamps = chart.timestamp ?? [];
  const quote = chart.indicators?.quote?.[0];
  if (!quote) return [];

  const bars: OhlcvBar[] = [];
  timestamps.forEach((ts, i) => {
    const close = quote.close?.[i];
    if (typeof close !== 'number' || !Number.isFinite(close)) return;
    bars.push({
      date: epochToDate(ts),
      open: quote.open?.[i] ?? close,
      high: quote.high?.[i] ?? close,
      low: quote.low?.[i] ?? close,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });
  return bars;
}

function mapContract(contract: YahooOptionContract, optionType: 'CALL' | 'PUT'): OptionChainRow {
  const iv = finite(contract.impliedVolatility);
  return {
    contractSymbol: contract.contractSymbol,
    optionType,
    strike: contract.strike,
    expiration: epochToDate(contract.expiration),
    bid: finite(contract.bid),
    ask: finite(contract.ask),
    last: finite(contract.lastPrice),
    volume: finite(contract.volume),
    openInterest: finite(contract.openInterest),
    impliedVolatility: iv !== null && iv > 0 ? iv : null,
    greeks: null,
  };
}

export interface YahooProviderOptions {
  enabled?: boolean;
  etfSymbols?: ReadonlySet<string>;
}

export class YahooProvider
  implements
    OhlcvSource,
    FundamentalsSource,
    OptionsChainSource,
    EarningsDateSource,
    AssetTypeSource,
    DirectQuoteSource
{
  readonly name = 'yahoo';
  private readonly enabled: boolean;
  private readonly etfSymbols: ReadonlySet<string>;

  constructor(
    private readonly client: YahooClient,
    options: YahooProviderOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.etfSymbols = options.etfSymbols ?? new Set();
  }

  isAvailable(): boolean {
    return this.enabled;
  }

  async fetchOhlcv(symbol: string, period: HistoryPeriod, interval: string): Promise<OhlcvBar[]> {
    const chart = await this.client.fetchChart(symbol, period, interval);
    return chart ? chartToBars(chart) : [];
  }

  async fetchFundamentals(symbol: string): Promise<FundamentalsData> {
    const summary = await this.client.fetchQuoteSummary(symbol);
    if (!summary) return {};

    const fin = summary.financialData ?? {};
    return {
      revenueGrowth: raw(fin.revenueGrowth),
      earningsGrowth: raw(fin.earningsGrowth),
      profitMargins: raw(fin.profitMargins),
      returnOnEquity: raw(fin.returnOnEquity),
      debtToEquity: raw(fin.debtToEquity),
      currentRatio: raw(fin.currentRatio),
      operatingCashflow: raw(fin.operatingCashflow),
      beta: raw(summary.defaultKeyStatistics?.beta) ?? raw(summary.summaryDetail?.beta),
      marketCap: raw(summary.summaryDetail?.marketCap),
      sector: summary.summaryProfile?.sector ?? null,
      industry: summary.summaryProfile?.industry ?? null,
    };
  }

  async fetchOptionsChain(symbol: string, minDaysToExpiry: number): Promise<OptionChainRow[]> {
    const first = await this.client.fetchOptions(symbol);
    const now = new Date();
    const expirations = (first?.expirationDates ?? []).filter((epoch) => {
      const days = daysUntil(new Date(epoch * 1000), now);
      return days !== null && days >= minDaysToExpiry;
    });

    const rows: OptionChainRow[] = [];
    for (const expiration of expirations) {
      try {
        const result = await this.client.fetchOptions(symbol, expiration);
        for (const chain of result?.options ?? []) {
          rows.push(...(chain.calls ?? []).map((c) => mapContract(c, 'CALL')));
          rows.push(...(chain.puts ?? []).map((p) => mapContract(p, 'PUT')));
        }
      } catch (error) {
        logger.warn({ symbol, expiration, err: error }, 'Options fetch failed for expiration');
      }
    }
    return rows;
  }

  async fetchEarningsDate(symbol: string): Promise<string | null> {
    const summary = await this.client.fetchQuoteSummary(symbol);
    const dates = (summary?.calendarEvents?.earnings?.earningsDate ?? [])
      .map(raw)
      .filter((epoch): epoch is number => epoch !== null)
      .sort((a, b) => a - b);

    const now = new Date();
    const upcoming = dates.find((epoch) => {
      const days = daysUntil(new Date(epoch * 1000), now);
      return days !== null && days >= 0;
    });
    return upcoming === undefined ? null : epochToDate(upcoming);
  }

  async fetchAssetType(symbol: string): Promise<AssetType> {
    const upper = symbol.toUpperCase();
    if (this.etfSymbols.has(upper)) return 'ETF';

    const summary = await this.client.fetchQuoteSummary(upper);
    switch (summary?.quoteType?.quoteType) {
      case 'ETF':
        return 'ETF';
      case 'EQUITY':
        return 'STOCK';
      default:
        return 'UNKNOWN';
    }
  }

  async fetchDirectQuote(symbol: string): Promise<number | null> {
    const chart = await this.client.fetchChart(symbol, '1d', '1d');
    const price = chart?.meta?.regularMarketPrice;
    return typeof price === 'number' && Number.isFinite(price) && price > 0 ? price : null;
  }
}
