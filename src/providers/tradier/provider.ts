/**
 * Tradier capability provider: preferred source for option chains with
 * Greeks, live option quotes and live underlying prices.
 */

import { createChildLogger } from '@/utils/logger';
import type { HistoryPeriod } from '@/core/config';
import { daysAgo, daysUntil, formatDate, parseDate, PERIOD_DAYS } from '@/core/time';
import type {
  AssetType,
  OhlcvBar,
  OptionChainRow,
  OptionQuote,
  ProviderGreeks,
} from '@/types/market';
import type {
  AssetTypeSource,
  EarningsDateSource,
  LiveQuoteSource,
  OhlcvSource,
  OptionQuoteSource,
  OptionsChainSource,
} from '../types';
import type { TradierClient } from './client';
import type { TradierGreeks, TradierOption } from './types';

const logger = createChildLogger('tradier_provider');

function num(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function mapGreeks(greeks: TradierGreeks | null | undefined): ProviderGreeks | null {
  if (!greeks) return null;
  return {
    delta: num(greeks.delta),
    gamma: num(greeks.gamma),
    theta: num(greeks.theta),
    vega: num(greeks.vega),
  };
}

function impliedVol(greeks: TradierGreeks | null | undefined): number | null {
  if (!greeks) return null;
  for (const value of [greeks.mid_iv, greeks.smv_vol]) {
    const iv = num(value);
    if (iv !== null && iv > 0) return iv;
  }
  return null;
}

export function mapTradierOption(option: TradierOption): OptionChainRow {
  return {
    contractSymbol: option.symbol,
    optionType: option.option_type === 'put' ? 'PUT' : 'CALL',
    strike: option.strike,
    expiration: option.expiration_date,
    bid: num(option.bid),
    ask: num(option.ask),
    last: num(option.last),
    volume: num(option.volume),
    openInterest: num(option.open_interest),
    impliedVolatility: impliedVol(option.greeks),
    greeks: mapGreeks(option.greeks),
  };
}

export class TradierProvider
  implements
    OhlcvSource,
    OptionsChainSource,
    EarningsDateSource,
    AssetTypeSource,
    LiveQuoteSource,
    OptionQuoteSource
{
  readonly name = 'tradier';

  constructor(
    private readonly client: TradierClient | null,
    private readonly etfSymbols: ReadonlySet<string> = new Set()
  ) {
    if (client) {
      logger.info({ mode: client.isLive ? 'LIVE' : 'SANDBOX' }, 'Tradier provider initialized');
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  private requireClient(): TradierClient {
    if (!this.client) {
      throw new Error('Tradier client not configured (TRADIER_TOKEN missing)');
    }
    return this.client;
  }

  async fetchOhlcv(symbol: string, period: HistoryPeriod, interval: string): Promise<OhlcvBar[]> {
    const start = formatDate(daysAgo(PERIOD_DAYS[period]));
    const days = await this.requireClient().fetchHistory(
      symbol,
      start,
      interval === '1d' ? 'daily' : interval
    );
    return days
      .filter((d) => Number.isFinite(d.close))
      .map((d) => ({
        date: d.date,
        open: d.open,
        high: d.high,
        low: d.low,
        close: d.close,
        volume: d.volume,
      }));
  }

  async fetchOptionsChain(symbol: string, minDaysToExpiry: number): Promise<OptionChainRow[]> {
    const client = this.requireClient();
    const now = new Date();
    const expirations = (await client.fetchExpirations(symbol)).filter((exp) => {
      const days = daysUntil(exp, now);
      return days !== null && days >= minDaysToExpiry;
    });

    if (expirations.length === 0) {
      logger.info({ symbol, minDaysToExpiry }, 'No LEAPS expirations');
      return [];
    }

    const rows: OptionChainRow[] = [];
    for (const expiration of expirations) {
      try {
        const options = await client.fetchChain(symbol, expiration);
        rows.push(...options.map(mapTradierOption));
      } catch (error) {
        // one bad expiry should not cost the whole chain
        logger.warn({ symbol, expiration, err: error }, 'Chain fetch failed for expiration');
      }
    }
    return rows;
  }

  async fetchEarningsDate(symbol: string): Promise<string | null> {
    const calendars = await this.requireClient().fetchCalendars(symbol);
    const now = new Date();
    const upcoming: string[] = [];

    for (const item of calendars) {
      for (const result of item.results ?? []) {
        for (const event of result.tables?.corporate_calendars ?? []) {
          if (!event.event?.toLowerCase().includes('earnings') || !event.begin_date_time) continue;
          const date = parseDate(event.begin_date_time);
          const days = date ? daysUntil(date, now) : null;
          if (date && days !== null && days >= 0) {
            upcoming.push(formatDate(date));
          }
        }
      }
    }

    upcoming.sort();
    return upcoming[0] ?? null;
  }

  async fetchAssetType(symbol: string): Promise<AssetType> {
    const upper = symbol.toUpperCase();
    if (this.etfSymbols.has(upper)) return 'ETF';

    const quote = await this.requireClient().fetchQuote(upper);
    switch (quote?.type) {
      case 'etf':
        return 'ETF';
      case 'stock':
        return 'STOCK';
      default:
        return 'UNKNOWN';
    }
  }

  async fetchLivePrice(symbol: string): Promise<number | null> {
    const quote = await this.requireClient().fetchQuote(symbol);
    if (!quote) return null;

    const last = num(quote.last);
    if (last !== null && last > 0) return last;

    const bid = num(quote.bid);
    const ask = num(quote.ask);
    if (bid !== null && ask !== null && bid > 0 && ask > 0) {
      return (bid + ask) / 2;
    }
    return null;
  }

  async fetchOptionQuote(contractSymbol: string): Promise<OptionQuote | null> {
    const quote = await this.requireClient().fetchQuote(contractSymbol, true);
    if (!quote) return null;
    return {
      bid: num(quote.bid),
      ask: num(quote.ask),
      last: num(quote.last),
      volume: num(quote.volume),
      openInterest: num(quote.open_interest),
      iv: impliedVol(quote.greeks),
      greeks: mapGreeks(quote.greeks),
      source: 'tradier_live',
    };
  }
}
