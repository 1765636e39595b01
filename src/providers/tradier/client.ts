/**
 * Tradier market data client (read-only endpoints; nothing here can trade)
 */

import { createChildLogger } from '@/utils/logger';
import { JsonHttpClient, type HttpClientOptions } from '../http_client';
import type {
  OneOrMany,
  TradierCalendarsResponse,
  TradierChainResponse,
  TradierExpirationsResponse,
  TradierHistoryDay,
  TradierHistoryResponse,
  TradierOption,
  TradierQuote,
  TradierQuotesResponse,
} from './types';

const logger = createChildLogger('tradier');

export function toList<T>(value: OneOrMany<T> | null | undefined): T[] {
  if (value === null || value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export interface TradierClientOptions extends HttpClientOptions {
  token: string;
  baseUrl: string;
}

export class TradierClient extends JsonHttpClient {
  private readonly token: string;
  readonly baseUrl: string;

  constructor(options: TradierClientOptions) {
    super('tradier', logger, options);
    this.token = options.token;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  get isLive(): boolean {
    return !this.baseUrl.toLowerCase().includes('sandbox');
  }

  protected override headers(): Record<string, string> {
    return {
      Accept: 'application/json',
      Authorization: `Bearer ${this.token}`,
    };
  }

  private url(path: string, params: Record<string, string>): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  async fetchQuote(symbol: string, greeks: boolean = false): Promise<TradierQuote | null> {
    const data = await this.fetchWithRetry<TradierQuotesResponse>(
      this.url('/markets/quotes', { symbols: symbol, greeks: String(greeks) }),
      { symbol, method: 'quote' }
    );
    const [quote] = toList(data.quotes?.quote);
    return quote ?? null;
  }

  async fetchHistory(symbol: string, start: string, interval: string = 'daily'): Promise<TradierHistoryDay[]> {
    const data = await this.fetchWithRetry<TradierHistoryResponse>(
      this.url('/markets/history', { symbol, interval, start }),
      { symbol, method: 'history' }
    );
    return toList(data.history?.day);
  }

  async fetchExpirations(symbol: string): Promise<string[]> {
    const data = await this.fetchWithRetry<TradierExpirationsResponse>(
      this.url('/markets/options/expirations', { symbol, includeAllRoots: 'true' }),
      { symbol, method: 'expirations' }
    );
    return toList(data.expirations?.date);
  }

  async fetchChain(symbol: string, expiration: string): Promise<TradierOption[]> {
    const data = await this.fetchWithRetry<TradierChainResponse>(
      this.url('/markets/options/chains', { symbol, expiration, greeks: 'true' }),
      { symbol, method: 'chain' }
    );
    return toList(data.options?.option);
  }

  async fetchCalendars(symbol: string): Promise<TradierCalendarsResponse> {
    const data = await this.fetchWithRetry<TradierCalendarsResponse | null>(
      this.url('/markets/fundamentals/calendars', { symbols: symbol }),
      { symbol, method: 'calendars' }
    );
    return Array.isArray(data) ? data : [];
  }
}
