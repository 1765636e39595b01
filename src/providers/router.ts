/**
 * DataSourceRouter
 *
 * One ordered provider list per operation. Each call walks its list, skips
 * unavailable providers, bounds every attempt with a timeout and returns the
 * first non-empty result. Provider failures are logged and never reach the
 * caller; when every provider fails the operation's empty value is returned.
 */

import { createChildLogger, type Logger } from '@/utils/logger';
import { withTimeout } from '@/utils/throttler';
import type { HistoryPeriod } from '@/core/config';
import {
  PRICE_UNAVAILABLE,
  type AssetType,
  type FundamentalsData,
  type LivePriceResult,
  type OhlcvBar,
  type OptionChainRow,
  type OptionQuote,
  type PriceObservation,
} from '@/types/market';
import type {
  AssetTypeSource,
  Capability,
  DirectQuoteSource,
  EarningsDateSource,
  FundamentalsSource,
  LiveQuoteSource,
  OhlcvSource,
  OptionQuoteSource,
  OptionsChainSource,
  ProviderBase,
} from './types';

export interface RouterProviders {
  ohlcv: OhlcvSource[];
  fundamentals: FundamentalsSource[];
  optionsChain: OptionsChainSource[];
  earningsDate: EarningsDateSource[];
  assetType: AssetTypeSource[];
  liveQuote: LiveQuoteSource[];
  directQuote: DirectQuoteSource[];
  optionQuote: OptionQuoteSource[];
}

export interface RouterOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export interface ProviderStatus {
  name: string;
  available: boolean;
  capabilities: Capability[];
}

const DEFAULT_TIMEOUT_MS = 8000;

const CAPABILITIES: readonly Capability[] = [
  'ohlcv',
  'fundamentals',
  'optionsChain',
  'earningsDate',
  'assetType',
  'liveQuote',
  'directQuote',
  'optionQuote',
];

function isPositivePrice(value: number | null): value is number {
  return value !== null && Number.isFinite(value) && value > 0;
}

function hasAnyValue(data: FundamentalsData): boolean {
  return Object.values(data).some((value) => value !== null && value !== undefined);
}

export class DataSourceRouter {
  private readonly providers: RouterProviders;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(providers: Partial<RouterProviders>, options: RouterOptions = {}) {
    this.providers = {
      ohlcv: providers.ohlcv ?? [],
      fundamentals: providers.fundamentals ?? [],
      optionsChain: providers.optionsChain ?? [],
      earningsDate: providers.earningsDate ?? [],
      assetType: providers.assetType ?? [],
      liveQuote: providers.liveQuote ?? [],
      directQuote: providers.directQuote ?? [],
      optionQuote: providers.optionQuote ?? [],
    };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createChildLogger('router');
  }

  private async checkAvailable(provider: ProviderBase): Promise<boolean> {
    try {
      return await withTimeout(
        Promise.resolve(provider.isAvailable()),
        this.timeoutMs,
        `${provider.name}.isAvailable`
      );
    } catch (error) {
      this.logger.warn({ provider: provider.name, err: error }, 'Availability check failed');
      return false;
    }
  }

  /**
   * Walks `providers` in order and resolves with the first accepted result.
   */
  private async firstResult<P extends ProviderBase, R>(
    operation: Capability,
    symbol: string,
    providers: P[],
    call: (provider: P) => Promise<R>,
    accept: (result: R) => boolean,
    empty: R
  ): Promise<{ value: R; provider: string | null }> {
    for (const provider of providers) {
      if (!(await this.checkAvailable(provider))) {
        this.logger.debug({ operation, symbol, provider: provider.name }, 'Provider unavailable, skipping');
        continue;
      }

      try {
        const result = await withTimeout(
          call(provider),
          this.timeoutMs,
          `${provider.name}.${operation}`
        );
        if (accept(result)) {
          this.logger.debug({ operation, symbol, provider: provider.name }, 'Provider answered');
          return { value: result, provider: provider.name };
        }
        this.logger.info({ operation, symbol, provider: provider.name }, 'Provider returned no data');
      } catch (error) {
        this.logger.warn(
          { operation, symbol, provider: provider.name, err: error },
          'Provider call failed, falling through'
        );
      }
    }

    this.logger.warn({ operation, symbol }, 'All providers exhausted');
    return { value: empty, provider: null };
  }

  async ohlcv(symbol: string, period: HistoryPeriod = '2y', interval: string = '1d'): Promise<OhlcvBar[]> {
    const { value } = await this.firstResult(
      'ohlcv',
      symbol,
      this.providers.ohlcv,
      (p) => p.fetchOhlcv(symbol, period, interval),
      (bars) => bars.length > 0,
      []
    );
    return value;
  }

  async fundamentals(symbol: string): Promise<FundamentalsData> {
    const { value } = await this.firstResult(
      'fundamentals',
      symbol,
      this.providers.fundamentals,
      (p) => p.fetchFundamentals(symbol),
      hasAnyValue,
      {}
    );
    return value;
  }

  async optionsChain(symbol: string, minDaysToExpiry: number): Promise<OptionChainRow[]> {
    const { value } = await this.firstResult(
      'optionsChain',
      symbol,
      this.providers.optionsChain,
      (p) => p.fetchOptionsChain(symbol, minDaysToExpiry),
      (rows) => rows.length > 0,
      []
    );
    return value;
  }

  async earningsDate(symbol: string): Promise<string | null> {
    const { value } = await this.firstResult<EarningsDateSource, string | null>(
      'earningsDate',
      symbol,
      this.providers.earningsDate,
      (p) => p.fetchEarningsDate(symbol),
      (date) => date !== null,
      null
    );
    return value;
  }

  async assetType(symbol: string): Promise<AssetType> {
    const { value } = await this.firstResult<AssetTypeSource, AssetType>(
      'assetType',
      symbol,
      this.providers.assetType,
      (p) => p.fetchAssetType(symbol),
      (type) => type !== 'UNKNOWN',
      'UNKNOWN'
    );
    return value;
  }

  async liveOptionQuote(contractSymbol: string): Promise<OptionQuote | null> {
    const { value } = await this.firstResult<OptionQuoteSource, OptionQuote | null>(
      'optionQuote',
      contractSymbol,
      this.providers.optionQuote,
      (p) => p.fetchOptionQuote(contractSymbol),
      (quote) => quote !== null && (quote.bid !== null || quote.ask !== null || quote.last !== null),
      null
    );
    return value;
  }

  /**
   * Live underlying price from up to three lookups: every broker live quote and
   * direct quote provider is asked; the historical close is only consulted when
   * both of those came back empty. The highest-priority value wins.
   */
  async livePrice(symbol: string): Promise<LivePriceResult> {
    const observations: PriceObservation[] = [];

    const live = await this.firstResult<LiveQuoteSource, number | null>(
      'liveQuote',
      symbol,
      this.providers.liveQuote,
      (p) => p.fetchLivePrice(symbol),
      isPositivePrice,
      null
    );
    if (isPositivePrice(live.value) && live.provider) {
      observations.push({ source: `${live.provider}_live`, price: live.value });
    }

    const direct = await this.firstResult<DirectQuoteSource, number | null>(
      'directQuote',
      symbol,
      this.providers.directQuote,
      (p) => p.fetchDirectQuote(symbol),
      isPositivePrice,
      null
    );
    if (isPositivePrice(direct.value) && direct.provider) {
      observations.push({ source: `${direct.provider}_quote`, price: direct.value });
    }

    if (observations.length === 0) {
      const history = await this.firstResult(
        'ohlcv',
        symbol,
        this.providers.ohlcv,
        (p) => p.fetchOhlcv(symbol, '1mo', '1d'),
        (bars) => bars.length > 0 && isPositivePrice(bars[bars.length - 1].close),
        []
      );
      const lastBar = history.value[history.value.length - 1];
      if (lastBar && history.provider) {
        observations.push({ source: `${history.provider}_ohlcv`, price: lastBar.close });
      }
    }

    if (observations.length > 1) {
      this.logger.info({ symbol, observations }, 'Multiple price sources');
    }

    const best = observations[0];
    if (!best) {
      this.logger.warn({ symbol }, 'Live price unavailable from all sources');
      return { price: null, source: PRICE_UNAVAILABLE, observations };
    }
    return { price: best.price, source: best.source, observations };
  }

  async status(): Promise<ProviderStatus[]> {
    const byName = new Map<string, { provider: ProviderBase; capabilities: Capability[] }>();
    for (const capability of CAPABILITIES) {
      const list: ProviderBase[] = this.providers[capability];
      for (const provider of list) {
        const existing = byName.get(provider.name);
        if (existing) {
          existing.capabilities.push(capability);
        } else {
          byName.set(provider.name, { provider, capabilities: [capability] });
        }
      }
    }

    const statuses: ProviderStatus[] = [];
    for (const [name, { provider, capabilities }] of byName) {
      statuses.push({ name, available: await this.checkAvailable(provider), capabilities });
    }
    return statuses;
  }
}
