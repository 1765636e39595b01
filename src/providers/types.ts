/**
 * Capability interfaces for market data providers.
 *
 * Each operation has its own narrow interface; a provider implements only the
 * ones it supports well and the router keeps an ordered list per operation.
 */

import type {
  AssetType,
  FundamentalsData,
  OhlcvBar,
  OptionChainRow,
  OptionQuote,
} from '@/types/market';
import type { HistoryPeriod } from '@/core/config';

export interface ProviderBase {
  readonly name: string;
  isAvailable(): boolean | Promise<boolean>;
}

export interface OhlcvSource extends ProviderBase {
  fetchOhlcv(symbol: string, period: HistoryPeriod, interval: string): Promise<OhlcvBar[]>;
}

export interface FundamentalsSource extends ProviderBase {
  fetchFundamentals(symbol: string): Promise<FundamentalsData>;
}

export interface OptionsChainSource extends ProviderBase {
  fetchOptionsChain(symbol: string, minDaysToExpiry: number): Promise<OptionChainRow[]>;
}

export interface EarningsDateSource extends ProviderBase {
  /** ISO date of the next earnings event, or null when none is known. */
  fetchEarningsDate(symbol: string): Promise<string | null>;
}

export interface AssetTypeSource extends ProviderBase {
  fetchAssetType(symbol: string): Promise<AssetType>;
}

/** Broker-grade real-time last price. */
export interface LiveQuoteSource extends ProviderBase {
  fetchLivePrice(symbol: string): Promise<number | null>;
}

/** Public delayed/regular-market quote. */
export interface DirectQuoteSource extends ProviderBase {
  fetchDirectQuote(symbol: string): Promise<number | null>;
}

export interface OptionQuoteSource extends ProviderBase {
  fetchOptionQuote(contractSymbol: string): Promise<OptionQuote | null>;
}

export type Capability =
  | 'ohlcv'
  | 'fundamentals'
  | 'optionsChain'
  | 'earningsDate'
  | 'assetType'
  | 'liveQuote'
  | 'directQuote'
  | 'optionQuote';

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
