/**
 * Raw market data shapes exchanged between providers and analyzers.
 */

export type AssetType = 'STOCK' | 'ETF' | 'UNKNOWN';

export type OptionType = 'CALL' | 'PUT';

export interface OhlcvBar {
  date: string; // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Provider-normalized fundamentals snapshot. Every field may be missing.
 */
export interface FundamentalsData {
  revenueGrowth?: number | null;
  earningsGrowth?: number | null;
  profitMargins?: number | null;
  returnOnEquity?: number | null;
  debtToEquity?: number | null;
  currentRatio?: number | null;
  operatingCashflow?: number | null;
  beta?: number | null;
  marketCap?: number | null;
  sector?: string | null;
  industry?: string | null;
}

export interface ProviderGreeks {
  delta: number | null;
  gamma: number | null;
  theta: number | null;
  vega: number | null;
}

/** One row of an options chain as delivered by a provider. */
export interface OptionChainRow {
  contractSymbol: string;
  optionType: OptionType;
  strike: number;
  expiration: string; // YYYY-MM-DD
  bid: number | null;
  ask: number | null;
  last: number | null;
  volume: number | null;
  openInterest: number | null;
  impliedVolatility: number | null;
  greeks: ProviderGreeks | null;
}

export interface OptionQuote {
  bid: number | null;
  ask: number | null;
  last: number | null;
  volume: number | null;
  openInterest: number | null;
  iv: number | null;
  greeks: ProviderGreeks | null;
  source: string;
}

export const PRICE_UNAVAILABLE = 'unavailable';

export interface PriceObservation {
  /** Provenance tag, `<provider>_<kind>` e.g. tradier_live, yahoo_quote, yahoo_ohlcv. */
  source: string;
  price: number;
}

export interface LivePriceResult {
  price: number | null;
  source: string;
  /** Every value obtained during the lookup, in priority order. */
  observations: PriceObservation[];
}
