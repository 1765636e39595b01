/**
 * Per-symbol analysis reports. Uncomputable metrics are null, never zero.
 */

import type { AssetType, OptionType } from './market';

export type Trend = 'BULLISH' | 'BEARISH' | 'NEUTRAL' | 'UNKNOWN';

export type RsiState = 'OVERBOUGHT' | 'OVERSOLD' | 'NEUTRAL' | 'UNKNOWN';

export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export interface TechnicalIndicators {
  smaFast: number | null;
  smaSlow: number | null;
  rsi: number | null;
  hv: number | null;
}

export interface TechnicalReport {
  symbol: string;
  status: 'OK' | 'INSUFFICIENT_DATA';
  date: string | null;
  price: number | null;
  trend: Trend;
  indicators: TechnicalIndicators;
  signals: {
    goldenCross: boolean;
    deathCross: boolean;
    rsiState: RsiState;
  };
}

export interface DimensionScore {
  score: number;
  confidence: Confidence;
  metrics: Record<string, number | null>;
  notes: string[];
}

export interface FundamentalReport {
  symbol: string;
  overallScore: number;
  confidence: Confidence;
  isEligible: boolean;
  assetType: AssetType;
  dimensions: Partial<Record<'growth' | 'profitability' | 'balanceSheet' | 'stability', DimensionScore>>;
  notes: string[];
}

export interface Greeks {
  delta: number;
  gamma: number;
  theta: number;
  vega: number;
}

export interface OptionCandidate {
  contractSymbol: string;
  optionType: OptionType;
  expiration: string;
  strike: number;
  bid: number;
  ask: number;
  mid: number;
  iv: number | null;
  openInterest: number;
  volume: number;
  greeks: Greeks | null;
  daysToExpiry: number;
  spreadPct: number;
}

export type OptionsStatus = 'OK' | 'NO_DATA' | 'NO_LIQUIDITY';

export interface OptionsReport {
  symbol: string;
  status: OptionsStatus;
  currentPrice: number | null;
  count: number;
  candidates: OptionCandidate[];
}
