/**
 * Yahoo Finance public endpoint response types (only the fields read)
 */

export interface YahooChartResult {
  meta?: {
    symbol?: string;
    regularMarketPrice?: number | null;
    instrumentType?: string;
  };
  timestamp?: number[];
  indicators?: {
    quote?: Array<{
      open?: Array<number | null>;
      high?: Array<number | null>;
      low?: Array<number | null>;
      close?: Array<number | null>;
      volume?: Array<number | null>;
    }>;
  };
}

export interface YahooChartResponse {
  chart?: {
    result?: YahooChartResult[] | null;
    error?: { code?: string; description?: string } | null;
  };
}

export interface YahooRawValue {
  raw?: number;
  fmt?: string;
}

export interface YahooQuoteSummary {
  financialData?: {
    revenueGrowth?: YahooRawValue;
    earningsGrowth?: YahooRawValue;
    profitMargins?: YahooRawValue;
    returnOnEquity?: YahooRawValue;
    debtToEquity?: YahooRawValue;
    currentRatio?: YahooRawValue;
    operatingCashflow?: YahooRawValue;
  };
  defaultKeyStatistics?: {
    beta?: YahooRawValue;
  };
  summaryDetail?: {
    marketCap?: YahooRawValue;
    beta?: YahooRawValue;
  };
  summaryProfile?: {
    sector?: string;
    industry?: string;
  };
  calendarEvents?: {
    earnings?: {
      earningsDate?: YahooRawValue[];
    };
  };
  quoteType?: {
    quoteType?: string;
  };
}

export interface YahooQuoteSummaryResponse {
  quoteSummary?: {
    result?: YahooQuoteSummary[] | null;
    error?: { code?: string; description?: string } | null;
  };
}

export interface YahooOptionContract {
  contractSymbol: string;
  strike: number;
  expiration: number; // epoch seconds
  bid?: number;
  ask?: number;
  lastPrice?: number;
  volume?: number;
  openInterest?: number;
  impliedVolatility?: number;
}

export interface YahooOptionsResponse {
  optionChain?: {
    result?: Array<{
      expirationDates?: number[];
      options?: Array<{
        expirationDate?: number;
        calls?: YahooOptionContract[];
        puts?: YahooOptionContract[];
      }>;
    }> | null;
  };
}
