/**
 * Tradier API response types. Tradier collapses single-element lists into a
 * bare object, so list fields are `T | T[]`.
 */

export type OneOrMany<T> = T | T[];

export interface TradierGreeks {
  delta?: number | null;
  gamma?: number | null;
  theta?: number | null;
  vega?: number | null;
  mid_iv?: number | null;
  smv_vol?: number | null;
}

export interface TradierQuote {
  symbol?: string;
  type?: string; // stock, etf, option, index
  last?: number | null;
  bid?: number | null;
  ask?: number | null;
  volume?: number | null;
  open_interest?: number | null;
  greeks?: TradierGreeks | null;
}

export interface TradierQuotesResponse {
  quotes?: {
    quote?: OneOrMany<TradierQuote>;
    unmatched_symbols?: unknown;
  } | null;
}

export interface TradierHistoryDay {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface TradierHistoryResponse {
  history?: { day?: OneOrMany<TradierHistoryDay> } | null;
}

export interface TradierExpirationsResponse {
  expirations?: { date?: OneOrMany<string> } | null;
}

export interface TradierOption {
  symbol: string;
  option_type?: 'call' | 'put';
  strike: number;
  expiration_date: string;
  bid?: number | null;
  ask?: number | null;
  last?: number | null;
  volume?: number | null;
  open_interest?: number | null;
  greeks?: TradierGreeks | null;
}

export interface TradierChainResponse {
  options?: { option?: OneOrMany<TradierOption> } | null;
}

export interface TradierCalendarEvent {
  event?: string;
  begin_date_time?: string;
}

export type TradierCalendarsResponse = Array<{
  results?: Array<{
    tables?: { corporate_calendars?: TradierCalendarEvent[] | null } | null;
  }>;
}>;
