import type { AssetType, OptionType } from './market';

export type PositionStatus = 'OPEN' | 'CLOSED' | 'ROLLED';

export type PricingConfidence = 'HIGH' | 'MEDIUM' | 'LOW';

export type PricingSource =
  | 'live_quote'
  | 'chain_lookup'
  | 'black_scholes'
  | 'unavailable';

export type PricePreference = 'MID' | 'BID' | 'ASK';

export interface PositionInput {
  symbol: string;
  asset_type?: AssetType;
  option_type: OptionType;
  expiry: string;
  strike: number;
  contracts: number;
  entry_date: string;
  entry_price: number;
  underlying_entry_price?: number | null;
  notes?: string;
  tags?: string[];
}

/** Durable identity and contract terms. */
export interface Position {
  id: string;
  symbol: string;
  assetType: AssetType;
  optionType: OptionType;
  expiry: string;
  strike: number;
  contracts: number;
  entryDate: string;
  entryPrice: number;
  underlyingEntryPrice: number | null;
  status: PositionStatus;
  notes: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

/** Ephemeral mark-to-market values, recomputed on every refresh. */
export interface PositionSnapshot {
  underlyingLast: number | null;
  optionBid: number | null;
  optionAsk: number | null;
  optionLast: number | null;
  optionMid: number | null;
  /** Price used for market value, chosen by the configured preference. */
  markPrice: number | null;
  delta: number | null;
  gamma: number | null;
  theta: number | null;
  vega: number | null;
  iv: number | null;
  daysToExpiry: number | null;
  costBasis: number;
  marketValue: number | null;
  unrealizedPnl: number | null;
  unrealizedPnlPct: number | null;
  pricingSource: PricingSource;
  /** Where the underlying price came from, e.g. tradier_live. */
  underlyingSource: string;
  pricingConfidence: PricingConfidence;
  lastUpdated: string;
}

export const SIGNAL_TYPES = [
  'STOP_LOSS',
  'TECH_INVALIDATED',
  'TAKE_PROFIT',
  'EARNINGS_RISK',
  'EXPIRY_REVIEW',
  'HOLD',
] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

export type SignalSeverity = 'INFO' | 'WARN' | 'CRITICAL';

export interface Signal {
  type: SignalType;
  severity: SignalSeverity;
  reasons: string[];
  recommendedAction: string;
  triggeredAt: string;
}

export interface PricedPosition {
  position: Position;
  snapshot: PositionSnapshot | null;
  signal: Signal | null;
  error: string | null;
}

export interface PortfolioSummary {
  totalPositions: number;
  positionsPriced: number;
  positionsUnpriced: number;
  totalCostBasis: number;
  totalMarketValue: number;
  totalUnrealizedPnl: number;
  totalUnrealizedPnlPct: number;
  signalCounts: Record<SignalType, number>;
  bySymbol: Record<string, { positions: number; marketValue: number; unrealizedPnl: number }>;
  criticalPositions: Array<{ id: string; symbol: string; signal: SignalType }>;
  lastUpdated: string;
}

export interface PortfolioImportResult {
  imported: number;
  skipped: number;
  errors: string[];
  importedPositions: Array<{ id: string; symbol: string }>;
}
