import { buildConfig, type AppConfig, type RawSettings } from '@/core/config';
import { loadEnvConfig } from '@/core/env';
import type { HistoryPeriod } from '@/core/config';
import type { ConvictionResult, Decision, Verdict } from '@/types/decision';
import type { ScanRecord, ScanResult } from '@/types/history';
import type { Position, PositionSnapshot } from '@/types/portfolio';
import type {
  AssetType,
  FundamentalsData,
  OhlcvBar,
  OptionChainRow,
  OptionQuote,
} from '@/types/market';
import type {
  FundamentalReport,
  OptionCandidate,
  OptionsReport,
  TechnicalReport,
} from '@/types/reports';
import type {
  AssetTypeSource,
  DirectQuoteSource,
  EarningsDateSource,
  FundamentalsSource,
  LiveQuoteSource,
  OhlcvSource,
  OptionQuoteSource,
  OptionsChainSource,
} from '@/providers/types';

export function testConfig(raw: RawSettings = {}): AppConfig {
  return buildConfig(raw, loadEnvConfig({ DB_PATH: ':memory:' }), '/tmp/leaps-desk-test');
}

export function makeTechnical(overrides: Partial<TechnicalReport> = {}): TechnicalReport {
  return {
    symbol: 'AAPL',
    status: 'OK',
    date: '2026-01-09',
    price: 200,
    trend: 'BULLISH',
    indicators: { smaFast: 190, smaSlow: 180, rsi: 55, hv: 0.25 },
    signals: { goldenCross: false, deathCross: false, rsiState: 'NEUTRAL' },
    ...overrides,
  };
}

export function makeFundamental(overrides: Partial<FundamentalReport> = {}): FundamentalReport {
  return {
    symbol: 'AAPL',
    overallScore: 85,
    confidence: 'HIGH',
    isEligible: true,
    assetType: 'STOCK',
    dimensions: {},
    notes: [],
    ...overrides,
  };
}

export function makeCandidate(overrides: Partial<OptionCandidate> = {}): OptionCandidate {
  return {
    contractSymbol: 'AAPL270115C00180000',
    optionType: 'CALL',
    expiration: '2027-01-15',
    strike: 180,
    bid: 39,
    ask: 41,
    mid: 40,
    iv: 0.2,
    openInterest: 1200,
    volume: 40,
    greeks: { delta: 0.75, gamma: 0.004, theta: -0.03, vega: 0.6 },
    daysToExpiry: 371,
    spreadPct: 0.05,
    ...overrides,
  };
}

export function makeOptions(
  candidates: OptionCandidate[] = [makeCandidate(), makeCandidate(), makeCandidate()],
  overrides: Partial<OptionsReport> = {}
): OptionsReport {
  return {
    symbol: 'AAPL',
    status: 'OK',
    currentPrice: 200,
    count: candidates.length,
    candidates,
    ...overrides,
  };
}

function makeDecision(symbol: string, verdict: Verdict): Decision {
  return {
    symbol,
    verdict,
    reasons: ['Technical: Trend is BULLISH', `Verdict ${verdict}`],
    earningsRisk: false,
    assetType: 'STOCK',
    perDimensionPass: { technical: verdict !== 'NO_GO', fundamental: verdict !== 'NO_GO', options: verdict === 'GO' },
    evaluatedAt: '2026-01-10T15:00:00.000Z',
  };
}

function makeConviction(symbol: string, score: number): ConvictionResult {
  return {
    symbol,
    score,
    band: score >= 75 ? 'STRONG' : score >= 50 ? 'MODERATE' : 'WEAK',
    components: { technical: score, fundamental: score, volatility: score, liquidity: score },
    notes: [],
  };
}

export function makeScanResult(
  symbol: string,
  verdict: Verdict,
  score: number = 60,
  overrides: Partial<ScanResult> = {}
): ScanResult {
  return {
    symbol,
    currentPrice: 200,
    priceSource: 'fake_live',
    assetType: 'STOCK',
    earningsDate: null,
    decision: makeDecision(symbol, verdict),
    conviction: makeConviction(symbol, score),
    reports: {
      technical: makeTechnical({ symbol }),
      fundamental: makeFundamental({ symbol }),
      options: makeOptions([makeCandidate()], { symbol }),
    },
    ...overrides,
  };
}

export function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    id: 'pos-1',
    symbol: 'AAPL',
    assetType: 'STOCK',
    optionType: 'CALL',
    expiry: '2027-06-17',
    strike: 150,
    contracts: 2,
    entryDate: '2025-11-03',
    entryPrice: 10,
    underlyingEntryPrice: 170,
    status: 'OPEN',
    notes: '',
    tags: [],
    createdAt: '2025-11-03T15:00:00.000Z',
    updatedAt: '2025-11-03T15:00:00.000Z',
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<PositionSnapshot> = {}): PositionSnapshot {
  return {
    underlyingLast: 180,
    optionBid: 10.5,
    optionAsk: 11.5,
    optionLast: 11,
    optionMid: 11,
    markPrice: 11,
    delta: 0.7,
    gamma: 0.004,
    theta: -0.0312,
    vega: 0.5,
    iv: 0.3,
    daysToExpiry: 523,
    costBasis: 2000,
    marketValue: 2200,
    unrealizedPnl: 200,
    unrealizedPnlPct: 10,
    pricingSource: 'live_quote',
    underlyingSource: 'fake_live',
    pricingConfidence: 'HIGH',
    lastUpdated: '2026-01-10T12:00:00.000Z',
    ...overrides,
  };
}

export function makeScanRecord(id: string, timestamp: string, results: ScanResult[]): ScanRecord {
  return {
    id,
    timestamp,
    configFingerprint: 'abc123def456',
    counts: {
      symbols: results.length,
      go: results.filter((r) => r.decision.verdict === 'GO').length,
      watch: results.filter((r) => r.decision.verdict === 'WATCH').length,
      noGo: results.filter((r) => r.decision.verdict === 'NO_GO').length,
    },
    results,
  };
}

/**
 * Daily bars on consecutive calendar days; close = start + i * step, with odd
 * bars bumped by `bump`.
 */
export function makeBars(count: number, start = 100, step = 0.5, bump = 1): OhlcvBar[] {
  const bars: OhlcvBar[] = [];
  const first = new Date(2025, 0, 1);
  for (let i = 0; i < count; i++) {
    const close = start + i * step + (i % 2 === 1 ? bump : 0);
    const day = new Date(first.getFullYear(), first.getMonth(), first.getDate() + i);
    const date = `${day.getFullYear()}-${String(day.getMonth() + 1).padStart(2, '0')}-${String(day.getDate()).padStart(2, '0')}`;
    bars.push({ date, open: close, high: close + 1, low: close - 1, close, volume: 1_000_000 });
  }
  return bars;
}

export function makeChainRow(overrides: Partial<OptionChainRow> = {}): OptionChainRow {
  return {
    contractSymbol: 'SPY270115C00100000',
    optionType: 'CALL',
    strike: 100,
    expiration: '2027-01-15',
    bid: 19.5,
    ask: 20.5,
    last: 20,
    volume: 25,
    openInterest: 800,
    impliedVolatility: 0.15,
    greeks: { delta: 0.78, gamma: 0.005, theta: -0.02, vega: 0.4 },
    ...overrides,
  };
}

interface FakeMarketData {
  bars?: OhlcvBar[];
  fundamentals?: FundamentalsData;
  chain?: OptionChainRow[];
  earnings?: string | null;
  assetType?: AssetType;
  livePrice?: number | null;
  directPrice?: number | null;
  optionQuotes?: Record<string, OptionQuote>;
}

/** In-process provider covering every capability from per-symbol fixtures. */
export class FakeMarket
  implements
    OhlcvSource,
    FundamentalsSource,
    OptionsChainSource,
    EarningsDateSource,
    AssetTypeSource,
    LiveQuoteSource,
    DirectQuoteSource,
    OptionQuoteSource
{
  readonly calls: string[] = [];
  available = true;
  failing = new Set<string>();

  constructor(
    readonly name: string,
    private readonly data: Record<string, FakeMarketData> = {}
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  private lookup(method: string, symbol: string): FakeMarketData {
    this.calls.push(`${method}:${symbol}`);
    if (this.failing.has(method)) throw new Error(`${this.name} ${method} failed`);
    return this.data[symbol] ?? {};
  }

  async fetchOhlcv(symbol: string, _period: HistoryPeriod, _interval: string): Promise<OhlcvBar[]> {
    return this.lookup('ohlcv', symbol).bars ?? [];
  }

  async fetchFundamentals(symbol: string): Promise<FundamentalsData> {
    return this.lookup('fundamentals', symbol).fundamentals ?? {};
  }

  async fetchOptionsChain(symbol: string, _minDaysToExpiry: number): Promise<OptionChainRow[]> {
    return this.lookup('optionsChain', symbol).chain ?? [];
  }

  async fetchEarningsDate(symbol: string): Promise<string | null> {
    return this.lookup('earningsDate', symbol).earnings ?? null;
  }

  async fetchAssetType(symbol: string): Promise<AssetType> {
    return this.lookup('assetType', symbol).assetType ?? 'UNKNOWN';
  }

  async fetchLivePrice(symbol: string): Promise<number | null> {
    return this.lookup('livePrice', symbol).livePrice ?? null;
  }

  async fetchDirectQuote(symbol: string): Promise<number | null> {
    return this.lookup('directQuote', symbol).directPrice ?? null;
  }

  async fetchOptionQuote(contractSymbol: string): Promise<OptionQuote | null> {
    this.calls.push(`optionQuote:${contractSymbol}`);
    if (this.failing.has('optionQuote')) throw new Error(`${this.name} optionQuote failed`);
    for (const entry of Object.values(this.data)) {
      const quote = entry.optionQuotes?.[contractSymbol];
      if (quote) return quote;
    }
    return null;
  }
}
