/**
 * Application configuration loaded from config/settings.json plus environment.
 *
 * The result is validated, filled with defaults and frozen. Components receive
 * the slice they need as an argument; nothing below reads this module's cache.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { validateSettings } from '@/validation/ajv_instance';
import { loadEnvConfig, type EnvConfig } from './env';
import type { PricePreference } from '@/types/portfolio';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export interface DecisionConfig {
  requireBullishTrend: boolean;
  maxRsiEntry: number;
  minFundamentalsScore: number;
  maxIvHvRatio: number;
  earningsBlockDays: number;
  etfBypassFundamentals: boolean;
}

export interface ConvictionWeights {
  technical: number;
  fundamental: number;
  volatility: number;
  liquidity: number;
}

export interface ConvictionConfig {
  weights: ConvictionWeights;
  strongThreshold: number;
  moderateThreshold: number;
  etfFundamentalScore: number;
}

export type HistoryPeriod = '1mo' | '3mo' | '6mo' | '1y' | '2y' | '5y';

export interface TechnicalConfig {
  smaFast: number;
  smaSlow: number;
  rsiPeriod: number;
  rsiOverbought: number;
  rsiOversold: number;
  hvWindow: number;
  historyPeriod: HistoryPeriod;
}

export interface FundamentalsConfig {
  minScoreLeaps: number;
  weights: {
    growth: number;
    profitability: number;
    balanceSheet: number;
    stability: number;
  };
  thresholds: {
    revenueGrowthGood: number;
    earningsGrowthGood: number;
    netMarginGood: number;
    roeGood: number;
    debtToEquityMaxGood: number;
    currentRatioMinGood: number;
  };
}

export interface OptionsConfig {
  minDaysToExpiration: number;
  minOpenInterest: number;
  minVolume: number;
  maxSpreadPct: number;
  targetDeltaMin: number;
  targetDeltaMax: number;
  riskFreeRate: number;
}

export interface PortfolioConfig {
  takeProfitPct: number;
  stopLossPct: number;
  expiryReviewDays: number;
  rollGuidanceDays: number;
  earningsWindowDays: number;
  pricePreference: PricePreference;
}

export interface TradierConfig {
  enabled: boolean;
  token: string | null;
  baseUrl: string;
  sandbox: boolean;
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export interface YahooConfig {
  enabled: boolean;
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export interface ProvidersConfig {
  timeoutMs: number;
  tradier: TradierConfig;
  yahoo: YahooConfig;
}

export interface ScanConfig {
  symbols: string[];
  concurrency: number;
  throttleMs: number;
}

export interface AppConfig {
  decision: DecisionConfig;
  conviction: ConvictionConfig;
  technical: TechnicalConfig;
  fundamentals: FundamentalsConfig;
  options: OptionsConfig;
  portfolio: PortfolioConfig;
  providers: ProvidersConfig;
  scan: ScanConfig;
  history: { retentionDays: number };
  alerts: { convictionThreshold: number; includePortfolioWarnings: boolean };
  tracking: { horizonsDays: number[]; minSampleSize: number };
  orders: { limitDiscount: number; defaultContracts: number };
  dbPath: string;
  projectRoot: string;
}

/** Shape of config/settings.json; every key optional. */
export interface RawSettings {
  decision?: {
    require_bullish_trend?: boolean;
    max_rsi_entry?: number;
    min_fundamentals_score?: number;
    max_iv_hv_ratio?: number;
    earnings_block_days?: number;
    etf_bypass_fundamentals?: boolean;
  };
  conviction?: {
    weights?: ConvictionWeights;
    strong_threshold?: number;
    moderate_threshold?: number;
    etf_fundamental_score?: number;
  };
  technical?: {
    sma_fast?: number;
    sma_slow?: number;
    rsi_period?: number;
    rsi_overbought?: number;
    rsi_oversold?: number;
    hv_window?: number;
    history_period?: HistoryPeriod;
  };
  fundamentals?: {
    min_score_leaps?: number;
    weights?: {
      growth?: number;
      profitability?: number;
      balance_sheet?: number;
      stability?: number;
    };
    thresholds?: {
      growth_revenue_yoy_good?: number;
      growth_earnings_yoy_good?: number;
      profitability_net_margin_good?: number;
      profitability_roe_good?: number;
      debt_to_equity_max_good?: number;
      current_ratio_min_good?: number;
    };
  };
  options?: {
    min_days_to_expiration?: number;
    min_open_interest?: number;
    min_volume?: number;
    max_bid_ask_spread_pct?: number;
    target_delta_min?: number;
    target_delta_max?: number;
    risk_free_rate?: number;
  };
  portfolio?: {
    take_profit_pct?: number;
    stop_loss_pct?: number;
    expiry_review_days?: number;
    roll_guidance_days?: number;
    price_preference?: PricePreference;
  };
  providers?: {
    timeout_ms?: number;
    tradier?: {
      enabled?: boolean;
      base_url?: string;
      sandbox?: boolean;
      max_requests_per_minute?: number;
      max_concurrent?: number;
    };
    yahoo?: {
      enabled?: boolean;
      max_requests_per_minute?: number;
      max_concurrent?: number;
    };
  };
  scan?: {
    symbols?: string[];
    concurrency?: number;
    throttle_ms?: number;
  };
  history?: { retention_days?: number };
  alerts?: { conviction_threshold?: number; include_portfolio_warnings?: boolean };
  tracking?: { horizons_days?: number[]; min_sample_size?: number };
  orders?: { limit_discount?: number; default_contracts?: number };
}

export const TRADIER_LIVE_URL = 'https://api.tradier.com/v1';
export const TRADIER_SANDBOX_URL = 'https://sandbox.tradier.com/v1';

function normalizeSymbols(symbols: string[] | undefined): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const sym of symbols ?? []) {
    const upper = sym.trim().toUpperCase();
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      out.push(upper);
    }
  }
  return out;
}

function resolveTradierBaseUrl(
  raw: RawSettings['providers'],
  env: EnvConfig
): { baseUrl: string; sandbox: boolean } {
  const sandbox = env.tradierSandbox ?? raw?.tradier?.sandbox ?? false;
  const explicit = env.tradierBaseUrl ?? raw?.tradier?.base_url ?? null;

  // explicit URL > sandbox flag > live default
  if (explicit) {
    const trimmed = explicit.replace(/\/+$/, '');
    const baseUrl = trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
    return { baseUrl, sandbox: baseUrl.toLowerCase().includes('sandbox') };
  }
  return { baseUrl: sandbox ? TRADIER_SANDBOX_URL : TRADIER_LIVE_URL, sandbox };
}

/**
 * Build the application config from already-parsed settings. Throws
 * ConfigurationError on schema violations or inconsistent thresholds.
 */
export function buildConfig(
  rawInput: unknown,
  env: EnvConfig,
  projectRoot: string = process.cwd()
): AppConfig {
  const validation = validateSettings(rawInput ?? {});
  if (!validation.valid || !validation.data) {
    throw new ConfigurationError('Invalid settings', validation.errors ?? []);
  }
  const raw = validation.data;

  const d = raw.decision ?? {};
  const c = raw.conviction ?? {};
  const t = raw.technical ?? {};
  const f = raw.fundamentals ?? {};
  const o = raw.options ?? {};
  const p = raw.portfolio ?? {};
  const pr = raw.providers ?? {};

  const decision: DecisionConfig = {
    requireBullishTrend: d.require_bullish_trend ?? true,
    maxRsiEntry: d.max_rsi_entry ?? 70,
    minFundamentalsScore: d.min_fundamentals_score ?? 60,
    maxIvHvRatio: d.max_iv_hv_ratio ?? 1.5,
    earningsBlockDays: d.earnings_block_days ?? 14,
    etfBypassFundamentals: d.etf_bypass_fundamentals ?? true,
  };

  const { baseUrl, sandbox } = resolveTradierBaseUrl(pr, env);

  const config: AppConfig = {
    decision,
    conviction: {
      weights: c.weights ?? { technical: 0.3, fundamental: 0.25, volatility: 0.25, liquidity: 0.2 },
      strongThreshold: c.strong_threshold ?? 75,
      moderateThreshold: c.moderate_threshold ?? 50,
      etfFundamentalScore: c.etf_fundamental_score ?? 70,
    },
    technical: {
      smaFast: t.sma_fast ?? 50,
      smaSlow: t.sma_slow ?? 200,
      rsiPeriod: t.rsi_period ?? 14,
      rsiOverbought: t.rsi_overbought ?? 70,
      rsiOversold: t.rsi_oversold ?? 30,
      hvWindow: t.hv_window ?? 20,
      historyPeriod: t.history_period ?? '2y',
    },
    fundamentals: {
      minScoreLeaps: f.min_score_leaps ?? 60,
      weights: {
        growth: f.weights?.growth ?? 0.3,
        profitability: f.weights?.profitability ?? 0.3,
        balanceSheet: f.weights?.balance_sheet ?? 0.25,
        stability: f.weights?.stability ?? 0.15,
      },
      thresholds: {
        revenueGrowthGood: f.thresholds?.growth_revenue_yoy_good ?? 0.1,
        earningsGrowthGood: f.thresholds?.growth_earnings_yoy_good ?? 0.1,
        netMarginGood: f.thresholds?.profitability_net_margin_good ?? 0.15,
        roeGood: f.thresholds?.profitability_roe_good ?? 0.15,
        debtToEquityMaxGood: f.thresholds?.debt_to_equity_max_good ?? 1.5,
        currentRatioMinGood: f.thresholds?.current_ratio_min_good ?? 1.2,
      },
    },
    options: {
      minDaysToExpiration: o.min_days_to_expiration ?? 300,
      minOpenInterest: o.min_open_interest ?? 50,
      minVolume: o.min_volume ?? 5,
      maxSpreadPct: o.max_bid_ask_spread_pct ?? 0.1,
      targetDeltaMin: o.target_delta_min ?? 0.65,
      targetDeltaMax: o.target_delta_max ?? 0.85,
      riskFreeRate: o.risk_free_rate ?? 0.045,
    },
    portfolio: {
      takeProfitPct: p.take_profit_pct ?? 50,
      stopLossPct: p.stop_loss_pct ?? -30,
      expiryReviewDays: p.expiry_review_days ?? 120,
      rollGuidanceDays: p.roll_guidance_days ?? 270,
      // Earnings window for held positions follows the entry gate
      earningsWindowDays: decision.earningsBlockDays,
      pricePreference: p.price_preference ?? 'MID',
    },
    providers: {
      timeoutMs: pr.timeout_ms ?? 8000,
      tradier: {
        enabled: pr.tradier?.enabled ?? true,
        token: env.tradierToken,
        baseUrl,
        sandbox,
        maxRequestsPerMinute: pr.tradier?.max_requests_per_minute ?? 120,
        maxConcurrent: pr.tradier?.max_concurrent ?? 2,
      },
      yahoo: {
        enabled: pr.yahoo?.enabled ?? true,
        maxRequestsPerMinute: pr.yahoo?.max_requests_per_minute ?? 60,
        maxConcurrent: pr.yahoo?.max_concurrent ?? 2,
      },
    },
    scan: {
      symbols: normalizeSymbols(raw.scan?.symbols),
      concurrency: raw.scan?.concurrency ?? 1,
      throttleMs: raw.scan?.throttle_ms ?? 0,
    },
    history: { retentionDays: raw.history?.retention_days ?? 30 },
    alerts: {
      convictionThreshold: raw.alerts?.conviction_threshold ?? 75,
      includePortfolioWarnings: raw.alerts?.include_portfolio_warnings ?? true,
    },
    tracking: {
      horizonsDays: [...(raw.tracking?.horizons_days ?? [30, 60, 90])].sort((a, b) => a - b),
      minSampleSize: raw.tracking?.min_sample_size ?? 30,
    },
    orders: {
      limitDiscount: raw.orders?.limit_discount ?? 0.98,
      defaultContracts: raw.orders?.default_contracts ?? 1,
    },
    dbPath: resolveDbPath(env.dbPath, projectRoot),
    projectRoot,
  };

  const problems = checkConsistency(config);
  if (problems.length > 0) {
    throw new ConfigurationError('Inconsistent settings', problems);
  }

  return deepFreeze(config);
}

function resolveDbPath(envPath: string | null, projectRoot: string): string {
  if (!envPath) return join(projectRoot, 'data', 'leaps_desk.db');
  if (envPath === ':memory:' || isAbsolute(envPath)) return envPath;
  return join(projectRoot, envPath);
}

export function checkConsistency(config: AppConfig): string[] {
  const problems: string[] = [];
  const w = config.conviction.weights;
  const weightSum = w.technical + w.fundamental + w.volatility + w.liquidity;
  if (Math.abs(weightSum - 1) > 1e-6) {
    problems.push(`conviction weights must sum to 1 (got ${weightSum.toFixed(4)})`);
  }
  if (config.conviction.moderateThreshold > config.conviction.strongThreshold) {
    problems.push('conviction moderate_threshold must not exceed strong_threshold');
  }
  if (config.technical.smaFast >= config.technical.smaSlow) {
    problems.push('technical sma_fast must be shorter than sma_slow');
  }
  if (config.technical.rsiOversold >= config.technical.rsiOverbought) {
    problems.push('technical rsi_oversold must be below rsi_overbought');
  }
  if (config.options.targetDeltaMin > config.options.targetDeltaMax) {
    problems.push('options target_delta_min must not exceed target_delta_max');
  }
  const fw = config.fundamentals.weights;
  if (fw.growth + fw.profitability + fw.balanceSheet + fw.stability <= 0) {
    problems.push('fundamentals weights must not all be zero');
  }
  return problems;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function resolveSettingsPath(projectRoot: string, env: EnvConfig): string {
  const fromEnv = env.settingsPath;
  if (fromEnv) {
    return isAbsolute(fromEnv) ? fromEnv : join(projectRoot, fromEnv);
  }
  return join(projectRoot, 'config', 'settings.json');
}

export interface LoadConfigOptions {
  projectRoot?: string;
  env?: EnvConfig;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const projectRoot = options.projectRoot ?? process.cwd();
  const env = options.env ?? loadEnvConfig();
  const settingsPath = resolveSettingsPath(projectRoot, env);

  let raw: unknown = {};
  if (existsSync(settingsPath)) {
    try {
      raw = JSON.parse(readFileSync(settingsPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Unable to parse ${settingsPath}`, [message]);
    }
  } else if (env.settingsPath) {
    throw new ConfigurationError(`Settings file not found: ${settingsPath}`);
  }

  return buildConfig(raw, env, projectRoot);
}
