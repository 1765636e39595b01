/**
 * Fundamental report: four rule-scored dimensions (0-100 each) combined by
 * configured weights. Confidence tracks how many inputs were present.
 */

import type { FundamentalsConfig } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import type { AssetType, FundamentalsData } from '@/types/market';
import type { Confidence, DimensionScore, FundamentalReport } from '@/types/reports';

const logger = createChildLogger('fundamentals');

/** Neutral passing score reported for ETFs, which have no company financials. */
export const ETF_NEUTRAL_SCORE = 70;

function present(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function confidenceFor(missing: number, total: number): Confidence {
  if (missing === 0) return 'HIGH';
  if (missing < total) return 'MEDIUM';
  return 'LOW';
}

/** Scores `value` 50 when >= good, 25 when positive, else 0. */
function tieredPositive(
  value: number | null | undefined,
  good: number,
  label: string,
  notes: string[]
): { points: number; missing: boolean } {
  if (!present(value)) {
    notes.push(`Missing ${label}`);
    return { points: 0, missing: true };
  }
  if (value >= good) return { points: 50, missing: false };
  if (value > 0) return { points: 25, missing: false };
  notes.push(`Negative ${label}: ${pct(value)}`);
  return { points: 0, missing: false };
}

function analyzeGrowth(info: FundamentalsData, config: FundamentalsConfig): DimensionScore {
  const notes: string[] = [];
  const rev = tieredPositive(info.revenueGrowth, config.thresholds.revenueGrowthGood, 'revenueGrowth', notes);
  const earn = tieredPositive(info.earningsGrowth, config.thresholds.earningsGrowthGood, 'earningsGrowth', notes);
  return {
    score: rev.points + earn.points,
    confidence: confidenceFor(Number(rev.missing) + Number(earn.missing), 2),
    metrics: { revenueGrowth: info.revenueGrowth ?? null, earningsGrowth: info.earningsGrowth ?? null },
    notes,
  };
}

function analyzeProfitability(info: FundamentalsData, config: FundamentalsConfig): DimensionScore {
  const notes: string[] = [];
  const margins = tieredPositive(info.profitMargins, config.thresholds.netMarginGood, 'profitMargins', notes);
  const roe = tieredPositive(info.returnOnEquity, config.thresholds.roeGood, 'returnOnEquity', notes);
  return {
    score: margins.points + roe.points,
    confidence: confidenceFor(Number(margins.missing) + Number(roe.missing), 2),
    metrics: { profitMargins: info.profitMargins ?? null, returnOnEquity: info.returnOnEquity ?? null },
    notes,
  };
}

function analyzeBalanceSheet(info: FundamentalsData, config: FundamentalsConfig): DimensionScore {
  const notes: string[] = [];
  let score = 0;
  let missing = 0;
  const { debtToEquityMaxGood, currentRatioMinGood } = config.thresholds;

  const de = info.debtToEquity;
  if (present(de)) {
    // Providers report D/E either as a ratio or as a percentage (156 = 1.56)
    const ratio = de > 10 ? de / 100 : de;
    if (ratio <= debtToEquityMaxGood) score += 50;
    else if (ratio <= debtToEquityMaxGood * 2) score += 25;
    else notes.push(`High Debt/Equity: ${ratio.toFixed(2)}`);
  } else {
    missing++;
    notes.push('Missing debtToEquity');
  }

  const cr = info.currentRatio;
  if (present(cr)) {
    if (cr >= currentRatioMinGood) score += 50;
    else if (cr >= 1) score += 25;
    else notes.push(`Weak Current Ratio: ${cr.toFixed(2)}`);
  } else {
    missing++;
    notes.push('Missing currentRatio');
  }

  return {
    score,
    confidence: confidenceFor(missing, 2),
    metrics: { debtToEquity: de ?? null, currentRatio: cr ?? null },
    notes,
  };
}

function analyzeStability(info: FundamentalsData): DimensionScore {
  const notes: string[] = [];
  let score = 0;
  let missing = 0;

  const ocf = info.operatingCashflow;
  if (present(ocf)) {
    if (ocf > 0) score += 60;
    else notes.push(`Negative Operating Cash Flow: ${ocf}`);
  } else {
    missing++;
    notes.push('Missing operatingCashflow');
  }

  const beta = info.beta;
  if (present(beta)) {
    if (beta > 0 && beta < 1.5) score += 40;
    else if (beta >= 1.5 && beta < 2.5) score += 20;
    else notes.push(`High/Abnormal Beta: ${beta}`);
  } else {
    missing++;
    notes.push('Missing beta');
  }

  return {
    score,
    confidence: confidenceFor(missing, 2),
    metrics: { operatingCashflow: ocf ?? null, beta: beta ?? null },
    notes,
  };
}

const CONFIDENCE_WEIGHT: Record<Confidence, number> = { HIGH: 1, MEDIUM: 0.5, LOW: 0 };

function hasAnyMetric(info: FundamentalsData): boolean {
  return [
    info.revenueGrowth,
    info.earningsGrowth,
    info.profitMargins,
    info.returnOnEquity,
    info.debtToEquity,
    info.currentRatio,
    info.operatingCashflow,
    info.beta,
  ].some(present);
}

export function analyzeFundamentals(
  symbol: string,
  info: FundamentalsData,
  assetType: AssetType,
  config: FundamentalsConfig
): FundamentalReport {
  if (assetType === 'ETF') {
    return {
      symbol,
      overallScore: ETF_NEUTRAL_SCORE,
      confidence: 'MEDIUM',
      isEligible: true,
      assetType,
      dimensions: {},
      notes: ['ETF: fundamental scoring bypassed'],
    };
  }

  if (!hasAnyMetric(info)) {
    logger.warn({ symbol }, 'No fundamental data');
    return {
      symbol,
      overallScore: 0,
      confidence: 'LOW',
      isEligible: false,
      assetType,
      dimensions: {},
      notes: ['No data available'],
    };
  }

  const dimensions = {
    growth: analyzeGrowth(info, config),
    profitability: analyzeProfitability(info, config),
    balanceSheet: analyzeBalanceSheet(info, config),
    stability: analyzeStability(info),
  };

  const w = config.weights;
  const weighted =
    dimensions.growth.score * w.growth +
    dimensions.profitability.score * w.profitability +
    dimensions.balanceSheet.score * w.balanceSheet +
    dimensions.stability.score * w.stability;
  const totalWeight = w.growth + w.profitability + w.balanceSheet + w.stability;
  const overallScore = Math.round((weighted / totalWeight) * 10) / 10;

  const all = Object.values(dimensions);
  const avgConfidence = all.reduce((acc, d) => acc + CONFIDENCE_WEIGHT[d.confidence], 0) / all.length;
  const confidence: Confidence = avgConfidence >= 0.8 ? 'HIGH' : avgConfidence >= 0.5 ? 'MEDIUM' : 'LOW';

  logger.debug({ symbol, overallScore, confidence }, 'Fundamentals scored');

  return {
    symbol,
    overallScore,
    confidence,
    isEligible: overallScore >= config.minScoreLeaps,
    assetType,
    dimensions,
    notes: all.flatMap((d) => d.notes),
  };
}
