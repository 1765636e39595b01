/**
 * Conviction score: weighted 0-100 ranking from the same reports the gate
 * reads. Purely additive; never gates and never reads the Decision.
 */

import type { ConvictionConfig } from '@/core/config';
import { meanCandidateIv } from '@/analysis/options';
import type { ConvictionBand, ConvictionComponents, ConvictionResult } from '@/types/decision';
import type { AssetType } from '@/types/market';
import type {
  Confidence,
  FundamentalReport,
  OptionCandidate,
  OptionsReport,
  TechnicalReport,
} from '@/types/reports';

export interface ConvictionInput {
  symbol: string;
  assetType: AssetType;
  technical: TechnicalReport | null;
  fundamental: FundamentalReport | null;
  options: OptionsReport | null;
}

const CONFIDENCE_MULTIPLIER: Record<Confidence, number> = {
  HIGH: 1.0,
  MEDIUM: 0.9,
  LOW: 0.7,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function scoreTechnical(report: TechnicalReport | null, notes: string[]): number {
  if (!report) {
    notes.push('Technical data unavailable');
    return 30;
  }

  let score = 50;
  switch (report.trend) {
    case 'BULLISH':
      score += 30;
      break;
    case 'BEARISH':
      score -= 30;
      break;
    case 'NEUTRAL':
      break;
    case 'UNKNOWN':
      score -= 20;
      notes.push('Trend unknown - technical score reduced');
      break;
  }

  const rsi = report.indicators.rsi;
  if (rsi !== null) {
    if (rsi >= 40 && rsi <= 60) score += 15;
    else if ((rsi >= 30 && rsi < 40) || (rsi > 60 && rsi <= 70)) score += 10;
    else if (rsi < 30) score += 5;
    else score -= 10;
  }

  if (report.signals.goldenCross) {
    score += 10;
    notes.push('Golden cross detected');
  }
  if (report.signals.deathCross) {
    score -= 15;
    notes.push('Death cross detected');
  }

  return clamp(score, 0, 100);
}

export function scoreFundamental(
  report: FundamentalReport | null,
  assetType: AssetType,
  etfProxy: number,
  notes: string[]
): number {
  if (assetType === 'ETF') {
    notes.push(`ETF: Using proxy fundamental score (${etfProxy})`);
    return etfProxy;
  }
  if (!report) {
    notes.push('Fundamental data unavailable');
    return 30;
  }

  if (report.confidence === 'MEDIUM') notes.push('Medium confidence fundamentals');
  if (report.confidence === 'LOW') notes.push('Low confidence fundamentals - score reduced');

  return Math.min(100, report.overallScore * CONFIDENCE_MULTIPLIER[report.confidence]);
}

export function ivHvBand(ratio: number): number {
  if (ratio <= 0.9) return 90;
  if (ratio <= 1.1) return 80;
  if (ratio <= 1.3) return 65;
  if (ratio <= 1.5) return 50;
  return 30;
}

export function scoreVolatility(
  options: OptionsReport | null,
  hv: number | null,
  notes: string[]
): number {
  const candidates = options?.candidates ?? [];
  if (candidates.length === 0) {
    notes.push('No options candidates - volatility score neutral');
    return 50;
  }

  const avgIv = meanCandidateIv(candidates);
  if (avgIv === null) {
    notes.push('IV data unavailable');
    return 40;
  }

  if (hv !== null && hv > 0) {
    const ratio = avgIv / hv;
    const band = ivHvBand(ratio);
    if (band === 90) notes.push(`IV/HV ratio excellent (${ratio.toFixed(2)})`);
    if (band === 30) notes.push(`IV/HV ratio high (${ratio.toFixed(2)}) - expensive`);
    return band;
  }

  notes.push('HV unavailable - using IV heuristic');
  if (avgIv < 0.2) return 75;
  if (avgIv < 0.35) return 60;
  return 45;
}

export function openInterestBand(avgOi: number): number {
  if (avgOi >= 5000) return 100;
  if (avgOi >= 1000) return 85;
  if (avgOi >= 500) return 70;
  if (avgOi >= 100) return 55;
  if (avgOi >= 50) return 40;
  return 25;
}

export function spreadBand(spreadPct: number): number {
  if (spreadPct <= 0.03) return 100;
  if (spreadPct <= 0.05) return 85;
  if (spreadPct <= 0.1) return 65;
  if (spreadPct <= 0.15) return 45;
  return 25;
}

export function scoreLiquidity(candidates: readonly OptionCandidate[], notes: string[]): number {
  if (candidates.length === 0) {
    notes.push('No options candidates for liquidity scoring');
    return 30;
  }

  const avgOi = candidates.reduce((acc, c) => acc + c.openInterest, 0) / candidates.length;
  const oiScore = openInterestBand(avgOi);
  if (oiScore === 25) notes.push('Low open interest - liquidity concern');

  const spreadScores = candidates
    .filter((c) => c.bid > 0 && c.ask > 0)
    .map((c) => spreadBand((c.ask - c.bid) / c.ask));
  const spreadScore =
    spreadScores.length > 0 ? spreadScores.reduce((a, b) => a + b, 0) / spreadScores.length : 50;

  return oiScore * 0.6 + spreadScore * 0.4;
}

export class ConvictionScorer {
  constructor(private readonly config: ConvictionConfig) {}

  band(score: number): ConvictionBand {
    if (score >= this.config.strongThreshold) return 'STRONG';
    if (score >= this.config.moderateThreshold) return 'MODERATE';
    return 'WEAK';
  }

  score(input: ConvictionInput): ConvictionResult {
    const notes: string[] = [];
    const hv = input.technical?.indicators.hv ?? null;

    const components: ConvictionComponents = {
      technical: scoreTechnical(input.technical, notes),
      fundamental: scoreFundamental(input.fundamental, input.assetType, this.config.etfFundamentalScore, notes),
      volatility: scoreVolatility(input.options, hv, notes),
      liquidity: scoreLiquidity(input.options?.candidates ?? [], notes),
    };

    const w = this.config.weights;
    const total = round1(
      components.technical * w.technical +
        components.fundamental * w.fundamental +
        components.volatility * w.volatility +
        components.liquidity * w.liquidity
    );

    return {
      symbol: input.symbol,
      score: total,
      band: this.band(total),
      components: {
        technical: round1(components.technical),
        fundamental: round1(components.fundamental),
        volatility: round1(components.volatility),
        liquidity: round1(components.liquidity),
      },
      notes,
    };
  }

  /** Scores every input; highest first, input order kept on ties. */
  scoreBatch(inputs: readonly ConvictionInput[]): ConvictionResult[] {
    return inputs.map((input) => this.score(input)).sort((a, b) => b.score - a.score);
  }
}
