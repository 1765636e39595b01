/**
 * DecisionGate: fail-closed entry verdict from the three reports.
 *
 * A dimension passes only on measured evidence. Unknown inputs fail their
 * dimension with a reason that names the unknown, so an inconclusive result
 * reads differently from a conclusively bad one. Earnings proximity is
 * advisory: it can turn GO into WATCH and nothing else.
 */

import type { DecisionConfig } from '@/core/config';
import { daysUntil, formatDate, parseDate } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { meanCandidateIv } from '@/analysis/options';
import type { Decision, Verdict } from '@/types/decision';
import type { AssetType } from '@/types/market';
import type { FundamentalReport, OptionsReport, TechnicalReport } from '@/types/reports';

const logger = createChildLogger('decision');

export interface GateInput {
  symbol: string;
  technical: TechnicalReport | null;
  fundamental: FundamentalReport | null;
  options: OptionsReport | null;
  earningsDate?: string | null;
  assetType: AssetType;
  now?: Date;
}

interface CheckResult {
  pass: boolean;
  reasons: string[];
}

export function evaluateTechnical(report: TechnicalReport | null, config: DecisionConfig): CheckResult {
  if (!report || report.status === 'INSUFFICIENT_DATA') {
    return { pass: false, reasons: ['Technical: Insufficient Data (UNKNOWN)'] };
  }

  if (report.trend === 'UNKNOWN') {
    return { pass: false, reasons: ['Technical: Trend is UNKNOWN (insufficient data)'] };
  }

  const reasons: string[] = [];
  let pass = true;

  if (config.requireBullishTrend && report.trend !== 'BULLISH') {
    reasons.push(`Technical: Trend is ${report.trend} (Bullish required)`);
    pass = false;
  } else {
    reasons.push(`Technical: Trend is ${report.trend}`);
  }

  const rsi = report.indicators.rsi;
  if (rsi === null) {
    reasons.push('Technical: RSI unavailable, overbought check skipped');
  } else if (rsi > config.maxRsiEntry) {
    reasons.push(`Technical: RSI is Overbought (${rsi.toFixed(1)} > ${config.maxRsiEntry})`);
    pass = false;
  } else {
    reasons.push(`Technical: RSI ${rsi.toFixed(1)} <= ${config.maxRsiEntry}`);
  }

  return { pass, reasons };
}

export function evaluateFundamental(
  report: FundamentalReport | null,
  assetType: AssetType,
  config: DecisionConfig
): CheckResult {
  if (assetType === 'ETF' && config.etfBypassFundamentals) {
    return { pass: true, reasons: ['Fundamentals: ETF bypass (fixed neutral pass)'] };
  }

  if (!report) {
    return { pass: false, reasons: ['Fundamentals: No Data (UNKNOWN)'] };
  }

  if (report.confidence === 'LOW' && report.overallScore === 0) {
    return {
      pass: false,
      reasons: ['Fundamentals: No usable metrics (UNKNOWN, LOW confidence)'],
    };
  }

  if (report.overallScore < config.minFundamentalsScore) {
    return {
      pass: false,
      reasons: [`Fundamentals: Score ${report.overallScore} < ${config.minFundamentalsScore}`],
    };
  }

  if (!report.isEligible) {
    return { pass: false, reasons: ['Fundamentals: Marked ineligible'] };
  }

  return {
    pass: true,
    reasons: [
      `Fundamentals: Score ${report.overallScore} >= ${config.minFundamentalsScore} (${report.confidence} confidence)`,
    ],
  };
}

export function evaluateOptions(
  report: OptionsReport | null,
  hv: number | null,
  config: DecisionConfig
): CheckResult {
  if (!report || report.status !== 'OK') {
    const status = report?.status ?? 'NO_DATA';
    return { pass: false, reasons: [`Options: ${status} - No suitable LEAPS chains found`] };
  }

  if (report.count === 0) {
    return { pass: false, reasons: ['Options: 0 candidates found matching criteria'] };
  }

  if (report.candidates.length === 0) {
    return { pass: false, reasons: ['Options: No candidates available'] };
  }

  const avgIv = meanCandidateIv(report.candidates);
  if (avgIv === null) {
    return {
      pass: false,
      reasons: ['Options: UNKNOWN IV data - cannot evaluate volatility pricing'],
    };
  }

  if (hv === null || !(hv > 0)) {
    return {
      pass: false,
      reasons: ['Options: UNKNOWN Historical Volatility - cannot compare IV/HV ratio'],
    };
  }

  const ratio = avgIv / hv;
  if (ratio > config.maxIvHvRatio) {
    return {
      pass: false,
      reasons: [`Options: Volatility too expensive, IV/HV ratio ${ratio.toFixed(2)} > ${config.maxIvHvRatio}`],
    };
  }

  return {
    pass: true,
    reasons: [
      `Options: ${report.count} candidates, IV/HV ratio ${ratio.toFixed(2)} <= ${config.maxIvHvRatio}`,
    ],
  };
}

/**
 * Earnings within [0, blockDays] calendar days ahead. A missing or past date
 * is no risk.
 */
export function checkEarningsRisk(
  earningsDate: string | null | undefined,
  blockDays: number,
  now: Date = new Date()
): CheckResult & { risk: boolean } {
  const date = parseDate(earningsDate);
  if (!date) {
    return { risk: false, pass: true, reasons: ['Earnings: No upcoming date known'] };
  }

  const days = daysUntil(date, now);
  if (days === null || days < 0) {
    return { risk: false, pass: true, reasons: ['Earnings: Last report already passed'] };
  }

  if (days <= blockDays) {
    return {
      risk: true,
      pass: false,
      reasons: [
        `Earnings: Within ${days} days (${formatDate(date)}), binary risk avoided (threshold: ${blockDays} days)`,
      ],
    };
  }

  return {
    risk: false,
    pass: true,
    reasons: [`Earnings: ${days} days away (${formatDate(date)}), outside ${blockDays}-day window`],
  };
}

export function evaluateDecision(input: GateInput, config: DecisionConfig): Decision {
  const now = input.now ?? new Date();

  const technical = evaluateTechnical(input.technical, config);
  const fundamental = evaluateFundamental(input.fundamental, input.assetType, config);
  const options = evaluateOptions(input.options, input.technical?.indicators.hv ?? null, config);
  const earnings = checkEarningsRisk(input.earningsDate, config.earningsBlockDays, now);

  const reasons = [...technical.reasons, ...fundamental.reasons, ...options.reasons, ...earnings.reasons];

  let verdict: Verdict;
  if (technical.pass && fundamental.pass && options.pass) {
    verdict = 'GO';
    reasons.push('All systems GO.');
  } else if (technical.pass && fundamental.pass) {
    verdict = 'WATCH';
    reasons.push('Fundamentals and Technicals align, but Options/Volatility conditions not met.');
  } else {
    verdict = 'NO_GO';
    reasons.push('NO_GO: Technical or Fundamental conditions not met.');
  }

  if (earnings.risk && verdict === 'GO') {
    verdict = 'WATCH';
    reasons.push('Downgraded GO to WATCH due to earnings proximity.');
    logger.warn({ symbol: input.symbol }, 'Decision downgraded from GO to WATCH due to earnings proximity');
  }

  logger.info({ symbol: input.symbol, assetType: input.assetType, verdict }, 'Decision evaluated');

  return Object.freeze({
    symbol: input.symbol,
    verdict,
    reasons: Object.freeze(reasons),
    earningsRisk: earnings.risk,
    assetType: input.assetType,
    perDimensionPass: Object.freeze({
      technical: technical.pass,
      fundamental: fundamental.pass,
      options: options.pass,
    }),
    evaluatedAt: now.toISOString(),
  });
}

/** Config-bound wrapper for callers that evaluate many symbols. */
export class DecisionGate {
  constructor(private readonly config: DecisionConfig) {}

  evaluate(input: GateInput): Decision {
    return evaluateDecision(input, this.config);
  }
}
