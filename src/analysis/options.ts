/**
 * LEAPS call candidate selection: liquidity and spread filters, then a delta
 * band. Candidates are ordered by open interest, highest first.
 */

import type { OptionsConfig } from '@/core/config';
import { daysUntil } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { OptionChainRow } from '@/types/market';
import type { Greeks, OptionCandidate, OptionsReport } from '@/types/reports';
import { blackScholes } from './greeks';

const logger = createChildLogger('options');

interface LiquidRow {
  row: OptionChainRow;
  bid: number;
  ask: number;
  mid: number;
  spreadPct: number;
  openInterest: number;
  volume: number;
}

function toLiquid(row: OptionChainRow, config: OptionsConfig): LiquidRow | null {
  const { bid, ask, openInterest, volume } = row;
  if (bid === null || ask === null || openInterest === null || volume === null) return null;
  const mid = (bid + ask) / 2;
  if (!(mid > 0)) return null;
  const spreadPct = (ask - bid) / mid;
  if (openInterest < config.minOpenInterest) return null;
  if (volume < config.minVolume) return null;
  if (spreadPct > config.maxSpreadPct) return null;
  return { row, bid, ask, mid, spreadPct, openInterest, volume };
}

/**
 * Provider Greeks when complete, otherwise Black-Scholes from the row's IV.
 */
function resolveGreeks(
  liquid: LiquidRow,
  spot: number | null,
  daysToExpiry: number,
  config: OptionsConfig
): Greeks | null {
  const g = liquid.row.greeks;
  if (g && g.delta !== null && g.gamma !== null && g.theta !== null && g.vega !== null) {
    return { delta: g.delta, gamma: g.gamma, theta: g.theta, vega: g.vega };
  }

  const iv = liquid.row.impliedVolatility;
  if (spot === null || iv === null) return null;
  const result = blackScholes({
    type: liquid.row.optionType,
    spot,
    strike: liquid.row.strike,
    years: daysToExpiry / 365,
    rate: config.riskFreeRate,
    sigma: iv,
  });
  return result
    ? { delta: result.delta, gamma: result.gamma, theta: result.theta, vega: result.vega }
    : null;
}

export function analyzeOptionsChain(
  symbol: string,
  currentPrice: number | null,
  chain: OptionChainRow[],
  config: OptionsConfig,
  now: Date = new Date()
): OptionsReport {
  const calls = chain.filter((row) => row.optionType === 'CALL');
  if (calls.length === 0) {
    return { symbol, status: 'NO_DATA', currentPrice, count: 0, candidates: [] };
  }

  const liquid = calls
    .map((row) => toLiquid(row, config))
    .filter((row): row is LiquidRow => row !== null);

  if (liquid.length === 0) {
    logger.info({ symbol, chainSize: calls.length }, 'No options passed liquidity/spread filters');
    return { symbol, status: 'NO_LIQUIDITY', currentPrice, count: 0, candidates: [] };
  }

  const candidates: OptionCandidate[] = [];
  for (const item of liquid) {
    const days = daysUntil(item.row.expiration, now);
    if (days === null || days < config.minDaysToExpiration) continue;

    const greeks = resolveGreeks(item, currentPrice, days, config);
    if (!greeks || greeks.delta < config.targetDeltaMin || greeks.delta > config.targetDeltaMax) {
      continue;
    }

    candidates.push({
      contractSymbol: item.row.contractSymbol,
      optionType: item.row.optionType,
      expiration: item.row.expiration,
      strike: item.row.strike,
      bid: item.bid,
      ask: item.ask,
      mid: item.mid,
      iv: item.row.impliedVolatility,
      openInterest: item.openInterest,
      volume: item.volume,
      greeks,
      daysToExpiry: days,
      spreadPct: item.spreadPct,
    });
  }

  candidates.sort((a, b) => b.openInterest - a.openInterest);

  return {
    symbol,
    status: 'OK',
    currentPrice,
    count: candidates.length,
    candidates,
  };
}

/** Mean IV over candidates that have one; null when none do. */
export function meanCandidateIv(candidates: readonly OptionCandidate[]): number | null {
  const ivs = candidates
    .map((c) => c.iv)
    .filter((iv): iv is number => iv !== null && Number.isFinite(iv) && iv > 0);
  if (ivs.length === 0) return null;
  return ivs.reduce((a, b) => a + b, 0) / ivs.length;
}
