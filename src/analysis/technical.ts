/**
 * Technical report from daily bars: SMA fast/slow, Wilder RSI, annualized
 * historical volatility, golden/death cross on the latest bar and trend.
 */

import type { TechnicalConfig } from '@/core/config';
import type { OhlcvBar } from '@/types/market';
import type { RsiState, TechnicalReport, Trend } from '@/types/reports';

const TRADING_DAYS = 252;

/** Simple moving average ending at index `end` (inclusive). */
export function smaAt(closes: number[], window: number, end: number): number | null {
  if (window <= 0 || end < window - 1 || end >= closes.length) return null;
  let sum = 0;
  for (let i = end - window + 1; i <= end; i++) {
    sum += closes[i];
  }
  return sum / window;
}

/** Wilder-smoothed RSI of the last bar; null when fewer than period+1 closes. */
export function rsi(closes: number[], period: number): number | null {
  if (closes.length < period + 1) return null;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = closes[i] - closes[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;

  for (let i = period + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
  }

  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Annualized stdev (sample) of the last `window` daily log returns.
 */
export function historicalVolatility(closes: number[], window: number): number | null {
  if (closes.length < window + 1) return null;
  const returns: number[] = [];
  for (let i = closes.length - window; i < closes.length; i++) {
    const prev = closes[i - 1];
    const curr = closes[i];
    if (!(prev > 0) || !(curr > 0)) return null;
    returns.push(Math.log(curr / prev));
  }
  const mean = returns.reduce((a, b) => a + b, 0) / returns.length;
  const variance = returns.reduce((acc, r) => acc + (r - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS);
}

export function determineTrend(price: number | null, smaFast: number | null, smaSlow: number | null): Trend {
  if (price === null || smaFast === null || smaSlow === null) return 'UNKNOWN';
  if (price > smaFast && smaFast > smaSlow) return 'BULLISH';
  if (price < smaFast && smaFast < smaSlow) return 'BEARISH';
  return 'NEUTRAL';
}

function rsiState(value: number | null, config: TechnicalConfig): RsiState {
  if (value === null) return 'UNKNOWN';
  if (value > config.rsiOverbought) return 'OVERBOUGHT';
  if (value < config.rsiOversold) return 'OVERSOLD';
  return 'NEUTRAL';
}

function emptyReport(symbol: string): TechnicalReport {
  return {
    symbol,
    status: 'INSUFFICIENT_DATA',
    date: null,
    price: null,
    trend: 'UNKNOWN',
    indicators: { smaFast: null, smaSlow: null, rsi: null, hv: null },
    signals: { goldenCross: false, deathCross: false, rsiState: 'UNKNOWN' },
  };
}

export function analyzeTechnical(symbol: string, bars: OhlcvBar[], config: TechnicalConfig): TechnicalReport {
  if (bars.length < config.smaSlow) {
    return emptyReport(symbol);
  }

  const closes = bars.map((b) => b.close);
  const last = closes.length - 1;

  const smaFast = smaAt(closes, config.smaFast, last);
  const smaSlow = smaAt(closes, config.smaSlow, last);
  const prevFast = smaAt(closes, config.smaFast, last - 1);
  const prevSlow = smaAt(closes, config.smaSlow, last - 1);

  const haveCrossData = smaFast !== null && smaSlow !== null && prevFast !== null && prevSlow !== null;
  const goldenCross = haveCrossData && prevFast <= prevSlow && smaFast > smaSlow;
  const deathCross = haveCrossData && prevFast >= prevSlow && smaFast < smaSlow;

  const rsiValue = rsi(closes, config.rsiPeriod);
  const price = closes[last];

  return {
    symbol,
    status: 'OK',
    date: bars[last].date,
    price,
    trend: determineTrend(price, smaFast, smaSlow),
    indicators: {
      smaFast,
      smaSlow,
      rsi: rsiValue,
      hv: historicalVolatility(closes, config.hvWindow),
    },
    signals: {
      goldenCross,
      deathCross,
      rsiState: rsiState(rsiValue, config),
    },
  };
}
