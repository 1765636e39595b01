import { describe, expect, it } from 'vitest';
import { analyzeTechnical, determineTrend, historicalVolatility, rsi, smaAt } from '@/analysis/technical';
import type { OhlcvBar } from '@/types/market';
import { makeBars, testConfig } from '../helpers/fixtures';

function barsFrom(closes: number[]): OhlcvBar[] {
  return closes.map((close, i) => ({
    date: `2025-03-${String(i + 1).padStart(2, '0')}`,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  }));
}

describe('indicators', () => {
  it('averages the window ending at an index', () => {
    expect(smaAt([1, 2, 3, 4, 5], 3, 4)).toBe(4);
    expect(smaAt([1, 2, 3, 4, 5], 3, 1)).toBeNull();
    expect(smaAt([1, 2, 3], 3, 3)).toBeNull();
  });

  it('computes RSI at the extremes', () => {
    expect(rsi([1, 2, 3, 4, 5, 6], 5)).toBe(100);
    expect(rsi([6, 5, 4, 3, 2, 1], 5)).toBe(0);
    expect(rsi([3, 3, 3, 3, 3, 3], 5)).toBe(50);
    expect(rsi([1, 2, 3], 5)).toBeNull();
  });

  it('matches Wilder smoothing on a mixed series', () => {
    // seed over 2 changes: gain 1, loss 0.5; then a -1 change: gain 0.5, loss 0.75
    expect(rsi([10, 12, 11, 10], 2)).toBeCloseTo(40, 10);
  });

  it('annualizes the stdev of log returns', () => {
    expect(historicalVolatility([100, 110, 121], 2)).toBeCloseTo(0, 10);
    expect(historicalVolatility([100, 110], 2)).toBeNull();
    expect(historicalVolatility([100, 0, 100], 2)).toBeNull();

    const half = (Math.log(1.1) - Math.log(0.9)) / 2;
    const expected = Math.sqrt(2 * half ** 2) * Math.sqrt(252);
    expect(historicalVolatility([100, 110, 99], 2)).toBeCloseTo(expected, 10);
  });

  it('classifies the trend from price and averages', () => {
    expect(determineTrend(110, 105, 100)).toBe('BULLISH');
    expect(determineTrend(90, 95, 100)).toBe('BEARISH');
    expect(determineTrend(104, 105, 100)).toBe('NEUTRAL');
    expect(determineTrend(null, 105, 100)).toBe('UNKNOWN');
  });
});

describe('analyzeTechnical', () => {
  const config = testConfig({ technical: { sma_fast: 5, sma_slow: 10, hv_window: 5, rsi_period: 5 } }).technical;

  it('reports a bullish, overbought zigzag uptrend', () => {
    const report = analyzeTechnical('SPY', makeBars(30), config);

    // last closes: 113.5, 113, 114.5, 114, 115.5
    expect(report.status).toBe('OK');
    expect(report.date).toBe('2025-01-30');
    expect(report.price).toBe(115.5);
    expect(report.indicators.smaFast).toBeCloseTo(114.1, 10);
    expect(report.indicators.smaSlow).toBeCloseTo(112.75, 10);
    expect(report.trend).toBe('BULLISH');
    expect(report.signals).toEqual({ goldenCross: false, deathCross: false, rsiState: 'OVERBOUGHT' });
    expect(report.indicators.hv).toBeGreaterThan(0);
  });

  it('needs at least the slow window of bars', () => {
    const report = analyzeTechnical('SPY', makeBars(9), config);

    expect(report.status).toBe('INSUFFICIENT_DATA');
    expect(report.trend).toBe('UNKNOWN');
    expect(report.price).toBeNull();
  });

  it('flags golden and death crosses on the latest bar', () => {
    const short = testConfig({ technical: { sma_fast: 2, sma_slow: 3, hv_window: 2, rsi_period: 2 } }).technical;

    const golden = analyzeTechnical('X', barsFrom([10, 10, 10, 13]), short);
    const death = analyzeTechnical('X', barsFrom([10, 10, 10, 7]), short);

    expect(golden.signals.goldenCross).toBe(true);
    expect(golden.signals.deathCross).toBe(false);
    expect(death.signals.deathCross).toBe(true);
    expect(death.trend).toBe('BEARISH');
  });
});
