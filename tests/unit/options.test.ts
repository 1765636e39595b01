import { describe, expect, it } from 'vitest';
import { blackScholes, normCdf } from '@/analysis/greeks';
import { analyzeOptionsChain, meanCandidateIv } from '@/analysis/options';
import { makeCandidate, makeChainRow, testConfig } from '../helpers/fixtures';

const config = testConfig().options;
const now = new Date(2026, 0, 10, 12, 0, 0);

describe('blackScholes', () => {
  it('prices an at-the-money call near the textbook value', () => {
    const call = blackScholes({ type: 'CALL', spot: 100, strike: 100, years: 1, rate: 0.05, sigma: 0.2 });

    expect(call?.price).toBeCloseTo(10.4506, 3);
    expect(call?.delta).toBeCloseTo(0.6368, 3);
  });

  it('satisfies put-call parity', () => {
    const inputs = { spot: 120, strike: 100, years: 1.5, rate: 0.045, sigma: 0.3 };
    const call = blackScholes({ type: 'CALL', ...inputs });
    const put = blackScholes({ type: 'PUT', ...inputs });
    expect(call).not.toBeNull();
    expect(put).not.toBeNull();
    if (!call || !put) return;

    expect(call.price - put.price).toBeCloseTo(120 - 100 * Math.exp(-0.045 * 1.5), 8);
    expect(put.delta).toBeCloseTo(call.delta - 1, 12);
    expect(put.gamma).toBe(call.gamma);
    expect(call.theta).toBeLessThan(0);
  });

  it('is undefined for expired, zero-vol or non-positive inputs', () => {
    expect(blackScholes({ type: 'CALL', spot: 100, strike: 100, years: 0, rate: 0.05, sigma: 0.2 })).toBeNull();
    expect(blackScholes({ type: 'CALL', spot: 100, strike: 100, years: 1, rate: 0.05, sigma: 0 })).toBeNull();
    expect(blackScholes({ type: 'PUT', spot: 0, strike: 100, years: 1, rate: 0.05, sigma: 0.2 })).toBeNull();
  });

  it('has a symmetric normal CDF', () => {
    expect(normCdf(0)).toBeCloseTo(0.5, 8);
    expect(normCdf(1.3) + normCdf(-1.3)).toBeCloseTo(1, 12);
  });
});

describe('analyzeOptionsChain', () => {
  it('reports NO_DATA without call rows', () => {
    const report = analyzeOptionsChain('SPY', 110, [makeChainRow({ optionType: 'PUT' })], config, now);

    expect(report).toEqual({ symbol: 'SPY', status: 'NO_DATA', currentPrice: 110, count: 0, candidates: [] });
  });

  it('reports NO_LIQUIDITY when every call fails the filters', () => {
    const chain = [
      makeChainRow({ openInterest: 10 }),
      makeChainRow({ volume: 1 }),
      makeChainRow({ bid: 10, ask: 14 }),
      makeChainRow({ bid: null }),
    ];

    expect(analyzeOptionsChain('SPY', 110, chain, config, now).status).toBe('NO_LIQUIDITY');
  });

  it('keeps LEAPS calls inside the delta band, ordered by open interest', () => {
    const chain = [
      makeChainRow({ contractSymbol: 'LOW_OI', openInterest: 300 }),
      makeChainRow({ contractSymbol: 'HIGH_OI', openInterest: 2500 }),
      makeChainRow({ contractSymbol: 'SHORT_DATED', expiration: '2026-06-19' }),
      makeChainRow({ contractSymbol: 'LOW_DELTA', greeks: { delta: 0.5, gamma: 0.01, theta: -0.02, vega: 0.4 } }),
    ];

    const report = analyzeOptionsChain('SPY', 110, chain, config, now);

    expect(report.status).toBe('OK');
    expect(report.candidates.map((c) => c.contractSymbol)).toEqual(['HIGH_OI', 'LOW_OI']);
    expect(report.candidates[0]).toMatchObject({
      mid: 20,
      spreadPct: 0.05,
      daysToExpiry: 370,
      greeks: { delta: 0.78, gamma: 0.005, theta: -0.02, vega: 0.4 },
    });
  });

  it('computes Greeks from implied volatility when the provider has none', () => {
    const chain = [makeChainRow({ greeks: null, impliedVolatility: 0.2 })];

    const report = analyzeOptionsChain('SPY', 112, chain, config, now);

    const model = blackScholes({ type: 'CALL', spot: 112, strike: 100, years: 370 / 365, rate: 0.045, sigma: 0.2 });
    expect(report.candidates).toHaveLength(1);
    expect(report.candidates[0].greeks.delta).toBe(model?.delta);
  });

  it('drops a row that has neither Greeks nor a spot to model them', () => {
    const chain = [makeChainRow({ greeks: { delta: null, gamma: null, theta: null, vega: null } })];

    const report = analyzeOptionsChain('SPY', null, chain, config, now);

    expect(report.status).toBe('OK');
    expect(report.count).toBe(0);
  });
});

describe('meanCandidateIv', () => {
  it('averages only positive finite IVs', () => {
    expect(meanCandidateIv([makeCandidate({ iv: 0.2 }), makeCandidate({ iv: 0.3 }), makeCandidate({ iv: null })])).toBe(
      0.25
    );
    expect(meanCandidateIv([makeCandidate({ iv: 0 })])).toBeNull();
  });
});
