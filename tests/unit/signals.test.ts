import { describe, expect, it } from 'vitest';
import { PortfolioSignalMachine, severityFor, severityRank } from '@/portfolio/signals';
import { DataSourceRouter } from '@/providers/router';
import type { HistoryPeriod } from '@/core/config';
import type { OhlcvBar } from '@/types/market';
import { FakeMarket, makeBars, makePosition, makeSnapshot, testConfig } from '../helpers/fixtures';

const config = testConfig({ technical: { sma_fast: 5, sma_slow: 10, hv_window: 5, rsi_period: 5 } });
const now = new Date(2026, 0, 10, 12, 0, 0);

function machineWith(market: FakeMarket): PortfolioSignalMachine {
  const router = new DataSourceRouter({ ohlcv: [market], earningsDate: [market] }, { timeoutMs: 500 });
  return new PortfolioSignalMachine(router, config);
}

class ThrowingRouter extends DataSourceRouter {
  override async ohlcv(_symbol: string, _period?: HistoryPeriod): Promise<OhlcvBar[]> {
    throw new Error('history backend down');
  }

  override async earningsDate(_symbol: string): Promise<string | null> {
    throw new Error('calendar backend down');
  }
}

describe('PortfolioSignalMachine', () => {
  it('signals TAKE_PROFIT at 60% against a 50% target', async () => {
    const machine = machineWith(new FakeMarket('fake'));
    const snapshot = makeSnapshot({ markPrice: 16, marketValue: 3200, unrealizedPnl: 1200, unrealizedPnlPct: 60 });

    const signal = await machine.evaluate(makePosition(), snapshot, now);

    expect(signal.type).toBe('TAKE_PROFIT');
    expect(signal.severity).toBe('WARN');
    expect(signal.reasons).toEqual(['Profit target reached: 60.0% >= 50%', 'Market value: $3,200.00']);
    expect(signal.recommendedAction).toBe(
      'Position up 60.0% (target: 50%). Unrealized gain: $1,200.00. ' +
        'Consider taking partial profits or setting a trailing stop. Thesis may have played out.'
    );
    expect(signal.triggeredAt).toBe(now.toISOString());
  });

  it('suggests rolling when a winner is inside the roll window', async () => {
    const machine = machineWith(new FakeMarket('fake'));
    const snapshot = makeSnapshot({ unrealizedPnl: 1200, unrealizedPnlPct: 60, daysToExpiry: 200 });

    const signal = await machine.evaluate(makePosition(), snapshot, now);

    expect(signal.recommendedAction.endsWith(
      'Consider rolling out 6-12 months while maintaining delta band to lock in gains and extend exposure.'
    )).toBe(true);
  });

  it('resolves to STOP_LOSS when stop-loss and take-profit both match', async () => {
    const market = new FakeMarket('fake');
    const router = new DataSourceRouter({ ohlcv: [market], earningsDate: [market] });
    const machine = new PortfolioSignalMachine(router, {
      ...config,
      portfolio: { ...config.portfolio, takeProfitPct: -50 },
    });
    const snapshot = makeSnapshot({ unrealizedPnl: -800, unrealizedPnlPct: -40 });

    const signal = await machine.evaluate(makePosition(), snapshot, now);

    expect(signal.type).toBe('STOP_LOSS');
    expect(signal.severity).toBe('CRITICAL');
    expect(signal.reasons).toEqual(['Position down -40.0% (threshold: -30%)', 'Unrealized loss: -$800.00']);
    expect(market.calls).toEqual([]);
  });

  it('signals TECH_INVALIDATED for a call when the trend turns bearish', async () => {
    const machine = machineWith(new FakeMarket('fake', { AAPL: { bars: makeBars(30, 130, -0.5, 1) } }));

    const signal = await machine.evaluate(makePosition(), makeSnapshot({ unrealizedPnlPct: 60 }), now);

    expect(signal.type).toBe('TECH_INVALIDATED');
    expect(signal.severity).toBe('CRITICAL');
    expect(signal.reasons.slice(0, 2)).toEqual([
      'CALL position invalidated: Technical trend turned BEARISH',
      'Current trend: BEARISH',
    ]);
  });

  it('does not invalidate a put on a bearish trend', async () => {
    const machine = machineWith(new FakeMarket('fake', { AAPL: { bars: makeBars(30, 130, -0.5, 1) } }));

    const signal = await machine.evaluate(makePosition({ optionType: 'PUT' }), makeSnapshot(), now);

    expect(signal.type).toBe('HOLD');
  });

  it('signals EARNINGS_RISK inside the earnings window', async () => {
    const machine = machineWith(new FakeMarket('fake', { AAPL: { earnings: '2026-01-20' } }));

    const signal = await machine.evaluate(makePosition(), makeSnapshot(), now);

    expect(signal.type).toBe('EARNINGS_RISK');
    expect(signal.reasons).toEqual([
      'Earnings in 10 days (2026-01-20)',
      'Risk window: 14 days',
      'Binary event risk - significant price movement possible',
    ]);
  });

  it('signals EXPIRY_REVIEW inside the review window', async () => {
    const machine = machineWith(new FakeMarket('fake'));

    const signal = await machine.evaluate(makePosition(), makeSnapshot({ daysToExpiry: 100 }), now);

    expect(signal.type).toBe('EXPIRY_REVIEW');
    expect(signal.reasons).toEqual([
      'Expiration approaching: 100 days remaining',
      'Expiry date: 2027-06-17',
      'Current theta: -0.0312',
    ]);
    expect(signal.recommendedAction).toBe(
      'Position expires in 100 days. Review theta decay impact. ' +
        'Position is profitable - consider rolling out 6-12 months to extend exposure while maintaining similar delta.'
    );
  });

  it('holds when nothing triggers', async () => {
    const machine = machineWith(new FakeMarket('fake'));

    const signal = await machine.evaluate(makePosition(), makeSnapshot(), now);

    expect(signal).toEqual({
      type: 'HOLD',
      severity: 'INFO',
      reasons: ['Position within normal parameters'],
      recommendedAction: 'Continue holding. No action required.',
      triggeredAt: now.toISOString(),
    });
  });

  it('moves on when the technical and earnings lookups fail', async () => {
    const machine = new PortfolioSignalMachine(new ThrowingRouter({}), config);

    const signal = await machine.evaluate(makePosition(), makeSnapshot({ daysToExpiry: 100 }), now);

    expect(signal.type).toBe('EXPIRY_REVIEW');
  });

  it('does not signal on an unpriced position', async () => {
    const machine = machineWith(new FakeMarket('fake'));
    const snapshot = makeSnapshot({ markPrice: null, marketValue: null, unrealizedPnl: null, unrealizedPnlPct: null });

    expect((await machine.evaluate(makePosition(), snapshot, now)).type).toBe('HOLD');
  });
});

describe('signal severity', () => {
  it('maps every signal type to a severity', () => {
    expect(severityFor('STOP_LOSS')).toBe('CRITICAL');
    expect(severityFor('TECH_INVALIDATED')).toBe('CRITICAL');
    expect(severityFor('TAKE_PROFIT')).toBe('WARN');
    expect(severityFor('EARNINGS_RISK')).toBe('WARN');
    expect(severityFor('EXPIRY_REVIEW')).toBe('WARN');
    expect(severityFor('HOLD')).toBe('INFO');
  });

  it('ranks CRITICAL ahead of WARN ahead of INFO', () => {
    expect(severityRank('CRITICAL')).toBeLessThan(severityRank('WARN'));
    expect(severityRank('WARN')).toBeLessThan(severityRank('INFO'));
  });
});
