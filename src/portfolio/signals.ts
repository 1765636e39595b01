/**
 * PortfolioSignalMachine: one management signal per priced position.
 *
 * Checks run in priority order and the first match wins:
 * STOP_LOSS > TECH_INVALIDATED > TAKE_PROFIT > EARNINGS_RISK > EXPIRY_REVIEW > HOLD.
 * The technical and earnings checks fetch fresh data; a failure there counts
 * as no evidence and evaluation moves on.
 */

import type { PortfolioConfig, TechnicalConfig } from '@/core/config';
import { daysUntil, formatDate, parseDate } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { analyzeTechnical } from '@/analysis/technical';
import type { DataSourceRouter } from '@/providers/router';
import type { Position, PositionSnapshot, Signal, SignalSeverity, SignalType } from '@/types/portfolio';

const logger = createChildLogger('signals');

export interface SignalMachineConfig {
  portfolio: PortfolioConfig;
  technical: TechnicalConfig;
}

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function severityFor(type: SignalType): SignalSeverity {
  switch (type) {
    case 'STOP_LOSS':
    case 'TECH_INVALIDATED':
      return 'CRITICAL';
    case 'TAKE_PROFIT':
    case 'EARNINGS_RISK':
    case 'EXPIRY_REVIEW':
      return 'WARN';
    case 'HOLD':
      return 'INFO';
  }
}

const SEVERITY_ORDER: Record<SignalSeverity, number> = { CRITICAL: 0, WARN: 1, INFO: 2 };

export function severityRank(severity: SignalSeverity): number {
  return SEVERITY_ORDER[severity];
}

function signal(type: SignalType, reasons: string[], recommendedAction: string, now: Date): Signal {
  return {
    type,
    severity: severityFor(type),
    reasons,
    recommendedAction,
    triggeredAt: now.toISOString(),
  };
}

export class PortfolioSignalMachine {
  constructor(
    private readonly router: DataSourceRouter,
    private readonly config: SignalMachineConfig
  ) {}

  async evaluate(position: Position, snapshot: PositionSnapshot, now: Date = new Date()): Promise<Signal> {
    const cfg = this.config.portfolio;
    const pnlPct = snapshot.unrealizedPnlPct;
    const dte = snapshot.daysToExpiry;

    if (pnlPct !== null && pnlPct <= cfg.stopLossPct) {
      const reasons = [`Position down ${pnlPct.toFixed(1)}% (threshold: ${cfg.stopLossPct}%)`];
      if (snapshot.unrealizedPnl !== null) {
        reasons.push(`Unrealized loss: ${usd.format(snapshot.unrealizedPnl)}`);
      }
      return signal(
        'STOP_LOSS',
        reasons,
        'CRITICAL: Consider closing position to limit further losses. ' +
          'Evaluate if the original thesis is still valid. ' +
          'If technical breakdown confirmed, exit may be warranted.',
        now
      );
    }

    const invalidated = await this.checkTechnicalInvalidation(position, now);
    if (invalidated) return invalidated;

    if (pnlPct !== null && pnlPct >= cfg.takeProfitPct) {
      let action = `Position up ${pnlPct.toFixed(1)}% (target: ${cfg.takeProfitPct}%). `;
      if (snapshot.unrealizedPnl !== null) {
        action += `Unrealized gain: ${usd.format(snapshot.unrealizedPnl)}. `;
      }
      action +=
        dte !== null && dte <= cfg.rollGuidanceDays
          ? 'Consider rolling out 6-12 months while maintaining delta band to lock in gains and extend exposure.'
          : 'Consider taking partial profits or setting a trailing stop. Thesis may have played out.';

      const reasons = [`Profit target reached: ${pnlPct.toFixed(1)}% >= ${cfg.takeProfitPct}%`];
      if (snapshot.marketValue !== null) {
        reasons.push(`Market value: ${usd.format(snapshot.marketValue)}`);
      }
      return signal('TAKE_PROFIT', reasons, action, now);
    }

    const earnings = await this.checkEarningsRisk(position, now);
    if (earnings) return earnings;

    if (dte !== null && dte <= cfg.expiryReviewDays) {
      let action = `Position expires in ${dte} days. Review theta decay impact. `;
      action +=
        pnlPct !== null && pnlPct > 0
          ? 'Position is profitable - consider rolling out 6-12 months to extend exposure while maintaining similar delta.'
          : 'Position is at/near loss - evaluate if thesis is still valid. ' +
            'Rolling may be appropriate if trend intact, otherwise consider closing.';

      return signal(
        'EXPIRY_REVIEW',
        [
          `Expiration approaching: ${dte} days remaining`,
          `Expiry date: ${position.expiry}`,
          snapshot.theta !== null ? `Current theta: ${snapshot.theta.toFixed(4)}` : 'Theta unknown',
        ],
        action,
        now
      );
    }

    return signal('HOLD', ['Position within normal parameters'], 'Continue holding. No action required.', now);
  }

  /** CALL is invalidated by a BEARISH trend, PUT by a BULLISH one. */
  private async checkTechnicalInvalidation(position: Position, now: Date): Promise<Signal | null> {
    try {
      const bars = await this.router.ohlcv(position.symbol, this.config.technical.historyPeriod, '1d');
      if (bars.length === 0) return null;

      const report = analyzeTechnical(position.symbol, bars, this.config.technical);
      const against = position.optionType === 'CALL' ? 'BEARISH' : 'BULLISH';
      if (report.trend !== against) return null;

      const reasons = [
        `${position.optionType} position invalidated: Technical trend turned ${against}`,
        `Current trend: ${report.trend}`,
      ];
      if (report.indicators.rsi !== null) reasons.push(`RSI: ${report.indicators.rsi.toFixed(1)}`);
      if (report.signals.deathCross) reasons.push('Death cross detected');
      if (report.signals.goldenCross) reasons.push('Golden cross detected');

      return signal(
        'TECH_INVALIDATED',
        reasons,
        'CRITICAL: Technical thesis invalidated. Consider exiting position to preserve capital. ' +
          'Wait for trend confirmation before re-entry.',
        now
      );
    } catch (error) {
      logger.warn({ symbol: position.symbol, err: error }, 'Technical invalidation check failed');
      return null;
    }
  }

  private async checkEarningsRisk(position: Position, now: Date): Promise<Signal | null> {
    try {
      const raw = await this.router.earningsDate(position.symbol);
      const date = parseDate(raw);
      if (!date) return null;

      const days = daysUntil(date, now);
      const window = this.config.portfolio.earningsWindowDays;
      if (days === null || days < 0 || days > window) return null;

      return signal(
        'EARNINGS_RISK',
        [
          `Earnings in ${days} days (${formatDate(date)})`,
          `Risk window: ${window} days`,
          'Binary event risk - significant price movement possible',
        ],
        `Earnings report in ${days} days. ` +
          'Consider reducing position size before earnings to limit binary risk, ' +
          'or accept the volatility if thesis is strong. IV typically elevated pre-earnings.',
        now
      );
    } catch (error) {
      logger.warn({ symbol: position.symbol, err: error }, 'Earnings risk check failed');
      return null;
    }
  }
}
