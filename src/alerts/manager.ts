/**
 * Alert manager: persists scanner and portfolio alerts and fans them out to
 * registered handlers. Alerts are informational; nothing here places orders.
 */

import { randomUUID } from 'crypto';
import { createChildLogger } from '@/utils/logger';
import type { AlertQuery, AlertRepository } from '@/data/repositories/alert_repo';
import type { ScanComparison, ScanRecord } from '@/types/history';
import type { PricedPosition, SignalSeverity } from '@/types/portfolio';
import type { Alert, AlertType } from '@/types/tracking';

const logger = createChildLogger('alerts');

export type AlertHandler = (alert: Alert) => void | Promise<void>;

export interface AlertsConfig {
  convictionThreshold: number;
  includePortfolioWarnings: boolean;
}

export interface AlertSummary {
  unacknowledged: Record<SignalSeverity, number>;
  totalUnacknowledged: number;
  recent: Alert[];
}

interface NewAlert {
  type: AlertType;
  severity: SignalSeverity;
  symbol: string;
  title: string;
  message: string;
  data?: Record<string, unknown>;
}

export class AlertManager {
  private readonly handlers: AlertHandler[] = [];

  constructor(
    private readonly repo: AlertRepository,
    private readonly config: AlertsConfig
  ) {}

  registerHandler(handler: AlertHandler): void {
    this.handlers.push(handler);
  }

  async create(input: NewAlert, now: Date = new Date()): Promise<Alert> {
    const alert = this.repo.save({
      id: randomUUID(),
      type: input.type,
      severity: input.severity,
      symbol: input.symbol,
      title: input.title,
      message: input.message,
      data: input.data ?? {},
      createdAt: now.toISOString(),
      acknowledged: false,
      acknowledgedAt: null,
    });

    const log = { type: alert.type, symbol: alert.symbol, severity: alert.severity };
    if (alert.severity === 'CRITICAL') logger.warn(log, alert.title);
    else logger.info(log, alert.title);

    for (const handler of this.handlers) {
      try {
        await handler(alert);
      } catch (error) {
        logger.error({ alertId: alert.id, err: error }, 'Alert handler failed');
      }
    }
    return alert;
  }

  /**
   * Alerts for one finished scan: every new GO, every upgrade that lands on
   * GO and every conviction score that crossed the threshold since the
   * previous scan.
   */
  async fromScan(
    record: ScanRecord,
    comparison: ScanComparison,
    previous: ScanRecord | null,
    now: Date = new Date()
  ): Promise<Alert[]> {
    const created: Alert[] = [];
    const bySymbol = new Map(record.results.map((r) => [r.symbol, r]));

    for (const symbol of comparison.newGoSignals) {
      const result = bySymbol.get(symbol);
      if (!result) continue;
      const score = result.conviction.score;
      created.push(
        await this.create(
          {
            type: 'NEW_GO_SIGNAL',
            severity: 'INFO',
            symbol,
            title: `New GO Signal: ${symbol}`,
            message: `Scanner detected GO signal with conviction ${score.toFixed(0)}`,
            data: { scanId: record.id, convictionScore: score, reasons: result.decision.reasons.slice(0, 3) },
          },
          now
        )
      );
    }

    for (const change of comparison.upgradedSignals) {
      if (change.to !== 'GO') continue;
      created.push(
        await this.create(
          {
            type: 'SIGNAL_UPGRADE',
            severity: 'INFO',
            symbol: change.symbol,
            title: `Signal Upgrade: ${change.symbol}`,
            message: `Signal upgraded from ${change.from} to ${change.to}`,
            data: { scanId: record.id, from: change.from, to: change.to },
          },
          now
        )
      );
    }

    if (previous) {
      const threshold = this.config.convictionThreshold;
      const previousScores = new Map(previous.results.map((r) => [r.symbol, r.conviction.score]));
      for (const result of record.results) {
        const before = previousScores.get(result.symbol);
        const after = result.conviction.score;
        if (before === undefined || (before >= threshold) === (after >= threshold)) continue;
        const direction = after >= threshold ? 'above' : 'below';
        created.push(
          await this.create(
            {
              type: 'CONVICTION_THRESHOLD',
              severity: 'INFO',
              symbol: result.symbol,
              title: `Conviction Threshold: ${result.symbol}`,
              message: `Conviction score moved ${direction} threshold (${before.toFixed(0)} -> ${after.toFixed(0)})`,
              data: { scanId: record.id, currentScore: after, previousScore: before, threshold },
            },
            now
          )
        );
      }
    }

    logger.info({ scanId: record.id, alerts: created.length }, 'Scan alerts generated');
    return created;
  }

  /** CRITICAL position signals always alert; WARN ones only when configured. HOLD never does. */
  async fromPortfolio(priced: PricedPosition[], now: Date = new Date()): Promise<Alert[]> {
    const created: Alert[] = [];
    for (const { position, snapshot, signal } of priced) {
      if (!signal || signal.type === 'HOLD') continue;
      const type: AlertType = signal.type;
      if (signal.severity === 'WARN' && !this.config.includePortfolioWarnings) continue;

      created.push(
        await this.create(
          {
            type,
            severity: signal.severity,
            symbol: position.symbol,
            title: `Portfolio Alert: ${position.symbol} - ${signal.type}`,
            message: signal.recommendedAction,
            data: {
              positionId: position.id,
              strike: position.strike,
              expiry: position.expiry,
              optionType: position.optionType,
              pnlPct: snapshot?.unrealizedPnlPct ?? null,
              reasons: signal.reasons,
            },
          },
          now
        )
      );
    }
    return created;
  }

  list(query: AlertQuery = {}): Alert[] {
    return this.repo.list(query);
  }

  acknowledge(id: string, now: Date = new Date()): boolean {
    return this.repo.acknowledge(id, now);
  }

  acknowledgeAll(now: Date = new Date()): number {
    return this.repo.acknowledgeAll(now);
  }

  summary(): AlertSummary {
    const unacknowledged = this.repo.unacknowledgedCounts();
    return {
      unacknowledged,
      totalUnacknowledged: unacknowledged.INFO + unacknowledged.WARN + unacknowledged.CRITICAL,
      recent: this.repo.list({ limit: 5 }),
    };
  }
}
