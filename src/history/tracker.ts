/**
 * Signal tracker: records GO/WATCH verdicts with the underlying price at the
 * time of the scan and backfills the price after each tracking horizon.
 *
 * The statistics are descriptive. The minimum sample size is a configured
 * placeholder, not a derived confidence bound.
 */

import { randomUUID } from 'crypto';
import { daysAgo } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { TrackedSignalRepository } from '@/data/repositories/tracked_signal_repo';
import type { DataSourceRouter } from '@/providers/router';
import type { ScanRecord, ScanResult } from '@/types/history';
import type {
  HorizonStats,
  TrackedSignal,
  TrackedVerdict,
  ValidationStats,
  VerdictStats,
} from '@/types/tracking';

const logger = createChildLogger('tracker');

export const STATS_DISCLAIMER =
  'These statistics are based on limited historical data. ' +
  'Past performance does not guarantee future results. ' +
  'Sample sizes may be too small for statistical significance.';

export interface TrackingConfig {
  horizonsDays: number[];
  minSampleSize: number;
}

export function horizonKey(days: number): string {
  return `${days}d`;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function isTracked(verdict: string): verdict is TrackedVerdict {
  return verdict === 'GO' || verdict === 'WATCH';
}

export class SignalTracker {
  constructor(
    private readonly repo: TrackedSignalRepository,
    private readonly router: DataSourceRouter,
    private readonly config: TrackingConfig
  ) {}

  /** Tracks one scan result; NO_GO and results without a price are ignored. */
  track(scanId: string, result: ScanResult, now: Date = new Date()): TrackedSignal | null {
    const verdict = result.decision.verdict;
    if (!isTracked(verdict) || result.currentPrice === null || !(result.currentPrice > 0)) {
      return null;
    }

    const top = result.reports.options?.candidates[0] ?? null;
    const signal: TrackedSignal = {
      id: randomUUID(),
      scanId,
      symbol: result.symbol,
      verdict,
      convictionScore: result.conviction.score,
      convictionBand: result.conviction.band,
      priceAtSignal: result.currentPrice,
      signalTimestamp: now.toISOString(),
      recommendedContract: top?.contractSymbol ?? null,
      recommendedStrike: top?.strike ?? null,
      recommendedExpiry: top?.expiration ?? null,
      optionPriceAtSignal: top ? top.mid : null,
      outcomes: {},
    };

    if (!this.repo.save(signal)) return null;
    logger.info({ symbol: signal.symbol, verdict }, 'Tracking signal');
    return signal;
  }

  trackScan(record: ScanRecord, now: Date = new Date(record.timestamp)): number {
    let tracked = 0;
    for (const result of record.results) {
      if (this.track(record.id, result, now)) tracked += 1;
    }
    return tracked;
  }

  /**
   * Records the current price for every signal that has reached a horizon
   * without an outcome. Returns how many outcomes were written.
   */
  async updateOutcomes(now: Date = new Date()): Promise<number> {
    const prices = new Map<string, number | null>();
    let updated = 0;

    for (const days of this.config.horizonsDays) {
      const key = horizonKey(days);
      for (const signal of this.repo.pendingOutcome(key, daysAgo(days, now))) {
        let price = prices.get(signal.symbol);
        if (price === undefined) {
          price = (await this.router.livePrice(signal.symbol)).price;
          prices.set(signal.symbol, price);
        }
        if (price === null) {
          logger.warn({ symbol: signal.symbol, horizon: key }, 'No price for outcome update');
          continue;
        }

        this.repo.recordOutcome(signal.id, key, {
          price,
          changePct: ((price - signal.priceAtSignal) / signal.priceAtSignal) * 100,
          recordedAt: now.toISOString(),
        });
        updated += 1;
      }
    }

    logger.info({ updated }, 'Signal outcomes updated');
    return updated;
  }

  stats(): ValidationStats {
    const go = this.verdictStats('GO');
    const watch = this.verdictStats('WATCH');
    const firstHorizon = this.config.horizonsDays[0];
    const goValidated = go.horizons[0]?.validated ?? 0;
    const enough = goValidated >= this.config.minSampleSize;

    return {
      go,
      watch,
      status: enough ? 'PRELIMINARY' : 'INSUFFICIENT_DATA',
      message: enough
        ? 'Statistics are preliminary. Continue tracking for more reliable results.'
        : `Only ${goValidated} GO signals have a ${firstHorizon}-day outcome. ` +
          `At least ${this.config.minSampleSize} are recommended for meaningful statistics.`,
      disclaimer: STATS_DISCLAIMER,
    };
  }

  recent(verdict?: TrackedVerdict, limit: number = 20): TrackedSignal[] {
    return this.repo.list(verdict, limit);
  }

  private verdictStats(verdict: TrackedVerdict): VerdictStats {
    const signals = this.repo.list(verdict);
    const horizons: HorizonStats[] = this.config.horizonsDays.map((days) => {
      const changes = signals
        .map((s) => s.outcomes[horizonKey(days)]?.changePct)
        .filter((c): c is number => typeof c === 'number');
      if (changes.length === 0) {
        return { horizonDays: days, validated: 0, avgChangePct: null, positivePct: null };
      }
      const positive = changes.filter((c) => c > 0).length;
      return {
        horizonDays: days,
        validated: changes.length,
        avgChangePct: round(changes.reduce((a, b) => a + b, 0) / changes.length, 2),
        positivePct: round((positive / changes.length) * 100, 1),
      };
    });
    return { total: signals.length, horizons };
  }
}
