/**
 * Scan orchestrator: fetch, analyse, gate and score each symbol, then persist
 * the ScanRecord, diff it against the previous scan and raise alerts.
 *
 * A symbol whose pipeline throws still gets a result: the reports are null and
 * the gate turns that into NO_GO.
 */

import type { AppConfig } from '@/core/config';
import { getScanId } from '@/core/time';
import { analyzeFundamentals } from '@/analysis/fundamentals';
import { analyzeOptionsChain } from '@/analysis/options';
import { analyzeTechnical } from '@/analysis/technical';
import { DecisionGate } from '@/decision/gate';
import { ConvictionScorer } from '@/scoring/conviction';
import { compareScans } from '@/history/compare';
import { PersistenceError } from '@/data/db';
import { hashObjectShort, randomHex } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';
import type { AlertManager } from '@/alerts/manager';
import type { ScanRepository } from '@/data/repositories/scan_repo';
import type { SignalTracker } from '@/history/tracker';
import type { DataSourceRouter } from '@/providers/router';
import type { ScanComparison, ScanCounts, ScanRecord, ScanResult } from '@/types/history';
import type { AssetType } from '@/types/market';
import type { FundamentalReport, OptionsReport, TechnicalReport } from '@/types/reports';
import type { Alert } from '@/types/tracking';

const logger = createChildLogger('scanner');

export type ScannerConfig = Pick<
  AppConfig,
  'decision' | 'conviction' | 'technical' | 'fundamentals' | 'options' | 'scan' | 'history'
>;

export interface ScannerDeps {
  router: DataSourceRouter;
  config: ScannerConfig;
  etfSymbols?: ReadonlySet<string>;
  scans?: ScanRepository | null;
  alerts?: AlertManager | null;
  tracker?: SignalTracker | null;
}

export interface ScanOptions {
  symbols?: string[];
  signal?: AbortSignal;
  now?: Date;
}

export interface ScanOutcome {
  record: ScanRecord | null;
  comparison: ScanComparison | null;
  alerts: Alert[];
  persisted: boolean;
  cancelled: boolean;
  trackedSignals: number;
}

/** Short hash over the sections that change verdicts. */
export function configFingerprint(config: ScannerConfig): string {
  return hashObjectShort({
    decision: config.decision,
    options: config.options,
    fundamentals: config.fundamentals,
    technical: config.technical,
  });
}

export function countVerdicts(results: readonly ScanResult[]): ScanCounts {
  const counts: ScanCounts = { symbols: results.length, go: 0, watch: 0, noGo: 0 };
  for (const result of results) {
    switch (result.decision.verdict) {
      case 'GO':
        counts.go += 1;
        break;
      case 'WATCH':
        counts.watch += 1;
        break;
      case 'NO_GO':
        counts.noGo += 1;
        break;
    }
  }
  return counts;
}

async function runWithConcurrency<T>(
  items: T[],
  worker: (item: T, index: number) => Promise<void>,
  concurrency: number,
  signal?: AbortSignal
): Promise<void> {
  let index = 0;
  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (index < items.length && !signal?.aborted) {
      const current = index;
      index += 1;
      await worker(items[current], current);
    }
  });

  await Promise.all(workers);
}

export class Scanner {
  private readonly gate: DecisionGate;
  private readonly scorer: ConvictionScorer;
  private readonly etfSymbols: ReadonlySet<string>;

  constructor(private readonly deps: ScannerDeps) {
    this.gate = new DecisionGate(deps.config.decision);
    this.scorer = new ConvictionScorer(deps.config.conviction);
    this.etfSymbols = deps.etfSymbols ?? new Set();
  }

  async run(options: ScanOptions = {}): Promise<ScanOutcome> {
    const { config } = this.deps;
    const now = options.now ?? new Date();
    const symbols = [...new Set((options.symbols ?? config.scan.symbols).map((s) => s.trim().toUpperCase()))].filter(
      (s) => s.length > 0
    );

    logger.info({ symbols: symbols.length, concurrency: config.scan.concurrency }, 'Scan started');

    const throttler = new RequestThrottler(config.scan.throttleMs);
    const slots: Array<ScanResult | undefined> = new Array(symbols.length);

    await runWithConcurrency(
      symbols,
      async (symbol, index) => {
        // only the start is paced; the symbols themselves run side by side
        await throttler.schedule(async () => undefined);
        slots[index] = await this.scanSymbol(symbol, now);
      },
      config.scan.concurrency,
      options.signal
    );

    if (options.signal?.aborted) {
      logger.warn({ completed: slots.filter(Boolean).length, total: symbols.length }, 'Scan cancelled');
      return { record: null, comparison: null, alerts: [], persisted: false, cancelled: true, trackedSignals: 0 };
    }

    const results = slots
      .filter((r): r is ScanResult => r !== undefined)
      .sort((a, b) => b.conviction.score - a.conviction.score);

    const record: ScanRecord = {
      id: getScanId(now, randomHex(6)),
      timestamp: now.toISOString(),
      configFingerprint: configFingerprint(config),
      counts: countVerdicts(results),
      results,
    };

    logger.info({ scanId: record.id, ...record.counts }, 'Scan finished');
    return this.finish(record, now);
  }

  /** Runs the per-symbol pipeline; never throws. */
  async scanSymbol(symbol: string, now: Date = new Date()): Promise<ScanResult> {
    const { router, config } = this.deps;
    let technical: TechnicalReport | null = null;
    let fundamental: FundamentalReport | null = null;
    let options: OptionsReport | null = null;
    let assetType: AssetType = 'UNKNOWN';
    let earningsDate: string | null = null;
    let currentPrice: number | null = null;
    let priceSource = 'unavailable';

    try {
      const bars = await router.ohlcv(symbol, config.technical.historyPeriod);
      technical = analyzeTechnical(symbol, bars, config.technical);

      assetType = this.etfSymbols.has(symbol) ? 'ETF' : await router.assetType(symbol);

      const info = await router.fundamentals(symbol);
      fundamental = analyzeFundamentals(symbol, info, assetType, config.fundamentals);

      if (assetType !== 'ETF') {
        earningsDate = await router.earningsDate(symbol);
      }

      const live = await router.livePrice(symbol);
      if (live.price !== null) {
        currentPrice = live.price;
        priceSource = live.source;
      } else if (technical.price !== null) {
        currentPrice = technical.price;
        priceSource = 'technical_close';
      }

      const chain = await router.optionsChain(symbol, config.options.minDaysToExpiration);
      options = analyzeOptionsChain(symbol, currentPrice, chain, config.options, now);
    } catch (error) {
      logger.error({ symbol, err: error }, 'Symbol pipeline failed');
    }

    const decision = this.gate.evaluate({
      symbol,
      technical,
      fundamental,
      options,
      earningsDate,
      assetType,
      now,
    });
    const conviction = this.scorer.score({ symbol, assetType, technical, fundamental, options });

    return {
      symbol,
      currentPrice,
      priceSource,
      assetType,
      earningsDate,
      decision,
      conviction,
      reports: { technical, fundamental, options },
    };
  }

  private async finish(record: ScanRecord, now: Date): Promise<ScanOutcome> {
    const { scans, alerts, tracker, config } = this.deps;
    if (!scans) {
      return {
        record,
        comparison: compareScans(record, null),
        alerts: [],
        persisted: false,
        cancelled: false,
        trackedSignals: 0,
      };
    }

    try {
      scans.append(record);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      logger.error({ scanId: record.id, operation: error.operation, err: error }, 'Scan not persisted');
      return {
        record,
        comparison: compareScans(record, null),
        alerts: [],
        persisted: false,
        cancelled: false,
        trackedSignals: 0,
      };
    }

    // Without the previous record every GO would look new, so alerts wait for the next scan
    let previous: ScanRecord | null = null;
    let previousKnown = true;
    try {
      previous = scans.previous(record.id);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      previousKnown = false;
      logger.error({ scanId: record.id, operation: error.operation, err: error }, 'Previous scan lookup failed');
    }

    const comparison = compareScans(record, previous);
    logger.info({ scanId: record.id, previousId: comparison.previousId, ...comparison.summary }, 'Scan compared');

    let created: Alert[] = [];
    if (alerts && previousKnown) {
      try {
        created = await alerts.fromScan(record, comparison, previous, now);
      } catch (error) {
        if (!(error instanceof PersistenceError)) throw error;
        logger.error({ scanId: record.id, operation: error.operation, err: error }, 'Scan alerts not stored');
      }
    }

    let trackedSignals = 0;
    try {
      trackedSignals = tracker ? tracker.trackScan(record, now) : 0;
      const removed = scans.cleanup(config.history.retentionDays, now);
      if (removed > 0) logger.info({ removed }, 'Old scans removed');
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      logger.error({ scanId: record.id, operation: error.operation, err: error }, 'Post-scan bookkeeping failed');
    }

    return { record, comparison, alerts: created, persisted: true, cancelled: false, trackedSignals };
  }
}
