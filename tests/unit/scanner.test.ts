import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AlertManager } from '@/alerts/manager';
import type { HistoryPeriod } from '@/core/config';
import { openDatabase, PersistenceError, type DatabaseHandle } from '@/data/db';
import { AlertRepository } from '@/data/repositories/alert_repo';
import { ScanRepository } from '@/data/repositories/scan_repo';
import { TrackedSignalRepository } from '@/data/repositories/tracked_signal_repo';
import { SignalTracker } from '@/history/tracker';
import { DataSourceRouter } from '@/providers/router';
import { configFingerprint, countVerdicts, Scanner } from '@/scan/scanner';
import type { ScanRecord } from '@/types/history';
import type { OhlcvBar } from '@/types/market';
import { sleep } from '@/utils/throttler';
import type { Alert } from '@/types/tracking';
import { FakeMarket, makeBars, makeChainRow, makeScanResult, testConfig } from '../helpers/fixtures';

// Short windows so 30 bars give a full report; the zigzag bars run an RSI near 79
const config = testConfig({
  technical: { sma_fast: 5, sma_slow: 10, hv_window: 5, rsi_period: 5 },
  decision: { max_rsi_entry: 100 },
});
const now = new Date(2026, 0, 10, 12, 0, 0);
const etfSymbols = new Set(['SPY']);

function market(): FakeMarket {
  return new FakeMarket('fake', {
    SPY: { bars: makeBars(30), livePrice: 116, chain: [makeChainRow()] },
  });
}

function routerFor(fake: FakeMarket): DataSourceRouter {
  return new DataSourceRouter(
    {
      ohlcv: [fake],
      fundamentals: [fake],
      optionsChain: [fake],
      earningsDate: [fake],
      assetType: [fake],
      liveQuote: [fake],
    },
    { timeoutMs: 500 }
  );
}

class BrokenHistoryRouter extends DataSourceRouter {
  override async ohlcv(_symbol: string, _period?: HistoryPeriod): Promise<OhlcvBar[]> {
    throw new Error('history backend down');
  }
}

class ReadOnlyScanRepository extends ScanRepository {
  override append(_record: ScanRecord): void {
    throw new PersistenceError('scan.append failed: disk full', 'scan.append');
  }
}

class FullAlertRepository extends AlertRepository {
  override save(_alert: Alert): Alert {
    throw new PersistenceError('alert.save failed: disk full', 'alert.save');
  }
}

class HistorylessScanRepository extends ScanRepository {
  override previous(_beforeId?: string): ScanRecord | null {
    throw new PersistenceError('scan.previous failed: database is locked', 'scan.previous');
  }
}

/** Holds each history request open for a moment and records how many overlap. */
class SlowHistoryMarket extends FakeMarket {
  active = 0;
  maxActive = 0;

  override async fetchOhlcv(symbol: string, period: HistoryPeriod, interval: string): Promise<OhlcvBar[]> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await sleep(20);
      return await super.fetchOhlcv(symbol, period, interval);
    } finally {
      this.active -= 1;
    }
  }
}

describe('Scanner without storage', () => {
  it('scans each symbol once and orders results by conviction', async () => {
    const fake = market();
    const scanner = new Scanner({ router: routerFor(fake), config, etfSymbols });

    const outcome = await scanner.run({ symbols: ['bad', ' spy', 'SPY'], now });

    expect(outcome.cancelled).toBe(false);
    expect(outcome.persisted).toBe(false);
    expect(outcome.record?.results.map((r) => r.symbol)).toEqual(['SPY', 'BAD']);
    expect(outcome.record?.counts).toEqual({ symbols: 2, go: 1, watch: 0, noGo: 1 });
    expect(outcome.record?.timestamp).toBe(now.toISOString());
    expect(outcome.record?.configFingerprint).toBe(configFingerprint(config));
    expect(outcome.comparison?.previousId).toBeNull();
    expect(outcome.comparison?.newGoSignals).toEqual(['SPY']);
    expect(fake.calls.filter((c) => c.endsWith(':SPY') && c.startsWith('ohlcv'))).toEqual(['ohlcv:SPY']);
  });

  it('runs symbols side by side up to the configured concurrency', async () => {
    const symbols = ['AAA', 'BBB', 'CCC', 'DDD'];
    const parallel = new SlowHistoryMarket('slow');
    const sequential = new SlowHistoryMarket('slow');

    await new Scanner({
      router: routerFor(parallel),
      config: testConfig({ scan: { concurrency: 4 } }),
    }).run({ symbols, now });
    await new Scanner({
      router: routerFor(sequential),
      config: testConfig({ scan: { concurrency: 1 } }),
    }).run({ symbols, now });

    expect(parallel.maxActive).toBe(4);
    expect(sequential.maxActive).toBe(1);
  });

  it('produces a GO for an ETF with a bullish trend and liquid LEAPS', async () => {
    const fake = market();
    const scanner = new Scanner({ router: routerFor(fake), config, etfSymbols });

    const result = await scanner.scanSymbol('SPY', now);

    expect(result.decision.verdict).toBe('GO');
    expect(result.assetType).toBe('ETF');
    expect(result.currentPrice).toBe(116);
    expect(result.priceSource).toBe('fake_live');
    expect(result.earningsDate).toBeNull();
    expect(result.reports.options?.candidates.map((c) => c.contractSymbol)).toEqual(['SPY270115C00100000']);
    expect(result.conviction.score).toBe(73.7);
    expect(result.conviction.band).toBe('MODERATE');
    expect(fake.calls).not.toContain('earningsDate:SPY');
    expect(fake.calls).not.toContain('assetType:SPY');
  });

  it('fails closed for a symbol without data', async () => {
    const scanner = new Scanner({ router: routerFor(market()), config, etfSymbols });

    const result = await scanner.scanSymbol('BAD', now);

    expect(result.decision.verdict).toBe('NO_GO');
    expect(result.currentPrice).toBeNull();
    expect(result.priceSource).toBe('unavailable');
    expect(result.decision.reasons[0]).toBe('Technical: Insufficient Data (UNKNOWN)');
  });

  it('keeps going when a symbol pipeline throws', async () => {
    const scanner = new Scanner({ router: new BrokenHistoryRouter({}), config, etfSymbols });

    const result = await scanner.scanSymbol('SPY', now);

    expect(result.decision.verdict).toBe('NO_GO');
    expect(result.reports).toEqual({ technical: null, fundamental: null, options: null });
  });

  it('discards partial results when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fake = market();
    const scanner = new Scanner({ router: routerFor(fake), config, etfSymbols });

    const outcome = await scanner.run({ symbols: ['SPY', 'BAD'], signal: controller.signal, now });

    expect(outcome).toEqual({
      record: null,
      comparison: null,
      alerts: [],
      persisted: false,
      cancelled: true,
      trackedSignals: 0,
    });
    expect(fake.calls).toEqual([]);
  });
});

describe('Scanner with storage', () => {
  let db: DatabaseHandle;

  beforeEach(() => {
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  function storedScanner(scans: ScanRepository = new ScanRepository(db)): Scanner {
    const router = routerFor(market());
    return new Scanner({
      router,
      config,
      etfSymbols,
      scans,
      alerts: new AlertManager(new AlertRepository(db), config.alerts),
      tracker: new SignalTracker(new TrackedSignalRepository(db), router, config.tracking),
    });
  }

  it('persists, tracks and alerts, then compares the next scan', async () => {
    const scanner = storedScanner();

    const first = await scanner.run({ symbols: ['SPY', 'BAD'], now });

    expect(first.persisted).toBe(true);
    expect(first.trackedSignals).toBe(1);
    expect(first.alerts.map((a) => `${a.type}:${a.symbol}`)).toEqual(['NEW_GO_SIGNAL:SPY']);

    const later = new Date(2026, 0, 10, 13, 0, 0);
    const second = await scanner.run({ symbols: ['SPY', 'BAD'], now: later });

    expect(second.comparison?.previousId).toBe(first.record?.id);
    expect(second.comparison?.newGoSignals).toEqual([]);
    expect(second.alerts).toEqual([]);
    expect(new ScanRepository(db).latest()?.id).toBe(second.record?.id);
  });

  it('returns the scan unpersisted when storage fails', async () => {
    const scanner = storedScanner(new ReadOnlyScanRepository(db));

    const outcome = await scanner.run({ symbols: ['SPY'], now });

    expect(outcome.persisted).toBe(false);
    expect(outcome.record?.counts.go).toBe(1);
    expect(outcome.alerts).toEqual([]);
    expect(outcome.trackedSignals).toBe(0);
  });
});

describe('Scanner with failing bookkeeping', () => {
  let db: DatabaseHandle;

  beforeEach(() => {
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('keeps a stored scan when its alerts cannot be saved', async () => {
    const router = routerFor(market());
    const scanner = new Scanner({
      router,
      config,
      etfSymbols,
      scans: new ScanRepository(db),
      alerts: new AlertManager(new FullAlertRepository(db), config.alerts),
      tracker: new SignalTracker(new TrackedSignalRepository(db), router, config.tracking),
    });

    const outcome = await scanner.run({ symbols: ['SPY'], now });

    expect(outcome.persisted).toBe(true);
    expect(outcome.alerts).toEqual([]);
    expect(outcome.trackedSignals).toBe(1);
    expect(outcome.comparison?.newGoSignals).toEqual(['SPY']);
    expect(new ScanRepository(db).latest()?.id).toBe(outcome.record?.id);
  });

  it('reports a stored scan as persisted when the previous lookup fails', async () => {
    const router = routerFor(market());
    const scanner = new Scanner({
      router,
      config,
      etfSymbols,
      scans: new HistorylessScanRepository(db),
      alerts: new AlertManager(new AlertRepository(db), config.alerts),
      tracker: new SignalTracker(new TrackedSignalRepository(db), router, config.tracking),
    });

    const outcome = await scanner.run({ symbols: ['SPY'], now });

    expect(outcome.persisted).toBe(true);
    expect(outcome.comparison?.previousId).toBeNull();
    expect(outcome.alerts).toEqual([]);
    expect(outcome.trackedSignals).toBe(1);
    expect(new AlertRepository(db).list()).toEqual([]);
  });
});

describe('scan helpers', () => {
  it('counts verdicts', () => {
    expect(
      countVerdicts([makeScanResult('A', 'GO'), makeScanResult('B', 'NO_GO'), makeScanResult('C', 'NO_GO')])
    ).toEqual({ symbols: 3, go: 1, watch: 0, noGo: 2 });
  });

  it('fingerprints only the sections that change verdicts', () => {
    const base = configFingerprint(config);
    expect(configFingerprint({ ...config, scan: { ...config.scan, concurrency: 8 } })).toBe(base);
    expect(configFingerprint({ ...config, decision: { ...config.decision, maxIvHvRatio: 2 } })).not.toBe(base);
  });
});
