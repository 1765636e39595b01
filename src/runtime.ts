/**
 * Wires config, storage, providers and services for an entry point.
 */

import { AlertManager } from '@/alerts/manager';
import type { AppConfig } from '@/core/config';
import { loadEtfSymbols } from '@/core/etf_symbols';
import { openDatabase, type DatabaseHandle } from '@/data/db';
import { AlertRepository } from '@/data/repositories/alert_repo';
import { PositionRepository } from '@/data/repositories/position_repo';
import { ScanRepository } from '@/data/repositories/scan_repo';
import { TrackedSignalRepository } from '@/data/repositories/tracked_signal_repo';
import { SignalTracker } from '@/history/tracker';
import { PortfolioManager } from '@/portfolio/manager';
import { PositionPricer } from '@/portfolio/pricing';
import { PortfolioSignalMachine } from '@/portfolio/signals';
import type { FetchFn } from '@/providers/http_client';
import { createRouter } from '@/providers/registry';
import type { DataSourceRouter } from '@/providers/router';
import { Scanner } from '@/scan/scanner';

export interface Runtime {
  config: AppConfig;
  db: DatabaseHandle;
  router: DataSourceRouter;
  scans: ScanRepository;
  scanner: Scanner;
  portfolio: PortfolioManager;
  alerts: AlertManager;
  tracker: SignalTracker;
  close(): void;
}

export interface RuntimeOptions {
  db?: DatabaseHandle;
  router?: DataSourceRouter;
  fetchImpl?: FetchFn;
}

export function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Runtime {
  const db = options.db ?? openDatabase(config.dbPath);
  const etfSymbols = loadEtfSymbols(config.projectRoot);
  const router = options.router ?? createRouter(config, { fetchImpl: options.fetchImpl, etfSymbols });

  const scans = new ScanRepository(db);
  const alerts = new AlertManager(new AlertRepository(db), config.alerts);
  const tracker = new SignalTracker(new TrackedSignalRepository(db), router, config.tracking);
  const portfolio = new PortfolioManager(
    new PositionRepository(db),
    router,
    new PositionPricer(router, config),
    new PortfolioSignalMachine(router, config)
  );
  const scanner = new Scanner({ router, config, etfSymbols, scans, alerts, tracker });

  return {
    config,
    db,
    router,
    scans,
    scanner,
    portfolio,
    alerts,
    tracker,
    close: () => db.close(),
  };
}
