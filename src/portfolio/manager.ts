/**
 * Portfolio manager: position CRUD, mark-to-market refresh with one signal
 * per position, summaries and JSON import/export.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createChildLogger } from '@/utils/logger';
import { validatePositionInput } from '@/validation/ajv_instance';
import type { PositionRepository, PositionUpdate } from '@/data/repositories/position_repo';
import type { DataSourceRouter } from '@/providers/router';
import type {
  PortfolioImportResult,
  PortfolioSummary,
  Position,
  PositionInput,
  PositionStatus,
  PricedPosition,
  Signal,
  SignalType,
} from '@/types/portfolio';
import { positionFromInput, positionToInput } from './models';
import type { PositionPricer } from './pricing';
import { severityRank, type PortfolioSignalMachine } from './signals';

const logger = createChildLogger('portfolio');

export class PositionValidationError extends Error {
  constructor(public problems: string[]) {
    super(`Invalid position: ${problems.join('; ')}`);
    this.name = 'PositionValidationError';
  }
}

export interface SignalSummaryEntry {
  positionId: string;
  symbol: string;
  strike: number;
  expiry: string;
  optionType: Position['optionType'];
  signal: Signal;
  pnlPct: number | null;
  daysToExpiry: number | null;
}

export interface PortfolioExport {
  version: 1;
  exportedAt: string;
  positions: PositionInput[];
}

function emptySignalCounts(): Record<SignalType, number> {
  return { STOP_LOSS: 0, TECH_INVALIDATED: 0, TAKE_PROFIT: 0, EARNINGS_RISK: 0, EXPIRY_REVIEW: 0, HOLD: 0 };
}

function extractPositionList(data: unknown): unknown[] | null {
  if (Array.isArray(data)) return data;
  if (typeof data === 'object' && data !== null && 'positions' in data && Array.isArray(data.positions)) {
    return data.positions;
  }
  return null;
}

export class PortfolioManager {
  constructor(
    private readonly repo: PositionRepository,
    private readonly router: DataSourceRouter,
    private readonly pricer: PositionPricer,
    private readonly signals: PortfolioSignalMachine
  ) {}

  /** Validates raw input and stores it as an OPEN position. */
  async addPosition(input: unknown, now: Date = new Date()): Promise<Position> {
    const result = validatePositionInput(input);
    if (!result.valid || !result.data) {
      throw new PositionValidationError(result.errors ?? ['Unknown validation error']);
    }
    const assetType = result.data.asset_type ?? (await this.router.assetType(result.data.symbol.toUpperCase()));
    return this.repo.add(positionFromInput(result.data, assetType, now));
  }

  getPosition(id: string): Position | null {
    return this.repo.get(id);
  }

  listPositions(status?: PositionStatus): Position[] {
    return this.repo.list(status);
  }

  listOpenPositions(): Position[] {
    return this.repo.listOpen();
  }

  updatePosition(id: string, changes: PositionUpdate, now: Date = new Date()): Position | null {
    return this.repo.update(id, changes, now);
  }

  closePosition(id: string, notes?: string, now: Date = new Date()): Position | null {
    const current = this.repo.get(id);
    if (!current) return null;
    const changes: PositionUpdate = { status: 'CLOSED' };
    if (notes) changes.notes = current.notes ? `${current.notes}\n${notes}` : notes;
    logger.info({ id, symbol: current.symbol }, 'Closing position');
    return this.repo.update(id, changes, now);
  }

  deletePosition(id: string): boolean {
    return this.repo.delete(id);
  }

  /** Prices and signals every OPEN position. A failure on one position is kept on its entry. */
  async refreshAll(now: Date = new Date()): Promise<PricedPosition[]> {
    const positions = this.repo.listOpen();
    if (positions.length === 0) {
      logger.info('No open positions to refresh');
      return [];
    }

    logger.info({ count: positions.length }, 'Refreshing open positions');
    const priced: PricedPosition[] = [];
    for (const position of positions) {
      priced.push(await this.refreshPosition(position, now));
    }
    return priced;
  }

  async refreshOne(id: string, now: Date = new Date()): Promise<PricedPosition | null> {
    const position = this.repo.get(id);
    return position ? this.refreshPosition(position, now) : null;
  }

  private async refreshPosition(position: Position, now: Date): Promise<PricedPosition> {
    try {
      const snapshot = await this.pricer.price(position, now);
      const signal = await this.signals.evaluate(position, snapshot, now);
      return { position, snapshot, signal, error: null };
    } catch (error) {
      logger.error({ id: position.id, symbol: position.symbol, err: error }, 'Position refresh failed');
      const message = error instanceof Error ? error.message : String(error);
      return { position, snapshot: null, signal: null, error: message };
    }
  }

  /** Totals cover positions that received a market value; the rest are counted as unpriced. */
  summarize(priced: PricedPosition[], now: Date = new Date()): PortfolioSummary {
    const signalCounts = emptySignalCounts();
    const bySymbol: PortfolioSummary['bySymbol'] = {};
    const criticalPositions: PortfolioSummary['criticalPositions'] = [];

    let positionsPriced = 0;
    let totalCostBasis = 0;
    let totalMarketValue = 0;
    let totalUnrealizedPnl = 0;

    for (const entry of priced) {
      const { position, snapshot, signal } = entry;

      if (signal) {
        signalCounts[signal.type] += 1;
        if (signal.severity === 'CRITICAL') {
          criticalPositions.push({ id: position.id, symbol: position.symbol, signal: signal.type });
        }
      }

      const symbolEntry = (bySymbol[position.symbol] ??= { positions: 0, marketValue: 0, unrealizedPnl: 0 });
      symbolEntry.positions += 1;

      if (snapshot && snapshot.marketValue !== null) {
        positionsPriced += 1;
        totalCostBasis += snapshot.costBasis;
        totalMarketValue += snapshot.marketValue;
        totalUnrealizedPnl += snapshot.unrealizedPnl ?? 0;
        symbolEntry.marketValue += snapshot.marketValue;
        symbolEntry.unrealizedPnl += snapshot.unrealizedPnl ?? 0;
      }
    }

    return {
      totalPositions: priced.length,
      positionsPriced,
      positionsUnpriced: priced.length - positionsPriced,
      totalCostBasis,
      totalMarketValue,
      totalUnrealizedPnl,
      totalUnrealizedPnlPct: totalCostBasis > 0 ? (totalUnrealizedPnl / totalCostBasis) * 100 : 0,
      signalCounts,
      bySymbol,
      criticalPositions,
      lastUpdated: now.toISOString(),
    };
  }

  /** Every non-HOLD signal, CRITICAL first; input order kept within a severity. */
  signalSummary(priced: PricedPosition[]): SignalSummaryEntry[] {
    const entries: SignalSummaryEntry[] = [];
    for (const { position, snapshot, signal } of priced) {
      if (!signal || signal.type === 'HOLD') continue;
      entries.push({
        positionId: position.id,
        symbol: position.symbol,
        strike: position.strike,
        expiry: position.expiry,
        optionType: position.optionType,
        signal,
        pnlPct: snapshot?.unrealizedPnlPct ?? null,
        daysToExpiry: snapshot?.daysToExpiry ?? null,
      });
    }
    return entries.sort((a, b) => severityRank(a.signal.severity) - severityRank(b.signal.severity));
  }

  exportToFile(filePath: string, now: Date = new Date()): number {
    const positions = this.repo.listOpen();
    const payload: PortfolioExport = {
      version: 1,
      exportedAt: now.toISOString(),
      positions: positions.map(positionToInput),
    };
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, JSON.stringify(payload, null, 2), 'utf-8');
    logger.info({ filePath, count: positions.length }, 'Portfolio exported');
    return positions.length;
  }

  /**
   * Imports positions from a JSON file holding either an array of positions or
   * `{ positions: [...] }`. Invalid entries are reported; a contract already held
   * OPEN is skipped.
   */
  async importFromFile(filePath: string, now: Date = new Date()): Promise<PortfolioImportResult> {
    const result: PortfolioImportResult = { imported: 0, skipped: 0, errors: [], importedPositions: [] };
    if (!existsSync(filePath)) {
      result.errors.push(`File not found: ${filePath}`);
      return result;
    }

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.errors.push(`Invalid JSON: ${message}`);
      return result;
    }

    const entries = extractPositionList(data);
    if (!entries) {
      result.errors.push('Expected an array of positions or an object with a "positions" array');
      return result;
    }

    for (const [index, entry] of entries.entries()) {
      const validation = validatePositionInput(entry);
      if (!validation.valid || !validation.data) {
        result.errors.push(`positions[${index}]: ${(validation.errors ?? []).join('; ')}`);
        result.skipped += 1;
        continue;
      }

      const input = validation.data;
      const symbol = input.symbol.trim().toUpperCase();
      if (this.repo.findOpenContract(symbol, input.option_type, input.expiry, input.strike)) {
        logger.info({ symbol, expiry: input.expiry, strike: input.strike }, 'Duplicate open contract skipped');
        result.skipped += 1;
        continue;
      }

      const position = await this.addPosition(input, now);
      result.imported += 1;
      result.importedPositions.push({ id: position.id, symbol: position.symbol });
    }

    logger.info({ filePath, imported: result.imported, skipped: result.skipped }, 'Portfolio import finished');
    return result;
  }
}
