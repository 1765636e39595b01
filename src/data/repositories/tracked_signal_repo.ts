import type { ConvictionBand } from '@/types/decision';
import type { HorizonOutcome, TrackedSignal, TrackedVerdict } from '@/types/tracking';
import { guard, type DatabaseHandle } from '../db';

interface TrackedSignalRow {
  id: string;
  scan_id: string;
  symbol: string;
  verdict: TrackedVerdict;
  conviction_score: number;
  conviction_band: ConvictionBand;
  price_at_signal: number;
  signal_timestamp: string;
  recommended_contract: string | null;
  recommended_strike: number | null;
  recommended_expiry: string | null;
  option_price_at_signal: number | null;
  outcomes: string;
}

function isOutcome(value: unknown): value is HorizonOutcome {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'price' in value &&
    typeof value.price === 'number' &&
    'changePct' in value &&
    typeof value.changePct === 'number' &&
    'recordedAt' in value &&
    typeof value.recordedAt === 'string'
  );
}

function parseOutcomes(raw: string): Record<string, HorizonOutcome> {
  const parsed: unknown = JSON.parse(raw);
  const outcomes: Record<string, HorizonOutcome> = {};
  if (typeof parsed !== 'object' || parsed === null) return outcomes;
  for (const [key, value] of Object.entries(parsed)) {
    if (isOutcome(value)) outcomes[key] = value;
  }
  return outcomes;
}

function fromRow(row: TrackedSignalRow): TrackedSignal {
  return {
    id: row.id,
    scanId: row.scan_id,
    symbol: row.symbol,
    verdict: row.verdict,
    convictionScore: row.conviction_score,
    convictionBand: row.conviction_band,
    priceAtSignal: row.price_at_signal,
    signalTimestamp: row.signal_timestamp,
    recommendedContract: row.recommended_contract,
    recommendedStrike: row.recommended_strike,
    recommendedExpiry: row.recommended_expiry,
    optionPriceAtSignal: row.option_price_at_signal,
    outcomes: parseOutcomes(row.outcomes),
  };
}

export class TrackedSignalRepository {
  constructor(private readonly db: DatabaseHandle) {}

  /** Inserts unless the same scan already tracked this symbol; returns whether a row was written. */
  save(signal: TrackedSignal): boolean {
    return guard('trackedSignal.save', () => {
      const { changes } = this.db
        .prepare(`
          INSERT OR IGNORE INTO tracked_signals (
            id, scan_id, symbol, verdict, conviction_score, conviction_band, price_at_signal,
            signal_timestamp, recommended_contract, recommended_strike, recommended_expiry,
            option_price_at_signal, outcomes
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          signal.id,
          signal.scanId,
          signal.symbol,
          signal.verdict,
          signal.convictionScore,
          signal.convictionBand,
          signal.priceAtSignal,
          signal.signalTimestamp,
          signal.recommendedContract,
          signal.recommendedStrike,
          signal.recommendedExpiry,
          signal.optionPriceAtSignal,
          JSON.stringify(signal.outcomes)
        );
      return changes > 0;
    });
  }

  /** Signals at least as old as `cutoff` that have no outcome under `horizonKey`. */
  pendingOutcome(horizonKey: string, cutoff: Date): TrackedSignal[] {
    return guard('trackedSignal.pendingOutcome', () =>
      this.db
        .prepare<[string], TrackedSignalRow>(
          'SELECT * FROM tracked_signals WHERE signal_timestamp <= ? ORDER BY signal_timestamp'
        )
        .all(cutoff.toISOString())
        .map(fromRow)
        .filter((signal) => !(horizonKey in signal.outcomes))
    );
  }

  recordOutcome(id: string, horizonKey: string, outcome: HorizonOutcome): void {
    guard('trackedSignal.recordOutcome', () => {
      const update = this.db.transaction(() => {
        const row = this.db
          .prepare<[string], { outcomes: string }>('SELECT outcomes FROM tracked_signals WHERE id = ?')
          .get(id);
        if (!row) return;
        const outcomes = { ...parseOutcomes(row.outcomes), [horizonKey]: outcome };
        this.db.prepare('UPDATE tracked_signals SET outcomes = ? WHERE id = ?').run(JSON.stringify(outcomes), id);
      });
      update();
    });
  }

  list(verdict?: TrackedVerdict, limit?: number): TrackedSignal[] {
    return guard('trackedSignal.list', () => {
      const max = limit ?? -1;
      const rows = verdict
        ? this.db
            .prepare<[string, number], TrackedSignalRow>(
              'SELECT * FROM tracked_signals WHERE verdict = ? ORDER BY signal_timestamp DESC LIMIT ?'
            )
            .all(verdict, max)
        : this.db
            .prepare<[number], TrackedSignalRow>('SELECT * FROM tracked_signals ORDER BY signal_timestamp DESC LIMIT ?')
            .all(max);
      return rows.map(fromRow);
    });
  }
}
