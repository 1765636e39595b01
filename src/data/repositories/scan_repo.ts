import { daysAgo } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { ScanRecord, ScanResult, ScanSummary } from '@/types/history';
import { guard, type DatabaseHandle } from '../db';

const logger = createChildLogger('scan_repo');

interface ScanRow {
  id: string;
  timestamp: string;
  config_fingerprint: string;
  symbol_count: number;
  go_count: number;
  watch_count: number;
  no_go_count: number;
}

interface ResultRow {
  payload: string;
}

export interface SymbolVerdictRow {
  scanId: string;
  timestamp: string;
  verdict: string;
  convictionScore: number;
}

function toSummary(row: ScanRow): ScanSummary {
  return {
    id: row.id,
    timestamp: row.timestamp,
    configFingerprint: row.config_fingerprint,
    counts: {
      symbols: row.symbol_count,
      go: row.go_count,
      watch: row.watch_count,
      noGo: row.no_go_count,
    },
  };
}

/**
 * Append-only scan history. A record and all of its results are written in
 * one transaction, so readers never observe a partial scan.
 */
export class ScanRepository {
  constructor(private readonly db: DatabaseHandle) {}

  append(record: ScanRecord): void {
    guard('scan.append', () => {
      const insertScan = this.db.prepare(`
        INSERT INTO scans (id, timestamp, config_fingerprint, symbol_count, go_count, watch_count, no_go_count)
        VALUES (@id, @timestamp, @configFingerprint, @symbols, @go, @watch, @noGo)
      `);
      const insertResult = this.db.prepare(`
        INSERT INTO scan_results (scan_id, position, symbol, verdict, conviction_score, payload)
        VALUES (?, ?, ?, ?, ?, ?)
      `);

      const write = this.db.transaction((scan: ScanRecord) => {
        insertScan.run({
          id: scan.id,
          timestamp: scan.timestamp,
          configFingerprint: scan.configFingerprint,
          ...scan.counts,
        });
        scan.results.forEach((result, index) => {
          insertResult.run(
            scan.id,
            index,
            result.symbol,
            result.decision.verdict,
            result.conviction.score,
            JSON.stringify(result)
          );
        });
      });

      write(record);
      logger.info({ scanId: record.id, results: record.results.length }, 'Scan persisted');
    });
  }

  get(id: string): ScanRecord | null {
    return guard('scan.get', () => {
      const row = this.db.prepare<[string], ScanRow>('SELECT * FROM scans WHERE id = ?').get(id);
      return row ? this.hydrate(row) : null;
    });
  }

  latest(): ScanRecord | null {
    return guard('scan.latest', () => {
      const row = this.db
        .prepare<[], ScanRow>('SELECT * FROM scans ORDER BY timestamp DESC, id DESC LIMIT 1')
        .get();
      return row ? this.hydrate(row) : null;
    });
  }

  /** The scan recorded immediately before `beforeId`; second newest without one. */
  previous(beforeId?: string): ScanRecord | null {
    return guard('scan.previous', () => {
      const row = beforeId
        ? this.db
            .prepare<[string], ScanRow>(`
              SELECT s.* FROM scans s, scans ref
              WHERE ref.id = ?
                AND (s.timestamp < ref.timestamp OR (s.timestamp = ref.timestamp AND s.id < ref.id))
              ORDER BY s.timestamp DESC, s.id DESC
              LIMIT 1
            `)
            .get(beforeId)
        : this.db
            .prepare<[], ScanRow>('SELECT * FROM scans ORDER BY timestamp DESC, id DESC LIMIT 1 OFFSET 1')
            .get();
      return row ? this.hydrate(row) : null;
    });
  }

  recent(limit: number = 10): ScanSummary[] {
    return guard('scan.recent', () =>
      this.db
        .prepare<[number], ScanRow>('SELECT * FROM scans ORDER BY timestamp DESC, id DESC LIMIT ?')
        .all(limit)
        .map(toSummary)
    );
  }

  /** Verdict trail for one symbol, newest first. */
  symbolHistory(symbol: string, limit: number = 20): SymbolVerdictRow[] {
    return guard('scan.symbolHistory', () =>
      this.db
        .prepare<
          [string, number],
          { scan_id: string; timestamp: string; verdict: string; conviction_score: number }
        >(`
          SELECT r.scan_id, s.timestamp, r.verdict, r.conviction_score
          FROM scan_results r JOIN scans s ON s.id = r.scan_id
          WHERE r.symbol = ?
          ORDER BY s.timestamp DESC
          LIMIT ?
        `)
        .all(symbol.toUpperCase(), limit)
        .map((row) => ({
          scanId: row.scan_id,
          timestamp: row.timestamp,
          verdict: row.verdict,
          convictionScore: row.conviction_score,
        }))
    );
  }

  /** Deletes scans older than `keepDays`; returns how many were removed. */
  cleanup(keepDays: number, now: Date = new Date()): number {
    return guard('scan.cleanup', () => {
      const cutoff = daysAgo(keepDays, now).toISOString();
      const deleted = this.db.prepare('DELETE FROM scans WHERE timestamp < ?').run(cutoff).changes;
      logger.info({ deleted, keepDays }, 'Cleaned up old scans');
      return deleted;
    });
  }

  private hydrate(row: ScanRow): ScanRecord {
    const results = this.db
      .prepare<[string], ResultRow>('SELECT payload FROM scan_results WHERE scan_id = ? ORDER BY position')
      .all(row.id)
      .map((r): ScanResult => JSON.parse(r.payload));
    return { ...toSummary(row), results };
  }
}
