import type { SignalSeverity } from '@/types/portfolio';
import type { Alert, AlertType } from '@/types/tracking';
import { guard, type DatabaseHandle } from '../db';

interface AlertRow {
  id: string;
  type: AlertType;
  severity: SignalSeverity;
  symbol: string;
  title: string;
  message: string;
  data: string;
  created_at: string;
  acknowledged: number;
  acknowledged_at: string | null;
}

export interface AlertQuery {
  limit?: number;
  unacknowledgedOnly?: boolean;
  type?: AlertType;
  severity?: SignalSeverity;
}

function parseData(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

function fromRow(row: AlertRow): Alert {
  return {
    id: row.id,
    type: row.type,
    severity: row.severity,
    symbol: row.symbol,
    title: row.title,
    message: row.message,
    data: parseData(row.data),
    createdAt: row.created_at,
    acknowledged: row.acknowledged === 1,
    acknowledgedAt: row.acknowledged_at,
  };
}

export class AlertRepository {
  constructor(private readonly db: DatabaseHandle) {}

  save(alert: Alert): Alert {
    return guard('alert.save', () => {
      this.db
        .prepare(`
          INSERT INTO alerts (id, type, severity, symbol, title, message, data, created_at, acknowledged, acknowledged_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          alert.id,
          alert.type,
          alert.severity,
          alert.symbol,
          alert.title,
          alert.message,
          JSON.stringify(alert.data),
          alert.createdAt,
          alert.acknowledged ? 1 : 0,
          alert.acknowledgedAt
        );
      return alert;
    });
  }

  list(query: AlertQuery = {}): Alert[] {
    return guard('alert.list', () => {
      const clauses: string[] = [];
      const params: Array<string | number> = [];
      if (query.unacknowledgedOnly) clauses.push('acknowledged = 0');
      if (query.type) {
        clauses.push('type = ?');
        params.push(query.type);
      }
      if (query.severity) {
        clauses.push('severity = ?');
        params.push(query.severity);
      }
      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
      params.push(query.limit ?? 50);

      return this.db
        .prepare<Array<string | number>, AlertRow>(
          `SELECT * FROM alerts ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`
        )
        .all(...params)
        .map(fromRow);
    });
  }

  acknowledge(id: string, now: Date = new Date()): boolean {
    return guard('alert.acknowledge', () => {
      const { changes } = this.db
        .prepare('UPDATE alerts SET acknowledged = 1, acknowledged_at = ? WHERE id = ? AND acknowledged = 0')
        .run(now.toISOString(), id);
      return changes > 0;
    });
  }

  acknowledgeAll(now: Date = new Date()): number {
    return guard('alert.acknowledgeAll', () =>
      this.db
        .prepare('UPDATE alerts SET acknowledged = 1, acknowledged_at = ? WHERE acknowledged = 0')
        .run(now.toISOString()).changes
    );
  }

  /** Unacknowledged alert counts per severity. */
  unacknowledgedCounts(): Record<SignalSeverity, number> {
    return guard('alert.unacknowledgedCounts', () => {
      const counts: Record<SignalSeverity, number> = { INFO: 0, WARN: 0, CRITICAL: 0 };
      const rows = this.db
        .prepare<[], { severity: SignalSeverity; count: number }>(
          'SELECT severity, COUNT(*) AS count FROM alerts WHERE acknowledged = 0 GROUP BY severity'
        )
        .all();
      for (const row of rows) counts[row.severity] = row.count;
      return counts;
    });
  }
}
