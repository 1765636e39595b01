import { createChildLogger } from '@/utils/logger';
import type { AssetType, OptionType } from '@/types/market';
import type { Position, PositionStatus } from '@/types/portfolio';
import { guard, type DatabaseHandle } from '../db';

const logger = createChildLogger('position_repo');

interface PositionRow {
  id: string;
  symbol: string;
  asset_type: AssetType;
  option_type: OptionType;
  expiry: string;
  strike: number;
  contracts: number;
  entry_date: string;
  entry_price: number;
  underlying_entry_price: number | null;
  status: PositionStatus;
  notes: string;
  tags: string;
  created_at: string;
  updated_at: string;
}

function parseTags(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
}

function fromRow(row: PositionRow): Position {
  return {
    id: row.id,
    symbol: row.symbol,
    assetType: row.asset_type,
    optionType: row.option_type,
    expiry: row.expiry,
    strike: row.strike,
    contracts: row.contracts,
    entryDate: row.entry_date,
    entryPrice: row.entry_price,
    underlyingEntryPrice: row.underlying_entry_price,
    status: row.status,
    notes: row.notes,
    tags: parseTags(row.tags),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toParams(position: Position): Record<string, string | number | null> {
  return {
    id: position.id,
    symbol: position.symbol,
    asset_type: position.assetType,
    option_type: position.optionType,
    expiry: position.expiry,
    strike: position.strike,
    contracts: position.contracts,
    entry_date: position.entryDate,
    entry_price: position.entryPrice,
    underlying_entry_price: position.underlyingEntryPrice,
    status: position.status,
    notes: position.notes,
    tags: JSON.stringify(position.tags),
    created_at: position.createdAt,
    updated_at: position.updatedAt,
  };
}

/** Fields a caller may change after entry. */
export type PositionUpdate = Partial<
  Pick<Position, 'contracts' | 'entryPrice' | 'underlyingEntryPrice' | 'status' | 'notes' | 'tags' | 'assetType'>
>;

export class PositionRepository {
  constructor(private readonly db: DatabaseHandle) {}

  add(position: Position): Position {
    return guard('position.add', () => {
      this.db
        .prepare(`
          INSERT INTO positions (
            id, symbol, asset_type, option_type, expiry, strike, contracts, entry_date,
            entry_price, underlying_entry_price, status, notes, tags, created_at, updated_at
          ) VALUES (
            @id, @symbol, @asset_type, @option_type, @expiry, @strike, @contracts, @entry_date,
            @entry_price, @underlying_entry_price, @status, @notes, @tags, @created_at, @updated_at
          )
        `)
        .run(toParams(position));
      logger.info({ id: position.id, symbol: position.symbol }, 'Position added');
      return position;
    });
  }

  get(id: string): Position | null {
    return guard('position.get', () => {
      const row = this.db.prepare<[string], PositionRow>('SELECT * FROM positions WHERE id = ?').get(id);
      return row ? fromRow(row) : null;
    });
  }

  list(status?: PositionStatus): Position[] {
    return guard('position.list', () => {
      const rows = status
        ? this.db
            .prepare<[string], PositionRow>('SELECT * FROM positions WHERE status = ? ORDER BY expiry, symbol')
            .all(status)
        : this.db.prepare<[], PositionRow>('SELECT * FROM positions ORDER BY expiry, symbol').all();
      return rows.map(fromRow);
    });
  }

  listOpen(): Position[] {
    return this.list('OPEN');
  }

  update(id: string, changes: PositionUpdate, now: Date = new Date()): Position | null {
    return guard('position.update', () => {
      const current = this.get(id);
      if (!current) return null;

      const next: Position = { ...current, ...changes, updatedAt: now.toISOString() };
      this.db
        .prepare(`
          UPDATE positions SET
            asset_type = @asset_type, contracts = @contracts, entry_price = @entry_price,
            underlying_entry_price = @underlying_entry_price, status = @status,
            notes = @notes, tags = @tags, updated_at = @updated_at
          WHERE id = @id
        `)
        .run({
          id: next.id,
          asset_type: next.assetType,
          contracts: next.contracts,
          entry_price: next.entryPrice,
          underlying_entry_price: next.underlyingEntryPrice,
          status: next.status,
          notes: next.notes,
          tags: JSON.stringify(next.tags),
          updated_at: next.updatedAt,
        });
      return next;
    });
  }

  close(id: string, now: Date = new Date()): Position | null {
    return this.update(id, { status: 'CLOSED' }, now);
  }

  delete(id: string): boolean {
    return guard('position.delete', () => {
      const { changes } = this.db.prepare('DELETE FROM positions WHERE id = ?').run(id);
      return changes > 0;
    });
  }

  /** Same contract already held open; used to skip duplicates on import. */
  findOpenContract(
    symbol: string,
    optionType: OptionType,
    expiry: string,
    strike: number
  ): Position | null {
    return guard('position.findOpenContract', () => {
      const row = this.db
        .prepare<[string, string, string, number], PositionRow>(`
          SELECT * FROM positions
          WHERE status = 'OPEN' AND symbol = ? AND option_type = ? AND expiry = ? AND ABS(strike - ?) < 0.005
          LIMIT 1
        `)
        .get(symbol, optionType, expiry, strike);
      return row ? fromRow(row) : null;
    });
  }
}
