/**
 * Position helpers: OCC contract symbols, cost basis and P&L arithmetic.
 */

import { randomUUID } from 'crypto';
import { formatOccDate } from '@/core/time';
import type { AssetType, OptionType } from '@/types/market';
import type { Position, PositionInput } from '@/types/portfolio';

export const CONTRACT_MULTIPLIER = 100;

/**
 * OCC option symbol: root + YYMMDD + C/P + strike x 1000 padded to 8 digits.
 * AAPL 2027-01-15 200 CALL -> AAPL270115C00200000
 */
export function occSymbol(
  symbol: string,
  expiry: string,
  optionType: OptionType,
  strike: number
): string | null {
  const date = formatOccDate(expiry);
  if (!date) return null;
  const side = optionType === 'CALL' ? 'C' : 'P';
  const strikePart = String(Math.round(strike * 1000)).padStart(8, '0');
  return `${symbol.toUpperCase()}${date}${side}${strikePart}`;
}

export function positionContractSymbol(position: Position): string | null {
  return occSymbol(position.symbol, position.expiry, position.optionType, position.strike);
}

export function costBasis(entryPrice: number, contracts: number): number {
  return entryPrice * contracts * CONTRACT_MULTIPLIER;
}

export function marketValue(price: number | null, contracts: number): number | null {
  return price === null ? null : price * contracts * CONTRACT_MULTIPLIER;
}

export function unrealizedPnl(
  value: number | null,
  basis: number
): { pnl: number | null; pnlPct: number | null } {
  if (value === null) return { pnl: null, pnlPct: null };
  const pnl = value - basis;
  return { pnl, pnlPct: basis > 0 ? (pnl / basis) * 100 : null };
}

export function positionFromInput(
  input: PositionInput,
  assetType: AssetType,
  now: Date = new Date()
): Position {
  const timestamp = now.toISOString();
  return {
    id: randomUUID(),
    symbol: input.symbol.trim().toUpperCase(),
    assetType: input.asset_type ?? assetType,
    optionType: input.option_type,
    expiry: input.expiry,
    strike: input.strike,
    contracts: input.contracts,
    entryDate: input.entry_date,
    entryPrice: input.entry_price,
    underlyingEntryPrice: input.underlying_entry_price ?? null,
    status: 'OPEN',
    notes: input.notes ?? '',
    tags: input.tags ?? [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Snake_case export shape, the inverse of positionFromInput. */
export function positionToInput(position: Position): PositionInput {
  return {
    symbol: position.symbol,
    asset_type: position.assetType,
    option_type: position.optionType,
    expiry: position.expiry,
    strike: position.strike,
    contracts: position.contracts,
    entry_date: position.entryDate,
    entry_price: position.entryPrice,
    underlying_entry_price: position.underlyingEntryPrice,
    notes: position.notes,
    tags: position.tags,
  };
}
