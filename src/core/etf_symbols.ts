import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('etf_symbols');

interface EtfSymbolsFile {
  symbols?: unknown;
}

/**
 * Known ETF tickers from config/etf_symbols.json, upper-cased. Used when a
 * provider has no asset classification of its own.
 */
export function loadEtfSymbols(projectRoot: string = process.cwd()): ReadonlySet<string> {
  const filePath = join(projectRoot, 'config', 'etf_symbols.json');
  if (!existsSync(filePath)) {
    logger.warn({ filePath }, 'ETF symbol list not found');
    return new Set();
  }

  const parsed: EtfSymbolsFile = JSON.parse(readFileSync(filePath, 'utf-8'));
  const symbols = Array.isArray(parsed.symbols) ? parsed.symbols : [];
  return new Set(
    symbols.filter((s): s is string => typeof s === 'string').map((s) => s.trim().toUpperCase())
  );
}
