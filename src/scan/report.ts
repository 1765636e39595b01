/**
 * Plain-text rendering of scan records and comparisons for the CLI.
 */

import type { ScanComparison, ScanRecord, ScanResult } from '@/types/history';

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

function formatPrice(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(2);
}

function topContract(result: ScanResult): string {
  const top = result.reports.options?.candidates[0];
  if (!top) return '-';
  return `${top.strike} ${top.optionType} ${top.expiration} @ ${top.mid.toFixed(2)}`;
}

export function formatScanTable(record: ScanRecord): string {
  const header = [pad('SYMBOL', 8), pad('VERDICT', 8), pad('SCORE', 6), pad('BAND', 9), pad('PRICE', 10), 'TOP CONTRACT'];
  const lines = [
    `Scan ${record.id} (${record.timestamp}) config ${record.configFingerprint}`,
    `GO ${record.counts.go} | WATCH ${record.counts.watch} | NO_GO ${record.counts.noGo} | symbols ${record.counts.symbols}`,
    '',
    header.join(' '),
  ];

  for (const result of record.results) {
    lines.push(
      [
        pad(result.symbol, 8),
        pad(result.decision.verdict, 8),
        pad(result.conviction.score.toFixed(1), 6),
        pad(result.conviction.band, 9),
        pad(formatPrice(result.currentPrice), 10),
        topContract(result),
      ].join(' ')
    );
  }
  return lines.join('\n');
}

export function formatReasons(result: ScanResult): string {
  return [`${result.symbol}: ${result.decision.verdict}`, ...result.decision.reasons.map((r) => `  - ${r}`)].join('\n');
}

export function formatComparison(comparison: ScanComparison): string {
  if (!comparison.previousId) {
    return `First scan: ${comparison.summary.newGo} GO, ${comparison.summary.newSymbols} symbols`;
  }

  const lines = [`Changes since ${comparison.previousId}:`];
  if (comparison.newGoSignals.length > 0) lines.push(`  New GO: ${comparison.newGoSignals.join(', ')}`);
  for (const change of comparison.upgradedSignals) {
    lines.push(`  Upgraded: ${change.symbol} ${change.from} -> ${change.to}`);
  }
  for (const change of comparison.downgradedSignals) {
    lines.push(`  Downgraded: ${change.symbol} ${change.from} -> ${change.to}`);
  }
  if (comparison.droppedSymbols.length > 0) lines.push(`  Dropped: ${comparison.droppedSymbols.join(', ')}`);
  if (comparison.newSymbols.length > 0) lines.push(`  New symbols: ${comparison.newSymbols.join(', ')}`);
  if (lines.length === 1) lines.push('  No verdict changes');
  return lines.join('\n');
}
