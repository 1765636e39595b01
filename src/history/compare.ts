/**
 * Scan-to-scan diff over verdicts ranked NO_GO < WATCH < GO.
 */

import { verdictRank, type Verdict } from '@/types/decision';
import type { ScanComparison, ScanRecord, VerdictChange } from '@/types/history';

function verdictMap(record: ScanRecord): Map<string, Verdict> {
  const map = new Map<string, Verdict>();
  for (const result of record.results) {
    map.set(result.symbol, result.decision.verdict);
  }
  return map;
}

function summarize(comparison: Omit<ScanComparison, 'summary'>): ScanComparison {
  return {
    ...comparison,
    summary: {
      newGo: comparison.newGoSignals.length,
      upgraded: comparison.upgradedSignals.length,
      downgraded: comparison.downgradedSignals.length,
      dropped: comparison.droppedSymbols.length,
      newSymbols: comparison.newSymbols.length,
    },
  };
}

/**
 * Any move up the ladder is an upgrade and any move down a downgrade.
 * newGoSignals holds every symbol that is GO now and was not GO before,
 * including symbols absent from the previous scan.
 */
export function compareScans(current: ScanRecord, previous: ScanRecord | null): ScanComparison {
  const currentVerdicts = verdictMap(current);

  if (!previous) {
    return summarize({
      currentId: current.id,
      previousId: null,
      newGoSignals: [...currentVerdicts].filter(([, v]) => v === 'GO').map(([s]) => s),
      upgradedSignals: [],
      downgradedSignals: [],
      droppedSymbols: [],
      newSymbols: [...currentVerdicts.keys()],
    });
  }

  const previousVerdicts = verdictMap(previous);
  const newGoSignals: string[] = [];
  const upgradedSignals: VerdictChange[] = [];
  const downgradedSignals: VerdictChange[] = [];
  const newSymbols: string[] = [];

  for (const [symbol, to] of currentVerdicts) {
    const from = previousVerdicts.get(symbol);
    if (from === undefined) {
      newSymbols.push(symbol);
      if (to === 'GO') newGoSignals.push(symbol);
      continue;
    }

    const delta = verdictRank(to) - verdictRank(from);
    if (to === 'GO' && from !== 'GO') newGoSignals.push(symbol);
    if (delta > 0) upgradedSignals.push({ symbol, from, to, magnitude: delta });
    if (delta < 0) downgradedSignals.push({ symbol, from, to, magnitude: -delta });
  }

  const droppedSymbols = [...previousVerdicts.keys()].filter((symbol) => !currentVerdicts.has(symbol));

  return summarize({
    currentId: current.id,
    previousId: previous.id,
    newGoSignals,
    upgradedSignals,
    downgradedSignals,
    droppedSymbols,
    newSymbols,
  });
}
