/**
 * Gate verdicts and conviction scores.
 */

import type { AssetType } from './market';

export const VERDICTS = ['NO_GO', 'WATCH', 'GO'] as const;

export type Verdict = (typeof VERDICTS)[number];

export interface DimensionPass {
  technical: boolean;
  fundamental: boolean;
  options: boolean;
}

export interface Decision {
  readonly symbol: string;
  readonly verdict: Verdict;
  readonly reasons: readonly string[];
  readonly earningsRisk: boolean;
  readonly assetType: AssetType;
  readonly perDimensionPass: Readonly<DimensionPass>;
  readonly evaluatedAt: string;
}

export type ConvictionBand = 'STRONG' | 'MODERATE' | 'WEAK';

export interface ConvictionComponents {
  technical: number;
  fundamental: number;
  volatility: number;
  liquidity: number;
}

export interface ConvictionResult {
  symbol: string;
  score: number;
  band: ConvictionBand;
  components: ConvictionComponents;
  notes: string[];
}

/** Ordinal rank used for scan-to-scan comparison: NO_GO < WATCH < GO. */
export function verdictRank(verdict: Verdict): number {
  return VERDICTS.indexOf(verdict);
}
