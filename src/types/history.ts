import type { Decision, ConvictionResult, Verdict } from './decision';
import type { AssetType } from './market';
import type { FundamentalReport, OptionsReport, TechnicalReport } from './reports';

export interface ScanResult {
  symbol: string;
  currentPrice: number | null;
  priceSource: string;
  assetType: AssetType;
  earningsDate: string | null;
  decision: Decision;
  conviction: ConvictionResult;
  reports: {
    technical: TechnicalReport | null;
    fundamental: FundamentalReport | null;
    options: OptionsReport | null;
  };
}

export interface ScanCounts {
  symbols: number;
  go: number;
  watch: number;
  noGo: number;
}

export interface ScanRecord {
  id: string;
  timestamp: string;
  configFingerprint: string;
  counts: ScanCounts;
  results: ScanResult[];
}

export interface ScanSummary {
  id: string;
  timestamp: string;
  configFingerprint: string;
  counts: ScanCounts;
}

export interface VerdictChange {
  symbol: string;
  from: Verdict;
  to: Verdict;
  /** Ordinal distance between the two verdicts (1 or 2). */
  magnitude: number;
}

export interface ScanComparison {
  currentId: string | null;
  previousId: string | null;
  newGoSignals: string[];
  upgradedSignals: VerdictChange[];
  downgradedSignals: VerdictChange[];
  droppedSymbols: string[];
  newSymbols: string[];
  summary: {
    newGo: number;
    upgraded: number;
    downgraded: number;
    dropped: number;
    newSymbols: number;
  };
}
