import type { ConvictionBand } from './decision';
import type { SignalSeverity } from './portfolio';

export type TrackedVerdict = 'GO' | 'WATCH';

export interface HorizonOutcome {
  price: number;
  changePct: number;
  recordedAt: string;
}

export interface TrackedSignal {
  id: string;
  scanId: string;
  symbol: string;
  verdict: TrackedVerdict;
  convictionScore: number;
  convictionBand: ConvictionBand;
  priceAtSignal: number;
  signalTimestamp: string;
  recommendedContract: string | null;
  recommendedStrike: number | null;
  recommendedExpiry: string | null;
  optionPriceAtSignal: number | null;
  /** Keyed by horizon label, e.g. "30d". */
  outcomes: Record<string, HorizonOutcome>;
}

export type ValidationStatus = 'INSUFFICIENT_DATA' | 'PRELIMINARY';

export interface HorizonStats {
  horizonDays: number;
  validated: number;
  avgChangePct: number | null;
  positivePct: number | null;
}

export interface VerdictStats {
  total: number;
  horizons: HorizonStats[];
}

export interface ValidationStats {
  go: VerdictStats;
  watch: VerdictStats;
  status: ValidationStatus;
  message: string;
  disclaimer: string;
}

export const ALERT_TYPES = [
  'NEW_GO_SIGNAL',
  'SIGNAL_UPGRADE',
  'CONVICTION_THRESHOLD',
  'STOP_LOSS',
  'TAKE_PROFIT',
  'TECH_INVALIDATED',
  'EXPIRY_REVIEW',
  'EARNINGS_RISK',
] as const;

export type AlertType = (typeof ALERT_TYPES)[number];

export interface Alert {
  id: string;
  type: AlertType;
  severity: SignalSeverity;
  symbol: string;
  title: string;
  message: string;
  data: Record<string, unknown>;
  createdAt: string;
  acknowledged: boolean;
  acknowledgedAt: string | null;
}
