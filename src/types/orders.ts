import type { AssetType, OptionType } from './market';

export type OrderSide = 'BUY_TO_OPEN' | 'SELL_TO_CLOSE' | 'BUY_TO_CLOSE' | 'SELL_TO_OPEN';

export type OrderType = 'LIMIT' | 'MARKET';

/** A ticket for manual review. There is no submission path; status is always DRAFT. */
export interface DraftOrderTicket {
  id: string;
  createdAt: string;
  symbol: string;
  assetType: AssetType;
  optionSymbol: string;
  expiry: string;
  strike: number;
  optionType: OptionType;
  side: OrderSide;
  orderType: OrderType;
  quantity: number;
  limitPrice: number | null;
  rationale: string;
  convictionScore: number | null;
  decisionReasons: string[];
  status: 'DRAFT';
  notes: string;
  disclaimer: string;
}
