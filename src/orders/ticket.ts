/**
 * Draft order tickets built from GO/WATCH scan results and kept in a JSON
 * file for manual review. Nothing here talks to a broker.
 */

import { randomUUID } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createChildLogger } from '@/utils/logger';
import { validateDraftTicket } from '@/validation/ajv_instance';
import type { ScanResult } from '@/types/history';
import type { DraftOrderTicket } from '@/types/orders';

const logger = createChildLogger('orders');

export const DRAFT_DISCLAIMER = 'DRAFT ONLY - NO EXECUTION CAPABILITY';

export interface TicketOptions {
  candidateIndex?: number;
  quantity?: number;
  limitDiscount?: number;
  now?: Date;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Limit price is the candidate mid shaved by `limitDiscount`; returns null
 * for NO_GO results and when the chosen candidate does not exist.
 */
export function ticketFromScanResult(result: ScanResult, options: TicketOptions = {}): DraftOrderTicket | null {
  const verdict = result.decision.verdict;
  if (verdict !== 'GO' && verdict !== 'WATCH') return null;

  const candidates = result.reports.options?.candidates ?? [];
  const candidate = candidates[options.candidateIndex ?? 0];
  if (!candidate) return null;

  const discount = options.limitDiscount ?? 0.98;
  const limitPrice =
    candidate.bid > 0 && candidate.ask > 0
      ? round2(((candidate.bid + candidate.ask) / 2) * discount)
      : candidate.bid > 0
        ? candidate.bid
        : candidate.ask > 0
          ? candidate.ask
          : null;

  return {
    id: randomUUID(),
    createdAt: (options.now ?? new Date()).toISOString(),
    symbol: result.symbol,
    assetType: result.assetType,
    optionSymbol: candidate.contractSymbol,
    expiry: candidate.expiration,
    strike: candidate.strike,
    optionType: candidate.optionType,
    side: 'BUY_TO_OPEN',
    orderType: 'LIMIT',
    quantity: options.quantity ?? 1,
    limitPrice,
    rationale: `${verdict} signal with ${result.conviction.band} conviction`,
    convictionScore: result.conviction.score,
    decisionReasons: result.decision.reasons.slice(0, 5),
    status: 'DRAFT',
    notes: '',
    disclaimer: DRAFT_DISCLAIMER,
  };
}

export function formatTicket(ticket: DraftOrderTicket): string {
  const rule = '='.repeat(50);
  const thin = '-'.repeat(50);
  return [
    rule,
    'DRAFT ORDER TICKET (NOT FOR EXECUTION)',
    rule,
    `Symbol:      ${ticket.symbol} (${ticket.assetType})`,
    `Contract:    ${ticket.optionSymbol}`,
    `             ${ticket.strike} ${ticket.optionType} exp ${ticket.expiry}`,
    `Action:      ${ticket.side}`,
    `Quantity:    ${ticket.quantity} contract(s)`,
    ticket.limitPrice !== null ? `Limit Price: $${ticket.limitPrice.toFixed(2)}` : 'Limit Price: N/A',
    thin,
    ticket.convictionScore !== null ? `Conviction:  ${ticket.convictionScore.toFixed(0)}` : 'Conviction:  N/A',
    `Rationale:   ${ticket.rationale}`,
    thin,
    'THIS IS A DRAFT ONLY. EXECUTE MANUALLY VIA YOUR BROKER.',
    rule,
  ].join('\n');
}

/** JSON-file store; entries that fail schema validation are dropped on load. */
export class DraftTicketStore {
  constructor(private readonly filePath: string) {}

  loadAll(): DraftOrderTicket[] {
    if (!existsSync(this.filePath)) return [];

    const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    if (!Array.isArray(parsed)) {
      logger.warn({ filePath: this.filePath }, 'Ticket file is not an array, ignoring');
      return [];
    }

    const tickets: DraftOrderTicket[] = [];
    for (const entry of parsed) {
      const result = validateDraftTicket(entry);
      if (result.valid && result.data) tickets.push(result.data);
      else logger.warn({ errors: result.errors }, 'Dropping invalid draft ticket');
    }
    return tickets;
  }

  save(ticket: DraftOrderTicket): void {
    const tickets = this.loadAll();
    tickets.push(ticket);
    this.write(tickets);
    logger.info({ id: ticket.id, symbol: ticket.symbol }, 'Draft ticket saved');
  }

  clear(): void {
    this.write([]);
  }

  private write(tickets: DraftOrderTicket[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(tickets, null, 2), 'utf-8');
  }
}
