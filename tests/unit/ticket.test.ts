import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DRAFT_DISCLAIMER, DraftTicketStore, formatTicket, ticketFromScanResult } from '@/orders/ticket';
import { makeCandidate, makeOptions, makeScanResult } from '../helpers/fixtures';

const now = new Date('2026-01-10T15:00:00.000Z');

describe('ticketFromScanResult', () => {
  it('drafts a limit order at a discount to the candidate mid', () => {
    const ticket = ticketFromScanResult(makeScanResult('AAPL', 'GO', 60), { quantity: 2, now });

    expect(ticket).toMatchObject({
      createdAt: '2026-01-10T15:00:00.000Z',
      symbol: 'AAPL',
      assetType: 'STOCK',
      optionSymbol: 'AAPL270115C00180000',
      expiry: '2027-01-15',
      strike: 180,
      optionType: 'CALL',
      side: 'BUY_TO_OPEN',
      orderType: 'LIMIT',
      quantity: 2,
      limitPrice: 39.2,
      rationale: 'GO signal with MODERATE conviction',
      convictionScore: 60,
      decisionReasons: ['Technical: Trend is BULLISH', 'Verdict GO'],
      status: 'DRAFT',
      disclaimer: DRAFT_DISCLAIMER,
    });
  });

  it('uses the one-sided quote when the other side is missing', () => {
    const result = makeScanResult('AAPL', 'WATCH', 60, {
      reports: { technical: null, fundamental: null, options: makeOptions([makeCandidate({ bid: 0, ask: 41 })]) },
    });

    expect(ticketFromScanResult(result, { now })?.limitPrice).toBe(41);
  });

  it('returns null for NO_GO and for a missing candidate', () => {
    expect(ticketFromScanResult(makeScanResult('AAPL', 'NO_GO'), { now })).toBeNull();
    expect(ticketFromScanResult(makeScanResult('AAPL', 'GO'), { candidateIndex: 3, now })).toBeNull();
  });
});

describe('formatTicket', () => {
  it('renders the ticket as a banner block', () => {
    const ticket = ticketFromScanResult(makeScanResult('AAPL', 'GO', 60), { now });
    expect(ticket).not.toBeNull();
    if (!ticket) return;

    const lines = formatTicket(ticket).split('\n');

    expect(lines[1]).toBe('DRAFT ORDER TICKET (NOT FOR EXECUTION)');
    expect(lines[4]).toBe('Contract:    AAPL270115C00180000');
    expect(lines[5]).toBe('             180 CALL exp 2027-01-15');
    expect(lines[8]).toBe('Limit Price: $39.20');
    expect(lines[10]).toBe('Conviction:  60');
  });
});

describe('DraftTicketStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tickets-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('saves, reloads and clears tickets', () => {
    const store = new DraftTicketStore(join(dir, 'nested', 'tickets.json'));
    const ticket = ticketFromScanResult(makeScanResult('AAPL', 'GO'), { now });
    expect(ticket).not.toBeNull();
    if (!ticket) return;

    expect(store.loadAll()).toEqual([]);
    store.save(ticket);
    expect(store.loadAll()).toEqual([ticket]);
    store.clear();
    expect(store.loadAll()).toEqual([]);
  });

  it('drops entries that fail schema validation', () => {
    const file = join(dir, 'tickets.json');
    const ticket = ticketFromScanResult(makeScanResult('AAPL', 'GO'), { now });
    writeFileSync(file, JSON.stringify([ticket, { ...ticket, quantity: 0 }, { symbol: 'MSFT' }]), 'utf-8');

    expect(new DraftTicketStore(file).loadAll()).toEqual([ticket]);
  });
});
