/**
 * Portfolio Script
 * Position bookkeeping, mark-to-market refresh, alerts and draft tickets.
 *
 * Usage:
 *   npx tsx scripts/portfolio.ts list [--all]
 *   npx tsx scripts/portfolio.ts add --symbol=AAPL --type=CALL --expiry=2027-01-15 --strike=200 \
 *     --contracts=1 --price=25.5 [--date=2026-01-10] [--underlying=210] [--notes=...]
 *   npx tsx scripts/portfolio.ts refresh [--alerts]
 *   npx tsx scripts/portfolio.ts close <id> [--notes=...]
 *   npx tsx scripts/portfolio.ts delete <id>
 *   npx tsx scripts/portfolio.ts import <file>
 *   npx tsx scripts/portfolio.ts export <file>
 *   npx tsx scripts/portfolio.ts alerts [--unread] | ack <id|all>
 *   npx tsx scripts/portfolio.ts ticket <symbol> [--contracts=N]
 *   npx tsx scripts/portfolio.ts tickets [--clear]
 */

import dotenv from 'dotenv';
import { join, resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { loadConfig } from '../src/core/config';
import { formatDate } from '../src/core/time';
import { DraftTicketStore, formatTicket, ticketFromScanResult } from '../src/orders/ticket';
import { PositionValidationError } from '../src/portfolio/manager';
import { createRuntime, type Runtime } from '../src/runtime';
import type { PricedPosition } from '../src/types/portfolio';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('portfolio_cli');

function argValue(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  return eqArg ? eqArg.slice(name.length + 1) : undefined;
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function positional(index: number): string | undefined {
  return process.argv.slice(2).filter((arg) => !arg.startsWith('--'))[index];
}

function numberArg(name: string): number | undefined {
  const raw = argValue(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function money(value: number | null): string {
  return value === null ? 'n/a' : `$${value.toFixed(2)}`;
}

function printPriced(priced: PricedPosition[]): void {
  for (const { position, snapshot, signal, error } of priced) {
    const label = `${position.symbol} ${position.strike} ${position.optionType} ${position.expiry} x${position.contracts}`;
    if (error || !snapshot) {
      console.log(`${label}  ERROR: ${error ?? 'no snapshot'}`);
      continue;
    }
    const pct = snapshot.unrealizedPnlPct === null ? 'n/a' : `${snapshot.unrealizedPnlPct.toFixed(1)}%`;
    console.log(
      `${label}  mark ${money(snapshot.markPrice)} (${snapshot.pricingSource})  value ${money(snapshot.marketValue)}  P&L ${money(snapshot.unrealizedPnl)} (${pct})  ${signal?.type ?? '-'}`
    );
    if (signal && signal.type !== 'HOLD') console.log(`    ${signal.recommendedAction}`);
  }
}

async function refresh(runtime: Runtime): Promise<void> {
  const priced = await runtime.portfolio.refreshAll();
  if (priced.length === 0) {
    console.log('No open positions.');
    return;
  }
  printPriced(priced);

  const summary = runtime.portfolio.summarize(priced);
  console.log(
    `\nTotal: cost ${money(summary.totalCostBasis)}  value ${money(summary.totalMarketValue)}  P&L ${money(summary.totalUnrealizedPnl)} (${summary.totalUnrealizedPnlPct.toFixed(1)}%)`
  );
  if (summary.positionsUnpriced > 0) console.log(`${summary.positionsUnpriced} position(s) could not be priced.`);

  if (hasFlag('--alerts')) {
    const created = await runtime.alerts.fromPortfolio(priced);
    console.log(`${created.length} alert(s) created.`);
  }
}

function createTicket(runtime: Runtime, symbol: string | undefined): void {
  if (!symbol) throw new Error('ticket requires a symbol');
  const latest = runtime.scans.latest();
  const result = latest?.results.find((r) => r.symbol === symbol.toUpperCase());
  if (!result) {
    console.log(`${symbol.toUpperCase()} is not in the latest scan.`);
    return;
  }

  const ticket = ticketFromScanResult(result, {
    quantity: numberArg('--contracts') ?? runtime.config.orders.defaultContracts,
    limitDiscount: runtime.config.orders.limitDiscount,
  });
  if (!ticket) {
    console.log(`No ticket: ${result.symbol} is ${result.decision.verdict} or has no candidate contract.`);
    return;
  }
  ticketStore(runtime).save(ticket);
  console.log(formatTicket(ticket));
}

function ticketStore(runtime: Runtime): DraftTicketStore {
  return new DraftTicketStore(join(runtime.config.projectRoot, 'data', 'draft_tickets.json'));
}

async function main() {
  const command = positional(0) ?? 'list';
  const runtime = createRuntime(loadConfig());

  try {
    switch (command) {
      case 'list': {
        const positions = hasFlag('--all') ? runtime.portfolio.listPositions() : runtime.portfolio.listOpenPositions();
        if (positions.length === 0) console.log('No positions.');
        for (const p of positions) {
          console.log(
            `${p.id}  ${p.status}  ${p.symbol} ${p.strike} ${p.optionType} ${p.expiry} x${p.contracts} @ ${money(p.entryPrice)}`
          );
        }
        break;
      }
      case 'add': {
        const position = await runtime.portfolio.addPosition({
          symbol: argValue('--symbol'),
          option_type: (argValue('--type') ?? 'CALL').toUpperCase(),
          expiry: argValue('--expiry'),
          strike: numberArg('--strike'),
          contracts: numberArg('--contracts'),
          entry_price: numberArg('--price'),
          entry_date: argValue('--date') ?? formatDate(new Date()),
          underlying_entry_price: numberArg('--underlying') ?? null,
          notes: argValue('--notes') ?? '',
        });
        console.log(`Added ${position.symbol} ${position.strike} ${position.optionType} ${position.expiry} (${position.id})`);
        break;
      }
      case 'refresh':
        await refresh(runtime);
        break;
      case 'close': {
        const id = positional(1);
        const closed = id ? runtime.portfolio.closePosition(id, argValue('--notes')) : null;
        console.log(closed ? `Closed ${closed.symbol} (${closed.id})` : `Position not found: ${id ?? '(none)'}`);
        break;
      }
      case 'delete': {
        const id = positional(1);
        console.log(id && runtime.portfolio.deletePosition(id) ? `Deleted ${id}` : `Position not found: ${id ?? '(none)'}`);
        break;
      }
      case 'import': {
        const file = positional(1);
        if (!file) throw new Error('import requires a file path');
        const result = await runtime.portfolio.importFromFile(resolve(file));
        console.log(`Imported ${result.imported}, skipped ${result.skipped}`);
        for (const problem of result.errors) console.log(`  ${problem}`);
        break;
      }
      case 'export': {
        const file = positional(1);
        if (!file) throw new Error('export requires a file path');
        const count = runtime.portfolio.exportToFile(resolve(file));
        console.log(`Exported ${count} open position(s) to ${file}`);
        break;
      }
      case 'alerts': {
        const alerts = runtime.alerts.list({ unacknowledgedOnly: hasFlag('--unread') });
        if (alerts.length === 0) console.log('No alerts.');
        for (const a of alerts) {
          console.log(`${a.id}  ${a.createdAt}  [${a.severity}] ${a.title}${a.acknowledged ? ' (ack)' : ''}`);
          console.log(`    ${a.message}`);
        }
        break;
      }
      case 'ack': {
        const id = positional(1);
        if (id === 'all') console.log(`Acknowledged ${runtime.alerts.acknowledgeAll()} alert(s).`);
        else console.log(id && runtime.alerts.acknowledge(id) ? `Acknowledged ${id}` : `Alert not found: ${id ?? '(none)'}`);
        break;
      }
      case 'ticket':
        createTicket(runtime, positional(1));
        break;
      case 'tickets': {
        const store = ticketStore(runtime);
        if (hasFlag('--clear')) {
          store.clear();
          console.log('Draft tickets cleared.');
          break;
        }
        const tickets = store.loadAll();
        if (tickets.length === 0) console.log('No draft tickets.');
        for (const ticket of tickets) console.log(`${formatTicket(ticket)}\n`);
        break;
      }
      default:
        console.log(`Unknown command: ${command}`);
        process.exitCode = 2;
    }
  } finally {
    runtime.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof PositionValidationError) {
    console.error(error.message);
  } else {
    logger.error({ err: error }, 'Portfolio command failed');
  }
  process.exitCode = 1;
});
