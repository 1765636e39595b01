/**
 * Scan Script
 * Runs the decision gate over the watchlist, stores the scan and prints the diff
 * against the previous one.
 *
 * Usage:
 *   npx tsx scripts/scan.ts [--symbols=AAPL,MSFT] [--reasons] [--json]
 *   npx tsx scripts/scan.ts --history [--limit=10]
 *   npx tsx scripts/scan.ts --update-outcomes
 *   npx tsx scripts/scan.ts --stats
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { loadConfig } from '../src/core/config';
import { createRuntime, type Runtime } from '../src/runtime';
import { formatComparison, formatReasons, formatScanTable } from '../src/scan/report';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('scan_cli');

function argValue(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  const next = index >= 0 ? process.argv[index + 1] : undefined;
  return next && !next.startsWith('--') ? next : undefined;
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function printHistory(runtime: Runtime): void {
  const limit = Number(argValue('--limit') ?? 10);
  const scans = runtime.scans.recent(Number.isFinite(limit) && limit > 0 ? limit : 10);
  if (scans.length === 0) {
    console.log('No scans stored yet.');
    return;
  }
  for (const scan of scans) {
    const { go, watch, noGo, symbols } = scan.counts;
    console.log(`${scan.id}  ${scan.timestamp}  GO ${go}  WATCH ${watch}  NO_GO ${noGo}  (${symbols} symbols)`);
  }
}

function printStats(runtime: Runtime): void {
  const stats = runtime.tracker.stats();
  console.log(`Status: ${stats.status}`);
  console.log(stats.message);
  for (const [label, verdict] of [
    ['GO', stats.go],
    ['WATCH', stats.watch],
  ] as const) {
    console.log(`\n${label}: ${verdict.total} tracked`);
    for (const h of verdict.horizons) {
      const avg = h.avgChangePct === null ? 'n/a' : `${h.avgChangePct}%`;
      const positive = h.positivePct === null ? 'n/a' : `${h.positivePct}%`;
      console.log(`  ${h.horizonDays}d: ${h.validated} outcomes, avg ${avg}, positive ${positive}`);
    }
  }
  console.log(`\n${stats.disclaimer}`);
}

async function runScan(runtime: Runtime): Promise<void> {
  const symbolsArg = argValue('--symbols');
  const symbols = symbolsArg ? symbolsArg.split(',') : undefined;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, cancelling scan');
    controller.abort();
  });

  const outcome = await runtime.scanner.run({ symbols, signal: controller.signal });
  if (outcome.cancelled || !outcome.record) {
    console.log('Scan cancelled; nothing was saved.');
    process.exitCode = 130;
    return;
  }

  if (hasFlag('--json')) {
    console.log(JSON.stringify(outcome.record, null, 2));
    return;
  }

  console.log(formatScanTable(outcome.record));
  if (hasFlag('--reasons')) {
    for (const result of outcome.record.results) console.log(`\n${formatReasons(result)}`);
  }
  if (outcome.comparison) console.log(`\n${formatComparison(outcome.comparison)}`);
  if (!outcome.persisted) console.log('\nWarning: scan could not be saved to history.');
  if (outcome.alerts.length > 0) {
    console.log(`\nAlerts:`);
    for (const alert of outcome.alerts) console.log(`  [${alert.severity}] ${alert.title}`);
  }
}

async function main() {
  const config = loadConfig();
  const runtime = createRuntime(config);

  try {
    if (hasFlag('--history')) {
      printHistory(runtime);
    } else if (hasFlag('--update-outcomes')) {
      const updated = await runtime.tracker.updateOutcomes();
      console.log(`Recorded ${updated} outcome(s).`);
    } else if (hasFlag('--stats')) {
      printStats(runtime);
    } else {
      await runScan(runtime);
    }
  } finally {
    runtime.close();
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Scan failed');
  process.exitCode = 1;
});
