/**
 * Run a Pro Forma Scenario
 *
 * Reads a scenario payload from a JSON file, runs it and prints the returns
 * summary. A file of the form { "payload": ..., "reference": ... } also
 * prints a parity report against the reference values.
 *
 * Exit codes:
 *   0  — run succeeded (and parity passed, when a reference is given)
 *   1  — invalid arguments, validation or numeric failure, or parity failure
 *
 * Usage:
 *   npx tsx scripts/runScenario.ts <payload.json>
 *   npx tsx scripts/runScenario.ts <payload.json> --rows
 *   npx tsx scripts/runScenario.ts --help
 */

import fs from "node:fs";
import path from "node:path";

import { compareToReference, PARITY_METRIC_KEYS, runProforma } from "@/lib/proforma";
import type { ProformaResult, ReferenceValues } from "@/lib/proforma";

// ── CLI arg parsing ─────────────────────────────────────────────────────────

interface CliArgs {
  file: string | null;
  rows: boolean;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  let file: string | null = null;
  let rows = false;
  let help = false;

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--rows") {
      rows = true;
    } else if (arg.startsWith("--")) {
      console.error(`[runScenario] Unknown option: ${arg}`);
      process.exit(1);
    } else {
      file = arg;
    }
  }

  return { file, rows, help };
}

function printHelp(): void {
  console.log(`
Run a Pro Forma Scenario
========================
Validates a scenario payload, projects it and prints the returns summary.

Usage:
  npx tsx scripts/runScenario.ts <payload.json> [options]

Options:
  --rows     Also print the monthly NOI / cash flow table
  --help     Show this help text

Environment:
  PROFORMA_IRR_GUESS, PROFORMA_IRR_TOLERANCE, PROFORMA_IRR_MAX_ITERATIONS
  PROFORMA_LOG_LEVEL (silent | error | warn | info | debug)

Example:
  npx tsx scripts/runScenario.ts src/lib/proforma/__tests__/fixtures/benchmarkScenario.json
`);
}

// ── Input ───────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readInput(file: string): { payload: unknown; reference: ReferenceValues | null } {
  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(file), "utf8"));
  if (!isRecord(raw) || !("payload" in raw)) return { payload: raw, reference: null };

  const source = raw.reference;
  if (!isRecord(source)) return { payload: raw.payload, reference: null };

  const reference: ReferenceValues = {};
  for (const key of PARITY_METRIC_KEYS) {
    const value = source[key];
    if (typeof value === "number") reference[key] = value;
  }
  return { payload: raw.payload, reference };
}

// ── Output ──────────────────────────────────────────────────────────────────

const pct = (v: number | null) => (v === null ? "n/a" : `${(v * 100).toFixed(2)}%`);
const money = (v: number) => v.toFixed(2);
const fixed = (v: number | null, digits: number) => (v === null ? "n/a" : v.toFixed(digits));

function printSummary(result: ProformaResult): void {
  const { returns, exit } = result;
  console.log(`
Returns
  Unlevered IRR        ${pct(returns.unleveredIrr)}
  Levered IRR          ${pct(returns.leveredIrr)}
  LP IRR               ${pct(returns.lpIrr)}
  GP IRR               ${pct(returns.gpIrr)}
  LP multiple          ${fixed(returns.lpMultiple, 3)}x
  GP multiple          ${fixed(returns.gpMultiple, 3)}x
  Unlevered multiple   ${returns.unleveredMultiple.toFixed(3)}x
  Levered multiple     ${returns.leveredMultiple.toFixed(3)}x
  Invested equity      ${money(returns.investedEquity)}
  Levered profit       ${money(returns.leveredProfit)}
  Avg cash-on-cash     ${pct(returns.cashOnCash.average)}${returns.npv !== null ? `\n  NPV                  ${money(returns.npv)}` : ""}

Exit
  Forward NOI          ${money(exit.forwardNoi)}
  Gross value          ${money(exit.grossValue)}
  Net proceeds         ${money(exit.netProceeds)}

Fingerprint ${result.fingerprint}`);
}

function printRows(result: ProformaResult): void {
  console.log("\nperiod  date        NOI           debt service  unlevered CF   levered CF");
  for (const r of result.rows) {
    console.log(
      [
        String(r.period).padStart(6),
        r.date,
        money(r.noi).padStart(12),
        money(r.debtService).padStart(13),
        money(r.unleveredCashFlow).padStart(14),
        money(r.leveredCashFlow).padStart(12),
      ].join("  "),
    );
  }
}

// ── Main ────────────────────────────────────────────────────────────────────

function main(): number {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return 0;
  }
  if (!args.file) {
    console.error("[runScenario] Missing payload file. See --help.");
    return 1;
  }

  const { payload, reference } = readInput(args.file);
  const run = runProforma(payload);
  if (!run.ok) {
    console.error(`[runScenario] ${run.error.kind} error ${run.error.code}: ${run.error.message}`);
    return 1;
  }

  printSummary(run.result);
  if (args.rows) printRows(run.result);

  if (reference) {
    const report = compareToReference(run.result, reference);
    console.log(`\nParity: ${report.verdict} (${report.summary.compared} compared, ${report.summary.failures} outside tolerance)`);
    for (const d of report.diffs) {
      const flag = d.withinTolerance ? "ok  " : "FAIL";
      console.log(`  ${flag} ${d.metric.padEnd(20)} ref ${d.reference}  got ${fixed(d.actual, 6)}  Δ ${fixed(d.delta, 6)}`);
    }
    if (report.verdict === "FAIL") return 1;
  }
  return 0;
}

process.exitCode = main();
