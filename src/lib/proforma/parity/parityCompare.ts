/**
 * Pro Forma Parity — Comparator
 *
 * Compares headline metrics of a run to reference values. Only metrics
 * present in the reference are compared.
 *
 * Pure function — deterministic, no side effects.
 */

import type { MonthlyRow } from "@/lib/cashFlow";
import type { ProformaResult } from "../types";
import { DEFAULT_THRESHOLDS } from "./thresholds";
import type {
  MetricDiff,
  MetricKind,
  ParityMetricKey,
  ParityReport,
  ParityThresholds,
  ReferenceValues,
} from "./types";

interface MetricDefinition {
  kind: MetricKind;
  /** Null when the run has no value for the metric */
  extract: (result: ProformaResult) => number | null;
}

function rowAt(result: ProformaResult, index: number): MonthlyRow {
  const row = result.rows[index];
  if (!row) throw new RangeError(`Run has no row ${index}`);
  return row;
}

export const PARITY_METRICS: Record<ParityMetricKey, MetricDefinition> = {
  unleveredIrr: { kind: "rate", extract: (r) => r.returns.unleveredIrr },
  leveredIrr: { kind: "rate", extract: (r) => r.returns.leveredIrr },
  lpIrr: { kind: "rate", extract: (r) => r.returns.lpIrr },
  gpIrr: { kind: "rate", extract: (r) => r.returns.gpIrr },
  firstMonthNoi: { kind: "money", extract: (r) => rowAt(r, 1).noi },
  lastMonthNoi: { kind: "money", extract: (r) => rowAt(r, r.rows.length - 1).noi },
  firstMonthInterest: { kind: "money", extract: (r) => rowAt(r, 1).interest },
  forwardNoi: { kind: "money", extract: (r) => r.exit.forwardNoi },
  grossValue: { kind: "money", extract: (r) => r.exit.grossValue },
  exitProceeds: { kind: "money", extract: (r) => r.exit.netProceeds },
  investedEquity: { kind: "money", extract: (r) => r.returns.investedEquity },
  leveredProfit: { kind: "money", extract: (r) => r.returns.leveredProfit },
};

export const PARITY_METRIC_KEYS: readonly ParityMetricKey[] = [
  "unleveredIrr",
  "leveredIrr",
  "lpIrr",
  "gpIrr",
  "firstMonthNoi",
  "lastMonthNoi",
  "firstMonthInterest",
  "forwardNoi",
  "grossValue",
  "exitProceeds",
  "investedEquity",
  "leveredProfit",
];

export function toleranceFor(kind: MetricKind, reference: number, thresholds: ParityThresholds): number {
  if (kind === "rate") return thresholds.rateAbsTolerance;
  return Math.max(thresholds.moneyPctTolerance * Math.abs(reference), thresholds.moneyAbsFloor);
}

export function compareToReference(
  result: ProformaResult,
  reference: ReferenceValues,
  thresholds: ParityThresholds = DEFAULT_THRESHOLDS,
): ParityReport {
  const diffs: MetricDiff[] = [];
  let maxRateDelta: number | undefined;
  let maxMoneyPctDelta: number | undefined;

  for (const metric of PARITY_METRIC_KEYS) {
    const def = PARITY_METRICS[metric];
    const expected = reference[metric];
    if (expected === undefined) continue;

    const actual = def.extract(result);
    const tolerance = toleranceFor(def.kind, expected, thresholds);
    if (actual === null) {
      diffs.push({
        metric,
        kind: def.kind,
        reference: expected,
        actual: null,
        delta: null,
        pctDelta: null,
        tolerance,
        withinTolerance: false,
      });
      continue;
    }

    const delta = actual - expected;
    const pctDelta = expected !== 0 ? delta / Math.abs(expected) : null;

    diffs.push({
      metric,
      kind: def.kind,
      reference: expected,
      actual,
      delta,
      pctDelta,
      tolerance,
      withinTolerance: Math.abs(delta) <= tolerance,
    });

    if (def.kind === "rate") {
      maxRateDelta = Math.max(maxRateDelta ?? 0, Math.abs(delta));
    } else if (pctDelta !== null) {
      maxMoneyPctDelta = Math.max(maxMoneyPctDelta ?? 0, Math.abs(pctDelta));
    }
  }

  const failures = diffs.filter((d) => !d.withinTolerance).length;
  return {
    verdict: failures === 0 ? "PASS" : "FAIL",
    diffs,
    summary: { compared: diffs.length, failures, maxRateDelta, maxMoneyPctDelta },
  };
}
