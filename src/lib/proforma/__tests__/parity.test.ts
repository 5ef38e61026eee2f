/**
 * Pro Forma — Parity comparator tests
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { runProforma } from "../runner";
import { compareToReference, toleranceFor, DEFAULT_THRESHOLDS } from "../parity";
import type { ProformaResult } from "../types";
import { smallPayload } from "./scenarioFixtures";

function smallResult(): ProformaResult {
  const run = runProforma(smallPayload(), { logLevel: "silent" });
  if (!run.ok) throw new Error(run.error.message);
  return run.result;
}

describe("Parity tolerances", () => {
  it("rates use the absolute tolerance", () => {
    assert.equal(toleranceFor("rate", 0.09, DEFAULT_THRESHOLDS), 0.003);
  });

  it("money uses 0.1% with a floor of half a unit", () => {
    assert.equal(toleranceFor("money", 100_000, DEFAULT_THRESHOLDS), 100);
    assert.equal(toleranceFor("money", 100, DEFAULT_THRESHOLDS), 0.5);
  });
});

describe("compareToReference", () => {
  const result = smallResult();

  it("compares only the metrics given", () => {
    const report = compareToReference(result, { firstMonthNoi: 2_000 });
    assert.equal(report.verdict, "PASS");
    assert.equal(report.summary.compared, 1);
    assert.equal(report.diffs[0].delta, 0);
  });

  it("fails a money metric outside tolerance", () => {
    const report = compareToReference(result, { firstMonthNoi: 2_010, exitProceeds: 400_100 });
    assert.equal(report.verdict, "FAIL");
    assert.equal(report.summary.failures, 1);
    const noi = report.diffs.find((d) => d.metric === "firstMonthNoi");
    assert.equal(noi?.withinTolerance, false);
    assert.ok(Math.abs((noi?.tolerance ?? 0) - 2.01) < 1e-12);
  });

  it("fails a rate metric outside tolerance", () => {
    const irr = result.returns.unleveredIrr;
    const report = compareToReference(result, { unleveredIrr: irr + 0.004 });
    assert.equal(report.verdict, "FAIL");
    assert.ok(Math.abs((report.summary.maxRateDelta ?? 0) - 0.004) < 1e-12);
  });

  it("reports a null percentage against a zero reference", () => {
    const report = compareToReference(result, { firstMonthInterest: 0 });
    assert.equal(report.diffs[0].pctDelta, null);
    assert.equal(report.verdict, "PASS");
  });
});
