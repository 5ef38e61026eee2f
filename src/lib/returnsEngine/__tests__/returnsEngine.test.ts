/**
 * Returns Engine — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  cashOnCash,
  equityMultiple,
  investedEquity,
  npv,
  periodicIrr,
  profit,
  xirr,
  xnpv,
} from "../index";
import { ConvergenceError, DegenerateCashFlowError } from "@/lib/proforma/errors";

function close(actual: number, expected: number, tol = 1e-6) {
  assert.ok(Math.abs(actual - expected) < tol, `expected ${expected}, got ${actual}`);
}

describe("XIRR", () => {
  it("one year at 10%", () => {
    close(xirr([-1_000, 1_100], ["2025-01-01", "2026-01-01"]), 0.1);
  });

  it("two years compounding with an empty middle flow", () => {
    close(xirr([-1_000, 0, 1_210], ["2025-01-01", "2026-01-01", "2027-01-01"]), 0.1);
  });

  it("XNPV at the XIRR is zero", () => {
    const flows = [-5_000, 300, 300, 300, 5_400];
    const dates = ["2026-03-31", "2026-09-30", "2027-03-31", "2027-09-30", "2028-03-31"];
    const rate = xirr(flows, dates);
    close(xnpv(rate, flows, dates), 0, 1e-4);
  });

  it("falls back to bisection when Newton runs out of iterations", () => {
    const rate = xirr([-1_000, 1_100], ["2025-01-01", "2026-01-01"], { guess: 5, maxIterations: 1 });
    close(rate, 0.1);
  });

  it("fails when no rate in the bracket zeroes the flows", () => {
    assert.throws(
      () => xirr([1, -3, 3], ["2025-01-01", "2026-01-01", "2027-01-01"]),
      ConvergenceError,
    );
  });

  it("single-sign or short series are degenerate", () => {
    assert.throws(() => xirr([100, 200], ["2025-01-01", "2026-01-01"]), DegenerateCashFlowError);
    assert.throws(() => xirr([-100], ["2025-01-01"]), DegenerateCashFlowError);
    assert.throws(() => xirr([], []), DegenerateCashFlowError);
  });
});

describe("Periodic IRR and NPV", () => {
  it("returns the period rate and its annual compounding", () => {
    const result = periodicIrr([-100, 110]);
    close(result.periodRate, 0.1);
    close(result.annualRate, Math.pow(1.1, 12) - 1, 1e-5);
  });

  it("a single-sign series is degenerate", () => {
    assert.throws(() => periodicIrr([-100, -10]), DegenerateCashFlowError);
  });

  it("NPV converts the annual rate to monthly", () => {
    const flows = new Array<number>(13).fill(0);
    flows[0] = -100;
    flows[12] = 110;
    close(npv(0.1, flows), 0, 1e-9);
  });

  it("NPV at zero is the sum", () => {
    close(npv(0, [-100, 30, 80]), 10, 1e-12);
  });
});

describe("Multiples", () => {
  const flows = [-100, 50, 100];

  it("invested equity, profit and multiple", () => {
    assert.equal(investedEquity(flows), 100);
    assert.equal(profit(flows), 50);
    assert.equal(equityMultiple(flows), 1.5);
  });

  it("no contribution is degenerate", () => {
    assert.throws(() => equityMultiple([10, 20]), DegenerateCashFlowError);
  });
});

describe("Cash-on-cash", () => {
  it("per hold year with a partial final year", () => {
    const operating = [0, ...new Array<number>(18).fill(1)];
    const result = cashOnCash(operating, 100, 18);
    assert.deepEqual(
      result.years.map((y) => [y.year, y.cash]),
      [
        [1, 12],
        [2, 6],
      ],
    );
    close(result.years[0].yield, 0.12, 1e-12);
    close(result.average, 0.09, 1e-12);
  });

  it("zero invested equity is degenerate", () => {
    assert.throws(() => cashOnCash([0, 1], 0, 1), DegenerateCashFlowError);
  });
});
