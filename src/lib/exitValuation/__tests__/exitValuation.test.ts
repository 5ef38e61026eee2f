/**
 * Exit Valuation — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { valueAtExit } from "../index";
import { DivideByZeroError, InvariantViolationError } from "@/lib/proforma/errors";

function close(actual: number, expected: number, tol = 1e-9) {
  assert.ok(Math.abs(actual - expected) < tol, `expected ${expected}, got ${actual}`);
}

// Exit at period 2; periods 3..14 are the forward year.
const NOI = [0, 90, 90, ...new Array<number>(12).fill(100)];
const RESERVES = [0, 5, 5, ...new Array<number>(12).fill(5)];

describe("Exit valuation", () => {
  it("capitalizes forward NOI plus the reserve add-back", () => {
    const v = valueAtExit(NOI, RESERVES, { exitPeriod: 2, exitCapRate: 0.05, salesCostRate: 0.02 });
    close(v.reserveAddBack, 60);
    close(v.forwardNoi, 1_260);
    close(v.grossValue, 25_200);
    close(v.salesCosts, 504);
    close(v.netProceeds, 24_696);
  });

  it("ignores NOI at or before the exit period", () => {
    const bumped = [...NOI];
    bumped[2] = 1_000_000;
    const a = valueAtExit(NOI, RESERVES, { exitPeriod: 2, exitCapRate: 0.05, salesCostRate: 0 });
    const b = valueAtExit(bumped, RESERVES, { exitPeriod: 2, exitCapRate: 0.05, salesCostRate: 0 });
    assert.equal(a.grossValue, b.grossValue);
  });

  it("zero or negative cap rate is a divide-by-zero error", () => {
    for (const exitCapRate of [0, -0.05]) {
      assert.throws(
        () => valueAtExit(NOI, RESERVES, { exitPeriod: 2, exitCapRate, salesCostRate: 0 }),
        DivideByZeroError,
      );
    }
  });

  it("fails when the projection is shorter than the forward year", () => {
    assert.throws(
      () => valueAtExit(NOI, RESERVES, { exitPeriod: 3, exitCapRate: 0.05, salesCostRate: 0 }),
      InvariantViolationError,
    );
  });
});
