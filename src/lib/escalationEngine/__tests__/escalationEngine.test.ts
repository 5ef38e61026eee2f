/**
 * Escalation Engine — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  buildRentEscalation,
  buildExpenseEscalation,
  buildPropertyTaxSeries,
} from "../escalation";

function close(actual: number, expected: number, tol = 1e-12) {
  assert.ok(Math.abs(actual - expected) < tol, `expected ${expected}, got ${actual}`);
}

describe("Rent escalation (monthly compounding)", () => {
  it("period 0 is exactly 1.0", () => {
    assert.equal(buildRentEscalation(0.025, 0)[0], 1);
  });

  it("compounds rate/12 each month", () => {
    const f = buildRentEscalation(0.025, 12);
    assert.equal(f.length, 13);
    close(f[1], 1 + 0.025 / 12);
    close(f[12], Math.pow(1 + 0.025 / 12, 12));
    close(f[12], 1.025288457, 1e-9);
  });

  it("switches to the stabilized rate after the boundary month", () => {
    const f = buildRentEscalation(0.12, 4, { stabilizationMonth: 2, stabilizedRate: 0 });
    close(f[1], 1.01);
    close(f[2], 1.0201);
    close(f[3], 1.0201);
    close(f[4], 1.0201);
  });

  it("without a stabilized rate keeps the base rate past the boundary", () => {
    const a = buildRentEscalation(0.03, 24, { stabilizationMonth: 6 });
    const b = buildRentEscalation(0.03, 24);
    assert.deepEqual(a, b);
  });
});

describe("Expense escalation (annual rate at a monthly root)", () => {
  it("reaches exactly one year of growth after 12 periods", () => {
    const f = buildExpenseEscalation(0.025, 12);
    close(f[12], 1.025);
    close(f[6], Math.sqrt(1.025));
  });

  it("zero rate stays flat", () => {
    const f = buildExpenseEscalation(0, 24);
    assert.ok(f.every((v) => v === 1));
  });
});

describe("Rent vs expense conventions", () => {
  it("diverge measurably after 12 periods for a non-zero rate", () => {
    for (const rate of [0.01, 0.025, 0.05, -0.02]) {
      const rent = buildRentEscalation(rate, 12)[12];
      const expense = buildExpenseEscalation(rate, 12)[12];
      assert.ok(Math.abs(rent - expense) > 1e-6, `rate ${rate}: ${rent} vs ${expense}`);
    }
  });

  it("at 2.5% the 12-month gap is about 2.88 bps", () => {
    const gap = buildRentEscalation(0.025, 12)[12] - buildExpenseEscalation(0.025, 12)[12];
    close(gap, 0.000288457, 1e-9);
  });
});

describe("Property tax stepped series", () => {
  it("is flat for 12 periods after the start, then steps once per boundary", () => {
    const tax = buildPropertyTaxSeries(1200, 0.1, 25, { startMonth: 1 });
    assert.equal(tax[0], 0);
    for (let t = 1; t <= 12; t++) assert.equal(tax[t], 100);
    for (let t = 13; t <= 24; t++) close(tax[t], 110);
    close(tax[25], 121);
  });

  it("is zero before a later start month", () => {
    const tax = buildPropertyTaxSeries(1200, 0.1, 20, { startMonth: 6 });
    for (let t = 0; t < 6; t++) assert.equal(tax[t], 0);
    assert.equal(tax[6], 100);
    assert.equal(tax[17], 100);
    close(tax[18], 110);
  });

  it("determinism: same input → same output", () => {
    assert.deepEqual(
      buildPropertyTaxSeries(622.5, 0.025, 132, { startMonth: 1 }),
      buildPropertyTaxSeries(622.5, 0.025, 132, { startMonth: 1 }),
    );
  });
});
