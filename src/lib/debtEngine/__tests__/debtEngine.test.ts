/**
 * Debt Engine — Tests
 *
 * PMT, interest accrual, IO and amortization, draws, paydowns, fees and
 * tranche aggregation.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { Loan } from "../types";
import { pmt, remainingAmortization } from "../amortization";
import { scheduleLoan } from "../schedule";
import { computeDebtSchedule } from "../portfolio";
import { buildPeriodDates } from "@/lib/proforma/calendar";
import { InvariantViolationError } from "@/lib/proforma/errors";

function close(actual: number, expected: number, tol = 1e-9) {
  assert.ok(Math.abs(actual - expected) < tol, `expected ${expected}, got ${actual}`);
}

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

/** 2026-03-31 → 2026-04-30 is 30 days; every date is month end. */
const DATES = buildPeriodDates("2026-03-31", 25);

const IO_LOAN: Loan = {
  id: "loan-io",
  principal: 12_000,
  rateMode: "fixed",
  fixedRate: 0.06,
  interestOnlyMonths: 24,
  amortizationMonths: 360,
  originationFeeRate: 0,
  closingCostRate: 0,
};

const ZERO_RATE_LOAN: Loan = {
  id: "loan-zero-rate",
  principal: 1_200,
  rateMode: "fixed",
  fixedRate: 0,
  interestOnlyMonths: 0,
  amortizationMonths: 12,
  originationFeeRate: 0,
  closingCostRate: 0,
};

const AMORTIZING_LOAN: Loan = {
  id: "loan-amort",
  principal: 100_000,
  rateMode: "fixed",
  fixedRate: 0.05,
  interestOnlyMonths: 2,
  amortizationMonths: 12,
  originationFeeRate: 0.01,
  closingCostRate: 0.005,
};

// ---------------------------------------------------------------------------
// PMT
// ---------------------------------------------------------------------------

describe("PMT", () => {
  it("5-year standard amort", () => {
    // PMT(500000, 0.065/12, 60) ≈ $9,783.07/mo
    assert.ok(Math.abs(pmt(500_000, 0.065 / 12, 60) - 9783.07) < 0.01);
  });

  it("10-year standard amort", () => {
    // PMT(1000000, 0.055/12, 120) ≈ $10,852.63/mo
    assert.ok(Math.abs(pmt(1_000_000, 0.055 / 12, 120) - 10852.63) < 0.01);
  });

  it("zero rate is pure principal", () => {
    assert.equal(pmt(120_000, 0, 60), 2_000);
  });

  it("remaining term counts from the first amortizing period", () => {
    assert.equal(remainingAmortization(13, 12, 360), 360);
    assert.equal(remainingAmortization(372, 12, 360), 1);
  });
});

// ---------------------------------------------------------------------------
// Single loan schedule
// ---------------------------------------------------------------------------

describe("Loan schedule", () => {
  it("period 0 draws the principal and accrues nothing", () => {
    const p0 = scheduleLoan(IO_LOAN, { periodDates: DATES }).periods[0];
    assert.equal(p0.draws, 12_000);
    assert.equal(p0.interest, 0);
    assert.equal(p0.endingBalance, 12_000);
  });

  it("accrues actual/365 interest on the balance", () => {
    const p1 = scheduleLoan(IO_LOAN, { periodDates: DATES }).periods[1];
    close(p1.interest, (12_000 * 0.06 * 30) / 365);
    assert.equal(p1.scheduledPrincipal, 0);
    assert.equal(p1.rate, 0.06);
  });

  it("uses calendar days per period", () => {
    // 2026-04-30 → 2026-05-31 is 31 days
    const p2 = scheduleLoan(IO_LOAN, { periodDates: DATES }).periods[2];
    close(p2.interest, (12_000 * 0.06 * 31) / 365);
  });

  it("zero-rate loan amortizes evenly to zero", () => {
    const periods = scheduleLoan(ZERO_RATE_LOAN, { periodDates: DATES }).periods;
    for (let t = 1; t <= 12; t++) close(periods[t].scheduledPrincipal, 100);
    close(periods[12].endingBalance, 0);
    assert.equal(periods[13].scheduledPrincipal, 0);
  });

  it("interest + scheduled principal = debt service every period", () => {
    for (const p of scheduleLoan(AMORTIZING_LOAN, { periodDates: DATES }).periods) {
      close(p.interest + p.scheduledPrincipal, p.debtService);
    }
  });

  it("amortizes only after the IO term", () => {
    const periods = scheduleLoan(AMORTIZING_LOAN, { periodDates: DATES }).periods;
    assert.equal(periods[2].scheduledPrincipal, 0);
    assert.ok(periods[3].scheduledPrincipal > 0);
    close(periods[14].endingBalance, 0, 2);
  });

  it("charges fees once, in the first draw period", () => {
    const delayed: Loan = { ...AMORTIZING_LOAN, drawSchedule: [{ period: 2, amount: 100_000 }] };
    const periods = scheduleLoan(delayed, { periodDates: DATES }).periods;
    close(periods[2].fees, 1_500);
    close(periods.reduce((s, p) => s + p.fees, 0), 1_500);
  });

  it("accrues half a period on new draws", () => {
    const staged: Loan = {
      ...IO_LOAN,
      fixedRate: 0.0365,
      drawSchedule: [
        { period: 0, amount: 600 },
        { period: 1, amount: 400 },
      ],
    };
    const p1 = scheduleLoan(staged, { periodDates: DATES }).periods[1];
    close(p1.interest, 2.4);
    assert.equal(p1.endingBalance, 1_000);
  });

  it("paydowns reduce the balance as a negative line", () => {
    const prepaid: Loan = { ...IO_LOAN, paydownSchedule: [{ period: 1, amount: 3_000 }] };
    const p1 = scheduleLoan(prepaid, { periodDates: DATES }).periods[1];
    assert.equal(p1.paydown, -3_000);
    assert.equal(p1.endingBalance, 9_000);
  });

  it("a paydown past zero is an invariant violation", () => {
    const over: Loan = { ...IO_LOAN, paydownSchedule: [{ period: 1, amount: 20_000 }] };
    assert.throws(() => scheduleLoan(over, { periodDates: DATES }), InvariantViolationError);
  });

  it("determinism: same input → same output", () => {
    assert.deepEqual(
      scheduleLoan(AMORTIZING_LOAN, { periodDates: DATES }),
      scheduleLoan(AMORTIZING_LOAN, { periodDates: DATES }),
    );
  });
});

// ---------------------------------------------------------------------------
// Capitalized interest
// ---------------------------------------------------------------------------

describe("Capitalized interest", () => {
  const CAPITALIZING: Loan = { ...IO_LOAN, capitalizeInterest: true };
  const i1 = (12_000 * 0.06 * 30) / 365;
  const cash = (amount: number) => new Array<number>(25).fill(amount);

  it("without operating cash all IO interest goes to the balance", () => {
    const periods = scheduleLoan(CAPITALIZING, { periodDates: DATES }).periods;
    close(periods[1].capitalizedInterest, i1);
    close(periods[1].debtService, i1);
    close(periods[1].endingBalance, 12_000 + i1);
    // 2026-04-30 → 2026-05-31 accrues on the grown balance
    close(periods[2].interest, ((12_000 + i1) * 0.06 * 31) / 365);
  });

  it("capitalizes only what operating cash leaves uncovered", () => {
    const p1 = scheduleLoan(CAPITALIZING, { periodDates: DATES, operatingCash: cash(20) }).periods[1];
    close(p1.capitalizedInterest, i1 - 20);
    close(p1.endingBalance, 12_000 + i1 - 20);
  });

  it("capitalizes nothing when cash covers the interest", () => {
    const periods = scheduleLoan(CAPITALIZING, { periodDates: DATES, operatingCash: cash(100) }).periods;
    assert.ok(periods.every((p) => p.capitalizedInterest === 0));
    assert.equal(periods[24].endingBalance, 12_000);
  });

  it("negative operating cash covers nothing", () => {
    const p1 = scheduleLoan(CAPITALIZING, { periodDates: DATES, operatingCash: cash(-50) }).periods[1];
    close(p1.capitalizedInterest, i1);
  });

  it("is off unless the loan asks for it", () => {
    const p1 = scheduleLoan(IO_LOAN, { periodDates: DATES, operatingCash: cash(0) }).periods[1];
    assert.equal(p1.capitalizedInterest, 0);
    assert.equal(p1.endingBalance, 12_000);
  });

  it("amortizes the grown balance after IO", () => {
    const loan: Loan = { ...AMORTIZING_LOAN, capitalizeInterest: true };
    const periods = scheduleLoan(loan, { periodDates: DATES }).periods;
    assert.ok(periods[2].endingBalance > 100_000);
    assert.equal(periods[3].capitalizedInterest, 0);
    close(periods[3].debtService, pmt(periods[2].endingBalance, 0.05 / 12, 12));
    close(periods[14].endingBalance, 0, 2);
  });

  it("later tranches see the cash left after earlier debt service", () => {
    const second: Loan = { ...CAPITALIZING, id: "loan-second" };
    const debt = computeDebtSchedule([IO_LOAN, second], { periodDates: DATES, operatingCash: cash(100) });
    close(debt.loans[0].periods[1].capitalizedInterest, 0);
    close(debt.loans[1].periods[1].capitalizedInterest, 2 * i1 - 100);
    close(debt.capitalizedInterest[1], 2 * i1 - 100);
  });
});

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

describe("Debt schedule aggregation", () => {
  it("sums tranches per period", () => {
    const debt = computeDebtSchedule([IO_LOAN, ZERO_RATE_LOAN], { periodDates: DATES });
    assert.equal(debt.loans.length, 2);
    assert.equal(debt.draws[0], 13_200);
    close(debt.interest[1], (12_000 * 0.06 * 30) / 365);
    close(debt.scheduledPrincipal[1], 100);
    close(debt.endingBalance[1], 12_000 + 1_100);
  });

  it("weights the effective rate by balance", () => {
    const debt = computeDebtSchedule([IO_LOAN, ZERO_RATE_LOAN], { periodDates: DATES });
    close(debt.effectiveRate[1], (0.06 * 12_000) / 13_200);
    assert.equal(debt.effectiveRate[0], 0);
  });

  it("no loans → all-zero schedule", () => {
    const debt = computeDebtSchedule([], { periodDates: DATES });
    assert.ok(debt.debtService.every((v) => v === 0));
    assert.equal(debt.endingBalance.length, 25);
  });
});
