/**
 * Returns Engine — Metrics
 *
 * XIRR / XNPV discount by actual days: CF / (1 + r)^(days / 365), days
 * counted from the first flow's date. Periodic IRR / NPV discount by period
 * index and annualize by compounding twelve periods.
 *
 * Pure functions — deterministic, no side effects.
 */

import { DegenerateCashFlowError, InvariantViolationError } from "@/lib/proforma/errors";
import { daysBetween } from "@/lib/proforma/calendar";
import { sum } from "@/lib/proforma/series";
import { DEFAULT_SOLVER_OPTIONS, solveRate } from "./solver";
import type { CashOnCash, CashOnCashYear, PeriodicIrr, SolverOptions } from "./types";

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function assertSolvable(flows: readonly number[], label: string): void {
  if (flows.length < 2) {
    throw new DegenerateCashFlowError(`${label} needs at least two cash flows`, { length: flows.length });
  }
  const hasPositive = flows.some((cf) => cf > 0);
  const hasNegative = flows.some((cf) => cf < 0);
  if (!(hasPositive && hasNegative)) {
    throw new DegenerateCashFlowError(`${label} needs both positive and negative cash flows`, {
      hasPositive,
      hasNegative,
    });
  }
}

function yearFractions(dates: readonly string[]): number[] {
  const origin = dates[0];
  return dates.map((d) => daysBetween(origin, d) / 365);
}

// ---------------------------------------------------------------------------
// Dated flows
// ---------------------------------------------------------------------------

export function xnpv(rate: number, flows: readonly number[], dates: readonly string[]): number {
  if (flows.length !== dates.length) {
    throw new InvariantViolationError("Cash flows and dates differ in length", {
      flows: flows.length,
      dates: dates.length,
    });
  }
  const years = yearFractions(dates);
  let total = 0;
  for (let i = 0; i < flows.length; i++) total += flows[i] / Math.pow(1 + rate, years[i]);
  return total;
}

export function xirr(
  flows: readonly number[],
  dates: readonly string[],
  opts: Partial<SolverOptions> = {},
): number {
  assertSolvable(flows, "XIRR");
  if (flows.length !== dates.length) {
    throw new InvariantViolationError("Cash flows and dates differ in length", {
      flows: flows.length,
      dates: dates.length,
    });
  }
  const years = yearFractions(dates);

  return solveRate(
    {
      value: (r) => {
        let total = 0;
        for (let i = 0; i < flows.length; i++) total += flows[i] / Math.pow(1 + r, years[i]);
        return total;
      },
      derivative: (r) => {
        let total = 0;
        for (let i = 0; i < flows.length; i++) {
          total -= (years[i] * flows[i]) / Math.pow(1 + r, years[i] + 1);
        }
        return total;
      },
    },
    { ...DEFAULT_SOLVER_OPTIONS, ...opts },
    "XIRR",
  );
}

// ---------------------------------------------------------------------------
// Periodic flows (monthly)
// ---------------------------------------------------------------------------

/** NPV of monthly flows at an annual rate converted to its monthly equivalent. */
export function npv(annualRate: number, flows: readonly number[]): number {
  const monthly = Math.pow(1 + annualRate, 1 / 12) - 1;
  let total = 0;
  for (let t = 0; t < flows.length; t++) total += flows[t] / Math.pow(1 + monthly, t);
  return total;
}

export function periodicIrr(flows: readonly number[], opts: Partial<SolverOptions> = {}): PeriodicIrr {
  assertSolvable(flows, "IRR");
  const solverOpts = { ...DEFAULT_SOLVER_OPTIONS, ...opts };
  // A monthly root sits near a twelfth of the annual guess.
  const periodRate = solveRate(
    {
      value: (r) => {
        let total = 0;
        for (let t = 0; t < flows.length; t++) total += flows[t] / Math.pow(1 + r, t);
        return total;
      },
      derivative: (r) => {
        let total = 0;
        for (let t = 1; t < flows.length; t++) total -= (t * flows[t]) / Math.pow(1 + r, t + 1);
        return total;
      },
    },
    { ...solverOpts, guess: solverOpts.guess / 12 },
    "IRR",
  );
  return { periodRate, annualRate: Math.pow(1 + periodRate, 12) - 1 };
}

// ---------------------------------------------------------------------------
// Multiples
// ---------------------------------------------------------------------------

export function investedEquity(flows: readonly number[]): number {
  return sum(flows.filter((cf) => cf < 0).map((cf) => -cf));
}

export function totalDistributions(flows: readonly number[]): number {
  return sum(flows.filter((cf) => cf > 0));
}

export function profit(flows: readonly number[]): number {
  return sum(flows);
}

export function equityMultiple(flows: readonly number[]): number {
  const invested = investedEquity(flows);
  if (invested === 0) {
    throw new DegenerateCashFlowError("Equity multiple needs a contribution", {});
  }
  return totalDistributions(flows) / invested;
}

/**
 * Cash-on-cash per hold year: operating cash of periods 12(y-1)+1..12y over
 * invested equity. Partial final years count the periods they have.
 */
export function cashOnCash(
  operatingCash: readonly number[],
  invested: number,
  holdPeriodMonths: number,
): CashOnCash {
  if (!(invested > 0)) {
    throw new DegenerateCashFlowError("Cash-on-cash needs invested equity", { invested });
  }

  const years: CashOnCashYear[] = [];
  const yearCount = Math.ceil(holdPeriodMonths / 12);
  for (let year = 1; year <= yearCount; year++) {
    const from = 12 * (year - 1) + 1;
    const to = Math.min(12 * year, holdPeriodMonths);
    const cash = sum(operatingCash.slice(from, to + 1));
    years.push({ year, cash, yield: cash / invested });
  }

  const average = years.length > 0 ? sum(years.map((y) => y.yield)) / years.length : 0;
  return { years, average };
}
