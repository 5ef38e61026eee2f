/**
 * Escalation Engine — Series builders
 *
 * Rent compounds monthly at rate/12:
 *   f[t] = f[t-1] * (1 + rate/12)        → 12 periods at 2.5% = 1.025288
 * Expenses compound at the monthly root of the annual rate:
 *   f[t] = f[t-1] * (1 + rate)^(1/12)    → 12 periods at 2.5% = 1.025000
 *
 * The two are not interchangeable. Property tax steps once per 12 periods.
 */

import type { PropertyTaxSeriesOpts, RentEscalationOpts } from "./types";

/** Rent multipliers for periods 0..lastPeriod. */
export function buildRentEscalation(
  annualRate: number,
  lastPeriod: number,
  opts: RentEscalationOpts = {},
): number[] {
  const stabilizationMonth = opts.stabilizationMonth ?? Number.POSITIVE_INFINITY;
  const stabilizedRate = opts.stabilizedRate ?? annualRate;

  const factors = [1];
  for (let t = 1; t <= lastPeriod; t++) {
    const rate = t > stabilizationMonth ? stabilizedRate : annualRate;
    factors.push(factors[t - 1] * (1 + rate / 12));
  }
  return factors;
}

/** Expense multipliers for periods 0..lastPeriod. */
export function buildExpenseEscalation(annualRate: number, lastPeriod: number): number[] {
  const monthly = Math.pow(1 + annualRate, 1 / 12);
  const factors = [1];
  for (let t = 1; t <= lastPeriod; t++) {
    factors.push(factors[t - 1] * monthly);
  }
  return factors;
}

/**
 * Stepped monthly property tax: flat for 12 periods from startMonth, then
 * multiplied by (1 + growth) exactly once at each 12-period boundary.
 */
export function buildPropertyTaxSeries(
  annualBase: number,
  annualGrowth: number,
  lastPeriod: number,
  opts: PropertyTaxSeriesOpts,
): number[] {
  const series: number[] = [];
  let monthly = annualBase / 12;
  for (let t = 0; t <= lastPeriod; t++) {
    if (t < opts.startMonth) {
      series.push(0);
      continue;
    }
    const offset = t - opts.startMonth;
    if (offset > 0 && offset % 12 === 0) {
      monthly *= 1 + annualGrowth;
    }
    series.push(monthly);
  }
  return series;
}
