/**
 * Cash Flow Assembler — Annual roll-up
 *
 * Year y covers periods 12(y-1)+1 .. 12y. Period 0 (acquisition) is year 0.
 */

import type { AnnualRow, MonthlyRow } from "./types";

export function yearOf(period: number): number {
  return Math.ceil(period / 12);
}

export function annualize(rows: readonly MonthlyRow[]): AnnualRow[] {
  const byYear = new Map<number, MonthlyRow[]>();
  for (const row of rows) {
    const year = yearOf(row.period);
    const bucket = byYear.get(year);
    if (bucket) bucket.push(row);
    else byYear.set(year, [row]);
  }

  const total = (bucket: readonly MonthlyRow[], pick: (r: MonthlyRow) => number) =>
    bucket.reduce((s, r) => s + pick(r), 0);

  return [...byYear.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, bucket]) =>
      Object.freeze({
        year,
        fromPeriod: bucket[0].period,
        toPeriod: bucket[bucket.length - 1].period,
        effectiveRevenue: total(bucket, (r) => r.effectiveRevenue),
        totalExpenses: total(bucket, (r) => r.totalExpenses),
        noi: total(bucket, (r) => r.noi),
        leasingCosts: total(bucket, (r) => r.tenantImprovements + r.leasingCommissions),
        acquisitionCosts: total(bucket, (r) => r.acquisitionCosts),
        exitProceeds: total(bucket, (r) => r.exitProceeds),
        debtService: total(bucket, (r) => r.debtService),
        unleveredCashFlow: total(bucket, (r) => r.unleveredCashFlow),
        leveredCashFlow: total(bucket, (r) => r.leveredCashFlow),
      }),
    );
}
