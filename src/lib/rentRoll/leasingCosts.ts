/**
 * Rent Roll — Leasing capital costs at rollover
 *
 * Booked once, in the period after the lease ends, when the rollover falls
 * inside the hold period. Only tenants with rollover costs and leasing terms
 * carry them.
 *
 * Commission on a new lease:
 *   year-1 rent = area × market rent × rentEscalation[rollover]
 *   year-n rent = year-1 rent × (1 + rentGrowth)^(n-1)
 *   year 1 is reduced by the free-rent months: × (12 - free) / 12
 *   rate = years 1-5 rate, or years 6+ rate
 */

import { seriesAt } from "@/lib/proforma/series";
import type { LeasingCostSeries, LeasingCostTerms, RentRollContext, Tenant } from "./types";

export function rolloverPeriod(tenant: Tenant): number {
  return tenant.leaseEndMonth + 1;
}

export function leaseCommission(
  tenant: Tenant,
  terms: LeasingCostTerms,
  rentGrowthRate: number,
  escalationAtRollover: number,
): number {
  const yearOneRent = tenant.area * tenant.marketRent * escalationAtRollover;
  let total = 0;

  for (let year = 1; year <= terms.newLeaseTermYears; year++) {
    const annualRent = yearOneRent * Math.pow(1 + rentGrowthRate, year - 1);
    const netRent =
      year === 1 && tenant.freeRentMonths > 0
        ? (annualRent * (12 - tenant.freeRentMonths)) / 12
        : annualRent;
    const rate = year <= 5 ? terms.commissionRateYears1to5 : terms.commissionRateYears6Plus;
    total += netRent * rate;
  }

  return total;
}

export function tenantImprovementCost(
  tenant: Tenant,
  terms: LeasingCostTerms,
  escalationAtRollover: number,
): number {
  return tenant.area * terms.tiAllowancePerArea * escalationAtRollover;
}

export function projectLeasingCosts(tenants: readonly Tenant[], ctx: RentRollContext): LeasingCostSeries {
  const tenantImprovements = new Array<number>(ctx.lastPeriod + 1).fill(0);
  const leasingCommissions = new Array<number>(ctx.lastPeriod + 1).fill(0);

  for (const tenant of tenants) {
    const terms = tenant.leasingCosts;
    if (!tenant.applyRolloverCosts || !terms) continue;

    const period = rolloverPeriod(tenant);
    if (period < 1 || period > ctx.holdPeriodMonths) continue;

    const factor = seriesAt(ctx.rentEscalation, period, "rentEscalation");
    tenantImprovements[period] += tenantImprovementCost(tenant, terms, factor) / ctx.moneyDivisor;
    leasingCommissions[period] +=
      leaseCommission(tenant, terms, ctx.rentGrowthRate, factor) / ctx.moneyDivisor;
  }

  return { tenantImprovements, leasingCommissions };
}
