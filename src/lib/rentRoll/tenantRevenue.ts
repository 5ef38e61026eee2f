/**
 * Rent Roll — Tenant revenue
 *
 * Timeline for a tenant with rollover costs, lease ending at month 50,
 * 6 buildout months and 10 free months:
 *   1..50   in-place rent
 *   51..56  buildout gap (zero)
 *   57..66  market rent with an equal negative free-rent line
 *   67+     market rent
 * Without rollover costs market rent starts at month 51.
 *
 * A freeRentStartMonth of s >= 1 also abates in-place rent for periods
 * s..s+freeRentMonths-1 that fall within the lease.
 */

import { buildRentEscalation } from "@/lib/escalationEngine";
import { seriesAt } from "@/lib/proforma/series";
import type { RentRollContext, Tenant, TenantRevenueSeries } from "./types";

export interface TenantMonth {
  grossRent: number;
  freeRent: number;
}

/** Last period of the buildout gap (equals leaseEndMonth when there is none). */
export function buildoutEnd(tenant: Tenant): number {
  return tenant.leaseEndMonth + (tenant.applyRolloverCosts ? tenant.tiBuildoutMonths : 0);
}

function inInPlaceFreeRent(tenant: Tenant, period: number): boolean {
  const start = tenant.freeRentStartMonth ?? 0;
  return start >= 1 && period >= start && period < start + tenant.freeRentMonths;
}

export function tenantMonth(
  tenant: Tenant,
  period: number,
  inPlaceEscalation: readonly number[],
  marketEscalation: readonly number[],
  moneyDivisor: number,
): TenantMonth {
  // Acquisition day carries no revenue.
  if (period === 0 || period < tenant.leaseStartMonth) {
    return { grossRent: 0, freeRent: 0 };
  }

  if (period <= tenant.leaseEndMonth) {
    const factor = seriesAt(inPlaceEscalation, period, `inPlaceEscalation:${tenant.id}`);
    const grossRent = (tenant.area * tenant.inPlaceRent * factor) / 12 / moneyDivisor;
    return { grossRent, freeRent: inInPlaceFreeRent(tenant, period) ? -grossRent : 0 };
  }

  const gapEnd = buildoutEnd(tenant);
  if (period <= gapEnd) {
    return { grossRent: 0, freeRent: 0 };
  }

  const factor = seriesAt(marketEscalation, period, "rentEscalation");
  const grossRent = (tenant.area * tenant.marketRent * factor) / 12 / moneyDivisor;
  const inFreeRent =
    tenant.applyRolloverCosts && period <= gapEnd + tenant.freeRentMonths;

  return { grossRent, freeRent: inFreeRent ? -grossRent : 0 };
}

export function projectTenant(tenant: Tenant, ctx: RentRollContext): TenantRevenueSeries {
  const inPlaceEscalation =
    tenant.annualRentBump !== undefined
      ? buildRentEscalation(tenant.annualRentBump, ctx.lastPeriod)
      : ctx.rentEscalation;

  const grossRent: number[] = [];
  const freeRent: number[] = [];
  for (let t = 0; t <= ctx.lastPeriod; t++) {
    const m = tenantMonth(tenant, t, inPlaceEscalation, ctx.rentEscalation, ctx.moneyDivisor);
    grossRent.push(m.grossRent);
    freeRent.push(m.freeRent);
  }
  return { tenantId: tenant.id, grossRent, freeRent };
}
