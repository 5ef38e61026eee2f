/**
 * Rent Roll — Projector
 *
 * Builds every tenant's revenue series plus ancillary income and rollover
 * leasing costs for periods 0..lastPeriod.
 */

import type { AncillaryIncomeInputs, RentRollContext, RentRollProjection, Tenant } from "./types";
import { projectTenant } from "./tenantRevenue";
import { projectLeasingCosts } from "./leasingCosts";
import { projectAncillaryIncome } from "./ancillary";

export function projectRentRoll(
  tenants: readonly Tenant[],
  ancillary: AncillaryIncomeInputs,
  ctx: RentRollContext,
): RentRollProjection {
  const perTenant = tenants.map((t) => projectTenant(t, ctx));

  const grossRent = new Array<number>(ctx.lastPeriod + 1).fill(0);
  const freeRent = new Array<number>(ctx.lastPeriod + 1).fill(0);
  for (const series of perTenant) {
    for (let t = 0; t <= ctx.lastPeriod; t++) {
      grossRent[t] += series.grossRent[t];
      freeRent[t] += series.freeRent[t];
    }
  }

  const { parkingIncome, storageIncome } = projectAncillaryIncome(
    ancillary,
    ctx.rentEscalation,
    ctx.lastPeriod,
    ctx.moneyDivisor,
  );

  return {
    tenants: perTenant,
    grossRent,
    freeRent,
    parkingIncome,
    storageIncome,
    leasingCosts: projectLeasingCosts(tenants, ctx),
  };
}
