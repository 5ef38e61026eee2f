/**
 * Rent Roll — Public API
 */

export type {
  Tenant,
  LeasingCostTerms,
  AncillaryIncomeInputs,
  RentRollContext,
  TenantRevenueSeries,
  LeasingCostSeries,
  RentRollProjection,
  ReimbursementInputs,
  Reimbursements,
} from "./types";

export { tenantMonth, projectTenant, buildoutEnd } from "./tenantRevenue";
export { leaseCommission, tenantImprovementCost, projectLeasingCosts, rolloverPeriod } from "./leasingCosts";
export { projectAncillaryIncome, computeReimbursements } from "./ancillary";
export { projectRentRoll } from "./projector";
