/**
 * Rent Roll — Types
 *
 * Rents are quoted per area per year, in dollars. Projected amounts are
 * divided by the run's money divisor (1 for dollars, 1000 for thousands).
 */

export interface LeasingCostTerms {
  /** TI allowance per area, paid once at rollover */
  tiAllowancePerArea: number;
  /** Commission rate on lease years 1-5 (e.g. 0.06) */
  commissionRateYears1to5: number;
  /** Commission rate on lease years 6+ (e.g. 0.03) */
  commissionRateYears6Plus: number;
  newLeaseTermYears: number;
}

export interface Tenant {
  id: string;
  name: string;
  area: number;
  inPlaceRent: number;
  marketRent: number;
  /** First period the tenant pays rent */
  leaseStartMonth: number;
  /** Last period of in-place rent */
  leaseEndMonth: number;
  /** Whether a buildout gap, free rent and leasing costs apply at rollover */
  applyRolloverCosts: boolean;
  /** In-place escalation override. Market rent always uses the scenario rate. */
  annualRentBump?: number;
  /** Length of each free-rent window (in-place and at rollover) */
  freeRentMonths: number;
  /** First period of free rent during the in-place lease; 0 or absent means none */
  freeRentStartMonth?: number;
  tiBuildoutMonths: number;
  leasingCosts?: LeasingCostTerms;
}

export interface AncillaryIncomeInputs {
  parkingStalls: number;
  /** Monthly rate per stall, dollars */
  parkingRatePerStall: number;
  storageUnits: number;
  /** Monthly rate per unit, dollars */
  storageRatePerUnit: number;
}

export interface RentRollContext {
  /** Last projected period (hold period + forward buffer) */
  lastPeriod: number;
  holdPeriodMonths: number;
  rentGrowthRate: number;
  rentEscalation: readonly number[];
  moneyDivisor: number;
}

export interface TenantRevenueSeries {
  tenantId: string;
  /** Scheduled rent (in-place or market), zero in the buildout gap */
  grossRent: number[];
  /** Free rent as a negative line */
  freeRent: number[];
}

export interface LeasingCostSeries {
  tenantImprovements: number[];
  leasingCommissions: number[];
}

export interface RentRollProjection {
  tenants: TenantRevenueSeries[];
  grossRent: number[];
  freeRent: number[];
  parkingIncome: number[];
  storageIncome: number[];
  leasingCosts: LeasingCostSeries;
}

export interface ReimbursementInputs {
  fixedOpex: number;
  propertyTax: number;
  variableOpex: number;
  parkingExpense: number;
  managementFee: number;
}

export interface Reimbursements {
  fixed: number;
  variable: number;
}
