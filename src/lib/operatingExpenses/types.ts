/**
 * Operating Expense Projector — Types
 */

export interface OperatingExpenseInputs {
  buildingArea: number;
  /** Annual, dollars per area */
  fixedOpexPerArea: number;
  /** Annual, dollars per area */
  variableOpexPerArea: number;
  /** Annual, dollars per area */
  capitalReservePerArea: number;
  /** Annual, in the run's money unit */
  propertyTaxBase: number;
  propertyTaxGrowthRate: number;
  propertyTaxStartMonth: number;
  /** Share of parking income spent operating the parking */
  parkingExpenseRate: number;
}

export interface OperatingExpenseContext {
  lastPeriod: number;
  expenseEscalation: readonly number[];
  moneyDivisor: number;
}

/** Every line except the management fee, which depends on revenue. */
export interface OperatingExpenseProjection {
  fixedOpex: number[];
  variableOpex: number[];
  parkingExpense: number[];
  propertyTax: number[];
  capitalReserve: number[];
}

export interface ManagementFeeInputs {
  managementFeeRate: number;
  vacancyRate: number;
  collectionLossRate: number;
  /** Potential revenue before the fee's own reimbursement */
  potentialBeforeFee: number;
  /** Rent, free rent and ancillary income: the base for collection loss */
  rentalRevenue: number;
  /** Whether tenants reimburse the fee (NNN) */
  feeReimbursed: boolean;
  resolveCircularity: boolean;
}
