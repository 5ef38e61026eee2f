/**
 * NOI Aggregator — Types
 */

import type { RentRollProjection } from "@/lib/rentRoll";
import type { OperatingExpenseProjection } from "@/lib/operatingExpenses";

export interface RevenuePolicy {
  managementFeeRate: number;
  vacancyRate: number;
  collectionLossRate: number;
  nnnLease: boolean;
  resolveCircularity: boolean;
}

export interface NoiInputs {
  lastPeriod: number;
  rentRoll: RentRollProjection;
  expenses: OperatingExpenseProjection;
  policy: RevenuePolicy;
}

/** One period of the operating statement. Losses are negative. */
export interface NoiPeriod {
  period: number;
  grossRent: number;
  freeRent: number;
  parkingIncome: number;
  storageIncome: number;
  fixedReimbursements: number;
  variableReimbursements: number;
  potentialRevenue: number;
  vacancyLoss: number;
  collectionLoss: number;
  effectiveRevenue: number;
  fixedOpex: number;
  variableOpex: number;
  parkingExpense: number;
  managementFee: number;
  propertyTax: number;
  capitalReserve: number;
  totalExpenses: number;
  noi: number;
}

export interface NoiProjection {
  periods: NoiPeriod[];
  /** NOI by period, the series the exit valuation and cash flows read */
  noi: number[];
  capitalReserve: number[];
}
