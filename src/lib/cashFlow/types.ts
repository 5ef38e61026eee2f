/**
 * Cash Flow Assembler — Types
 */

import type { NoiProjection } from "@/lib/noi";
import type { LeasingCostSeries } from "@/lib/rentRoll";
import type { DebtSchedule } from "@/lib/debtEngine";
import type { ExitValuation } from "@/lib/exitValuation";

export interface CashFlowInputs {
  /** ISO date of each period 0..holdPeriodMonths */
  periodDates: readonly string[];
  holdPeriodMonths: number;
  operations: NoiProjection;
  leasingCosts: LeasingCostSeries;
  exit: ExitValuation;
  purchasePrice: number;
  closingCosts: number;
  debt: DebtSchedule;
}

/**
 * One surfaced period of the pro forma. Outflows and losses are negative
 * except where the name says cost, expense or service.
 */
export interface MonthlyRow {
  readonly period: number;
  readonly date: string;

  readonly grossRent: number;
  readonly freeRent: number;
  readonly parkingIncome: number;
  readonly storageIncome: number;
  readonly fixedReimbursements: number;
  readonly variableReimbursements: number;
  readonly potentialRevenue: number;
  readonly vacancyLoss: number;
  readonly collectionLoss: number;
  readonly effectiveRevenue: number;

  readonly fixedOpex: number;
  readonly variableOpex: number;
  readonly parkingExpense: number;
  readonly managementFee: number;
  readonly propertyTax: number;
  readonly capitalReserve: number;
  readonly totalExpenses: number;
  readonly noi: number;

  readonly tenantImprovements: number;
  readonly leasingCommissions: number;
  readonly acquisitionCosts: number;
  readonly exitProceeds: number;

  readonly loanDraws: number;
  readonly interest: number;
  readonly scheduledPrincipal: number;
  readonly paydown: number;
  readonly debtService: number;
  /** Interest added to the loan balance; part of debt service, not paid in cash */
  readonly capitalizedInterest: number;
  readonly loanFees: number;
  readonly loanPayoff: number;
  readonly loanBalance: number;
  readonly effectiveRate: number;

  readonly unleveredCashFlow: number;
  readonly leveredCashFlow: number;
}

export interface AnnualRow {
  readonly year: number;
  readonly fromPeriod: number;
  readonly toPeriod: number;
  readonly effectiveRevenue: number;
  readonly totalExpenses: number;
  readonly noi: number;
  readonly leasingCosts: number;
  readonly acquisitionCosts: number;
  readonly exitProceeds: number;
  readonly debtService: number;
  readonly unleveredCashFlow: number;
  readonly leveredCashFlow: number;
}

export interface CashFlowTable {
  rows: readonly MonthlyRow[];
  unlevered: number[];
  levered: number[];
}
