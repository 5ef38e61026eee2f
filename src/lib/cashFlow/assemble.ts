/**
 * Cash Flow Assembler
 *
 * unlevered = NOI - (TI + LC) + exit proceeds - acquisition costs
 * levered   = unlevered + draws - debt service + capitalized interest
 *             - loan fees + paydown - payoff
 *
 * Acquisition costs land at period 0, exit proceeds and the loan payoff at
 * the hold period end. Rows are frozen on creation.
 *
 * Pure function — deterministic, no side effects.
 */

import { itemAt, seriesAt } from "@/lib/proforma/series";
import type { CashFlowInputs, CashFlowTable, MonthlyRow } from "./types";

export function assembleRow(inputs: CashFlowInputs, t: number): MonthlyRow {
  const { operations, leasingCosts, debt, exit } = inputs;
  const op = itemAt(operations.periods, t, "operations");

  const tenantImprovements = seriesAt(leasingCosts.tenantImprovements, t, "tenantImprovements");
  const leasingCommissions = seriesAt(leasingCosts.leasingCommissions, t, "leasingCommissions");
  const acquisitionCosts = t === 0 ? inputs.purchasePrice + inputs.closingCosts : 0;
  const isExit = t === inputs.holdPeriodMonths;
  const exitProceeds = isExit ? exit.netProceeds : 0;

  const loanDraws = seriesAt(debt.draws, t, "draws");
  const debtService = seriesAt(debt.debtService, t, "debtService");
  const capitalizedInterest = seriesAt(debt.capitalizedInterest, t, "capitalizedInterest");
  const loanFees = seriesAt(debt.fees, t, "fees");
  const paydown = seriesAt(debt.paydown, t, "paydown");
  const balance = seriesAt(debt.endingBalance, t, "endingBalance");
  const loanPayoff = isExit ? balance : 0;

  const unleveredCashFlow =
    op.noi - tenantImprovements - leasingCommissions + exitProceeds - acquisitionCosts;
  const leveredCashFlow =
    unleveredCashFlow + loanDraws - debtService + capitalizedInterest - loanFees + paydown - loanPayoff;

  return Object.freeze({
    period: t,
    date: itemAt(inputs.periodDates, t, "periodDates"),
    grossRent: op.grossRent,
    freeRent: op.freeRent,
    parkingIncome: op.parkingIncome,
    storageIncome: op.storageIncome,
    fixedReimbursements: op.fixedReimbursements,
    variableReimbursements: op.variableReimbursements,
    potentialRevenue: op.potentialRevenue,
    vacancyLoss: op.vacancyLoss,
    collectionLoss: op.collectionLoss,
    effectiveRevenue: op.effectiveRevenue,
    fixedOpex: op.fixedOpex,
    variableOpex: op.variableOpex,
    parkingExpense: op.parkingExpense,
    managementFee: op.managementFee,
    propertyTax: op.propertyTax,
    capitalReserve: op.capitalReserve,
    totalExpenses: op.totalExpenses,
    noi: op.noi,
    tenantImprovements,
    leasingCommissions,
    acquisitionCosts,
    exitProceeds,
    loanDraws,
    interest: seriesAt(debt.interest, t, "interest"),
    scheduledPrincipal: seriesAt(debt.scheduledPrincipal, t, "scheduledPrincipal"),
    paydown,
    debtService,
    capitalizedInterest,
    loanFees,
    loanPayoff,
    loanBalance: isExit ? 0 : balance,
    effectiveRate: seriesAt(debt.effectiveRate, t, "effectiveRate"),
    unleveredCashFlow,
    leveredCashFlow,
  });
}

/** Rows 0..holdPeriodMonths and the two cash flow series. */
export function assembleCashFlows(inputs: CashFlowInputs): CashFlowTable {
  const rows: MonthlyRow[] = [];
  for (let t = 0; t <= inputs.holdPeriodMonths; t++) rows.push(assembleRow(inputs, t));
  return {
    rows: Object.freeze(rows),
    unlevered: rows.map((r) => r.unleveredCashFlow),
    levered: rows.map((r) => r.leveredCashFlow),
  };
}
