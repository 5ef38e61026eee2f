/**
 * NOI Aggregator
 *
 * Per period:
 *   potential  = rent + free rent + parking + storage + reimbursements
 *   vacancy    = -vacancyRate × potential
 *   collection = -collectionLossRate × (rent + free rent + parking + storage)
 *   effective  = potential + vacancy + collection
 *   NOI        = effective - expenses
 *
 * The management fee is settled here because it depends on revenue and,
 * under NNN, revenue depends on the fee.
 *
 * Pure function — deterministic, no side effects.
 */

import { computeReimbursements } from "@/lib/rentRoll";
import { solveManagementFee } from "@/lib/operatingExpenses";
import { seriesAt } from "@/lib/proforma/series";
import type { NoiInputs, NoiPeriod, NoiProjection } from "./types";

const ZERO_PERIOD: Omit<NoiPeriod, "period"> = {
  grossRent: 0,
  freeRent: 0,
  parkingIncome: 0,
  storageIncome: 0,
  fixedReimbursements: 0,
  variableReimbursements: 0,
  potentialRevenue: 0,
  vacancyLoss: 0,
  collectionLoss: 0,
  effectiveRevenue: 0,
  fixedOpex: 0,
  variableOpex: 0,
  parkingExpense: 0,
  managementFee: 0,
  propertyTax: 0,
  capitalReserve: 0,
  totalExpenses: 0,
  noi: 0,
};

export function aggregatePeriod(inputs: NoiInputs, t: number): NoiPeriod {
  if (t === 0) return { period: 0, ...ZERO_PERIOD };

  const { rentRoll, expenses, policy } = inputs;
  const grossRent = seriesAt(rentRoll.grossRent, t, "grossRent");
  const freeRent = seriesAt(rentRoll.freeRent, t, "freeRent");
  const parkingIncome = seriesAt(rentRoll.parkingIncome, t, "parkingIncome");
  const storageIncome = seriesAt(rentRoll.storageIncome, t, "storageIncome");
  const fixedOpex = seriesAt(expenses.fixedOpex, t, "fixedOpex");
  const variableOpex = seriesAt(expenses.variableOpex, t, "variableOpex");
  const parkingExpense = seriesAt(expenses.parkingExpense, t, "parkingExpense");
  const propertyTax = seriesAt(expenses.propertyTax, t, "propertyTax");
  const capitalReserve = seriesAt(expenses.capitalReserve, t, "capitalReserve");

  const rentalRevenue = grossRent + freeRent + parkingIncome + storageIncome;
  const recoveriesBeforeFee = policy.nnnLease
    ? computeReimbursements({ fixedOpex, propertyTax, variableOpex, parkingExpense, managementFee: 0 })
    : { fixed: 0, variable: 0 };

  const managementFee = solveManagementFee({
    managementFeeRate: policy.managementFeeRate,
    vacancyRate: policy.vacancyRate,
    collectionLossRate: policy.collectionLossRate,
    potentialBeforeFee: rentalRevenue + recoveriesBeforeFee.fixed + recoveriesBeforeFee.variable,
    rentalRevenue,
    feeReimbursed: policy.nnnLease,
    resolveCircularity: policy.resolveCircularity,
  });

  const recoveries = policy.nnnLease
    ? computeReimbursements({ fixedOpex, propertyTax, variableOpex, parkingExpense, managementFee })
    : { fixed: 0, variable: 0 };

  const potentialRevenue = rentalRevenue + recoveries.fixed + recoveries.variable;
  const vacancyLoss = -policy.vacancyRate * potentialRevenue;
  const collectionLoss = -policy.collectionLossRate * rentalRevenue;
  const effectiveRevenue = potentialRevenue + vacancyLoss + collectionLoss;
  const totalExpenses =
    fixedOpex + variableOpex + parkingExpense + managementFee + propertyTax + capitalReserve;

  return {
    period: t,
    grossRent,
    freeRent,
    parkingIncome,
    storageIncome,
    fixedReimbursements: recoveries.fixed,
    variableReimbursements: recoveries.variable,
    potentialRevenue,
    vacancyLoss,
    collectionLoss,
    effectiveRevenue,
    fixedOpex,
    variableOpex,
    parkingExpense,
    managementFee,
    propertyTax,
    capitalReserve,
    totalExpenses,
    noi: effectiveRevenue - totalExpenses,
  };
}

export function aggregateNoi(inputs: NoiInputs): NoiProjection {
  const periods: NoiPeriod[] = [];
  for (let t = 0; t <= inputs.lastPeriod; t++) periods.push(aggregatePeriod(inputs, t));
  return {
    periods,
    noi: periods.map((p) => p.noi),
    capitalReserve: periods.map((p) => p.capitalReserve),
  };
}
