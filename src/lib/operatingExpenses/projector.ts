/**
 * Operating Expense Projector
 *
 * Area-based lines: rate × building area × expenseEscalation[t] / 12.
 * Parking expense is a share of parking income. Property tax is the stepped
 * series from the escalation engine. Period 0 is zero on every line.
 *
 * Pure function — deterministic, no side effects.
 */

import { buildPropertyTaxSeries } from "@/lib/escalationEngine";
import { seriesAt } from "@/lib/proforma/series";
import type {
  OperatingExpenseContext,
  OperatingExpenseInputs,
  OperatingExpenseProjection,
} from "./types";

function areaLine(
  annualPerArea: number,
  inputs: OperatingExpenseInputs,
  ctx: OperatingExpenseContext,
): number[] {
  const line: number[] = [0];
  for (let t = 1; t <= ctx.lastPeriod; t++) {
    const factor = seriesAt(ctx.expenseEscalation, t, "expenseEscalation");
    line.push((annualPerArea * inputs.buildingArea * factor) / 12 / ctx.moneyDivisor);
  }
  return line;
}

export function projectOperatingExpenses(
  inputs: OperatingExpenseInputs,
  parkingIncome: readonly number[],
  ctx: OperatingExpenseContext,
): OperatingExpenseProjection {
  const parkingExpense: number[] = [];
  for (let t = 0; t <= ctx.lastPeriod; t++) {
    parkingExpense.push(t === 0 ? 0 : inputs.parkingExpenseRate * seriesAt(parkingIncome, t, "parkingIncome"));
  }

  const propertyTax = buildPropertyTaxSeries(
    inputs.propertyTaxBase,
    inputs.propertyTaxGrowthRate,
    ctx.lastPeriod,
    { startMonth: inputs.propertyTaxStartMonth },
  );
  propertyTax[0] = 0;

  return {
    fixedOpex: areaLine(inputs.fixedOpexPerArea, inputs, ctx),
    variableOpex: areaLine(inputs.variableOpexPerArea, inputs, ctx),
    parkingExpense,
    propertyTax,
    capitalReserve: areaLine(inputs.capitalReservePerArea, inputs, ctx),
  };
}
