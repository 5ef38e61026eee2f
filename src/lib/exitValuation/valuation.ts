/**
 * Exit Valuation
 *
 * forward NOI = Σ NOI[N+1..N+12] + Σ capital reserve[N+1..N+12]
 * gross       = forward NOI / exit cap rate
 * net         = gross × (1 - sales cost rate)
 *
 * Reserves are below-the-line for a buyer, so they are added back before
 * capitalizing.
 *
 * Pure function — deterministic, no side effects.
 */

import { DivideByZeroError } from "@/lib/proforma/errors";
import { sumRange } from "@/lib/proforma/series";
import type { ExitInputs, ExitValuation } from "./types";

export const FORWARD_PERIODS = 12;

export function valueAtExit(
  noi: readonly number[],
  capitalReserve: readonly number[],
  inputs: ExitInputs,
): ExitValuation {
  if (!(inputs.exitCapRate > 0)) {
    throw new DivideByZeroError(`Exit cap rate must be positive, got ${inputs.exitCapRate}`, {
      exitCapRate: inputs.exitCapRate,
    });
  }

  const from = inputs.exitPeriod + 1;
  const to = inputs.exitPeriod + FORWARD_PERIODS;
  const forwardOperating = sumRange(noi, from, to, "noi");
  const reserveAddBack = sumRange(capitalReserve, from, to, "capitalReserve");
  const forwardNoi = forwardOperating + reserveAddBack;

  const grossValue = forwardNoi / inputs.exitCapRate;
  const salesCosts = grossValue * inputs.salesCostRate;

  return {
    exitPeriod: inputs.exitPeriod,
    forwardNoi,
    reserveAddBack,
    grossValue,
    salesCosts,
    netProceeds: grossValue - salesCosts,
  };
}
