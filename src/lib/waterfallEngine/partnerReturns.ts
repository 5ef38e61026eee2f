/**
 * Waterfall Engine — Partner returns
 *
 * Each class is measured on its own. A class that never contributed has no
 * multiple, and one without both contributions and distributions has no
 * IRR; those metrics are null rather than failing the run.
 */

import { equityMultiple, investedEquity, xirr } from "@/lib/returnsEngine";
import type { SolverOptions } from "@/lib/returnsEngine";
import type { PartnerReturns, WaterfallResult } from "./types";

function hasBothSigns(flows: readonly number[]): boolean {
  return flows.some((cf) => cf > 0) && flows.some((cf) => cf < 0);
}

function classIrr(
  flows: readonly number[],
  dates: readonly string[],
  opts: Partial<SolverOptions>,
): number | null {
  return hasBothSigns(flows) ? xirr(flows, dates, opts) : null;
}

function classMultiple(flows: readonly number[]): number | null {
  return investedEquity(flows) > 0 ? equityMultiple(flows) : null;
}

export function computePartnerReturns(
  result: WaterfallResult,
  dates: readonly string[],
  opts: Partial<SolverOptions> = {},
): PartnerReturns {
  return {
    lpIrr: classIrr(result.lpCashFlows, dates, opts),
    gpIrr: classIrr(result.gpCashFlows, dates, opts),
    lpMultiple: classMultiple(result.lpCashFlows),
    gpMultiple: classMultiple(result.gpCashFlows),
  };
}
