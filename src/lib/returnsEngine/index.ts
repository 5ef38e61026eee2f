/**
 * Returns Engine — Public API
 */

export type { SolverOptions, PeriodicIrr, CashOnCash, CashOnCashYear } from "./types";
export { DEFAULT_SOLVER_OPTIONS, BISECTION_BRACKET, solveRate, newton, bisect } from "./solver";
export type { RateFunction } from "./solver";
export {
  assertSolvable,
  xnpv,
  xirr,
  npv,
  periodicIrr,
  investedEquity,
  totalDistributions,
  profit,
  equityMultiple,
  cashOnCash,
} from "./metrics";
