/**
 * Returns Engine — Types
 */

export interface SolverOptions {
  /** Starting rate for Newton iteration */
  guess: number;
  /** Convergence threshold on the rate step */
  tolerance: number;
  maxIterations: number;
}

export interface PeriodicIrr {
  /** Rate per period (monthly) */
  periodRate: number;
  /** (1 + periodRate)^12 - 1 */
  annualRate: number;
}

export interface CashOnCashYear {
  year: number;
  cash: number;
  yield: number;
}

export interface CashOnCash {
  years: CashOnCashYear[];
  average: number;
}
