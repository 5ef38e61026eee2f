/**
 * Debt Engine — Public API
 *
 * Monthly loan schedules for fixed and floating tranches, and their
 * per-period aggregate.
 */

// Re-export types
export type {
  RateMode,
  ScheduledAmount,
  Loan,
  RateCurvePoint,
  RateCurve,
  DebtContext,
  LoanPeriod,
  LoanSchedule,
  DebtSchedule,
} from "./types";

// Re-export computation functions
export { pmt, remainingAmortization, accrueInterest } from "./amortization";
export { createRateCurve, rateAt } from "./rateCurve";
export { scheduleLoan, loanRateAt } from "./schedule";
export { aggregateLoanSchedules, computeDebtSchedule } from "./portfolio";
