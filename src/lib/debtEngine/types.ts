/**
 * Debt Engine — Types
 *
 * Monthly loan schedules: draws, actual/365 interest accrual, IO then level
 * amortization, scheduled paydowns, fees. Tranches are fixed-rate or float
 * over a rate curve.
 */

// ---------------------------------------------------------------------------
// Loan
// ---------------------------------------------------------------------------

export type RateMode = "fixed" | "floating";

export interface ScheduledAmount {
  period: number;
  amount: number;
}

export interface Loan {
  id: string;
  principal: number;
  rateMode: RateMode;
  /** Annual rate as decimal (e.g. 0.0525). Required when fixed. */
  fixedRate?: number;
  /** Added to the curve rate when floating */
  spread?: number;
  interestOnlyMonths: number;
  /** Amortization term in months, counted from the end of IO */
  amortizationMonths: number;
  originationFeeRate: number;
  closingCostRate: number;
  /** Defaults to the full principal drawn at period 0 */
  drawSchedule?: ScheduledAmount[];
  /** Unscheduled principal prepayments */
  paydownSchedule?: ScheduledAmount[];
  /**
   * During IO, interest that operating cash does not cover is added to the
   * balance instead of being paid.
   */
  capitalizeInterest?: boolean;
}

// ---------------------------------------------------------------------------
// Rate curve
// ---------------------------------------------------------------------------

export interface RateCurvePoint {
  /** ISO date */
  date: string;
  /** Annual rate as decimal */
  rate: number;
}

export interface RateCurve {
  points: readonly RateCurvePoint[];
}

// ---------------------------------------------------------------------------
// Schedules
// ---------------------------------------------------------------------------

export interface DebtContext {
  /** ISO date of each period 0..holdPeriodMonths */
  periodDates: readonly string[];
  rateCurve?: RateCurve;
  /**
   * Property cash available for debt service per period (NOI less leasing
   * costs). Only read for loans that capitalize interest; absent, no cash is
   * available and all of their IO interest is capitalized.
   */
  operatingCash?: readonly number[];
}

/** One loan, one period. Paydown is negative. */
export interface LoanPeriod {
  period: number;
  date: string;
  beginningBalance: number;
  draws: number;
  /** Annual rate in effect (0 at period 0, where nothing accrues) */
  rate: number;
  interest: number;
  scheduledPrincipal: number;
  paydown: number;
  debtService: number;
  /** Part of this period's interest added to the balance, not paid */
  capitalizedInterest: number;
  fees: number;
  endingBalance: number;
}

export interface LoanSchedule {
  loanId: string;
  periods: LoanPeriod[];
}

/** All tranches summed per period. */
export interface DebtSchedule {
  loans: LoanSchedule[];
  draws: number[];
  interest: number[];
  scheduledPrincipal: number[];
  paydown: number[];
  debtService: number[];
  capitalizedInterest: number[];
  fees: number[];
  endingBalance: number[];
  /** Rate weighted by interest-bearing balance */
  effectiveRate: number[];
}
