/**
 * Debt Engine — Amortization
 *
 * PMT formula: P * r * (1+r)^n / ((1+r)^n - 1)
 * Where: P = principal, r = periodic rate, n = number of periods.
 * When r = 0: PMT = P / n (pure principal, no interest).
 */

/**
 * Standard PMT calculation.
 * Returns periodic payment (principal + interest combined).
 */
export function pmt(principal: number, periodicRate: number, numPeriods: number): number {
  if (numPeriods <= 0) return 0;
  if (periodicRate === 0) {
    return principal / numPeriods;
  }
  const factor = Math.pow(1 + periodicRate, numPeriods);
  return (principal * periodicRate * factor) / (factor - 1);
}

/**
 * Amortization periods left at period t, given the IO term.
 * The first amortizing period (IO + 1) has the full term remaining.
 */
export function remainingAmortization(
  period: number,
  interestOnlyMonths: number,
  amortizationMonths: number,
): number {
  return amortizationMonths - (period - interestOnlyMonths - 1);
}

/** Interest on the average balance over the period, actual/365. */
export function accrueInterest(
  beginningBalance: number,
  draws: number,
  annualRate: number,
  days: number,
): number {
  return (beginningBalance + draws / 2) * annualRate * (days / 365);
}
