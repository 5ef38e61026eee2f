/**
 * Debt Engine — Portfolio Aggregation
 *
 * Sums every tranche's schedule per period. The effective rate is the
 * tranche rates weighted by interest-bearing balance (begin + draws/2).
 *
 * Pure function — deterministic, no side effects.
 */

import { itemAt } from "@/lib/proforma/series";
import type { DebtContext, DebtSchedule, Loan, LoanSchedule } from "./types";
import { scheduleLoan } from "./schedule";

export function aggregateLoanSchedules(loans: LoanSchedule[], periodCount: number): DebtSchedule {
  const zeros = () => new Array<number>(periodCount).fill(0);
  const result: DebtSchedule = {
    loans,
    draws: zeros(),
    interest: zeros(),
    scheduledPrincipal: zeros(),
    paydown: zeros(),
    debtService: zeros(),
    capitalizedInterest: zeros(),
    fees: zeros(),
    endingBalance: zeros(),
    effectiveRate: zeros(),
  };
  const weights = zeros();

  for (const loan of loans) {
    for (const p of loan.periods) {
      const t = p.period;
      result.draws[t] += p.draws;
      result.interest[t] += p.interest;
      result.scheduledPrincipal[t] += p.scheduledPrincipal;
      result.paydown[t] += p.paydown;
      result.debtService[t] += p.debtService;
      result.capitalizedInterest[t] += p.capitalizedInterest;
      result.fees[t] += p.fees;
      result.endingBalance[t] += p.endingBalance;

      const weight = p.beginningBalance + p.draws / 2;
      result.effectiveRate[t] += p.rate * weight;
      weights[t] += weight;
    }
  }

  for (let t = 0; t < periodCount; t++) {
    result.effectiveRate[t] = weights[t] > 0 ? result.effectiveRate[t] / weights[t] : 0;
  }
  return result;
}

/**
 * Schedule every tranche over the context's periods and aggregate. Tranches
 * are served in order: each one sees the operating cash left after the
 * debt service paid by the tranches before it.
 */
export function computeDebtSchedule(loans: readonly Loan[], ctx: DebtContext): DebtSchedule {
  let operatingCash = ctx.operatingCash;
  const schedules = loans.map((loan) => {
    const schedule = scheduleLoan(loan, { ...ctx, operatingCash });
    if (operatingCash) {
      operatingCash = operatingCash.map((cash, t) => {
        const p = itemAt(schedule.periods, t, "periods");
        return cash - (p.debtService - p.capitalizedInterest);
      });
    }
    return schedule;
  });
  return aggregateLoanSchedules(schedules, ctx.periodDates.length);
}
