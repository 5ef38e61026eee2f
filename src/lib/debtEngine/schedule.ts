/**
 * Debt Engine — Loan schedule
 *
 * Per period t of one loan:
 *   t = 0   draws only, nothing accrues
 *   t >= 1  interest = (begin + draws/2) × rate × days(t-1 → t) / 365
 *           rate = fixed, or curve(date[t]) + spread
 *   t <= IO scheduled principal 0
 *   t >  IO payment = PMT(begin + draws, rate/12, remaining term)
 *           principal = payment - interest, capped at the balance on the
 *           final amortization payment
 *   ending = begin + draws + paydown - scheduled principal + capitalized
 *
 * A loan that capitalizes interest pays IO interest out of operating cash
 * as far as it reaches; the rest is added to the balance.
 *
 * Fees (origination + closing rates × principal) are charged once, in the
 * first period with a draw.
 *
 * Pure function — deterministic, no side effects.
 */

import { InvariantViolationError } from "@/lib/proforma/errors";
import { daysBetween } from "@/lib/proforma/calendar";
import { itemAt, seriesAt } from "@/lib/proforma/series";
import { accrueInterest, pmt, remainingAmortization } from "./amortization";
import { rateAt } from "./rateCurve";
import type { DebtContext, Loan, LoanPeriod, LoanSchedule, ScheduledAmount } from "./types";

const BALANCE_EPSILON = 1e-9;

function amountsByPeriod(entries: readonly ScheduledAmount[], periods: number): number[] {
  const out = new Array<number>(periods).fill(0);
  for (const e of entries) {
    if (e.period >= 0 && e.period < periods) out[e.period] += e.amount;
  }
  return out;
}

export function loanRateAt(loan: Loan, date: string, ctx: DebtContext): number {
  if (loan.rateMode === "fixed") {
    return loan.fixedRate ?? 0;
  }
  if (!ctx.rateCurve) {
    throw new InvariantViolationError(`Floating loan ${loan.id} has no rate curve`, { loanId: loan.id });
  }
  return rateAt(ctx.rateCurve, date) + (loan.spread ?? 0);
}

/** IO interest that operating cash leaves uncovered. */
function uncoveredInterest(interest: number, t: number, ctx: DebtContext): number {
  const cash = ctx.operatingCash ? seriesAt(ctx.operatingCash, t, "operatingCash") : 0;
  return interest - Math.min(Math.max(cash, 0), interest);
}

export function scheduleLoan(loan: Loan, ctx: DebtContext): LoanSchedule {
  const count = ctx.periodDates.length;
  const draws = amountsByPeriod(loan.drawSchedule ?? [{ period: 0, amount: loan.principal }], count);
  const paydowns = amountsByPeriod(loan.paydownSchedule ?? [], count);
  const feeTotal = (loan.originationFeeRate + loan.closingCostRate) * loan.principal;
  const feePeriod = draws.findIndex((d) => d > 0);

  const periods: LoanPeriod[] = [];
  let balance = 0;

  for (let t = 0; t < count; t++) {
    const date = itemAt(ctx.periodDates, t, "periodDates");
    const beginningBalance = balance;
    const drawn = draws[t];
    const paydown = paydowns[t] !== 0 ? -paydowns[t] : 0;
    const fees = t === feePeriod ? feeTotal : 0;

    let rate = 0;
    let interest = 0;
    let scheduledPrincipal = 0;
    let capitalizedInterest = 0;

    if (t > 0) {
      rate = loanRateAt(loan, date, ctx);
      const days = daysBetween(itemAt(ctx.periodDates, t - 1, "periodDates"), date);
      interest = accrueInterest(beginningBalance, drawn, rate, days);

      if (t > loan.interestOnlyMonths) {
        const remaining = remainingAmortization(t, loan.interestOnlyMonths, loan.amortizationMonths);
        if (remaining >= 1) {
          const payment = pmt(beginningBalance + drawn, rate / 12, remaining);
          scheduledPrincipal = payment - interest;
          if (remaining === 1) {
            scheduledPrincipal = Math.min(scheduledPrincipal, beginningBalance + drawn + paydown);
          }
        }
      } else if (loan.capitalizeInterest) {
        capitalizedInterest = uncoveredInterest(interest, t, ctx);
      }
    }

    const endingBalance = beginningBalance + drawn + paydown - scheduledPrincipal + capitalizedInterest;
    if (endingBalance < -BALANCE_EPSILON) {
      throw new InvariantViolationError(`Loan ${loan.id} balance is negative at period ${t}`, {
        loanId: loan.id,
        period: t,
        endingBalance,
      });
    }

    periods.push({
      period: t,
      date,
      beginningBalance,
      draws: drawn,
      rate,
      interest,
      scheduledPrincipal,
      paydown,
      debtService: interest + scheduledPrincipal,
      capitalizedInterest,
      fees,
      endingBalance,
    });
    balance = endingBalance;
  }

  return { loanId: loan.id, periods };
}
