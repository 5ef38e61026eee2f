/**
 * Waterfall Engine — Tiered distribution
 *
 * Every tier keeps an equity account per class: [capital, accrued pref].
 * Each period, for every tier and class:
 *   1. pref accrues on (capital + pref) at the tier's monthly rate (t >= 1)
 *   2. contributions (negative levered cash, split lpShare / gpShare) add
 *      to capital
 * Then positive levered cash runs down the tiers in order. Tier k takes
 *   X = min(remaining, lpNeed_k / lpSplit_k)
 * where lpNeed_k is the LP's tier-k account less what the LP already got
 * this period at earlier tiers. X goes out as lpSplit / gpSplit / gpPromote.
 * Whatever is left after the last tier goes to the final split.
 *
 * A class's distributions at tiers <= j pay down its tier-j account,
 * capital first, then pref. Promote never pays down an account.
 *
 * Pure function — deterministic, no side effects.
 */

import { InvariantViolationError, ValidationError } from "@/lib/proforma/errors";
import type { ValidationIssue } from "@/lib/proforma/errors";
import { itemAt } from "@/lib/proforma/series";
import type {
  DistributionSplit,
  EquityClass,
  PrefConvention,
  TierDistribution,
  UnpaidPref,
  WaterfallPeriod,
  WaterfallResult,
  WaterfallStructure,
  WaterfallTier,
  WaterfallTotals,
} from "./types";

const EPSILON = 1e-9;
const SPLIT_TOLERANCE = 1e-6;
const CLASSES: readonly EquityClass[] = ["lp", "gp"];

interface EquityAccount {
  capital: number;
  pref: number;
}

type TierAccounts = Record<EquityClass, EquityAccount>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function monthlyPrefRate(annualRate: number, convention: PrefConvention): number {
  return convention === "simple" ? annualRate / 12 : Math.pow(1 + annualRate, 1 / 12) - 1;
}

function splitTotal(split: DistributionSplit): number {
  return split.lpSplit + split.gpSplit + split.gpPromote;
}

export function validateStructure(structure: WaterfallStructure): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (Math.abs(structure.lpShare + structure.gpShare - 1) > SPLIT_TOLERANCE) {
    issues.push({ path: "equity", message: "lpShare and gpShare must sum to 1" });
  }
  structure.tiers.forEach((tier, i) => {
    if (Math.abs(splitTotal(tier) - 1) > SPLIT_TOLERANCE) {
      issues.push({ path: `waterfall.tiers.${i}`, message: "Tier splits must sum to 1" });
    }
    if (!(tier.lpSplit > 0)) {
      issues.push({ path: `waterfall.tiers.${i}.lpSplit`, message: "Tier lpSplit must be positive" });
    }
  });
  if (Math.abs(splitTotal(structure.finalSplit) - 1) > SPLIT_TOLERANCE) {
    issues.push({ path: "waterfall.finalSplit", message: "Final splits must sum to 1" });
  }
  return issues;
}

function distribute(tier: string, amount: number, split: DistributionSplit): TierDistribution {
  return {
    tier,
    lp: amount * split.lpSplit,
    gp: amount * split.gpSplit,
    promote: amount * split.gpPromote,
  };
}

export interface TierAllocation {
  paid: TierDistribution[];
  /** Cash left for the final split */
  remaining: number;
}

/**
 * Run `available` cash down the tiers. `lpBalances[k]` is the LP's tier-k
 * account (capital + accrued pref) before this period's distributions.
 */
export function allocateTiers(
  available: number,
  tiers: readonly WaterfallTier[],
  lpBalances: readonly number[],
): TierAllocation {
  if (!(available >= 0)) {
    throw new InvariantViolationError("Cash available for distribution must be a non-negative number", {
      available,
    });
  }

  let remaining = available;
  const paid: TierDistribution[] = [];
  tiers.forEach((tier, k) => {
    const lpPaidEarlier = paid.reduce((s, p) => s + p.lp, 0);
    const lpNeed = Math.max(itemAt(lpBalances, k, "lpBalances") - lpPaidEarlier, 0);
    const amount = lpNeed > EPSILON ? Math.min(remaining, lpNeed / tier.lpSplit) : 0;
    paid.push(distribute(tier.name, amount, tier));
    remaining -= amount;
  });
  return { paid, remaining: Math.max(remaining, 0) };
}

/** Pay down capital first, then pref. */
function payDown(account: EquityAccount, amount: number): void {
  const toCapital = Math.min(amount, account.capital);
  account.capital -= toCapital;
  const toPref = Math.min(amount - toCapital, account.pref);
  account.pref -= toPref;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export function runWaterfall(
  leveredCashFlows: readonly number[],
  structure: WaterfallStructure,
): WaterfallResult {
  const issues = validateStructure(structure);
  if (issues.length > 0) throw new ValidationError(issues);

  const { tiers, finalSplit } = structure;
  const share: Record<EquityClass, number> = { lp: structure.lpShare, gp: structure.gpShare };
  const rates = tiers.map((t) => monthlyPrefRate(t.prefRate, structure.prefConvention));
  const accounts: TierAccounts[] = tiers.map(() => ({
    lp: { capital: 0, pref: 0 },
    gp: { capital: 0, pref: 0 },
  }));
  const unreturned: Record<EquityClass, number> = { lp: 0, gp: 0 };

  const periods: WaterfallPeriod[] = [];

  leveredCashFlows.forEach((cashFlow, t) => {
    const contributed = Math.max(-cashFlow, 0);
    const contribution: Record<EquityClass, number> = {
      lp: contributed * share.lp,
      gp: contributed * share.gp,
    };

    accounts.forEach((account, k) => {
      for (const cls of CLASSES) {
        const a = account[cls];
        if (t > 0) a.pref += (a.capital + a.pref) * rates[k];
        a.capital += contribution[cls];
      }
    });
    unreturned.lp += contribution.lp;
    unreturned.gp += contribution.gp;

    const distributable = Math.max(cashFlow, 0);
    const { paid, remaining } = allocateTiers(
      distributable,
      tiers,
      accounts.map((account) => account.lp.capital + account.lp.pref),
    );
    const final = distribute("Final", remaining, finalSplit);

    // Distributions at tiers <= k retire the tier-k account
    accounts.forEach((account, k) => {
      for (const cls of CLASSES) {
        const received = paid.slice(0, k + 1).reduce((s, p) => s + p[cls], 0);
        payDown(account[cls], received);
      }
    });

    const all = [...paid, final];
    const lpDistribution = all.reduce((s, p) => s + p.lp, 0);
    const gpPaid = all.reduce((s, p) => s + p.gp, 0);
    const gpDistribution = gpPaid + all.reduce((s, p) => s + p.promote, 0);

    const lpReturnOfCapital = Math.min(lpDistribution, unreturned.lp);
    const gpReturnOfCapital = Math.min(gpPaid, unreturned.gp);
    unreturned.lp -= lpReturnOfCapital;
    unreturned.gp -= gpReturnOfCapital;

    periods.push({
      period: t,
      leveredCashFlow: cashFlow,
      lpContribution: contribution.lp,
      gpContribution: contribution.gp,
      distributable,
      tiers: paid,
      final,
      lpDistribution,
      gpDistribution,
      lpReturnOfCapital,
      gpReturnOfCapital,
      lpCashFlow: lpDistribution - contribution.lp,
      gpCashFlow: gpDistribution - contribution.gp,
    });
  });

  return {
    periods,
    lpCashFlows: periods.map((p) => p.lpCashFlow),
    gpCashFlows: periods.map((p) => p.gpCashFlow),
    totals: summarizeTotals(periods, tiers.map((t) => t.name)),
    unpaidPref: accounts.map(
      (account, k): UnpaidPref => ({
        tier: tiers[k].name,
        lp: account.lp.pref,
        gp: account.gp.pref,
      }),
    ),
  };
}

function summarizeTotals(
  periods: readonly WaterfallPeriod[],
  tierNames: readonly string[],
): WaterfallTotals {
  const byTier: TierDistribution[] = [...tierNames, "Final"].map((tier) => ({
    tier,
    lp: 0,
    gp: 0,
    promote: 0,
  }));

  for (const p of periods) {
    [...p.tiers, p.final].forEach((d, i) => {
      byTier[i].lp += d.lp;
      byTier[i].gp += d.gp;
      byTier[i].promote += d.promote;
    });
  }

  const total = (pick: (p: WaterfallPeriod) => number) => periods.reduce((s, p) => s + pick(p), 0);
  return {
    lpContributed: total((p) => p.lpContribution),
    gpContributed: total((p) => p.gpContribution),
    lpDistributed: total((p) => p.lpDistribution),
    gpDistributed: total((p) => p.gpDistribution),
    promote: byTier.reduce((s, d) => s + d.promote, 0),
    byTier,
  };
}
