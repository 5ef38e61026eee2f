/**
 * Waterfall Engine — Types
 *
 * Multi-tier LP/GP distribution with compounding preferred return hurdles
 * and GP promote.
 */

export type PrefConvention = "annualRoot" | "simple";

export interface DistributionSplit {
  lpSplit: number;
  gpSplit: number;
  /** Promote to the GP on top of its pro rata split */
  gpPromote: number;
}

export interface WaterfallTier extends DistributionSplit {
  name: string;
  /** Annual pref rate that must be met before the next tier */
  prefRate: number;
}

export interface WaterfallStructure {
  /** Share of contributed equity funded by the LP */
  lpShare: number;
  gpShare: number;
  tiers: WaterfallTier[];
  finalSplit: DistributionSplit;
  prefConvention: PrefConvention;
}

export type EquityClass = "lp" | "gp";

export interface TierDistribution {
  tier: string;
  lp: number;
  gp: number;
  promote: number;
}

export interface WaterfallPeriod {
  period: number;
  leveredCashFlow: number;
  lpContribution: number;
  gpContribution: number;
  distributable: number;
  tiers: TierDistribution[];
  final: TierDistribution;
  /** LP distributions, all tiers */
  lpDistribution: number;
  /** GP distributions including promote, all tiers */
  gpDistribution: number;
  lpReturnOfCapital: number;
  gpReturnOfCapital: number;
  /** Distributions less contributions */
  lpCashFlow: number;
  gpCashFlow: number;
}

export interface UnpaidPref {
  tier: string;
  lp: number;
  gp: number;
}

export interface WaterfallTotals {
  lpContributed: number;
  gpContributed: number;
  lpDistributed: number;
  gpDistributed: number;
  promote: number;
  byTier: TierDistribution[];
}

export interface WaterfallResult {
  periods: WaterfallPeriod[];
  lpCashFlows: number[];
  gpCashFlows: number[];
  totals: WaterfallTotals;
  /** Accrued pref still owed at the end of the hold. Reported, not paid. */
  unpaidPref: UnpaidPref[];
}

/** Null where the class has nothing to measure (e.g. a GP with no equity) */
export interface PartnerReturns {
  lpIrr: number | null;
  gpIrr: number | null;
  lpMultiple: number | null;
  gpMultiple: number | null;
}
