/**
 * Waterfall Engine — Public API
 */

export type {
  PrefConvention,
  DistributionSplit,
  WaterfallTier,
  WaterfallStructure,
  EquityClass,
  TierDistribution,
  WaterfallPeriod,
  UnpaidPref,
  WaterfallTotals,
  WaterfallResult,
  PartnerReturns,
} from "./types";

export { runWaterfall, allocateTiers, monthlyPrefRate, validateStructure } from "./engine";
export type { TierAllocation } from "./engine";
export { computePartnerReturns } from "./partnerReturns";
export { DEFAULT_WATERFALL_STRUCTURE, DEFAULT_WATERFALL_TIERS } from "./defaults";
