/**
 * Waterfall Engine — Default structure
 *
 * 90/10 LP/GP equity. Three 5% hurdles: pari passu to the first, then
 * 75 / 8.33 / 16.67 with promote above it and in the residual.
 */

import type { DistributionSplit, WaterfallStructure, WaterfallTier } from "./types";

const PROMOTED: DistributionSplit = { lpSplit: 0.75, gpSplit: 0.0833, gpPromote: 0.1667 };

export const DEFAULT_WATERFALL_TIERS: readonly WaterfallTier[] = [
  { name: "Tier 1", prefRate: 0.05, lpSplit: 0.9, gpSplit: 0.1, gpPromote: 0 },
  { name: "Tier 2", prefRate: 0.05, ...PROMOTED },
  { name: "Tier 3", prefRate: 0.05, ...PROMOTED },
];

export const DEFAULT_WATERFALL_STRUCTURE: WaterfallStructure = {
  lpShare: 0.9,
  gpShare: 0.1,
  tiers: DEFAULT_WATERFALL_TIERS.map((t) => ({ ...t })),
  finalSplit: { ...PROMOTED },
  prefConvention: "annualRoot",
};
