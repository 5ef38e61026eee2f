/**
 * Pro Forma Parity — Thresholds
 */

import type { ParityThresholds } from "./types";

/**
 * Default thresholds: IRR within 30 bps, money within 0.1% or half a unit,
 * whichever is larger.
 */
export const DEFAULT_THRESHOLDS: ParityThresholds = {
  rateAbsTolerance: 0.003,
  moneyPctTolerance: 0.001,
  moneyAbsFloor: 0.5,
};

/** Exact reproduction, for regression against a stored run of this engine. */
export const STRICT_THRESHOLDS: ParityThresholds = {
  rateAbsTolerance: 1e-9,
  moneyPctTolerance: 0,
  moneyAbsFloor: 1e-6,
};
