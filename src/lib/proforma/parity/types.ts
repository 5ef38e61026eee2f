/**
 * Pro Forma Parity — Types
 *
 * Comparison of a run against reference values from an external model.
 */

export type MetricKind = "rate" | "money";
export type ParityVerdict = "PASS" | "FAIL";

export type ParityMetricKey =
  | "unleveredIrr"
  | "leveredIrr"
  | "lpIrr"
  | "gpIrr"
  | "firstMonthNoi"
  | "lastMonthNoi"
  | "firstMonthInterest"
  | "forwardNoi"
  | "grossValue"
  | "exitProceeds"
  | "investedEquity"
  | "leveredProfit";

export type ReferenceValues = Partial<Record<ParityMetricKey, number>>;

export interface ParityThresholds {
  /** Absolute tolerance on rates (IRR) */
  rateAbsTolerance: number;
  /** Relative tolerance on money */
  moneyPctTolerance: number;
  /** Money tolerance never drops below this, in the run's unit */
  moneyAbsFloor: number;
}

export interface MetricDiff {
  metric: ParityMetricKey;
  kind: MetricKind;
  reference: number;
  /** Null when the run has no value for the metric; always a failure */
  actual: number | null;
  delta: number | null;
  /** delta / |reference|, null when the reference is zero */
  pctDelta: number | null;
  tolerance: number;
  withinTolerance: boolean;
}

export interface ParityReport {
  verdict: ParityVerdict;
  diffs: MetricDiff[];
  summary: {
    compared: number;
    failures: number;
    maxRateDelta?: number;
    maxMoneyPctDelta?: number;
  };
}
