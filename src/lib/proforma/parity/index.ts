/**
 * Pro Forma Parity — Public API
 */

export type {
  MetricKind,
  ParityVerdict,
  ParityMetricKey,
  ReferenceValues,
  ParityThresholds,
  MetricDiff,
  ParityReport,
} from "./types";
export { compareToReference, toleranceFor, PARITY_METRICS, PARITY_METRIC_KEYS } from "./parityCompare";
export { DEFAULT_THRESHOLDS, STRICT_THRESHOLDS } from "./thresholds";
