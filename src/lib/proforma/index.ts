/**
 * Pro Forma — Public API
 *
 * Monthly pro forma for a single commercial property: rent roll, expenses,
 * NOI, debt, exit, returns and the LP/GP waterfall.
 */

export type {
  ReturnsSummary,
  ProformaResult,
  ProformaFailure,
  ProformaRunResult,
  ProformaRunOptions,
} from "./types";
export type {
  MoneyUnit,
  ScenarioParameters,
  ScenarioPayload,
  ScenarioPayloadInput,
} from "./scenarioSchema";
export type { ProformaErrorKind, ProformaErrorCode, ValidationIssue } from "./errors";
export type { EngineLogger } from "./log";

export { runProforma, projectScenario, MONEY_DIVISOR } from "./runner";
export { validateScenario, checkScenarioRules, waterfallStructureOf } from "./validate";
export { ScenarioPayloadSchema } from "./scenarioSchema";
export {
  ProformaError,
  ValidationError,
  NumericError,
  ConvergenceError,
  DegenerateCashFlowError,
  DivideByZeroError,
  RateCurveRangeError,
  InvariantViolationError,
  isProformaError,
} from "./errors";
export { deterministicHash } from "./hashing";
export { createLogger } from "./log";
export * from "./parity";
