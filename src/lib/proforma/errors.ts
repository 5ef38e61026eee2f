/**
 * Pro Forma — Error Taxonomy
 *
 * Three kinds of failure:
 * - validation: bad payload, reported before any projection runs
 * - numeric: solver non-convergence, zero cap rate, rate-curve gaps
 * - invariant: negative balances or cash, fatal for the run
 *
 * Engines throw. The run boundary (runner.ts) converts validation and
 * numeric failures into a structured result and rethrows invariants.
 */

export type ProformaErrorKind = "validation" | "numeric" | "invariant";

export type ProformaErrorCode =
  | "INVALID_PAYLOAD"
  | "CONVERGENCE_FAILED"
  | "DEGENERATE_CASH_FLOWS"
  | "DIVIDE_BY_ZERO"
  | "RATE_CURVE_OUT_OF_RANGE"
  | "INVARIANT_VIOLATION";

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ProformaError extends Error {
  readonly kind: ProformaErrorKind;
  readonly code: ProformaErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    kind: ProformaErrorKind,
    code: ProformaErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export class ValidationError extends ProformaError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => `${i.path || "<root>"}: ${i.message}`).join("; ");
    super("validation", "INVALID_PAYLOAD", `Invalid scenario: ${summary}`, { issues });
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Numeric
// ---------------------------------------------------------------------------

export class NumericError extends ProformaError {
  constructor(code: ProformaErrorCode, message: string, details: Record<string, unknown> = {}) {
    super("numeric", code, message, details);
  }
}

export class ConvergenceError extends NumericError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONVERGENCE_FAILED", message, details);
  }
}

export class DegenerateCashFlowError extends NumericError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("DEGENERATE_CASH_FLOWS", message, details);
  }
}

export class DivideByZeroError extends NumericError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("DIVIDE_BY_ZERO", message, details);
  }
}

export class RateCurveRangeError extends NumericError {
  constructor(date: string, first: string, last: string) {
    super(
      "RATE_CURVE_OUT_OF_RANGE",
      `Rate curve has no rate for ${date} (curve covers ${first} to ${last})`,
      { date, first, last },
    );
  }
}

// ---------------------------------------------------------------------------
// Invariant
// ---------------------------------------------------------------------------

export class InvariantViolationError extends ProformaError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("invariant", "INVARIANT_VIOLATION", message, details);
  }
}

export function isProformaError(err: unknown): err is ProformaError {
  return err instanceof ProformaError;
}
