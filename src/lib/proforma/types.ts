/**
 * Pro Forma — Run types
 */

import type { AnnualRow, MonthlyRow } from "@/lib/cashFlow";
import type { ExitValuation } from "@/lib/exitValuation";
import type { CashOnCash, SolverOptions } from "@/lib/returnsEngine";
import type { PartnerReturns, WaterfallResult } from "@/lib/waterfallEngine";
import type { LogLevel } from "@/lib/env/engine";
import type { EngineLogger } from "./log";
import type { ProformaErrorCode, ProformaErrorKind } from "./errors";

export interface ReturnsSummary {
  unleveredIrr: number;
  leveredIrr: number;
  unleveredMultiple: number;
  leveredMultiple: number;
  unleveredProfit: number;
  leveredProfit: number;
  investedEquity: number;
  /** Unlevered NPV at the scenario discount rate, null without one */
  npv: number | null;
  cashOnCash: CashOnCash;
  /** Null when the class did not both contribute and receive cash */
  lpIrr: number | null;
  gpIrr: number | null;
  /** Null when the class contributed nothing */
  lpMultiple: number | null;
  gpMultiple: number | null;
}

export interface ProformaResult {
  rows: readonly MonthlyRow[];
  annualRows: readonly AnnualRow[];
  exit: ExitValuation;
  returns: ReturnsSummary;
  waterfall: WaterfallResult;
  partners: PartnerReturns;
  /** SHA-256 of the sorted-key JSON of everything above */
  fingerprint: string;
}

export interface ProformaFailure {
  kind: Exclude<ProformaErrorKind, "invariant">;
  code: ProformaErrorCode;
  message: string;
  details: Record<string, unknown>;
}

export type ProformaRunResult =
  | { ok: true; result: ProformaResult }
  | { ok: false; error: ProformaFailure };

export interface ProformaRunOptions {
  /** Overrides PROFORMA_IRR_* settings */
  solver?: Partial<SolverOptions>;
  /** Overrides PROFORMA_LOG_LEVEL */
  logLevel?: LogLevel;
  logger?: EngineLogger;
}
