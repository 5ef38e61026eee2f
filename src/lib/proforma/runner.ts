/**
 * Pro Forma — Run boundary
 *
 * validate → escalation → rent roll → expenses → NOI → debt → exit →
 * cash flows → returns → waterfall, in one forward pass.
 *
 * Validation and numeric failures come back as { ok: false, error }.
 * Invariant violations are fatal for the run and are rethrown.
 */

import { buildExpenseEscalation, buildRentEscalation } from "@/lib/escalationEngine";
import { projectRentRoll } from "@/lib/rentRoll";
import type { LeasingCostSeries } from "@/lib/rentRoll";
import { projectOperatingExpenses } from "@/lib/operatingExpenses";
import { aggregateNoi } from "@/lib/noi";
import { computeDebtSchedule, createRateCurve } from "@/lib/debtEngine";
import { FORWARD_PERIODS, valueAtExit } from "@/lib/exitValuation";
import { annualize, assembleCashFlows } from "@/lib/cashFlow";
import type { MonthlyRow } from "@/lib/cashFlow";
import {
  cashOnCash,
  equityMultiple,
  investedEquity,
  npv,
  profit,
  xirr,
} from "@/lib/returnsEngine";
import type { SolverOptions } from "@/lib/returnsEngine";
import { computePartnerReturns, runWaterfall } from "@/lib/waterfallEngine";
import { engineEnv } from "@/lib/env/engine";
import { buildPeriodDates } from "./calendar";
import { seriesAt } from "./series";
import { isProformaError } from "./errors";
import { deterministicHash } from "./hashing";
import { createLogger } from "./log";
import type { ScenarioPayload } from "./scenarioSchema";
import type {
  ProformaResult,
  ProformaRunOptions,
  ProformaRunResult,
  ReturnsSummary,
} from "./types";
import { validateScenario, waterfallStructureOf } from "./validate";

export const MONEY_DIVISOR = { dollars: 1, thousands: 1000 } as const;

function solverOptions(opts: ProformaRunOptions): SolverOptions {
  const env = engineEnv();
  return {
    guess: opts.solver?.guess ?? env.PROFORMA_IRR_GUESS,
    tolerance: opts.solver?.tolerance ?? env.PROFORMA_IRR_TOLERANCE,
    maxIterations: opts.solver?.maxIterations ?? env.PROFORMA_IRR_MAX_ITERATIONS,
  };
}

/** Operating levered cash: NOI less leasing costs and the debt service paid in cash. */
function operatingCash(rows: readonly MonthlyRow[]): number[] {
  return rows.map(
    (r) => r.noi - r.tenantImprovements - r.leasingCommissions - (r.debtService - r.capitalizedInterest),
  );
}

/** Property cash before debt for periods 0..hold: NOI less leasing costs. */
function cashBeforeDebt(noi: readonly number[], leasingCosts: LeasingCostSeries, hold: number): number[] {
  const cash: number[] = [];
  for (let t = 0; t <= hold; t++) {
    cash.push(
      seriesAt(noi, t, "noi") -
        seriesAt(leasingCosts.tenantImprovements, t, "tenantImprovements") -
        seriesAt(leasingCosts.leasingCommissions, t, "leasingCommissions"),
    );
  }
  return cash;
}

/**
 * Project a validated scenario. Throws on numeric and invariant failures.
 *
 * Pure function — deterministic, no side effects.
 */
export function projectScenario(payload: ScenarioPayload, solver: SolverOptions): ProformaResult {
  const { scenario } = payload;
  const hold = scenario.holdPeriodMonths;
  const lastPeriod = hold + FORWARD_PERIODS;
  const moneyDivisor = MONEY_DIVISOR[scenario.moneyUnit];

  // Escalation
  const rentEscalation = buildRentEscalation(scenario.rentGrowthRate, lastPeriod, {
    stabilizationMonth: scenario.stabilizationMonth,
    stabilizedRate: scenario.stabilizedRentGrowthRate,
  });
  const expenseEscalation = buildExpenseEscalation(scenario.expenseGrowthRate, lastPeriod);

  // Operations
  const rentRoll = projectRentRoll(
    payload.tenants,
    {
      parkingStalls: scenario.parkingStalls,
      parkingRatePerStall: scenario.parkingRatePerStall,
      storageUnits: scenario.storageUnits,
      storageRatePerUnit: scenario.storageRatePerUnit,
    },
    {
      lastPeriod,
      holdPeriodMonths: hold,
      rentGrowthRate: scenario.rentGrowthRate,
      rentEscalation,
      moneyDivisor,
    },
  );
  const expenses = projectOperatingExpenses(scenario, rentRoll.parkingIncome, {
    lastPeriod,
    expenseEscalation,
    moneyDivisor,
  });
  const operations = aggregateNoi({
    lastPeriod,
    rentRoll,
    expenses,
    policy: {
      managementFeeRate: scenario.managementFeeRate,
      vacancyRate: scenario.vacancyRate,
      collectionLossRate: scenario.collectionLossRate,
      nnnLease: scenario.nnnLease,
      resolveCircularity: scenario.resolveCircularity,
    },
  });

  // Debt
  const periodDates = buildPeriodDates(scenario.acquisitionDate, hold + 1);
  const debt = computeDebtSchedule(payload.loans, {
    periodDates,
    rateCurve: payload.rateCurve ? createRateCurve(payload.rateCurve) : undefined,
    operatingCash: cashBeforeDebt(operations.noi, rentRoll.leasingCosts, hold),
  });

  // Exit & cash flows
  const exit = valueAtExit(operations.noi, operations.capitalReserve, {
    exitPeriod: hold,
    exitCapRate: scenario.exitCapRate,
    salesCostRate: scenario.salesCostRate,
  });
  const table = assembleCashFlows({
    periodDates,
    holdPeriodMonths: hold,
    operations,
    leasingCosts: rentRoll.leasingCosts,
    exit,
    purchasePrice: scenario.purchasePrice,
    closingCosts: scenario.closingCosts,
    debt,
  });

  // Returns & waterfall
  const waterfall = runWaterfall(table.levered, waterfallStructureOf(payload));
  const partners = computePartnerReturns(waterfall, periodDates, solver);
  const invested = investedEquity(table.levered);

  const returns: ReturnsSummary = {
    unleveredIrr: xirr(table.unlevered, periodDates, solver),
    leveredIrr: xirr(table.levered, periodDates, solver),
    unleveredMultiple: equityMultiple(table.unlevered),
    leveredMultiple: equityMultiple(table.levered),
    unleveredProfit: profit(table.unlevered),
    leveredProfit: profit(table.levered),
    investedEquity: invested,
    npv: scenario.discountRate !== undefined ? npv(scenario.discountRate, table.unlevered) : null,
    cashOnCash: cashOnCash(operatingCash(table.rows), invested, hold),
    lpIrr: partners.lpIrr,
    gpIrr: partners.gpIrr,
    lpMultiple: partners.lpMultiple,
    gpMultiple: partners.gpMultiple,
  };

  const body = { rows: table.rows, annualRows: annualize(table.rows), exit, returns, waterfall, partners };
  return { ...body, fingerprint: deterministicHash(body) };
}

/**
 * Validate and run a scenario payload.
 */
export function runProforma(payload: unknown, opts: ProformaRunOptions = {}): ProformaRunResult {
  const log = opts.logger ?? createLogger("runner", opts.logLevel);

  try {
    const scenario = validateScenario(payload);
    log.debug("payload valid", {
      tenants: scenario.tenants.length,
      loans: scenario.loans.length,
      holdPeriodMonths: scenario.scenario.holdPeriodMonths,
    });

    const result = projectScenario(scenario, solverOptions(opts));
    log.info("run complete", {
      fingerprint: result.fingerprint,
      unleveredIrr: result.returns.unleveredIrr,
      leveredIrr: result.returns.leveredIrr,
    });
    return { ok: true, result };
  } catch (err) {
    if (isProformaError(err) && err.kind !== "invariant") {
      log.warn(`run failed: ${err.code}`, { message: err.message });
      return {
        ok: false,
        error: { kind: err.kind, code: err.code, message: err.message, details: err.details },
      };
    }
    log.error("run aborted", { error: err instanceof Error ? err.message : String(err) });
    throw err;
  }
}
