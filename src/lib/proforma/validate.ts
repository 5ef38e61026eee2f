/**
 * Pro Forma — Payload validation
 *
 * Runs before any projection. Parses with zod, then checks the rules that
 * span fields. Every problem found is reported in one ValidationError.
 */

import type { z } from "zod";

import { validateStructure, DEFAULT_WATERFALL_STRUCTURE } from "@/lib/waterfallEngine";
import type { WaterfallStructure } from "@/lib/waterfallEngine";
import { ValidationError } from "./errors";
import type { ValidationIssue } from "./errors";
import { parseIsoDate } from "./calendar";
import { ScenarioPayloadSchema } from "./scenarioSchema";
import type { ScenarioPayload } from "./scenarioSchema";

const AREA_TOLERANCE = 1e-6;
const AMOUNT_TOLERANCE = 1e-6;

function zodIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

export function waterfallStructureOf(payload: ScenarioPayload): WaterfallStructure {
  const waterfall = payload.waterfall;
  return {
    lpShare: payload.equity.lpShare,
    gpShare: payload.equity.gpShare,
    tiers: waterfall ? waterfall.tiers : DEFAULT_WATERFALL_STRUCTURE.tiers,
    finalSplit: waterfall ? waterfall.finalSplit : DEFAULT_WATERFALL_STRUCTURE.finalSplit,
    prefConvention: waterfall ? waterfall.prefConvention : DEFAULT_WATERFALL_STRUCTURE.prefConvention,
  };
}

export function checkScenarioRules(payload: ScenarioPayload): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const { scenario, tenants, loans, rateCurve } = payload;
  const hold = scenario.holdPeriodMonths;

  // Tenants
  const totalArea = tenants.reduce((s, t) => s + t.area, 0);
  if (Math.abs(totalArea - scenario.buildingArea) > AREA_TOLERANCE * scenario.buildingArea) {
    issues.push({
      path: "tenants",
      message: `Tenant areas sum to ${totalArea}, building area is ${scenario.buildingArea}`,
    });
  }
  const tenantIds = new Set<string>();
  tenants.forEach((t, i) => {
    if (tenantIds.has(t.id)) issues.push({ path: `tenants.${i}.id`, message: `Duplicate tenant id ${t.id}` });
    tenantIds.add(t.id);
    if (t.leaseEndMonth < t.leaseStartMonth) {
      issues.push({ path: `tenants.${i}.leaseEndMonth`, message: "Lease ends before it starts" });
    }
  });

  // Loans
  const loanIds = new Set<string>();
  loans.forEach((loan, i) => {
    const at = `loans.${i}`;
    if (loanIds.has(loan.id)) issues.push({ path: `${at}.id`, message: `Duplicate loan id ${loan.id}` });
    loanIds.add(loan.id);

    if (loan.rateMode === "fixed" && loan.fixedRate === undefined) {
      issues.push({ path: `${at}.fixedRate`, message: "Fixed-rate loan needs fixedRate" });
    }
    if (loan.rateMode === "floating" && (!rateCurve || rateCurve.length === 0)) {
      issues.push({ path: `${at}.rateMode`, message: "Floating loan needs a rate curve" });
    }

    const draws = loan.drawSchedule;
    if (draws) {
      const drawn = draws.reduce((s, d) => s + d.amount, 0);
      if (Math.abs(drawn - loan.principal) > AMOUNT_TOLERANCE * Math.max(1, loan.principal)) {
        issues.push({ path: `${at}.drawSchedule`, message: `Draws total ${drawn}, principal is ${loan.principal}` });
      }
      draws.forEach((d, j) => {
        if (d.period > hold) {
          issues.push({ path: `${at}.drawSchedule.${j}.period`, message: "Draw after the hold period" });
        }
      });
    }
    (loan.paydownSchedule ?? []).forEach((p, j) => {
      if (p.period < 1 || p.period > hold) {
        issues.push({
          path: `${at}.paydownSchedule.${j}.period`,
          message: "Paydown must fall within periods 1 to the hold period",
        });
      }
    });
  });

  // Rate curve
  (rateCurve ?? []).forEach((point, i, points) => {
    if (i > 0 && parseIsoDate(point.date) <= parseIsoDate(points[i - 1].date)) {
      issues.push({ path: `rateCurve.${i}.date`, message: "Rate curve dates must be strictly increasing" });
    }
  });

  // Equity & waterfall
  issues.push(...validateStructure(waterfallStructureOf(payload)));

  return issues;
}

/** Parse and validate a raw payload. Throws ValidationError listing every issue. */
export function validateScenario(raw: unknown): ScenarioPayload {
  const parsed = ScenarioPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(zodIssues(parsed.error));
  }

  const issues = checkScenarioRules(parsed.data);
  if (issues.length > 0) throw new ValidationError(issues);
  return parsed.data;
}
