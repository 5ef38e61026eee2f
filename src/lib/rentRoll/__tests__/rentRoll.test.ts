/**
 * Rent Roll — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { buildRentEscalation } from "@/lib/escalationEngine";
import {
  computeReimbursements,
  leaseCommission,
  projectAncillaryIncome,
  projectRentRoll,
  projectTenant,
  tenantMonth,
} from "../index";
import type { RentRollContext, Tenant } from "../types";

function close(actual: number, expected: number, tol = 1e-9) {
  assert.ok(Math.abs(actual - expected) < tol, `expected ${expected}, got ${actual}`);
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const FLAT = buildRentEscalation(0, 140);

/** Area 1200 at $100 in-place, $150 market: 10,000/mo in place, 15,000/mo at market. */
const ROLLOVER_TENANT: Tenant = {
  id: "t-roll",
  name: "Rollover Tenant",
  area: 1200,
  inPlaceRent: 100,
  marketRent: 150,
  leaseStartMonth: 0,
  leaseEndMonth: 50,
  applyRolloverCosts: true,
  freeRentMonths: 10,
  tiBuildoutMonths: 6,
};

const PLAIN_TENANT: Tenant = {
  ...ROLLOVER_TENANT,
  id: "t-plain",
  name: "Plain Tenant",
  applyRolloverCosts: false,
};

const CTX: RentRollContext = {
  lastPeriod: 132,
  holdPeriodMonths: 120,
  rentGrowthRate: 0,
  rentEscalation: FLAT,
  moneyDivisor: 1,
};

// ---------------------------------------------------------------------------
// Tenant timeline
// ---------------------------------------------------------------------------

describe("Tenant revenue timeline", () => {
  it("period 0 carries no revenue", () => {
    const m = tenantMonth(ROLLOVER_TENANT, 0, FLAT, FLAT, 1);
    assert.deepEqual(m, { grossRent: 0, freeRent: 0 });
  });

  it("pays in-place rent through the lease end", () => {
    const s = projectTenant(ROLLOVER_TENANT, CTX);
    close(s.grossRent[1], 10_000);
    close(s.grossRent[50], 10_000);
    assert.equal(s.freeRent[50], 0);
  });

  it("is zero through the buildout gap", () => {
    const s = projectTenant(ROLLOVER_TENANT, CTX);
    for (let t = 51; t <= 56; t++) {
      assert.equal(s.grossRent[t], 0, `period ${t}`);
      assert.equal(s.freeRent[t], 0, `period ${t}`);
    }
  });

  it("books market rent with an offsetting free-rent line after the gap", () => {
    const s = projectTenant(ROLLOVER_TENANT, CTX);
    for (let t = 57; t <= 66; t++) {
      close(s.grossRent[t], 15_000);
      close(s.freeRent[t], -15_000);
    }
    close(s.grossRent[67], 15_000);
    assert.equal(s.freeRent[67], 0);
  });

  it("without rollover costs moves straight to market with no free rent", () => {
    const s = projectTenant(PLAIN_TENANT, CTX);
    close(s.grossRent[51], 15_000);
    assert.ok(s.freeRent.every((v) => v === 0));
  });

  it("is zero before a later lease start", () => {
    const late: Tenant = { ...PLAIN_TENANT, leaseStartMonth: 4 };
    const s = projectTenant(late, CTX);
    assert.equal(s.grossRent[3], 0);
    close(s.grossRent[4], 10_000);
  });

  it("abates in-place rent over a free-rent window inside the lease", () => {
    const abated: Tenant = { ...PLAIN_TENANT, freeRentStartMonth: 3, freeRentMonths: 2 };
    const s = projectTenant(abated, CTX);
    assert.equal(s.freeRent[2], 0);
    close(s.grossRent[3], 10_000);
    close(s.freeRent[3], -10_000);
    close(s.freeRent[4], -10_000);
    assert.equal(s.freeRent[5], 0);
  });

  it("ends an in-place window at the lease end", () => {
    const late: Tenant = { ...PLAIN_TENANT, freeRentStartMonth: 49, freeRentMonths: 5 };
    const s = projectTenant(late, CTX);
    close(s.freeRent[49], -10_000);
    close(s.freeRent[50], -10_000);
    assert.equal(s.freeRent[51], 0);
    close(s.grossRent[51], 15_000);
  });

  it("keeps the rollover window alongside an in-place one", () => {
    const both: Tenant = { ...ROLLOVER_TENANT, freeRentStartMonth: 1 };
    const s = projectTenant(both, CTX);
    for (let t = 1; t <= 10; t++) close(s.freeRent[t], -10_000);
    assert.equal(s.freeRent[11], 0);
    close(s.freeRent[57], -15_000);
    close(s.freeRent[66], -15_000);
  });

  it("escalates in-place rent by the tenant bump and market rent by the scenario rate", () => {
    const bumped: Tenant = { ...PLAIN_TENANT, annualRentBump: 0.12 };
    const s = projectTenant(bumped, CTX);
    close(s.grossRent[1], 10_100);
    close(s.grossRent[2], 10_201);
    close(s.grossRent[51], 15_000);
  });

  it("divides by the money unit", () => {
    const s = projectTenant(PLAIN_TENANT, { ...CTX, moneyDivisor: 1000 });
    close(s.grossRent[1], 10);
  });
});

// ---------------------------------------------------------------------------
// Benchmark tenants, month 1 (thousands)
// ---------------------------------------------------------------------------

describe("Benchmark rent roll month 1", () => {
  const esc = buildRentEscalation(0.025, 132);
  const ctx: RentRollContext = { ...CTX, rentGrowthRate: 0.025, rentEscalation: esc, moneyDivisor: 1000 };
  const base = { ...PLAIN_TENANT, marketRent: 300, freeRentMonths: 10, tiBuildoutMonths: 6 };

  it("matches the expected in-place rents", () => {
    const rr = projectRentRoll(
      [
        { ...base, id: "a", area: 2300, inPlaceRent: 201.45, leaseEndMonth: 83, applyRolloverCosts: false },
        { ...base, id: "b", area: 1868, inPlaceRent: 200.47, leaseEndMonth: 50, applyRolloverCosts: true },
        { ...base, id: "c", area: 5950, inPlaceRent: 187.65, leaseEndMonth: 210, applyRolloverCosts: true },
      ],
      { parkingStalls: 0, parkingRatePerStall: 0, storageUnits: 0, storageRatePerUnit: 0 },
      ctx,
    );
    close(rr.tenants[0].grossRent[1], 38.69, 0.01);
    close(rr.tenants[1].grossRent[1], 31.27, 0.01);
    close(rr.tenants[2].grossRent[1], 93.24, 0.01);
    close(rr.grossRent[1], rr.tenants.reduce((s, t) => s + t.grossRent[1], 0), 1e-12);
  });
});

// ---------------------------------------------------------------------------
// Ancillary income & reimbursements
// ---------------------------------------------------------------------------

describe("Ancillary income", () => {
  it("scales stall and unit counts by rent escalation", () => {
    const esc = buildRentEscalation(0.12, 2);
    const { parkingIncome, storageIncome } = projectAncillaryIncome(
      { parkingStalls: 10, parkingRatePerStall: 100, storageUnits: 4, storageRatePerUnit: 50 },
      esc,
      2,
      1,
    );
    assert.deepEqual([parkingIncome[0], storageIncome[0]], [0, 0]);
    close(parkingIncome[1], 1010);
    close(storageIncome[2], 204.02);
  });
});

describe("NNN reimbursements", () => {
  it("split into fixed and variable recoveries", () => {
    const r = computeReimbursements({
      fixedOpex: 30,
      propertyTax: 50,
      variableOpex: 5,
      parkingExpense: 2,
      managementFee: 6,
    });
    assert.deepEqual(r, { fixed: 80, variable: 13 });
  });
});

// ---------------------------------------------------------------------------
// Leasing costs
// ---------------------------------------------------------------------------

describe("Leasing costs at rollover", () => {
  const terms = {
    tiAllowancePerArea: 20,
    commissionRateYears1to5: 0.06,
    commissionRateYears6Plus: 0.03,
    newLeaseTermYears: 7,
  };

  it("commission reduces year 1 by free months and drops the rate after year 5", () => {
    // year-1 rent 180,000 → 180,000 × 2/12 × 0.06 = 1,800
    // years 2-5: 4 × 180,000 × 0.06 = 43,200
    // years 6-7: 2 × 180,000 × 0.03 = 10,800
    const lc = leaseCommission(ROLLOVER_TENANT, terms, 0, 1);
    close(lc, 55_800, 1e-6);
  });

  it("books TI and commissions once in the rollover period", () => {
    const rr = projectRentRoll(
      [{ ...ROLLOVER_TENANT, leasingCosts: terms }],
      { parkingStalls: 0, parkingRatePerStall: 0, storageUnits: 0, storageRatePerUnit: 0 },
      CTX,
    );
    const { tenantImprovements, leasingCommissions } = rr.leasingCosts;
    close(tenantImprovements[51], 24_000);
    close(leasingCommissions[51], 55_800, 1e-6);
    assert.equal(tenantImprovements.reduce((s, v) => s + v, 0), 24_000);
  });

  it("skips tenants without rollover costs or rolling after the hold", () => {
    const rr = projectRentRoll(
      [
        { ...PLAIN_TENANT, leasingCosts: terms },
        { ...ROLLOVER_TENANT, id: "late", leaseEndMonth: 125, leasingCosts: terms },
      ],
      { parkingStalls: 0, parkingRatePerStall: 0, storageUnits: 0, storageRatePerUnit: 0 },
      CTX,
    );
    assert.ok(rr.leasingCosts.tenantImprovements.every((v) => v === 0));
    assert.ok(rr.leasingCosts.leasingCommissions.every((v) => v === 0));
  });
});
