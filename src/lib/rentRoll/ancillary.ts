/**
 * Rent Roll — Ancillary income and NNN reimbursements
 */

import { seriesAt } from "@/lib/proforma/series";
import type { AncillaryIncomeInputs, ReimbursementInputs, Reimbursements } from "./types";

export interface AncillaryIncome {
  parkingIncome: number[];
  storageIncome: number[];
}

/** Parking and storage scale a fixed monthly rate by rent escalation. Zero at period 0. */
export function projectAncillaryIncome(
  inputs: AncillaryIncomeInputs,
  rentEscalation: readonly number[],
  lastPeriod: number,
  moneyDivisor: number,
): AncillaryIncome {
  const parkingIncome: number[] = [];
  const storageIncome: number[] = [];

  for (let t = 0; t <= lastPeriod; t++) {
    if (t === 0) {
      parkingIncome.push(0);
      storageIncome.push(0);
      continue;
    }
    const factor = seriesAt(rentEscalation, t, "rentEscalation");
    parkingIncome.push((inputs.parkingStalls * inputs.parkingRatePerStall * factor) / moneyDivisor);
    storageIncome.push((inputs.storageUnits * inputs.storageRatePerUnit * factor) / moneyDivisor);
  }

  return { parkingIncome, storageIncome };
}

/**
 * NNN recovery.
 * Fixed: fixed opex + property tax.
 * Variable: variable opex + parking expense + management fee.
 */
export function computeReimbursements(inputs: ReimbursementInputs): Reimbursements {
  return {
    fixed: inputs.fixedOpex + inputs.propertyTax,
    variable: inputs.variableOpex + inputs.parkingExpense + inputs.managementFee,
  };
}
