/**
 * Operating Expense Projector — Management fee
 *
 * fee = rate × effective revenue, where
 *   effective = (1 - vacancy) × potential - collectionLoss × rental
 *
 * Under NNN the fee is itself reimbursed, so potential revenue contains the
 * fee. Left unresolved, the fee is taken on revenue before its own
 * reimbursement. Resolved, the fixed point has the closed form
 *   fee = rate × ((1 - v) × P0 - c × R) / (1 - rate × (1 - v))
 */

import type { ManagementFeeInputs } from "./types";

export function solveManagementFee(inputs: ManagementFeeInputs): number {
  const p = inputs.managementFeeRate;
  const occupied = 1 - inputs.vacancyRate;
  const base = occupied * inputs.potentialBeforeFee - inputs.collectionLossRate * inputs.rentalRevenue;

  if (!inputs.resolveCircularity || !inputs.feeReimbursed) {
    return p * base;
  }
  return (p * base) / (1 - p * occupied);
}
