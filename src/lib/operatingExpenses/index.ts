/**
 * Operating Expense Projector — Public API
 */

export type {
  OperatingExpenseInputs,
  OperatingExpenseContext,
  OperatingExpenseProjection,
  ManagementFeeInputs,
} from "./types";

export { projectOperatingExpenses } from "./projector";
export { solveManagementFee } from "./managementFee";
