/**
 * Cash Flow Assembler — Public API
 */

export type { CashFlowInputs, MonthlyRow, AnnualRow, CashFlowTable } from "./types";
export { assembleRow, assembleCashFlows } from "./assemble";
export { annualize, yearOf } from "./annualize";
