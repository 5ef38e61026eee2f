/**
 * Exit Valuation — Public API
 */

export type { ExitInputs, ExitValuation } from "./types";
export { valueAtExit, FORWARD_PERIODS } from "./valuation";
