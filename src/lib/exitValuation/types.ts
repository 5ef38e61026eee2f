/**
 * Exit Valuation — Types
 */

export interface ExitInputs {
  /** Exit period (the hold period end) */
  exitPeriod: number;
  exitCapRate: number;
  salesCostRate: number;
}

export interface ExitValuation {
  exitPeriod: number;
  /** NOI over the 12 periods after exit, reserves added back */
  forwardNoi: number;
  reserveAddBack: number;
  grossValue: number;
  salesCosts: number;
  netProceeds: number;
}
