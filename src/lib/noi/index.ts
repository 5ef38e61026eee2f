/**
 * NOI Aggregator — Public API
 */

export type { RevenuePolicy, NoiInputs, NoiPeriod, NoiProjection } from "./types";
export { aggregateNoi, aggregatePeriod } from "./aggregate";
