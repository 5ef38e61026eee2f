/**
 * Escalation Engine — Public API
 */

export type { RentEscalationOpts, PropertyTaxSeriesOpts, EscalationSeries } from "./types";

export {
  buildRentEscalation,
  buildExpenseEscalation,
  buildPropertyTaxSeries,
} from "./escalation";
