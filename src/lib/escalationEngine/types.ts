/**
 * Escalation Engine — Types
 *
 * Multiplier series indexed by period (0..n). Period 0 is always 1.0.
 */

export interface RentEscalationOpts {
  /** Rate applies while period <= stabilizationMonth */
  stabilizationMonth?: number;
  /** Annual rate used once period > stabilizationMonth. Defaults to the base rate. */
  stabilizedRate?: number;
}

export interface PropertyTaxSeriesOpts {
  /** First period that carries tax. Earlier periods are zero. */
  startMonth: number;
}

export interface EscalationSeries {
  rent: number[];
  expense: number[];
  /** Monthly property tax amount (already scaled from the annual base) */
  propertyTax: number[];
}
