/**
 * Pro Forma — Payload schema
 *
 * Shape and range checks with defaults applied. Cross-field rules (area
 * sums, lease ordering, draw totals) live in validate.ts.
 */
import { z } from "zod";

import { isIsoDate } from "./calendar";

const IsoDate = z.string().refine(isIsoDate, { message: "Expected an ISO date (YYYY-MM-DD)" });
const Rate = z.number().finite();
const NonNegative = z.number().finite().nonnegative();
const Month = z.number().int().nonnegative();

export const MoneyUnitEnum = z.enum(["dollars", "thousands"]);

export const LeasingCostTermsSchema = z.object({
  tiAllowancePerArea: NonNegative,
  commissionRateYears1to5: NonNegative,
  commissionRateYears6Plus: NonNegative,
  newLeaseTermYears: z.number().int().positive(),
});

export const TenantSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  area: z.number().finite().positive(),
  inPlaceRent: NonNegative,
  marketRent: NonNegative,
  leaseStartMonth: Month.default(0),
  leaseEndMonth: Month,
  applyRolloverCosts: z.boolean().default(false),
  annualRentBump: Rate.optional(),
  freeRentMonths: Month.default(0),
  /** In-place free rent starts here when set (>= 1); 0 means none */
  freeRentStartMonth: Month.default(0),
  tiBuildoutMonths: Month.default(0),
  leasingCosts: LeasingCostTermsSchema.optional(),
});

export const ScheduledAmountSchema = z.object({
  period: Month,
  amount: z.number().finite().positive(),
});

export const LoanSchema = z.object({
  id: z.string().min(1),
  principal: NonNegative,
  rateMode: z.enum(["fixed", "floating"]),
  fixedRate: Rate.optional(),
  spread: Rate.optional(),
  interestOnlyMonths: Month.default(0),
  amortizationMonths: z.number().int().positive(),
  originationFeeRate: NonNegative.default(0),
  closingCostRate: NonNegative.default(0),
  drawSchedule: z.array(ScheduledAmountSchema).optional(),
  paydownSchedule: z.array(ScheduledAmountSchema).optional(),
  capitalizeInterest: z.boolean().default(false),
});

export const RateCurvePointSchema = z.object({
  date: IsoDate,
  rate: Rate,
});

export const ScenarioParametersSchema = z.object({
  acquisitionDate: IsoDate,
  holdPeriodMonths: z.number().int().positive(),
  purchasePrice: NonNegative,
  closingCosts: NonNegative.default(0),
  buildingArea: z.number().finite().positive(),
  vacancyRate: z.number().min(0).max(1).default(0),
  collectionLossRate: z.number().min(0).max(1).default(0),
  managementFeeRate: z.number().min(0).lt(1).default(0),
  fixedOpexPerArea: NonNegative.default(0),
  variableOpexPerArea: NonNegative.default(0),
  propertyTaxBase: NonNegative.default(0),
  propertyTaxGrowthRate: Rate.default(0),
  propertyTaxStartMonth: Month.default(1),
  capitalReservePerArea: NonNegative.default(0),
  exitCapRate: Rate,
  salesCostRate: z.number().min(0).lt(1).default(0),
  rentGrowthRate: Rate.default(0),
  stabilizedRentGrowthRate: Rate.optional(),
  expenseGrowthRate: Rate.default(0),
  stabilizationMonth: Month.optional(),
  parkingStalls: Month.default(0),
  parkingRatePerStall: NonNegative.default(0),
  parkingExpenseRate: z.number().min(0).max(1).default(0),
  storageUnits: Month.default(0),
  storageRatePerUnit: NonNegative.default(0),
  nnnLease: z.boolean().default(true),
  resolveCircularity: z.boolean().default(false),
  discountRate: Rate.optional(),
  moneyUnit: MoneyUnitEnum.default("dollars"),
});

export const DistributionSplitSchema = z.object({
  lpSplit: z.number().min(0).max(1),
  gpSplit: z.number().min(0).max(1),
  gpPromote: z.number().min(0).max(1).default(0),
});

export const WaterfallTierSchema = DistributionSplitSchema.extend({
  name: z.string().min(1),
  prefRate: Rate,
});

export const WaterfallSchema = z.object({
  tiers: z.array(WaterfallTierSchema).min(1),
  finalSplit: DistributionSplitSchema,
  prefConvention: z.enum(["annualRoot", "simple"]).default("annualRoot"),
});

export const EquitySchema = z.object({
  lpShare: z.number().min(0).max(1),
  gpShare: z.number().min(0).max(1),
});

export const ScenarioPayloadSchema = z.object({
  scenario: ScenarioParametersSchema,
  tenants: z.array(TenantSchema).min(1),
  loans: z.array(LoanSchema).default([]),
  rateCurve: z.array(RateCurvePointSchema).optional(),
  equity: EquitySchema.default({ lpShare: 0.9, gpShare: 0.1 }),
  waterfall: WaterfallSchema.optional(),
});

export type MoneyUnit = z.infer<typeof MoneyUnitEnum>;
export type ScenarioParameters = z.infer<typeof ScenarioParametersSchema>;
export type ScenarioPayload = z.infer<typeof ScenarioPayloadSchema>;
export type ScenarioPayloadInput = z.input<typeof ScenarioPayloadSchema>;
