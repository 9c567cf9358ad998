import { z } from "zod";

export const StockCodeSchema = z
  .string()
  .trim()
  .min(1)
  .max(10)
  .regex(/^[0-9A-Za-z]+$/, "expected letters and digits only");

export const BaselineSchema = z.object({
  id: z.number().int().positive(),
  stockCode: StockCodeSchema,
  step: z.number().int().min(0),
  decisionPrice: z.number().int().nonnegative(),
  quantity: z.number().int().nonnegative(),
  lowPrice: z.number().int().nonnegative().nullable(),
  highPrice: z.number().int().nonnegative().nullable(),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1)
});
export type Baseline = z.infer<typeof BaselineSchema>;

export const BaselineCreateSchema = z.object({
  stockCode: StockCodeSchema,
  decisionPrice: z.number().int().positive(),
  quantity: z.number().int().positive(),
  lowPrice: z.number().int().positive().nullish(),
  highPrice: z.number().int().positive().nullish()
});
export type BaselineCreate = z.infer<typeof BaselineCreateSchema>;

export const BaselineUpdateSchema = BaselineCreateSchema.extend({
  step: z.number().int().min(0)
});
export type BaselineUpdate = z.infer<typeof BaselineUpdateSchema>;

export const BaselineSearchSchema = z.object({
  minLowPrice: z.coerce.number().int().positive().optional(),
  maxLowPrice: z.coerce.number().int().positive().optional(),
  minHighPrice: z.coerce.number().int().positive().optional(),
  maxHighPrice: z.coerce.number().int().positive().optional(),
  minDecisionPrice: z.coerce.number().int().positive().optional(),
  maxDecisionPrice: z.coerce.number().int().positive().optional()
});
export type BaselineSearch = z.infer<typeof BaselineSearchSchema>;

export const BaselineStoreSchema = z.object({
  nextId: z.number().int().positive(),
  baselines: z.array(BaselineSchema)
});
export type BaselineStore = z.infer<typeof BaselineStoreSchema>;

export function emptyBaselineStore(): BaselineStore {
  return { nextId: 1, baselines: [] };
}

export type BaselineWithRange = Baseline & { lowPrice: number; highPrice: number };

export function hasPriceRange(baseline: Baseline): baseline is BaselineWithRange {
  return baseline.lowPrice !== null && baseline.highPrice !== null;
}

export function baselineValue(baseline: Pick<Baseline, "decisionPrice" | "quantity">): number {
  return baseline.decisionPrice * baseline.quantity;
}

export function baselineSpread(baseline: Baseline): number | null {
  return hasPriceRange(baseline) ? baseline.highPrice - baseline.lowPrice : null;
}
