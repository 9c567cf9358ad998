import { z } from "zod";

import { mean, percentOf } from "../numeric";
import { StockCodeSchema } from "./baseline";

const PriceListSchema = z.array(z.number().int().positive());

export const StepManagerSchema = z.object({
  id: z.number().int().positive(),
  code: StockCodeSchema,
  type: z.boolean(),
  market: z.string().min(1).max(10),
  finalPrice: z.number().int().nonnegative(),
  totalQty: z.number().int().nonnegative(),
  tradeQty: z.number().int().nonnegative(),
  tradeStep: z.number().int().nonnegative(),
  holdQty: z.number().int().nonnegative(),
  lastTradeTime: z.string().min(1).nullable(),
  lastTradePrices: PriceListSchema,
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1)
});
export type StepManager = z.infer<typeof StepManagerSchema>;

export const StepManagerCreateSchema = z.object({
  code: StockCodeSchema,
  type: z.boolean(),
  market: z.string().trim().min(1).max(10),
  finalPrice: z.number().int().positive(),
  totalQty: z.number().int().positive(),
  tradeQty: z.number().int().nonnegative().default(0),
  tradeStep: z.number().int().nonnegative().default(0),
  holdQty: z.number().int().nonnegative().optional(),
  lastTradeTime: z.string().datetime({ offset: true }).nullish(),
  lastTradePrices: PriceListSchema.default([])
});
export type StepManagerCreate = z.infer<typeof StepManagerCreateSchema>;

export const StepManagerUpdateSchema = z.object({
  finalPrice: z.number().int().positive().optional(),
  totalQty: z.number().int().positive().optional(),
  tradeQty: z.number().int().nonnegative().optional(),
  tradeStep: z.number().int().nonnegative().optional(),
  holdQty: z.number().int().nonnegative().optional(),
  lastTradeTime: z.string().datetime({ offset: true }).optional(),
  lastTradePrices: PriceListSchema.optional()
});
export type StepManagerUpdate = z.infer<typeof StepManagerUpdateSchema>;

export const StepManagerTradeUpdateSchema = z.object({
  tradeQty: z.number().int().nonnegative(),
  tradeStep: z.number().int().nonnegative(),
  tradePrice: z.number().int().positive()
});
export type StepManagerTradeUpdate = z.infer<typeof StepManagerTradeUpdateSchema>;

export const StepManagerPriceUpdateSchema = z.object({
  tradePrice: z.number().int().positive()
});
export type StepManagerPriceUpdate = z.infer<typeof StepManagerPriceUpdateSchema>;

export const BulkPriceItemSchema = z.object({
  code: StockCodeSchema,
  tradePrice: z.number().int().positive()
});
export type BulkPriceItem = z.infer<typeof BulkPriceItemSchema>;

export const StepManagerPriceSearchSchema = z.object({
  minPrice: z.coerce.number().int().nonnegative().optional(),
  maxPrice: z.coerce.number().int().nonnegative().optional(),
  minAvgPrice: z.coerce.number().nonnegative().optional(),
  maxAvgPrice: z.coerce.number().nonnegative().optional()
});
export type StepManagerPriceSearch = z.infer<typeof StepManagerPriceSearchSchema>;

export const StepManagerStoreSchema = z.object({
  nextId: z.number().int().positive(),
  managers: z.array(StepManagerSchema)
});
export type StepManagerStore = z.infer<typeof StepManagerStoreSchema>;

export function emptyStepManagerStore(): StepManagerStore {
  return { nextId: 1, managers: [] };
}

type Position = Pick<StepManager, "finalPrice" | "totalQty" | "tradeQty" | "holdQty" | "lastTradePrices">;

export function averageTradePrice(position: Pick<StepManager, "lastTradePrices">): number | null {
  return mean(position.lastTradePrices);
}

export function lastTradePrice(position: Pick<StepManager, "lastTradePrices">): number | null {
  return position.lastTradePrices.at(-1) ?? null;
}

export function totalValue(position: Position): number {
  return position.finalPrice * position.totalQty;
}

export function holdValue(position: Position): number {
  return position.finalPrice * position.holdQty;
}

export function tradeValue(position: Position): number {
  return position.finalPrice * position.tradeQty;
}

/** Unrealised P/L of the traded quantity against the most recent fill; null before the first fill. */
export function profitLoss(position: Position): number | null {
  const last = lastTradePrice(position);
  if (last === null) return null;
  return (position.finalPrice - last) * position.tradeQty;
}

export function remainingQty(position: Position): number {
  return position.totalQty - position.tradeQty;
}

export function isFullyTraded(position: Position): boolean {
  return position.tradeQty >= position.totalQty;
}

export function completionRate(position: Position): number {
  return percentOf(position.tradeQty, position.totalQty);
}

export type StepManagerView = StepManager & {
  averageTradePrice: number | null;
  lastTradePrice: number | null;
  totalValue: number;
  holdValue: number;
  tradeValue: number;
  profitLoss: number | null;
  remainingQty: number;
  isFullyTraded: boolean;
  completionRate: number;
};

export function toStepManagerView(manager: StepManager): StepManagerView {
  return {
    ...manager,
    averageTradePrice: averageTradePrice(manager),
    lastTradePrice: lastTradePrice(manager),
    totalValue: totalValue(manager),
    holdValue: holdValue(manager),
    tradeValue: tradeValue(manager),
    profitLoss: profitLoss(manager),
    remainingQty: remainingQty(manager),
    isFullyTraded: isFullyTraded(manager),
    completionRate: completionRate(manager)
  };
}
