import { z } from "zod";

import { StockCodeSchema } from "./baseline";

export const MIN_CONDITION_NUM = 1;
export const MAX_CONDITION_NUM = 7;

export const ConditionDirectionSchema = z.enum(["up", "down"]);
export type ConditionDirection = z.infer<typeof ConditionDirectionSchema>;

export const ConditionValueSchema = z.union([z.number(), z.string(), z.boolean()]);
export type ConditionValue = z.infer<typeof ConditionValueSchema>;

export const ConditionEntrySchema = z.record(z.string().min(1), ConditionValueSchema);
export type ConditionEntry = z.infer<typeof ConditionEntrySchema>;

export const StockConditionsSchema = z.object({
  up: z.array(ConditionEntrySchema).default([]),
  down: z.array(ConditionEntrySchema).default([])
});
export type StockConditions = z.infer<typeof StockConditionsSchema>;

export const OrderConditionBookSchema = z.record(StockCodeSchema, StockConditionsSchema);
export type OrderConditionBook = z.infer<typeof OrderConditionBookSchema>;

export const ConditionNumSchema = z.coerce.number().int().min(MIN_CONDITION_NUM).max(MAX_CONDITION_NUM);

export const AddConditionRequestSchema = z.object({
  direction: ConditionDirectionSchema,
  conditionNum: ConditionNumSchema,
  price: z.number().int().positive(),
  extras: z.record(z.string().min(1), ConditionValueSchema).default({})
});
export type AddConditionRequest = z.infer<typeof AddConditionRequestSchema>;

export const AddConditionEntryRequestSchema = z.object({
  direction: ConditionDirectionSchema,
  condition: ConditionEntrySchema
});
export type AddConditionEntryRequest = z.infer<typeof AddConditionEntryRequestSchema>;

export const UpdateConditionRequestSchema = z.object({
  direction: ConditionDirectionSchema,
  key: z.string().min(1),
  value: ConditionValueSchema
});
export type UpdateConditionRequest = z.infer<typeof UpdateConditionRequestSchema>;

export function conditionKey(direction: ConditionDirection, conditionNum: number): string {
  return `${direction}${conditionNum}`;
}

export function validConditionKeys(direction: ConditionDirection): string[] {
  const keys: string[] = [];
  for (let n = MIN_CONDITION_NUM; n <= MAX_CONDITION_NUM; n += 1) {
    keys.push(conditionKey(direction, n));
  }
  return keys;
}

/** Condition number encoded in a key such as "up3"; null for metadata keys like "timestamp". */
export function parseConditionNum(direction: ConditionDirection, key: string): number | null {
  if (!key.startsWith(direction)) return null;
  const rest = key.slice(direction.length);
  if (!/^\d+$/.test(rest)) return null;
  const num = Number.parseInt(rest, 10);
  return num >= MIN_CONDITION_NUM && num <= MAX_CONDITION_NUM ? num : null;
}
