import { describe, expect, it } from "vitest";

import type { StepManager } from "./step-manager";
import { StepManagerCreateSchema, completionRate, isFullyTraded, profitLoss, toStepManagerView } from "./step-manager";

function manager(overrides: Partial<StepManager> = {}): StepManager {
  return {
    id: 1,
    code: "005930",
    type: true,
    market: "kospi",
    finalPrice: 75_000,
    totalQty: 100,
    tradeQty: 50,
    tradeStep: 2,
    holdQty: 50,
    lastTradeTime: null,
    lastTradePrices: [70_000, 72_000],
    createdAt: "2025-06-20T00:00:00.000Z",
    updatedAt: "2025-06-20T00:00:00.000Z",
    ...overrides
  };
}

describe("step-manager metrics", () => {
  it("derives values from the price list and quantities", () => {
    const view = toStepManagerView(manager());

    expect(view.averageTradePrice).toBe(71_000);
    expect(view.lastTradePrice).toBe(72_000);
    expect(view.totalValue).toBe(7_500_000);
    expect(view.holdValue).toBe(3_750_000);
    expect(view.tradeValue).toBe(3_750_000);
    expect(view.profitLoss).toBe(150_000);
    expect(view.remainingQty).toBe(50);
    expect(view.isFullyTraded).toBe(false);
    expect(view.completionRate).toBe(50);
  });

  it("has no average or P/L before the first fill", () => {
    const view = toStepManagerView(manager({ lastTradePrices: [], tradeQty: 0 }));
    expect(view.averageTradePrice).toBeNull();
    expect(profitLoss(manager({ lastTradePrices: [] }))).toBeNull();
  });

  it("treats a zero total quantity as zero completion", () => {
    expect(completionRate(manager({ totalQty: 0, tradeQty: 0 }))).toBe(0);
    expect(isFullyTraded(manager({ totalQty: 0, tradeQty: 0 }))).toBe(true);
  });
});

describe("StepManagerCreateSchema", () => {
  it("fills defaults", () => {
    const parsed = StepManagerCreateSchema.parse({ code: "005930", type: true, market: "kospi", finalPrice: 75_000, totalQty: 10 });
    expect(parsed.tradeQty).toBe(0);
    expect(parsed.tradeStep).toBe(0);
    expect(parsed.lastTradePrices).toEqual([]);
    expect(parsed.holdQty).toBeUndefined();
  });

  it("rejects non-positive prices", () => {
    expect(StepManagerCreateSchema.safeParse({ code: "005930", type: true, market: "kospi", finalPrice: 0, totalQty: 10 }).success).toBe(false);
  });
});
