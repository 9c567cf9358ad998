import { describe, expect, it } from "vitest";

import { StockCodeSchema } from "./baseline";

describe("StockCodeSchema", () => {
  it("accepts alphanumeric codes and trims them", () => {
    expect(StockCodeSchema.parse(" 005930 ")).toBe("005930");
    expect(StockCodeSchema.parse("0000J0")).toBe("0000J0");
  });

  it("rejects punctuation, empty and overlong codes", () => {
    expect(StockCodeSchema.safeParse("__proto__").success).toBe(false);
    expect(StockCodeSchema.safeParse("A-1").success).toBe(false);
    expect(StockCodeSchema.safeParse("").success).toBe(false);
    expect(StockCodeSchema.safeParse("ABCDEFGHIJK").success).toBe(false);
  });
});
