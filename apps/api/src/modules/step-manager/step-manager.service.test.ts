import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { BadRequestException, ConflictException, NotFoundException } from "@nestjs/common";
import type { StepManagerCreate } from "@steptrade/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ConfigService } from "../config/config.service";
import { StepManagerService } from "./step-manager.service";

function createInput(code: string, overrides: Partial<StepManagerCreate> = {}): StepManagerCreate {
  return {
    code,
    type: true,
    market: "kospi",
    finalPrice: 70_000,
    totalQty: 100,
    tradeQty: 0,
    tradeStep: 0,
    lastTradePrices: [],
    ...overrides
  };
}

describe("StepManagerService", () => {
  let dataDir: string;
  let service: StepManagerService;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "step-manager-"));
    const configService = { resolveDataFile: (fileName: string) => path.join(dataDir, fileName) };
    service = new StepManagerService(configService as unknown as ConfigService);
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("derives holdQty on create and rejects duplicate codes", () => {
    const created = service.create(createInput("005930", { tradeQty: 30 }));

    expect(created).toMatchObject({ id: 1, holdQty: 70, lastTradeTime: null, lastTradePrices: [] });
    expect(() => service.create(createInput("005930"))).toThrow(ConflictException);
    expect(() => service.create(createInput("000660", { tradeQty: 200 }))).toThrow(BadRequestException);
  });

  it("moves the trade step with added and removed prices", () => {
    service.create(createInput("005930"));
    service.addTradePrice("005930", 72_000);
    const afterAdd = service.addTradePrice("005930", 68_000);
    expect(afterAdd).toMatchObject({ tradeStep: 2, lastTradePrices: [72_000, 68_000] });

    const afterDelete = service.deleteTradePrice("005930");
    expect(afterDelete).toMatchObject({ tradeStep: 1, lastTradePrices: [72_000] });

    service.resetTradePrices("005930");
    expect(() => service.deleteTradePrice("005930")).toThrow(NotFoundException);
    expect(service.getByCode("005930").tradeStep).toBe(0);
  });

  it("edits prices by index and resyncs the step", () => {
    service.create(createInput("005930", { lastTradePrices: [71_000, 70_000, 69_000], tradeStep: 3 }));

    expect(service.updateTradePriceByIndex("005930", 1, 70_500).lastTradePrices).toEqual([71_000, 70_500, 69_000]);
    expect(service.deleteTradePriceByIndex("005930", 0)).toMatchObject({ lastTradePrices: [70_500, 69_000], tradeStep: 2 });
    expect(() => service.deleteTradePriceByIndex("005930", 5)).toThrow(NotFoundException);

    service.updateByCode("005930", { tradeStep: 9 });
    expect(service.syncTradeStep("005930").tradeStep).toBe(2);
  });

  it("records a fill with updateTradeInfo", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-06-02T01:00:00.000Z"));
    service.create(createInput("005930"));

    const updated = service.updateTradeInfo("005930", { tradeQty: 40, tradeStep: 1, tradePrice: 71_000 });

    expect(updated).toMatchObject({
      tradeQty: 40,
      tradeStep: 1,
      holdQty: 60,
      lastTradePrices: [71_000],
      lastTradeTime: "2025-06-02T01:00:00.000Z"
    });
    expect(() => service.updateTradeInfo("005930", { tradeQty: 101, tradeStep: 2, tradePrice: 70_000 })).toThrow(BadRequestException);
  });

  it("changes only the provided fields on update", () => {
    service.create(createInput("005930"));
    const updated = service.updateByCode("005930", { finalPrice: 75_000 });
    expect(updated).toMatchObject({ finalPrice: 75_000, totalQty: 100, holdQty: 100 });
    expect(() => service.updateByCode("999999", { finalPrice: 1 })).toThrow(NotFoundException);
  });

  it("filters by market, type and position state", () => {
    service.create(createInput("A", { market: "kospi" }));
    service.create(createInput("B", { market: "kosdaq", type: false, tradeQty: 100 }));
    service.create(createInput("C", { market: "kosdaq" }));

    expect(service.getByMarket("kosdaq").map((m) => m.code)).toEqual(["B", "C"]);
    expect(service.getByMarket("all")).toHaveLength(3);
    expect(service.countByMarket()).toEqual({ kospi: 1, kosdaq: 2 });
    expect(service.countByType()).toEqual({ true: 2, false: 1 });
    expect(service.getFullyTraded().map((m) => m.code)).toEqual(["B"]);
    expect(service.getActivePositions().map((m) => m.code)).toEqual(["A", "C"]);
  });

  it("lists recent trades newest first", () => {
    service.create(createInput("A", { lastTradeTime: "2025-06-02T01:00:00.000Z" }));
    service.create(createInput("B"));
    service.create(createInput("C", { lastTradeTime: "2025-06-03T01:00:00.000Z" }));

    expect(service.recentTrades().map((m) => m.code)).toEqual(["C", "A"]);
    expect(service.recentTrades(1).map((m) => m.code)).toEqual(["C"]);
  });

  it("adds prices in bulk and reports unknown codes", () => {
    service.create(createInput("A"));
    const result = service.bulkAddPrices([
      { code: "A", tradePrice: 70_000 },
      { code: "Z", tradePrice: 70_000 }
    ]);

    expect(result).toMatchObject({ totalRequested: 2, success: 1, errors: 1, successRate: 50 });
    expect(result.errorDetails).toEqual(["Z: No step manager for Z."]);
  });

  it("requires at least two codes to compare", () => {
    expect(() => service.compareStocks(["A"])).toThrow(BadRequestException);
  });

  it("deletes one or every record", () => {
    service.create(createInput("A"));
    service.create(createInput("B"));

    expect(service.deleteByCode("A").code).toBe("A");
    expect(() => service.deleteByCode("A")).toThrow(NotFoundException);
    expect(service.deleteAll()).toEqual({ deleted: 1 });
    expect(service.getAllCodes()).toEqual([]);
  });
});
