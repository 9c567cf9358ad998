import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { BadRequestException, ConflictException, NotFoundException } from "@nestjs/common";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";

import type { ConfigService } from "../config/config.service";
import { CorruptDataFileError } from "../storage/json-file";
import { BaselineService } from "./baseline.service";

describe("BaselineService", () => {
  let dataDir: string;
  let service: BaselineService;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "baseline-"));
    const configService = { resolveDataFile: (fileName: string) => path.join(dataDir, fileName) };
    service = new BaselineService(configService as unknown as ConfigService);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("fails with a storage error when the baseline file is damaged", () => {
    fs.writeFileSync(path.join(dataDir, "baselines.json"), JSON.stringify({ nextId: 1, baselines: [{ id: 1 }] }), "utf-8");

    expect(() => service.getAll()).toThrow(CorruptDataFileError);
    expect(() => service.getAll()).not.toThrow(ZodError);
  });

  it("creates the first baseline at step 0 and rejects a second createNew", () => {
    const created = service.createNew({ stockCode: "005930", decisionPrice: 72000, quantity: 10 });
    expect(created).toMatchObject({ id: 1, step: 0, lowPrice: null, highPrice: null });
    expect(() => service.createNew({ stockCode: "005930", decisionPrice: 71000, quantity: 5 })).toThrow(ConflictException);
  });

  it("appends steps after the last one and persists them to disk", () => {
    service.addStep({ stockCode: "000660", decisionPrice: 180000, quantity: 3 });
    service.addStep({ stockCode: "000660", decisionPrice: 175000, quantity: 4 });
    const third = service.addStep({ stockCode: "000660", decisionPrice: 170000, quantity: 5 });

    expect(third.step).toBe(2);
    expect(service.getLastStep("000660")).toEqual({ stockCode: "000660", lastStep: 2 });
    expect(service.getLastStep("035420")).toEqual({ stockCode: "035420", lastStep: null });

    const raw = JSON.parse(fs.readFileSync(path.join(dataDir, "baselines.json"), "utf-8")) as { nextId: number };
    expect(raw.nextId).toBe(4);
  });

  it("updates, reads and deletes by step", () => {
    service.addStep({ stockCode: "005930", decisionPrice: 72000, quantity: 10 });
    service.addStep({ stockCode: "005930", decisionPrice: 70000, quantity: 10 });

    const updated = service.updateByStep({ stockCode: "005930", step: 1, decisionPrice: 69000, quantity: 12, lowPrice: 67000, highPrice: 71000 });
    expect(updated).toMatchObject({ decisionPrice: 69000, quantity: 12, lowPrice: 67000, highPrice: 71000 });
    expect(service.getByStep("005930", 1).quantity).toBe(12);

    expect(service.deleteLastStep("005930").step).toBe(1);
    expect(service.getLastBaseline("005930").step).toBe(0);
    expect(() => service.getByStep("005930", 1)).toThrow(NotFoundException);
    expect(() => service.updateByStep({ stockCode: "005930", step: 5, decisionPrice: 1, quantity: 1 })).toThrow(NotFoundException);
  });

  it("deletes by code and requires confirmation to delete everything", () => {
    service.addStep({ stockCode: "A", decisionPrice: 1000, quantity: 1 });
    service.addStep({ stockCode: "A", decisionPrice: 900, quantity: 1 });
    service.addStep({ stockCode: "B", decisionPrice: 2000, quantity: 1 });

    expect(service.deleteByCode("A")).toEqual({ stockCode: "A", deleted: 2 });
    expect(() => service.deleteByCode("A")).toThrow(NotFoundException);
    expect(() => service.deleteAll(false)).toThrow(BadRequestException);
    expect(service.deleteAll(true)).toEqual({ deletedStocks: 1, totalDeletedBaselines: 1 });
    expect(service.count()).toBe(0);
  });

  it("orders rows by code then step and summarizes step counts", () => {
    service.addStep({ stockCode: "B", decisionPrice: 2000, quantity: 1 });
    service.addStep({ stockCode: "A", decisionPrice: 1000, quantity: 1 });
    service.addStep({ stockCode: "A", decisionPrice: 900, quantity: 1 });

    expect(service.getAllOrdered().map((b) => `${b.stockCode}:${b.step}`)).toEqual(["A:0", "A:1", "B:0"]);
    expect(service.getStockCodes()).toEqual(["A", "B"]);
    expect(service.summary()).toEqual({
      totalBaselines: 3,
      uniqueStocks: 2,
      stockCodes: ["A", "B"],
      stockStepCounts: { B: 1, A: 2 },
      maxStepsPerStock: 2,
      minStepsPerStock: 1
    });
  });

  it("skips duplicates in bulk create", () => {
    const result = service.bulkCreate([
      { stockCode: "A", decisionPrice: 1000, quantity: 1 },
      { stockCode: "A", decisionPrice: 1100, quantity: 1 },
      { stockCode: "B", decisionPrice: 2000, quantity: 1 }
    ]);

    expect(result).toMatchObject({ totalRequested: 3, created: 2, skipped: 1, errors: 0, successRate: 66.67, errorDetails: null });
  });

  it("counts missing rows in bulk update", () => {
    service.createNew({ stockCode: "A", decisionPrice: 1000, quantity: 1 });
    const result = service.bulkUpdate([
      { stockCode: "A", step: 0, decisionPrice: 1200, quantity: 2 },
      { stockCode: "A", step: 3, decisionPrice: 1200, quantity: 2 }
    ]);

    expect(result).toMatchObject({ totalRequested: 2, updated: 1, notFound: 1, errors: 0, successRate: 50 });
  });

  it("validates the decision price against its predicted range", () => {
    expect(() =>
      service.createWithValidation({ stockCode: "A", decisionPrice: 80000, quantity: 1, lowPrice: 70000, highPrice: 75000 })
    ).toThrow(BadRequestException);
    expect(() =>
      service.createWithValidation({ stockCode: "A", decisionPrice: 60000, quantity: 1, lowPrice: 50000, highPrice: 90000 }, 0.1)
    ).toThrow(BadRequestException);

    const created = service.createWithValidation({ stockCode: "A", decisionPrice: 72000, quantity: 1, lowPrice: 70000, highPrice: 76000 });
    expect(created.step).toBe(0);
  });

  it("computes per-stock statistics and range risk", () => {
    service.addStep({ stockCode: "A", decisionPrice: 72000, quantity: 10, lowPrice: 70000, highPrice: 74000 });
    service.addStep({ stockCode: "A", decisionPrice: 80000, quantity: 5, lowPrice: 77000, highPrice: 83000 });
    service.addStep({ stockCode: "A", decisionPrice: 76000, quantity: 5 });

    expect(service.stockStats("A")).toMatchObject({
      totalSteps: 3,
      totalQuantity: 20,
      totalValue: 720000 + 400000 + 380000,
      averagePrice: 76000,
      minPrice: 72000,
      maxPrice: 80000,
      averageLowPrice: 73500,
      averageHighPrice: 78500,
      priceRangeDataCount: 2
    });

    expect(service.priceRangeAnalysis("A")).toMatchObject({
      priceRangeDataCount: 2,
      priceRangeSpread: 5000,
      priceAccuracyRatio: 1,
      riskAssessment: "MEDIUM_RISK",
      analysisDetails: { minSpread: 4000, maxSpread: 6000, avgSpread: 5000, spreadStd: 1000 }
    });
    expect(() => service.stockStats("Z")).toThrow(NotFoundException);
  });

  it("reports NO_DATA when no row has a full range", () => {
    service.addStep({ stockCode: "A", decisionPrice: 72000, quantity: 10, lowPrice: 70000 });
    expect(service.priceRangeAnalysis("A")).toMatchObject({ riskAssessment: "NO_DATA", priceRangeSpread: null, analysisDetails: null });
  });

  it("ranks stocks by average spread in the overall stats", () => {
    service.addStep({ stockCode: "A", decisionPrice: 10000, quantity: 1, lowPrice: 9000, highPrice: 11000 });
    service.addStep({ stockCode: "B", decisionPrice: 50000, quantity: 1, lowPrice: 45000, highPrice: 55000 });
    service.addStep({ stockCode: "C", decisionPrice: 30000, quantity: 1 });

    const stats = service.priceRangeStats();
    expect(stats.coveragePercentage).toBe(66.67);
    expect(stats.topVolatileStocks).toEqual([
      { stockCode: "B", avgSpread: 10000 },
      { stockCode: "A", avgSpread: 2000 }
    ]);
    expect(stats.overallStats).toMatchObject({ avgSpread: 6000, minDecisionPrice: 10000, maxDecisionPrice: 50000 });
  });

  it("filters by price bounds, excluding rows without the bounded price", () => {
    service.addStep({ stockCode: "A", decisionPrice: 10000, quantity: 1, lowPrice: 9000, highPrice: 11000 });
    service.addStep({ stockCode: "B", decisionPrice: 50000, quantity: 1, lowPrice: 45000, highPrice: 55000 });
    service.addStep({ stockCode: "C", decisionPrice: 30000, quantity: 1 });

    expect(service.search({ minLowPrice: 8000 }).map((b) => b.stockCode)).toEqual(["A", "B"]);
    expect(service.search({ maxDecisionPrice: 30000 }).map((b) => b.stockCode)).toEqual(["A", "C"]);
    expect(service.search({})).toHaveLength(3);
  });
});
