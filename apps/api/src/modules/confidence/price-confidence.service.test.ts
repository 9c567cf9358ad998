import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { BadRequestException, NotFoundException } from "@nestjs/common";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { BaselineService } from "../baseline/baseline.service";
import type { ConfigService } from "../config/config.service";
import { OpenPriceStore } from "./open-price.store";
import { PriceConfidenceService } from "./price-confidence.service";

const HOUR_MS = 60 * 60 * 1000;

describe("PriceConfidenceService", () => {
  let dataDir: string;
  let baselines: BaselineService;
  let service: PriceConfidenceService;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-06-02T00:00:00.000Z"));
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "confidence-"));
    const configService = {
      load: () => ({ openPriceTtlHours: 12 }),
      resolveDataFile: (fileName: string) => path.join(dataDir, fileName)
    } as unknown as ConfigService;
    baselines = new BaselineService(configService);
    service = new PriceConfidenceService(new OpenPriceStore(configService), baselines);
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("keeps the first recorded open price", () => {
    const first = service.recordOpenPrice("005930", 75_000, 75_000, 72_000, 78_000);
    expect(first.isFirstRecord).toBe(true);
    expect(first.record).toMatchObject({ openPrice: 75_000, confidenceScore: 100, confidenceLevel: "VERY_HIGH", positionInRange: 0.5 });

    const second = service.recordOpenPrice("005930", 80_000, 75_000, 72_000, 78_000);
    expect(second.isFirstRecord).toBe(false);
    expect(second.record.openPrice).toBe(75_000);
  });

  it("keeps codes that match object property names apart", () => {
    expect(service.recordOpenPrice("toString", 75_000, 75_000, 72_000, 78_000).isFirstRecord).toBe(true);
    const again = service.recordOpenPrice("toString", 80_000, 75_000, 72_000, 78_000);
    expect(again.isFirstRecord).toBe(false);
    expect(again.record.openPrice).toBe(75_000);

    expect(() => service.getOpenPriceData("valueOf")).toThrow(NotFoundException);
    expect(service.clear("constructor")).toEqual({ stockCode: "constructor", cleared: false });
    expect(service.getAllConfidenceData().totalCount).toBe(1);
    expect(Object.keys(JSON.parse(fs.readFileSync(path.join(dataDir, "open-prices.json"), "utf-8")))).toEqual(["toString"]);
  });

  it("drops records once the TTL has passed", () => {
    service.recordOpenPrice("005930", 75_000, 75_000, 72_000, 78_000);

    vi.advanceTimersByTime(12 * HOUR_MS - 1);
    expect(service.getOpenPriceData("005930").openPrice).toBe(75_000);

    vi.advanceTimersByTime(1);
    expect(() => service.getOpenPriceData("005930")).toThrow(NotFoundException);
    expect(service.recordOpenPrice("005930", 76_000, 75_000, 72_000, 78_000).isFirstRecord).toBe(true);
  });

  it("takes the prediction from the step-0 baseline", () => {
    expect(() => service.recordFromBaseline("005930", 75_000)).toThrow(NotFoundException);

    baselines.createNew({ stockCode: "000660", decisionPrice: 180_000, quantity: 5 });
    expect(() => service.recordFromBaseline("000660", 181_000)).toThrow(BadRequestException);

    baselines.createNew({ stockCode: "005930", decisionPrice: 75_000, quantity: 10, lowPrice: 72_000, highPrice: 78_000 });
    const result = service.recordFromBaseline("005930", 75_000);
    expect(result.record).toMatchObject({ baselineDecisionPrice: 75_000, baselineLowPrice: 72_000, baselineHighPrice: 78_000 });
  });

  it("summarizes accuracy and elapsed time", () => {
    service.recordOpenPrice("005930", 76_500, 75_000, 72_000, 78_000);
    vi.advanceTimersByTime(90 * 60 * 1000);

    const summary = service.getConfidenceSummary("005930");
    expect(summary.priceRange).toEqual({ low: 72_000, high: 78_000, width: 6_000 });
    expect(summary.confidence).toEqual({ score: 75, level: "HIGH", positionInRange: 0.75 });
    expect(summary.analysis).toEqual({ predictionAccuracy: 98, priceDifference: 1_500, elapsedHours: 1.5 });
    expect(summary.interpretation).toBe(
      "The open sits at the upper-middle of the predicted range, so the prediction was fairly accurate; the signal is reliable."
    );
  });

  it("aggregates every live record by level", () => {
    service.recordOpenPrice("005930", 75_000, 75_000, 72_000, 78_000);
    service.recordOpenPrice("000660", 76_500, 75_000, 72_000, 78_000);

    const all = service.getAllConfidenceData();
    expect(all.totalCount).toBe(2);
    expect(all.statistics).toEqual({ VERY_HIGH: 1, HIGH: 1, MEDIUM: 0, LOW: 0, VERY_LOW: 0 });
    expect(all.averageConfidence).toBe(87.5);
  });

  it("clears a single record", () => {
    service.recordOpenPrice("005930", 75_000, 75_000, 72_000, 78_000);
    expect(service.clear("005930")).toEqual({ stockCode: "005930", cleared: true });
    expect(service.clear("005930")).toEqual({ stockCode: "005930", cleared: false });
  });
});
