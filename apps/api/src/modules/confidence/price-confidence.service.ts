import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import type { ConfidenceLevel, OpenPriceRecord } from "@steptrade/shared";
import { analyzeConfidence, hasPriceRange, interpretConfidence, mean, round } from "@steptrade/shared";

import { BaselineService } from "../baseline/baseline.service";
import { OpenPriceStore } from "./open-price.store";

export type OpenPriceResult = {
  isFirstRecord: boolean;
  record: OpenPriceRecord;
};

export type ConfidenceSummary = {
  stockCode: string;
  openPrice: number;
  predictedPrice: number;
  priceRange: { low: number; high: number; width: number };
  confidence: { score: number; level: ConfidenceLevel; positionInRange: number };
  analysis: { predictionAccuracy: number; priceDifference: number; elapsedHours: number };
  interpretation: string;
};

export type AllConfidenceData = {
  totalCount: number;
  stocks: Record<string, ConfidenceSummary>;
  statistics: Record<ConfidenceLevel, number>;
  averageConfidence: number;
};

const HOUR_MS = 60 * 60 * 1000;

function summarize(record: OpenPriceRecord, nowMs: number): ConfidenceSummary {
  const { openPrice, baselineDecisionPrice: decision, baselineLowPrice: low, baselineHighPrice: high } = record;
  const accuracy = decision > 0 ? (1 - Math.abs(openPrice - decision) / decision) * 100 : 0;
  return {
    stockCode: record.stockCode,
    openPrice,
    predictedPrice: decision,
    priceRange: { low, high, width: high - low },
    confidence: {
      score: record.confidenceScore,
      level: record.confidenceLevel,
      positionInRange: record.positionInRange
    },
    analysis: {
      predictionAccuracy: round(accuracy, 2),
      priceDifference: openPrice - decision,
      elapsedHours: round((nowMs - Date.parse(record.recordedAt)) / HOUR_MS, 1)
    },
    interpretation: interpretConfidence(record.confidenceLevel, record.positionInRange)
  };
}

@Injectable()
export class PriceConfidenceService {
  private readonly logger = new Logger(PriceConfidenceService.name);

  constructor(
    @Inject(OpenPriceStore) private readonly store: OpenPriceStore,
    @Inject(BaselineService) private readonly baselineService: BaselineService
  ) {}

  /** Keeps the first observed price of the day; later calls return the stored record untouched. */
  recordOpenPrice(stockCode: string, currentPrice: number, decisionPrice: number, lowPrice: number, highPrice: number): OpenPriceResult {
    const existing = this.store.get(stockCode);
    if (existing) {
      return { isFirstRecord: false, record: existing };
    }

    const analysis = analyzeConfidence(currentPrice, decisionPrice, lowPrice, highPrice);
    if (analysis.error) {
      this.logger.warn(`Open price for ${stockCode} scored without a usable prediction: ${analysis.error}`);
    }

    const record: OpenPriceRecord = {
      stockCode,
      openPrice: currentPrice,
      baselineDecisionPrice: decisionPrice,
      baselineLowPrice: lowPrice,
      baselineHighPrice: highPrice,
      recordedAt: new Date().toISOString(),
      confidenceScore: analysis.confidenceScore,
      confidenceLevel: analysis.confidenceLevel,
      positionInRange: analysis.positionInRange
    };
    this.store.set(record);
    this.logger.log(`Recorded open price ${currentPrice} for ${stockCode}: ${record.confidenceLevel} (${record.confidenceScore})`);
    return { isFirstRecord: true, record };
  }

  recordFromBaseline(stockCode: string, currentPrice: number): OpenPriceResult {
    const baseline = this.baselineService.findByStep(stockCode, 0);
    if (!baseline) {
      throw new NotFoundException(`No step-0 baseline for ${stockCode}.`);
    }
    if (!hasPriceRange(baseline)) {
      throw new BadRequestException(`Step-0 baseline of ${stockCode} has no predicted price range.`);
    }
    return this.recordOpenPrice(stockCode, currentPrice, baseline.decisionPrice, baseline.lowPrice, baseline.highPrice);
  }

  getOpenPriceData(stockCode: string): OpenPriceRecord {
    const record = this.store.get(stockCode);
    if (!record) {
      throw new NotFoundException(`No open price recorded for ${stockCode}.`);
    }
    return record;
  }

  getConfidenceSummary(stockCode: string): ConfidenceSummary {
    return summarize(this.getOpenPriceData(stockCode), Date.now());
  }

  getAllConfidenceData(): AllConfidenceData {
    const nowMs = Date.now();
    const statistics: Record<ConfidenceLevel, number> = { VERY_HIGH: 0, HIGH: 0, MEDIUM: 0, LOW: 0, VERY_LOW: 0 };
    const stocks: Record<string, ConfidenceSummary> = {};
    for (const record of this.store.getAll()) {
      stocks[record.stockCode] = summarize(record, nowMs);
      statistics[record.confidenceLevel] += 1;
    }
    const scores = Object.values(stocks).map((s) => s.confidence.score);
    return {
      totalCount: scores.length,
      stocks,
      statistics,
      averageConfidence: round(mean(scores) ?? 0, 2)
    };
  }

  clear(stockCode: string): { stockCode: string; cleared: boolean } {
    return { stockCode, cleared: this.store.delete(stockCode) };
  }
}
