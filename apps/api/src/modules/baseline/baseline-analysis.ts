import type { Baseline, BaselineCreate, BaselineSearch } from "@steptrade/shared";
import { baselineValue, hasPriceRange, mean, percentOf, round, sum } from "@steptrade/shared";

export type BaselineSummary = {
  totalBaselines: number;
  uniqueStocks: number;
  stockCodes: string[];
  stockStepCounts: Record<string, number>;
  maxStepsPerStock: number;
  minStepsPerStock: number;
};

export type BaselineStockStats = {
  stockCode: string;
  totalSteps: number;
  totalQuantity: number;
  totalValue: number;
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  averageLowPrice: number | null;
  averageHighPrice: number | null;
  priceRangeDataCount: number;
  steps: Array<Pick<Baseline, "step" | "decisionPrice" | "quantity" | "lowPrice" | "highPrice">>;
};

export type RangeRiskAssessment = "LOW_RISK" | "MEDIUM_RISK" | "HIGH_RISK" | "NO_DATA";

export type PriceRangeAnalysis = {
  stockCode: string;
  totalBaselines: number;
  priceRangeDataCount: number;
  priceRangeSpread: number | null;
  priceAccuracyRatio: number | null;
  riskAssessment: RangeRiskAssessment;
  recommendation: string;
  analysisDetails: {
    minSpread: number;
    maxSpread: number;
    avgSpread: number;
    spreadStd: number;
  } | null;
};

export type PriceRangeStats = {
  totalBaselines: number;
  priceRangeDataCount: number;
  coveragePercentage: number;
  overallStats: {
    avgSpread: number;
    minSpread: number;
    maxSpread: number;
    avgDecisionPrice: number;
    minDecisionPrice: number;
    maxDecisionPrice: number;
    avgLowPrice: number;
    avgHighPrice: number;
  } | null;
  stockCountWithPriceRange: number;
  topVolatileStocks: Array<{ stockCode: string; avgSpread: number }>;
};

const LOW_RISK_SPREAD = 5_000;
const MEDIUM_RISK_SPREAD = 15_000;
const TOP_VOLATILE_LIMIT = 10;

function groupByCode<T extends Baseline>(baselines: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const b of baselines) {
    const rows = groups.get(b.stockCode);
    if (rows) {
      rows.push(b);
    } else {
      groups.set(b.stockCode, [b]);
    }
  }
  return groups;
}

function roundOrNull(value: number | null, decimals: number): number | null {
  return value === null ? null : round(value, decimals);
}

export function summarizeBaselines(baselines: readonly Baseline[]): BaselineSummary {
  const groups = groupByCode(baselines);
  const stockStepCounts: Record<string, number> = {};
  for (const [code, rows] of groups) {
    stockStepCounts[code] = rows.length;
  }
  const counts = Object.values(stockStepCounts);
  return {
    totalBaselines: baselines.length,
    uniqueStocks: groups.size,
    stockCodes: [...groups.keys()].sort(),
    stockStepCounts,
    maxStepsPerStock: counts.length > 0 ? Math.max(...counts) : 0,
    minStepsPerStock: counts.length > 0 ? Math.min(...counts) : 0
  };
}

/** Expects the non-empty, step-ordered rows of one stock. */
export function buildStockStats(stockCode: string, rows: readonly Baseline[]): BaselineStockStats {
  const prices = rows.map((b) => b.decisionPrice);
  const ranged = rows.filter(hasPriceRange);
  return {
    stockCode,
    totalSteps: rows.length,
    totalQuantity: sum(rows.map((b) => b.quantity)),
    totalValue: sum(rows.map(baselineValue)),
    averagePrice: round(mean(prices) ?? 0, 2),
    minPrice: Math.min(...prices),
    maxPrice: Math.max(...prices),
    averageLowPrice: roundOrNull(mean(ranged.map((b) => b.lowPrice)), 2),
    averageHighPrice: roundOrNull(mean(ranged.map((b) => b.highPrice)), 2),
    priceRangeDataCount: ranged.length,
    steps: rows.map((b) => ({
      step: b.step,
      decisionPrice: b.decisionPrice,
      quantity: b.quantity,
      lowPrice: b.lowPrice,
      highPrice: b.highPrice
    }))
  };
}

function populationStd(values: readonly number[]): number {
  const avg = mean(values);
  if (avg === null || values.length < 2) return 0;
  const variance = sum(values.map((v) => (v - avg) ** 2)) / values.length;
  return Math.sqrt(variance);
}

export function analyzePriceRange(stockCode: string, rows: readonly Baseline[]): PriceRangeAnalysis {
  const ranged = rows.filter(hasPriceRange);
  if (ranged.length === 0) {
    return {
      stockCode,
      totalBaselines: rows.length,
      priceRangeDataCount: 0,
      priceRangeSpread: null,
      priceAccuracyRatio: null,
      riskAssessment: "NO_DATA",
      recommendation: "No predicted price range recorded; nothing to analyze.",
      analysisDetails: null
    };
  }

  const spreads = ranged.map((b) => b.highPrice - b.lowPrice);
  const avgSpread = sum(spreads) / spreads.length;
  const accuracyRatios = ranged.map((b) => b.decisionPrice / ((b.highPrice + b.lowPrice) / 2));

  let riskAssessment: RangeRiskAssessment;
  let recommendation: string;
  if (avgSpread < LOW_RISK_SPREAD) {
    riskAssessment = "LOW_RISK";
    recommendation = "Low price volatility; a steady position is feasible.";
  } else if (avgSpread < MEDIUM_RISK_SPREAD) {
    riskAssessment = "MEDIUM_RISK";
    recommendation = "Moderate price volatility; split the buy into steps.";
  } else {
    riskAssessment = "HIGH_RISK";
    recommendation = "High price volatility; approach with caution.";
  }

  return {
    stockCode,
    totalBaselines: rows.length,
    priceRangeDataCount: ranged.length,
    priceRangeSpread: round(avgSpread, 2),
    priceAccuracyRatio: round(sum(accuracyRatios) / accuracyRatios.length, 4),
    riskAssessment,
    recommendation,
    analysisDetails: {
      minSpread: Math.min(...spreads),
      maxSpread: Math.max(...spreads),
      avgSpread: round(avgSpread, 2),
      spreadStd: round(populationStd(spreads), 2)
    }
  };
}

export function buildPriceRangeStats(baselines: readonly Baseline[]): PriceRangeStats {
  const ranged = baselines.filter(hasPriceRange);
  if (ranged.length === 0) {
    return {
      totalBaselines: baselines.length,
      priceRangeDataCount: 0,
      coveragePercentage: 0,
      overallStats: null,
      stockCountWithPriceRange: 0,
      topVolatileStocks: []
    };
  }

  const spreads = ranged.map((b) => b.highPrice - b.lowPrice);
  const decisionPrices = ranged.map((b) => b.decisionPrice);
  const perStock = [...groupByCode(ranged)].map(([stockCode, rows]) => ({
    stockCode,
    avgSpread: round(sum(rows.map((b) => b.highPrice - b.lowPrice)) / rows.length, 2)
  }));
  perStock.sort((a, b) => b.avgSpread - a.avgSpread);

  return {
    totalBaselines: baselines.length,
    priceRangeDataCount: ranged.length,
    coveragePercentage: round(percentOf(ranged.length, baselines.length), 2),
    overallStats: {
      avgSpread: round(sum(spreads) / spreads.length, 2),
      minSpread: Math.min(...spreads),
      maxSpread: Math.max(...spreads),
      avgDecisionPrice: round(sum(decisionPrices) / decisionPrices.length, 2),
      minDecisionPrice: Math.min(...decisionPrices),
      maxDecisionPrice: Math.max(...decisionPrices),
      avgLowPrice: round(sum(ranged.map((b) => b.lowPrice)) / ranged.length, 2),
      avgHighPrice: round(sum(ranged.map((b) => b.highPrice)) / ranged.length, 2)
    },
    stockCountWithPriceRange: perStock.length,
    topVolatileStocks: perStock.slice(0, TOP_VOLATILE_LIMIT)
  };
}

export function matchesSearch(baseline: Baseline, filters: BaselineSearch): boolean {
  const { lowPrice, highPrice, decisionPrice } = baseline;
  if (filters.minLowPrice !== undefined && (lowPrice === null || lowPrice < filters.minLowPrice)) return false;
  if (filters.maxLowPrice !== undefined && (lowPrice === null || lowPrice > filters.maxLowPrice)) return false;
  if (filters.minHighPrice !== undefined && (highPrice === null || highPrice < filters.minHighPrice)) return false;
  if (filters.maxHighPrice !== undefined && (highPrice === null || highPrice > filters.maxHighPrice)) return false;
  if (filters.minDecisionPrice !== undefined && decisionPrice < filters.minDecisionPrice) return false;
  if (filters.maxDecisionPrice !== undefined && decisionPrice > filters.maxDecisionPrice) return false;
  return true;
}

/** Reason the decision price is rejected against its own predicted range, or null when it passes. */
export function validateDecisionPrice(input: BaselineCreate, maxDeviation: number): string | null {
  const { decisionPrice, lowPrice, highPrice } = input;
  if (lowPrice == null || highPrice == null) return null;

  if (decisionPrice < lowPrice || decisionPrice > highPrice) {
    return `Decision price ${decisionPrice} is outside the predicted range [${lowPrice}, ${highPrice}].`;
  }

  const mid = (lowPrice + highPrice) / 2;
  const deviation = Math.abs(decisionPrice - mid) / mid;
  if (deviation > maxDeviation) {
    return `Decision price deviates ${(deviation * 100).toFixed(2)}% from the range midpoint; allowed ${(maxDeviation * 100).toFixed(2)}%.`;
  }
  return null;
}
