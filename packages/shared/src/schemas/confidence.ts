import { z } from "zod";

import { round } from "../numeric";
import { StockCodeSchema } from "./baseline";

export const ConfidenceLevelSchema = z.enum(["VERY_HIGH", "HIGH", "MEDIUM", "LOW", "VERY_LOW"]);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;

export const OpenPriceRecordSchema = z.object({
  stockCode: StockCodeSchema,
  openPrice: z.number().int().positive(),
  baselineDecisionPrice: z.number().int().nonnegative(),
  baselineLowPrice: z.number().int().nonnegative(),
  baselineHighPrice: z.number().int().nonnegative(),
  recordedAt: z.string().min(1),
  confidenceScore: z.number().min(0).max(100),
  confidenceLevel: ConfidenceLevelSchema,
  positionInRange: z.number().min(0).max(1)
});
export type OpenPriceRecord = z.infer<typeof OpenPriceRecordSchema>;

export const OpenPriceEntrySchema = z.object({
  record: OpenPriceRecordSchema,
  expiresAt: z.string().min(1)
});
export type OpenPriceEntry = z.infer<typeof OpenPriceEntrySchema>;

export const OpenPriceStoreSchema = z.record(StockCodeSchema, OpenPriceEntrySchema);

export const OpenPriceRequestSchema = z.object({
  currentPrice: z.number().int().positive(),
  decisionPrice: z.number().int().positive().optional(),
  lowPrice: z.number().int().positive().optional(),
  highPrice: z.number().int().positive().optional()
});
export type OpenPriceRequest = z.infer<typeof OpenPriceRequestSchema>;

export type ConfidenceAnalysis = {
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  positionInRange: number;
  error?: string;
  priceDiff?: number;
  priceDiffRatio?: number;
  rangeDiffRatio?: number;
  details?: {
    openVsDecisionPct: number;
    distanceToLowPct: number;
    distanceToHighPct: number;
    rangeWidthPct: number;
  };
};

function invalidAnalysis(error: string): ConfidenceAnalysis {
  return { confidenceScore: 0, confidenceLevel: "VERY_LOW", positionInRange: 0.5, error };
}

function accuracyScore(priceDiffRatio: number): number {
  if (priceDiffRatio <= 1) return 100;
  if (priceDiffRatio <= 3) return 90 - (priceDiffRatio - 1) * 10;
  if (priceDiffRatio <= 5) return 70 - (priceDiffRatio - 3) * 15;
  if (priceDiffRatio <= 10) return 40 - (priceDiffRatio - 5) * 6;
  return Math.max(0, 10 - (priceDiffRatio - 10) * 0.5);
}

function rangeScore(rangeDiffRatio: number): number {
  if (rangeDiffRatio <= 50) return 100;
  if (rangeDiffRatio <= 100) return 80;
  if (rangeDiffRatio <= 200) return 60;
  return 40;
}

/**
 * Weighted 0..100 score: 50% prediction accuracy, 30% centrality of the open inside the
 * predicted range, 20% how the miss compares with the half-width of the range.
 */
export function calculateConfidenceScore(priceDiffRatio: number, rangeDiffRatio: number, positionInRange: number): number {
  const centerDistance = Math.abs(positionInRange - 0.5) * 2;
  const positionScore = (1 - centerDistance) * 100;
  const score = accuracyScore(priceDiffRatio) * 0.5 + positionScore * 0.3 + rangeScore(rangeDiffRatio) * 0.2;
  return Math.max(0, Math.min(100, score));
}

export function confidenceLevelFor(score: number): ConfidenceLevel {
  if (score >= 90) return "VERY_HIGH";
  if (score >= 70) return "HIGH";
  if (score >= 30) return "MEDIUM";
  if (score >= 10) return "LOW";
  return "VERY_LOW";
}

export function positionInRange(price: number, low: number, high: number): number {
  if (price <= low) return 0;
  if (price >= high) return 1;
  return (price - low) / (high - low);
}

export function analyzeConfidence(openPrice: number, decisionPrice: number, lowPrice: number, highPrice: number): ConfidenceAnalysis {
  const priceRange = highPrice - lowPrice;
  if (priceRange <= 0) {
    return invalidAnalysis("Invalid predicted price range");
  }
  if (decisionPrice <= 0 || lowPrice <= 0 || openPrice <= 0) {
    return invalidAnalysis("Prices must be positive");
  }

  const position = positionInRange(openPrice, lowPrice, highPrice);
  const priceDiff = Math.abs(openPrice - decisionPrice);
  const priceDiffRatio = (priceDiff / decisionPrice) * 100;
  const rangeDiffRatio = (priceDiff / (priceRange / 2)) * 100;
  const score = calculateConfidenceScore(priceDiffRatio, rangeDiffRatio, position);

  return {
    confidenceScore: round(score, 2),
    confidenceLevel: confidenceLevelFor(score),
    positionInRange: round(position, 3),
    priceDiff,
    priceDiffRatio: round(priceDiffRatio, 2),
    rangeDiffRatio: round(rangeDiffRatio, 2),
    details: {
      openVsDecisionPct: round(((openPrice - decisionPrice) / decisionPrice) * 100, 2),
      distanceToLowPct: round(((openPrice - lowPrice) / lowPrice) * 100, 2),
      distanceToHighPct: round(((highPrice - openPrice) / openPrice) * 100, 2),
      rangeWidthPct: round((priceRange / decisionPrice) * 100, 2)
    }
  };
}

function positionBand(position: number): string {
  if (position < 0.2) return "the bottom of the predicted range";
  if (position < 0.4) return "the lower-middle of the predicted range";
  if (position < 0.6) return "the middle of the predicted range";
  if (position < 0.8) return "the upper-middle of the predicted range";
  return "the top of the predicted range";
}

const LEVEL_MESSAGES: Record<ConfidenceLevel, string> = {
  VERY_HIGH: "the prediction was very accurate; strategies can rely on it.",
  HIGH: "the prediction was fairly accurate; the signal is reliable.",
  MEDIUM: "the prediction was average; confirm with other indicators before trading.",
  LOW: "the prediction was weak; trade with caution.",
  VERY_LOW: "the prediction missed; revisit the trading plan."
};

export function interpretConfidence(level: ConfidenceLevel, position: number): string {
  return `The open sits at ${positionBand(position)}, so ${LEVEL_MESSAGES[level]}`;
}
