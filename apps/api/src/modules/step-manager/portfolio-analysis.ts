import type { StepManager, StepManagerPriceSearch } from "@steptrade/shared";
import {
  averageTradePrice,
  completionRate,
  holdValue,
  isFullyTraded,
  mean,
  percentOf,
  profitLoss,
  round,
  sum,
  totalValue,
  tradeValue
} from "@steptrade/shared";

export type TypeDistribution = { true: number; false: number };
export type VolatilityRisk = "LOW" | "MEDIUM" | "HIGH" | "UNKNOWN";
export type Priority = "HIGH" | "MEDIUM" | "LOW";
export type RebalanceAction = "START_BUYING" | "INCREASE_POSITION" | "CONTINUE_BUYING" | "MONITOR" | "CONSIDER_SELLING" | "HOLD";

export type SummaryStatistics = {
  totalCount: number;
  marketDistribution: Record<string, number>;
  typeDistribution: TypeDistribution;
  averageFinalPrice: number;
  totalValue: number;
  totalHoldValue: number;
  activePositions: number;
  fullyTradedPositions: number;
  completionRate: number;
  averageTradePricesSummary: { count: number; min: number; max: number; average: number } | null;
};

export type PriceBuckets = { under_100k: number; "100k_500k": number; "500k_1m": number; over_1m: number };

export type TradeHistorySummary = {
  totalTrades: number;
  stepDistribution: Record<string, number>;
  priceRanges: PriceBuckets;
  managersWithTrades: number;
};

export type TradeDetails = {
  code: string;
  currentStep: number;
  totalTrades: number;
  tradePrices: number[];
  averageTradePrice: number | null;
  totalValue: number;
  holdValue: number;
  tradeValue: number;
  profitLoss: number | null;
  completionRate: number;
  isFullyTraded: boolean;
  lastTradeTime: string | null;
  stepDetails: Array<{ step: number; price: number; stepValue: number }>;
};

export type Performance = {
  code: string;
  currentPrice: number;
  averageBuyPrice: number | null;
  totalInvestment: number;
  currentValue: number;
  unrealizedPnl: number | null;
  totalQuantity: number;
  tradedQuantity: number;
  holdingQuantity: number;
  completionRate: number;
  returnRate: number;
  priceVolatility: number;
  volatilityRate: number;
  riskLevel: VolatilityRisk;
};

export type PortfolioSummary = {
  totalStocks: number;
  totalInvestment: number;
  totalCurrentValue: number;
  totalHoldValue: number;
  totalUnrealizedPnl: number;
  overallReturnRate: number;
  activePositions: number;
  completedPositions: number;
  completionRate: number;
  marketDistribution: Record<string, number>;
  typeDistribution: TypeDistribution;
  averagePositionSize: number;
};

export type StepStatistics = {
  stepDistribution: Record<string, { count: number; totalValue: number; averageValue: number; stocks: string[] }>;
  totalSteps: number;
  mostCommonStep: number | null;
  stepProgression: { step_0: number; step_1: number; step_2: number; step_3_plus: number };
};

export type Recommendation = {
  code: string;
  currentStep: number;
  completionRate: number;
  action: RebalanceAction;
  reason: string;
  priority: Priority;
};

export type RebalancingReport = {
  totalStocks: number;
  recommendations: Recommendation[];
  summary: {
    actionDistribution: Record<string, number>;
    priorityDistribution: Record<string, number>;
    highPriorityCount: number;
  };
};

export type StockComparison = {
  code: string;
  currentPrice: number;
  averageBuyPrice: number | null;
  tradeStep: number;
  completionRate: number;
  returnRate: number;
  tradeValue: number;
  holdValue: number;
  unrealizedPnl: number | null;
  market: string;
  type: boolean;
};

export type ComparisonReport = {
  comparedStocks: number;
  notFound: string[];
  comparisons: StockComparison[];
  analysis: {
    bestPerformer: { code: string; returnRate: number };
    worstPerformer: { code: string; returnRate: number };
    highestCompletion: { code: string; completionRate: number };
    mostValuable: { code: string; holdValue: number };
    averageReturnRate: number;
    averageCompletionRate: number;
  } | null;
};

export type RiskReport = {
  totalStocks: number;
  overallRiskLevel: VolatilityRisk;
  riskDistribution: Record<VolatilityRisk, number>;
  concentrationRisk: Record<string, number>;
  marketExposure: Record<string, number>;
  stepConcentration: Record<string, number>;
  recommendations: string[];
};

const CONCENTRATION_LIMIT_PCT = 20;
const DIP_FACTOR = 0.95;
const TAKE_PROFIT_FACTOR = 1.1;

function increment(counts: Record<string, number>, key: string | number): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function typeDistribution(managers: readonly StepManager[]): TypeDistribution {
  const out: TypeDistribution = { true: 0, false: 0 };
  for (const m of managers) {
    if (m.type) out.true += 1;
    else out.false += 1;
  }
  return out;
}

function marketDistribution(managers: readonly StepManager[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const m of managers) increment(out, m.market);
  return out;
}

function returnRate(manager: StepManager): number {
  const avg = averageTradePrice(manager);
  return avg ? ((manager.finalPrice - avg) / avg) * 100 : 0;
}

/** Spread of fill prices as a share of their mean; needs at least two fills. */
export function volatility(manager: StepManager): { priceVolatility: number; volatilityRate: number; riskLevel: VolatilityRisk } {
  const prices = manager.lastTradePrices;
  const avg = averageTradePrice(manager);
  if (prices.length < 2 || !avg) {
    return { priceVolatility: 0, volatilityRate: 0, riskLevel: "UNKNOWN" };
  }
  const priceVolatility = Math.max(...prices) - Math.min(...prices);
  const rate = (priceVolatility / avg) * 100;
  const riskLevel: VolatilityRisk = rate < 5 ? "LOW" : rate < 15 ? "MEDIUM" : "HIGH";
  return { priceVolatility, volatilityRate: round(rate, 2), riskLevel };
}

export function summaryStatistics(managers: readonly StepManager[]): SummaryStatistics {
  const averages = managers.map(averageTradePrice).filter((v): v is number => v !== null);
  const fullyTradedPositions = managers.filter(isFullyTraded).length;
  return {
    totalCount: managers.length,
    marketDistribution: marketDistribution(managers),
    typeDistribution: typeDistribution(managers),
    averageFinalPrice: managers.length > 0 ? Math.floor(sum(managers.map((m) => m.finalPrice)) / managers.length) : 0,
    totalValue: sum(managers.map(totalValue)),
    totalHoldValue: sum(managers.map(holdValue)),
    activePositions: managers.filter((m) => m.holdQty > 0).length,
    fullyTradedPositions,
    completionRate: round(percentOf(fullyTradedPositions, managers.length), 2),
    averageTradePricesSummary:
      averages.length > 0
        ? { count: averages.length, min: Math.min(...averages), max: Math.max(...averages), average: round(mean(averages) ?? 0, 2) }
        : null
  };
}

function priceBucket(price: number): keyof PriceBuckets {
  if (price < 100_000) return "under_100k";
  if (price < 500_000) return "100k_500k";
  if (price < 1_000_000) return "500k_1m";
  return "over_1m";
}

export function tradeHistorySummary(managers: readonly StepManager[]): TradeHistorySummary {
  const stepDistribution: Record<string, number> = {};
  const priceRanges: PriceBuckets = { under_100k: 0, "100k_500k": 0, "500k_1m": 0, over_1m: 0 };
  let totalTrades = 0;

  for (const m of managers) {
    totalTrades += m.lastTradePrices.length;
    increment(stepDistribution, m.tradeStep);
    for (const price of m.lastTradePrices) {
      priceRanges[priceBucket(price)] += 1;
    }
  }

  return {
    totalTrades,
    stepDistribution,
    priceRanges,
    managersWithTrades: managers.filter((m) => m.lastTradePrices.length > 0).length
  };
}

export function tradeDetails(manager: StepManager): TradeDetails {
  const prices = manager.lastTradePrices;
  const qtyPerFill = prices.length > 0 ? Math.floor(manager.tradeQty / prices.length) : 0;
  return {
    code: manager.code,
    currentStep: manager.tradeStep,
    totalTrades: prices.length,
    tradePrices: prices,
    averageTradePrice: averageTradePrice(manager),
    totalValue: totalValue(manager),
    holdValue: holdValue(manager),
    tradeValue: tradeValue(manager),
    profitLoss: profitLoss(manager),
    completionRate: completionRate(manager),
    isFullyTraded: isFullyTraded(manager),
    lastTradeTime: manager.lastTradeTime,
    stepDetails: prices.map((price, step) => ({ step, price, stepValue: price * qtyPerFill }))
  };
}

export function performance(manager: StepManager): Performance {
  return {
    code: manager.code,
    currentPrice: manager.finalPrice,
    averageBuyPrice: averageTradePrice(manager),
    totalInvestment: sum(manager.lastTradePrices),
    currentValue: holdValue(manager),
    unrealizedPnl: profitLoss(manager),
    totalQuantity: manager.totalQty,
    tradedQuantity: manager.tradeQty,
    holdingQuantity: manager.holdQty,
    completionRate: completionRate(manager),
    returnRate: round(returnRate(manager), 2),
    ...volatility(manager)
  };
}

export function portfolioSummary(managers: readonly StepManager[]): PortfolioSummary {
  let totalInvestment = 0;
  let totalCurrentValue = 0;
  let totalUnrealizedPnl = 0;

  for (const m of managers) {
    const avg = averageTradePrice(m);
    if (avg !== null) totalInvestment += avg * m.tradeQty;
    totalCurrentValue += tradeValue(m);
    totalUnrealizedPnl += profitLoss(m) ?? 0;
  }

  const completedPositions = managers.filter(isFullyTraded).length;
  return {
    totalStocks: managers.length,
    totalInvestment: round(totalInvestment, 2),
    totalCurrentValue,
    totalHoldValue: sum(managers.map(holdValue)),
    totalUnrealizedPnl: round(totalUnrealizedPnl, 2),
    overallReturnRate: totalInvestment > 0 ? round(((totalCurrentValue - totalInvestment) / totalInvestment) * 100, 2) : 0,
    activePositions: managers.filter((m) => m.holdQty > 0).length,
    completedPositions,
    completionRate: round(percentOf(completedPositions, managers.length), 2),
    marketDistribution: marketDistribution(managers),
    typeDistribution: typeDistribution(managers),
    averagePositionSize: managers.length > 0 ? round(totalCurrentValue / managers.length, 2) : 0
  };
}

export function stepStatistics(managers: readonly StepManager[]): StepStatistics {
  const stepDistribution: StepStatistics["stepDistribution"] = {};
  for (const m of managers) {
    const entry = (stepDistribution[m.tradeStep] ??= { count: 0, totalValue: 0, averageValue: 0, stocks: [] });
    entry.count += 1;
    entry.totalValue += tradeValue(m);
    entry.stocks.push(m.code);
  }

  let mostCommonStep: number | null = null;
  let mostCommonCount = 0;
  let stepThreePlus = 0;
  for (const [step, entry] of Object.entries(stepDistribution)) {
    entry.averageValue = round(entry.totalValue / entry.count, 2);
    if (entry.count > mostCommonCount) {
      mostCommonCount = entry.count;
      mostCommonStep = Number(step);
    }
    if (Number(step) >= 3) stepThreePlus += entry.count;
  }

  return {
    stepDistribution,
    totalSteps: Object.keys(stepDistribution).length,
    mostCommonStep,
    stepProgression: {
      step_0: stepDistribution[0]?.count ?? 0,
      step_1: stepDistribution[1]?.count ?? 0,
      step_2: stepDistribution[2]?.count ?? 0,
      step_3_plus: stepThreePlus
    }
  };
}

export function recommend(manager: StepManager): Recommendation {
  const rate = completionRate(manager);
  const avg = averageTradePrice(manager);
  const price = manager.finalPrice;
  const base = { code: manager.code, currentStep: manager.tradeStep, completionRate: round(rate, 2) };

  if (rate === 0) {
    return { ...base, action: "START_BUYING", reason: "Buying has not started yet.", priority: "HIGH" };
  }
  if (rate < 50) {
    if (avg !== null && price < avg * DIP_FACTOR) {
      return { ...base, action: "INCREASE_POSITION", reason: "Price is more than 5% below the average fill.", priority: "HIGH" };
    }
    return { ...base, action: "CONTINUE_BUYING", reason: "Continue the planned step buys.", priority: "MEDIUM" };
  }
  if (rate < 80) {
    return { ...base, action: "MONITOR", reason: "Most of the position is filled; watch the market.", priority: "LOW" };
  }
  if (rate >= 100 && avg !== null && price > avg * TAKE_PROFIT_FACTOR) {
    return { ...base, action: "CONSIDER_SELLING", reason: "Price is more than 10% above the average fill.", priority: "MEDIUM" };
  }
  return { ...base, action: "HOLD", reason: rate >= 100 ? "Position complete; hold." : "Final steps pending; hold.", priority: "LOW" };
}

const PRIORITY_RANK: Record<Priority, number> = { HIGH: 3, MEDIUM: 2, LOW: 1 };

export function rebalancingRecommendations(managers: readonly StepManager[]): RebalancingReport {
  const recommendations = managers.map(recommend).sort((a, b) => PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority]);
  const actionDistribution: Record<string, number> = {};
  const priorityDistribution: Record<string, number> = {};
  for (const r of recommendations) {
    increment(actionDistribution, r.action);
    increment(priorityDistribution, r.priority);
  }
  return {
    totalStocks: managers.length,
    recommendations,
    summary: {
      actionDistribution,
      priorityDistribution,
      highPriorityCount: priorityDistribution.HIGH ?? 0
    }
  };
}

function pickBy<T>(items: readonly T[], score: (item: T) => number, better: (a: number, b: number) => boolean): T {
  let best = items[0];
  for (const item of items) {
    if (better(score(item), score(best))) best = item;
  }
  return best;
}

export function compareStocks(managers: readonly StepManager[], notFound: string[]): ComparisonReport {
  const comparisons: StockComparison[] = managers.map((m) => ({
    code: m.code,
    currentPrice: m.finalPrice,
    averageBuyPrice: averageTradePrice(m),
    tradeStep: m.tradeStep,
    completionRate: round(completionRate(m), 2),
    returnRate: round(returnRate(m), 2),
    tradeValue: tradeValue(m),
    holdValue: holdValue(m),
    unrealizedPnl: profitLoss(m),
    market: m.market,
    type: m.type
  }));

  if (comparisons.length === 0) {
    return { comparedStocks: 0, notFound, comparisons, analysis: null };
  }

  const gt = (a: number, b: number): boolean => a > b;
  const lt = (a: number, b: number): boolean => a < b;
  const best = pickBy(comparisons, (c) => c.returnRate, gt);
  const worst = pickBy(comparisons, (c) => c.returnRate, lt);
  const highest = pickBy(comparisons, (c) => c.completionRate, gt);
  const valuable = pickBy(comparisons, (c) => c.holdValue, gt);

  return {
    comparedStocks: comparisons.length,
    notFound,
    comparisons,
    analysis: {
      bestPerformer: { code: best.code, returnRate: best.returnRate },
      worstPerformer: { code: worst.code, returnRate: worst.returnRate },
      highestCompletion: { code: highest.code, completionRate: highest.completionRate },
      mostValuable: { code: valuable.code, holdValue: valuable.holdValue },
      averageReturnRate: round(sum(comparisons.map((c) => c.returnRate)) / comparisons.length, 2),
      averageCompletionRate: round(sum(comparisons.map((c) => c.completionRate)) / comparisons.length, 2)
    }
  };
}

export function riskAnalysis(managers: readonly StepManager[]): RiskReport {
  const riskDistribution: Record<VolatilityRisk, number> = { LOW: 0, MEDIUM: 0, HIGH: 0, UNKNOWN: 0 };
  const concentrationRisk: Record<string, number> = {};
  const marketExposure: Record<string, number> = {};
  const stepConcentration: Record<string, number> = {};
  const recommendations: string[] = [];

  if (managers.length === 0) {
    return { totalStocks: 0, overallRiskLevel: "UNKNOWN", riskDistribution, concentrationRisk, marketExposure, stepConcentration, recommendations };
  }

  const portfolioHoldValue = sum(managers.map(holdValue));
  for (const m of managers) {
    riskDistribution[volatility(m).riskLevel] += 1;

    const concentration = percentOf(holdValue(m), portfolioHoldValue);
    if (concentration > CONCENTRATION_LIMIT_PCT) {
      concentrationRisk[m.code] = round(concentration, 1);
      recommendations.push(`${m.code} is ${concentration.toFixed(1)}% of hold value; consider diversifying.`);
    }

    increment(marketExposure, m.market);
    increment(stepConcentration, m.tradeStep);
  }

  const highRiskRatio = percentOf(riskDistribution.HIGH, managers.length);
  let overallRiskLevel: VolatilityRisk;
  if (highRiskRatio > 30) {
    overallRiskLevel = "HIGH";
    recommendations.push("High-volatility positions dominate the portfolio; tighten risk management.");
  } else if (highRiskRatio > 15) {
    overallRiskLevel = "MEDIUM";
    recommendations.push("Portfolio risk is moderate.");
  } else {
    overallRiskLevel = "LOW";
    recommendations.push("Portfolio is broadly stable.");
  }

  if (Object.keys(marketExposure).length === 1) {
    recommendations.push("All positions are in a single market; consider spreading across markets.");
  }

  return { totalStocks: managers.length, overallRiskLevel, riskDistribution, concentrationRisk, marketExposure, stepConcentration, recommendations };
}

export function matchesPriceSearch(manager: StepManager, filters: StepManagerPriceSearch): boolean {
  if (filters.minPrice !== undefined && manager.finalPrice < filters.minPrice) return false;
  if (filters.maxPrice !== undefined && manager.finalPrice > filters.maxPrice) return false;
  const avg = averageTradePrice(manager);
  if (filters.minAvgPrice !== undefined && (avg === null || avg < filters.minAvgPrice)) return false;
  if (filters.maxAvgPrice !== undefined && (avg === null || avg > filters.maxAvgPrice)) return false;
  return true;
}
