import { BadRequestException, ConflictException, Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import type {
  BulkPriceItem,
  StepManager,
  StepManagerCreate,
  StepManagerPriceSearch,
  StepManagerStore,
  StepManagerTradeUpdate,
  StepManagerUpdate
} from "@steptrade/shared";
import { StepManagerStoreSchema, emptyStepManagerStore, isFullyTraded, percentOf, round } from "@steptrade/shared";

import { ConfigService } from "../config/config.service";
import { readJsonFile, writeJsonFile } from "../storage/json-file";
import type {
  ComparisonReport,
  Performance,
  PortfolioSummary,
  RebalancingReport,
  RiskReport,
  StepStatistics,
  SummaryStatistics,
  TradeDetails,
  TradeHistorySummary,
  TypeDistribution
} from "./portfolio-analysis";
import {
  compareStocks,
  matchesPriceSearch,
  performance,
  portfolioSummary,
  rebalancingRecommendations,
  riskAnalysis,
  stepStatistics,
  summaryStatistics,
  tradeDetails,
  tradeHistorySummary
} from "./portfolio-analysis";

export const STEP_MANAGERS_FILE = "step-managers.json";
export const DEFAULT_RECENT_LIMIT = 10;

export type BulkPriceResult = {
  totalRequested: number;
  success: number;
  errors: number;
  successRate: number;
  errorDetails: string[] | null;
  message: string;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

@Injectable()
export class StepManagerService {
  private readonly logger = new Logger(StepManagerService.name);

  constructor(@Inject(ConfigService) private readonly configService: ConfigService) {}

  private get filePath(): string {
    return this.configService.resolveDataFile(STEP_MANAGERS_FILE);
  }

  private read(): StepManagerStore {
    return readJsonFile(this.filePath, StepManagerStoreSchema, emptyStepManagerStore);
  }

  private write(store: StepManagerStore): void {
    writeJsonFile(this.filePath, store);
  }

  /** Loads the store, applies `fn` to the record for `code`, stamps `updatedAt` and writes it back. */
  private mutate(code: string, fn: (manager: StepManager) => void): StepManager {
    const store = this.read();
    const manager = store.managers.find((m) => m.code === code);
    if (!manager) {
      throw new NotFoundException(`No step manager for ${code}.`);
    }
    fn(manager);
    manager.updatedAt = new Date().toISOString();
    this.write(store);
    return manager;
  }

  create(input: StepManagerCreate): StepManager {
    const store = this.read();
    if (store.managers.some((m) => m.code === input.code)) {
      throw new ConflictException(`Step manager already exists for ${input.code}.`);
    }
    if (input.tradeQty > input.totalQty) {
      throw new BadRequestException("tradeQty cannot exceed totalQty.");
    }
    const now = new Date().toISOString();
    const manager: StepManager = {
      id: store.nextId,
      code: input.code,
      type: input.type,
      market: input.market,
      finalPrice: input.finalPrice,
      totalQty: input.totalQty,
      tradeQty: input.tradeQty,
      tradeStep: input.tradeStep,
      holdQty: input.holdQty ?? input.totalQty - input.tradeQty,
      lastTradeTime: input.lastTradeTime ?? null,
      lastTradePrices: input.lastTradePrices,
      createdAt: now,
      updatedAt: now
    };
    store.managers.push(manager);
    store.nextId += 1;
    this.write(store);
    this.logger.log(`Created step manager ${manager.code} (${manager.market})`);
    return manager;
  }

  getByCode(code: string): StepManager {
    const manager = this.read().managers.find((m) => m.code === code);
    if (!manager) {
      throw new NotFoundException(`No step manager for ${code}.`);
    }
    return manager;
  }

  getAll(): StepManager[] {
    return this.read().managers;
  }

  getByMarket(market: string): StepManager[] {
    const managers = this.getAll();
    if (market.toLowerCase() === "all") return managers;
    return managers.filter((m) => m.market === market);
  }

  getByType(type: boolean): StepManager[] {
    return this.getAll().filter((m) => m.type === type);
  }

  getByTradeStep(tradeStep: number): StepManager[] {
    return this.getAll().filter((m) => m.tradeStep === tradeStep);
  }

  updateByCode(code: string, patch: StepManagerUpdate): StepManager {
    return this.mutate(code, (m) => {
      if (patch.finalPrice !== undefined) m.finalPrice = patch.finalPrice;
      if (patch.totalQty !== undefined) m.totalQty = patch.totalQty;
      if (patch.tradeQty !== undefined) m.tradeQty = patch.tradeQty;
      if (patch.tradeStep !== undefined) m.tradeStep = patch.tradeStep;
      if (patch.holdQty !== undefined) m.holdQty = patch.holdQty;
      if (patch.lastTradeTime !== undefined) m.lastTradeTime = patch.lastTradeTime;
      if (patch.lastTradePrices !== undefined) m.lastTradePrices = patch.lastTradePrices;
    });
  }

  updateTradeInfo(code: string, update: StepManagerTradeUpdate): StepManager {
    return this.mutate(code, (m) => {
      if (update.tradeQty > m.totalQty) {
        throw new BadRequestException(`tradeQty ${update.tradeQty} exceeds totalQty ${m.totalQty}.`);
      }
      m.tradeQty = update.tradeQty;
      m.tradeStep = update.tradeStep;
      m.holdQty = m.totalQty - update.tradeQty;
      m.lastTradePrices.push(update.tradePrice);
      m.lastTradeTime = new Date().toISOString();
    });
  }

  addTradePrice(code: string, tradePrice: number): StepManager {
    return this.mutate(code, (m) => {
      m.lastTradePrices.push(tradePrice);
      m.tradeStep += 1;
    });
  }

  deleteTradePrice(code: string): StepManager {
    return this.mutate(code, (m) => {
      if (m.lastTradePrices.length === 0) {
        throw new NotFoundException(`No trade price recorded for ${code}.`);
      }
      m.lastTradePrices.pop();
      m.tradeStep = Math.max(0, m.tradeStep - 1);
    });
  }

  private requireIndex(manager: StepManager, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= manager.lastTradePrices.length) {
      throw new NotFoundException(`Trade price index ${index} is out of range for ${manager.code}.`);
    }
  }

  deleteTradePriceByIndex(code: string, index: number): StepManager {
    return this.mutate(code, (m) => {
      this.requireIndex(m, index);
      m.lastTradePrices.splice(index, 1);
      m.tradeStep = m.lastTradePrices.length;
    });
  }

  updateTradePriceByIndex(code: string, index: number, tradePrice: number): StepManager {
    return this.mutate(code, (m) => {
      this.requireIndex(m, index);
      m.lastTradePrices[index] = tradePrice;
    });
  }

  syncTradeStep(code: string): StepManager {
    return this.mutate(code, (m) => {
      if (m.tradeStep !== m.lastTradePrices.length) {
        this.logger.warn(`Trade step of ${code} drifted: ${m.tradeStep} -> ${m.lastTradePrices.length}`);
      }
      m.tradeStep = m.lastTradePrices.length;
    });
  }

  resetTradePrices(code: string): StepManager {
    return this.mutate(code, (m) => {
      m.lastTradePrices = [];
      m.tradeStep = 0;
    });
  }

  deleteByCode(code: string): StepManager {
    const store = this.read();
    const index = store.managers.findIndex((m) => m.code === code);
    if (index < 0) {
      throw new NotFoundException(`No step manager for ${code}.`);
    }
    const [removed] = store.managers.splice(index, 1);
    this.write(store);
    this.logger.log(`Deleted step manager ${code}`);
    return removed;
  }

  deleteAll(): { deleted: number } {
    const store = this.read();
    const deleted = store.managers.length;
    this.write({ ...store, managers: [] });
    this.logger.warn(`Deleted all step managers (${deleted})`);
    return { deleted };
  }

  getAllCodes(): string[] {
    return this.getAll().map((m) => m.code);
  }

  getActivePositions(): StepManager[] {
    return this.getAll().filter((m) => m.holdQty > 0);
  }

  getFullyTraded(): StepManager[] {
    return this.getAll().filter(isFullyTraded);
  }

  countByMarket(): Record<string, number> {
    const counts = new Map<string, number>();
    for (const manager of this.getAll()) {
      counts.set(manager.market, (counts.get(manager.market) ?? 0) + 1);
    }
    return Object.fromEntries(counts);
  }

  countByType(): TypeDistribution {
    const managers = this.getAll();
    const trading = managers.filter((m) => m.type).length;
    return { true: trading, false: managers.length - trading };
  }

  recentTrades(limit = DEFAULT_RECENT_LIMIT): StepManager[] {
    return this.getAll()
      .filter((m): m is StepManager & { lastTradeTime: string } => m.lastTradeTime !== null)
      .sort((a, b) => Date.parse(b.lastTradeTime) - Date.parse(a.lastTradeTime))
      .slice(0, limit);
  }

  summaryStatistics(): SummaryStatistics {
    return summaryStatistics(this.getAll());
  }

  tradeHistorySummary(): TradeHistorySummary {
    return tradeHistorySummary(this.getAll());
  }

  tradeDetails(code: string): TradeDetails {
    return tradeDetails(this.getByCode(code));
  }

  performance(code: string): Performance {
    return performance(this.getByCode(code));
  }

  bulkAddPrices(items: BulkPriceItem[]): BulkPriceResult {
    let success = 0;
    const errorDetails: string[] = [];

    for (const item of items) {
      try {
        this.addTradePrice(item.code, item.tradePrice);
        success += 1;
      } catch (err) {
        const detail = `${item.code}: ${errorMessage(err)}`;
        errorDetails.push(detail);
        this.logger.error(detail);
      }
    }

    const errors = errorDetails.length;
    return {
      totalRequested: items.length,
      success,
      errors,
      successRate: round(percentOf(success, items.length), 2),
      errorDetails: errors > 0 ? errorDetails : null,
      message: `Bulk price add finished: ${success} succeeded, ${errors} failed`
    };
  }

  portfolioSummary(): PortfolioSummary {
    return portfolioSummary(this.getAll());
  }

  stepStatistics(): StepStatistics {
    return stepStatistics(this.getAll());
  }

  rebalancingRecommendations(): RebalancingReport {
    return rebalancingRecommendations(this.getAll());
  }

  compareStocks(codes: string[]): ComparisonReport {
    if (codes.length < 2) {
      throw new BadRequestException("Compare needs at least two stock codes.");
    }
    const byCode = new Map(this.getAll().map((m) => [m.code, m]));
    const found: StepManager[] = [];
    const notFound: string[] = [];
    for (const code of codes) {
      const manager = byCode.get(code);
      if (manager) found.push(manager);
      else notFound.push(code);
    }
    return compareStocks(found, notFound);
  }

  riskAnalysis(): RiskReport {
    return riskAnalysis(this.getAll());
  }

  searchByPriceRange(filters: StepManagerPriceSearch): StepManager[] {
    return this.getAll().filter((m) => matchesPriceSearch(m, filters));
  }
}
