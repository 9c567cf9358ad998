import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Post, Put, Query } from "@nestjs/common";
import type { StepManagerView } from "@steptrade/shared";
import {
  BulkPriceItemSchema,
  StepManagerCreateSchema,
  StepManagerPriceSearchSchema,
  StepManagerPriceUpdateSchema,
  StepManagerTradeUpdateSchema,
  StepManagerUpdateSchema,
  StockCodeSchema,
  toStepManagerView
} from "@steptrade/shared";
import { z } from "zod";

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
import type { BulkPriceResult } from "./step-manager.service";
import { DEFAULT_RECENT_LIMIT, StepManagerService } from "./step-manager.service";

const IndexParamSchema = z.coerce.number().int().min(0);
const TradeStepParamSchema = z.coerce.number().int().min(0);
const TypeParamSchema = z.enum(["true", "false"]).transform((v) => v === "true");
const LimitSchema = z.coerce.number().int().min(1).max(100).default(DEFAULT_RECENT_LIMIT);
const CompareRequestSchema = z.array(StockCodeSchema);

@Controller("step-manager")
export class StepManagerController {
  constructor(@Inject(StepManagerService) private readonly stepManagerService: StepManagerService) {}

  @Post()
  create(@Body() body: unknown): StepManagerView {
    return toStepManagerView(this.stepManagerService.create(StepManagerCreateSchema.parse(body)));
  }

  @Get("all")
  getAll(): StepManagerView[] {
    return this.stepManagerService.getAll().map(toStepManagerView);
  }

  @Delete("all")
  deleteAll(): { deleted: number } {
    return this.stepManagerService.deleteAll();
  }

  @Get("codes")
  getAllCodes(): string[] {
    return this.stepManagerService.getAllCodes();
  }

  @Get("active")
  getActivePositions(): StepManagerView[] {
    return this.stepManagerService.getActivePositions().map(toStepManagerView);
  }

  @Get("fully-traded")
  getFullyTraded(): StepManagerView[] {
    return this.stepManagerService.getFullyTraded().map(toStepManagerView);
  }

  @Get("market/:market")
  getByMarket(@Param("market") market: string): StepManagerView[] {
    return this.stepManagerService.getByMarket(market).map(toStepManagerView);
  }

  @Get("count/market")
  countByMarket(): Record<string, number> {
    return this.stepManagerService.countByMarket();
  }

  @Get("count/type")
  countByType(): TypeDistribution {
    return this.stepManagerService.countByType();
  }

  @Get("type/:type")
  getByType(@Param("type") type: string): StepManagerView[] {
    return this.stepManagerService.getByType(TypeParamSchema.parse(type)).map(toStepManagerView);
  }

  @Get("trade-step/:step")
  getByTradeStep(@Param("step") step: string): StepManagerView[] {
    return this.stepManagerService.getByTradeStep(TradeStepParamSchema.parse(step)).map(toStepManagerView);
  }

  @Get("recent-trades")
  recentTrades(@Query("limit") limit?: string): StepManagerView[] {
    return this.stepManagerService.recentTrades(LimitSchema.parse(limit)).map(toStepManagerView);
  }

  @Get("summary")
  summaryStatistics(): SummaryStatistics {
    return this.stepManagerService.summaryStatistics();
  }

  @Get("trade-history-summary")
  tradeHistorySummary(): TradeHistorySummary {
    return this.stepManagerService.tradeHistorySummary();
  }

  @Get("portfolio-summary")
  portfolioSummary(): PortfolioSummary {
    return this.stepManagerService.portfolioSummary();
  }

  @Get("step-statistics")
  stepStatistics(): StepStatistics {
    return this.stepManagerService.stepStatistics();
  }

  @Get("rebalancing-recommendations")
  rebalancingRecommendations(): RebalancingReport {
    return this.stepManagerService.rebalancingRecommendations();
  }

  @Get("risk-analysis")
  riskAnalysis(): RiskReport {
    return this.stepManagerService.riskAnalysis();
  }

  @Get("search-by-price-range")
  searchByPriceRange(@Query() query: unknown): StepManagerView[] {
    return this.stepManagerService.searchByPriceRange(StepManagerPriceSearchSchema.parse(query)).map(toStepManagerView);
  }

  @Post("compare")
  @HttpCode(200)
  compareStocks(@Body() body: unknown): ComparisonReport {
    return this.stepManagerService.compareStocks(CompareRequestSchema.parse(body));
  }

  @Post("bulk-add-prices")
  @HttpCode(200)
  bulkAddPrices(@Body() body: unknown): BulkPriceResult {
    return this.stepManagerService.bulkAddPrices(z.array(BulkPriceItemSchema).parse(body));
  }

  @Get(":code")
  getByCode(@Param("code") code: string): StepManagerView {
    return toStepManagerView(this.stepManagerService.getByCode(StockCodeSchema.parse(code)));
  }

  @Put(":code")
  updateByCode(@Param("code") code: string, @Body() body: unknown): StepManagerView {
    return toStepManagerView(this.stepManagerService.updateByCode(StockCodeSchema.parse(code), StepManagerUpdateSchema.parse(body)));
  }

  @Delete(":code")
  deleteByCode(@Param("code") code: string): StepManagerView {
    return toStepManagerView(this.stepManagerService.deleteByCode(StockCodeSchema.parse(code)));
  }

  @Put(":code/trade")
  updateTradeInfo(@Param("code") code: string, @Body() body: unknown): StepManagerView {
    return toStepManagerView(this.stepManagerService.updateTradeInfo(StockCodeSchema.parse(code), StepManagerTradeUpdateSchema.parse(body)));
  }

  @Post(":code/prices")
  addTradePrice(@Param("code") code: string, @Body() body: unknown): StepManagerView {
    const { tradePrice } = StepManagerPriceUpdateSchema.parse(body);
    return toStepManagerView(this.stepManagerService.addTradePrice(StockCodeSchema.parse(code), tradePrice));
  }

  @Delete(":code/prices/last")
  deleteTradePrice(@Param("code") code: string): StepManagerView {
    return toStepManagerView(this.stepManagerService.deleteTradePrice(StockCodeSchema.parse(code)));
  }

  @Delete(":code/prices")
  resetTradePrices(@Param("code") code: string): StepManagerView {
    return toStepManagerView(this.stepManagerService.resetTradePrices(StockCodeSchema.parse(code)));
  }

  @Delete(":code/prices/:index")
  deleteTradePriceByIndex(@Param("code") code: string, @Param("index") index: string): StepManagerView {
    return toStepManagerView(this.stepManagerService.deleteTradePriceByIndex(StockCodeSchema.parse(code), IndexParamSchema.parse(index)));
  }

  @Put(":code/prices/:index")
  updateTradePriceByIndex(@Param("code") code: string, @Param("index") index: string, @Body() body: unknown): StepManagerView {
    const { tradePrice } = StepManagerPriceUpdateSchema.parse(body);
    return toStepManagerView(
      this.stepManagerService.updateTradePriceByIndex(StockCodeSchema.parse(code), IndexParamSchema.parse(index), tradePrice)
    );
  }

  @Post(":code/sync-step")
  @HttpCode(200)
  syncTradeStep(@Param("code") code: string): StepManagerView {
    return toStepManagerView(this.stepManagerService.syncTradeStep(StockCodeSchema.parse(code)));
  }

  @Get(":code/trade-details")
  tradeDetails(@Param("code") code: string): TradeDetails {
    return this.stepManagerService.tradeDetails(StockCodeSchema.parse(code));
  }

  @Get(":code/performance")
  performance(@Param("code") code: string): Performance {
    return this.stepManagerService.performance(StockCodeSchema.parse(code));
  }
}
