import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Post, Put, Query } from "@nestjs/common";
import type { Baseline } from "@steptrade/shared";
import { BaselineCreateSchema, BaselineSearchSchema, BaselineUpdateSchema, StockCodeSchema } from "@steptrade/shared";
import { z } from "zod";

import type { BaselineStockStats, BaselineSummary, PriceRangeAnalysis, PriceRangeStats } from "./baseline-analysis";
import type { BulkCreateResult, BulkUpdateResult } from "./baseline.service";
import { BaselineService, DEFAULT_MAX_DEVIATION } from "./baseline.service";

const StepParamSchema = z.coerce.number().int().min(0);
const MaxDeviationSchema = z.coerce.number().positive().max(1).default(DEFAULT_MAX_DEVIATION);
const ConfirmSchema = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

@Controller("baseline")
export class BaselineController {
  constructor(@Inject(BaselineService) private readonly baselineService: BaselineService) {}

  @Post()
  create(@Body() body: unknown): Baseline {
    return this.baselineService.createNew(BaselineCreateSchema.parse(body));
  }

  @Post("add-step")
  addStep(@Body() body: unknown): Baseline {
    return this.baselineService.addStep(BaselineCreateSchema.parse(body));
  }

  @Post("create-with-validation")
  createWithValidation(@Body() body: unknown, @Query("maxDeviation") maxDeviation?: string): Baseline {
    return this.baselineService.createWithValidation(BaselineCreateSchema.parse(body), MaxDeviationSchema.parse(maxDeviation));
  }

  @Post("bulk-create")
  @HttpCode(200)
  bulkCreate(@Body() body: unknown): BulkCreateResult {
    return this.baselineService.bulkCreate(z.array(BaselineCreateSchema).parse(body));
  }

  @Put("update-by-step")
  updateByStep(@Body() body: unknown): Baseline {
    return this.baselineService.updateByStep(BaselineUpdateSchema.parse(body));
  }

  @Put("bulk-update")
  bulkUpdate(@Body() body: unknown): BulkUpdateResult {
    return this.baselineService.bulkUpdate(z.array(BaselineUpdateSchema).parse(body));
  }

  @Get("all")
  getAll(): Baseline[] {
    return this.baselineService.getAll();
  }

  @Get("all/ordered")
  getAllOrdered(): Baseline[] {
    return this.baselineService.getAllOrdered();
  }

  @Get("stock-codes")
  getStockCodes(): string[] {
    return this.baselineService.getStockCodes();
  }

  @Get("count")
  count(): { count: number } {
    return { count: this.baselineService.count() };
  }

  @Get("summary")
  summary(): BaselineSummary {
    return this.baselineService.summary();
  }

  @Get("price-range-stats")
  priceRangeStats(): PriceRangeStats {
    return this.baselineService.priceRangeStats();
  }

  @Get("search")
  search(@Query() query: unknown): Baseline[] {
    return this.baselineService.search(BaselineSearchSchema.parse(query));
  }

  @Delete()
  deleteAll(@Query("confirm") confirm?: string): { deletedStocks: number; totalDeletedBaselines: number } {
    return this.baselineService.deleteAll(ConfirmSchema.parse(confirm));
  }

  @Get(":code")
  getAllByCode(@Param("code") code: string): Baseline[] {
    return this.baselineService.getAllByCode(StockCodeSchema.parse(code));
  }

  @Get(":code/last-step")
  getLastStep(@Param("code") code: string): { stockCode: string; lastStep: number | null } {
    return this.baselineService.getLastStep(StockCodeSchema.parse(code));
  }

  @Get(":code/last")
  getLastBaseline(@Param("code") code: string): Baseline {
    return this.baselineService.getLastBaseline(StockCodeSchema.parse(code));
  }

  @Get(":code/stats")
  stockStats(@Param("code") code: string): BaselineStockStats {
    return this.baselineService.stockStats(StockCodeSchema.parse(code));
  }

  @Get(":code/price-range-analysis")
  priceRangeAnalysis(@Param("code") code: string): PriceRangeAnalysis {
    return this.baselineService.priceRangeAnalysis(StockCodeSchema.parse(code));
  }

  @Get(":code/step/:step")
  getByStep(@Param("code") code: string, @Param("step") step: string): Baseline {
    return this.baselineService.getByStep(StockCodeSchema.parse(code), StepParamSchema.parse(step));
  }

  @Delete(":code/step/:step")
  deleteByStep(@Param("code") code: string, @Param("step") step: string): Baseline {
    return this.baselineService.deleteByStep(StockCodeSchema.parse(code), StepParamSchema.parse(step));
  }

  @Delete(":code/last")
  deleteLastStep(@Param("code") code: string): Baseline {
    return this.baselineService.deleteLastStep(StockCodeSchema.parse(code));
  }

  @Delete(":code")
  deleteByCode(@Param("code") code: string): { stockCode: string; deleted: number } {
    return this.baselineService.deleteByCode(StockCodeSchema.parse(code));
  }
}
