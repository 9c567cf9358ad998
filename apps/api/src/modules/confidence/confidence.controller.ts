import { BadRequestException, Body, Controller, Delete, Get, Inject, Param, Post } from "@nestjs/common";
import type { ConfidenceAnalysis, OpenPriceRecord } from "@steptrade/shared";
import { OpenPriceRequestSchema, StockCodeSchema, analyzeConfidence } from "@steptrade/shared";
import { z } from "zod";

import type { AllConfidenceData, ConfidenceSummary, OpenPriceResult } from "./price-confidence.service";
import { PriceConfidenceService } from "./price-confidence.service";

const AnalyzeRequestSchema = z.object({
  openPrice: z.number().int().positive(),
  decisionPrice: z.number().int(),
  lowPrice: z.number().int(),
  highPrice: z.number().int()
});

@Controller("confidence")
export class ConfidenceController {
  constructor(@Inject(PriceConfidenceService) private readonly confidenceService: PriceConfidenceService) {}

  @Post("analyze")
  analyze(@Body() body: unknown): ConfidenceAnalysis {
    const req = AnalyzeRequestSchema.parse(body);
    return analyzeConfidence(req.openPrice, req.decisionPrice, req.lowPrice, req.highPrice);
  }

  @Get("all")
  getAll(): AllConfidenceData {
    return this.confidenceService.getAllConfidenceData();
  }

  @Post(":code/open-price")
  recordOpenPrice(@Param("code") code: string, @Body() body: unknown): OpenPriceResult {
    const stockCode = StockCodeSchema.parse(code);
    const req = OpenPriceRequestSchema.parse(body);
    const { decisionPrice, lowPrice, highPrice } = req;

    if (decisionPrice === undefined && lowPrice === undefined && highPrice === undefined) {
      return this.confidenceService.recordFromBaseline(stockCode, req.currentPrice);
    }
    if (decisionPrice === undefined || lowPrice === undefined || highPrice === undefined) {
      throw new BadRequestException("Provide decisionPrice, lowPrice and highPrice together, or none to use the step-0 baseline.");
    }
    return this.confidenceService.recordOpenPrice(stockCode, req.currentPrice, decisionPrice, lowPrice, highPrice);
  }

  @Get(":code/open-price")
  getOpenPriceData(@Param("code") code: string): OpenPriceRecord {
    return this.confidenceService.getOpenPriceData(StockCodeSchema.parse(code));
  }

  @Get(":code/summary")
  getSummary(@Param("code") code: string): ConfidenceSummary {
    return this.confidenceService.getConfidenceSummary(StockCodeSchema.parse(code));
  }

  @Delete(":code")
  clear(@Param("code") code: string): { stockCode: string; cleared: boolean } {
    return this.confidenceService.clear(StockCodeSchema.parse(code));
  }
}
