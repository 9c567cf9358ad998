import { Body, ConflictException, Controller, Delete, Get, Inject, NotFoundException, Param, Post, Put } from "@nestjs/common";
import type { ConditionEntry, OrderConditionBook, StockConditions } from "@steptrade/shared";
import {
  AddConditionEntryRequestSchema,
  AddConditionRequestSchema,
  ConditionDirectionSchema,
  ConditionNumSchema,
  StockCodeSchema,
  UpdateConditionRequestSchema
} from "@steptrade/shared";

import { OrderConditionService } from "./order-condition.service";

@Controller("order-conditions")
export class OrderConditionController {
  constructor(@Inject(OrderConditionService) private readonly orderConditions: OrderConditionService) {}

  @Get()
  getAll(): OrderConditionBook {
    return this.orderConditions.getAll();
  }

  @Post(":code")
  addStock(@Param("code") code: string): StockConditions {
    const stockCode = StockCodeSchema.parse(code);
    if (!this.orderConditions.addStock(stockCode)) {
      throw new ConflictException(`${stockCode} is already registered.`);
    }
    return this.requireStock(stockCode);
  }

  @Get(":code")
  getStockConditions(@Param("code") code: string): StockConditions {
    return this.requireStock(StockCodeSchema.parse(code));
  }

  @Delete(":code")
  deleteStock(@Param("code") code: string): { deleted: true } {
    const stockCode = StockCodeSchema.parse(code);
    if (!this.orderConditions.deleteStock(stockCode)) {
      throw new NotFoundException(`${stockCode} is not registered.`);
    }
    return { deleted: true };
  }

  @Post(":code/conditions")
  addCondition(@Param("code") code: string, @Body() body: unknown): StockConditions {
    const req = AddConditionRequestSchema.parse(body);
    return this.orderConditions.addCondition(StockCodeSchema.parse(code), req.direction, req.conditionNum, req.price, req.extras);
  }

  @Post(":code/conditions/entry")
  addConditionEntry(@Param("code") code: string, @Body() body: unknown): StockConditions {
    const req = AddConditionEntryRequestSchema.parse(body);
    return this.orderConditions.addConditionEntry(StockCodeSchema.parse(code), req.direction, req.condition);
  }

  @Put(":code/conditions")
  updateCondition(@Param("code") code: string, @Body() body: unknown): StockConditions {
    const stockCode = StockCodeSchema.parse(code);
    const req = UpdateConditionRequestSchema.parse(body);
    if (!this.orderConditions.updateCondition(stockCode, req.direction, req.key, req.value)) {
      throw new NotFoundException(`${stockCode} has no ${req.direction} condition with key ${req.key}.`);
    }
    return this.requireStock(stockCode);
  }

  @Get(":code/:direction/available")
  getAvailableConditionNums(@Param("code") code: string, @Param("direction") direction: string): { available: number[] } {
    return {
      available: this.orderConditions.getAvailableConditionNums(StockCodeSchema.parse(code), ConditionDirectionSchema.parse(direction))
    };
  }

  @Get(":code/:direction/:num")
  getCondition(@Param("code") code: string, @Param("direction") direction: string, @Param("num") num: string): ConditionEntry {
    const condition = this.orderConditions.getCondition(
      StockCodeSchema.parse(code),
      ConditionDirectionSchema.parse(direction),
      ConditionNumSchema.parse(num)
    );
    if (!condition) {
      throw new NotFoundException(`No ${direction}${num} condition for ${code}.`);
    }
    return condition;
  }

  @Delete(":code/:direction/key/:key")
  deleteCondition(@Param("code") code: string, @Param("direction") direction: string, @Param("key") key: string): { deleted: true } {
    if (!this.orderConditions.deleteCondition(StockCodeSchema.parse(code), ConditionDirectionSchema.parse(direction), key)) {
      throw new NotFoundException(`No ${direction} condition with key ${key} for ${code}.`);
    }
    return { deleted: true };
  }

  @Delete(":code/:direction/:num")
  deleteConditionByNum(@Param("code") code: string, @Param("direction") direction: string, @Param("num") num: string): { deleted: true } {
    const deleted = this.orderConditions.deleteConditionByNum(
      StockCodeSchema.parse(code),
      ConditionDirectionSchema.parse(direction),
      ConditionNumSchema.parse(num)
    );
    if (!deleted) {
      throw new NotFoundException(`No ${direction}${num} condition for ${code}.`);
    }
    return { deleted: true };
  }

  private requireStock(stockCode: string): StockConditions {
    const conditions = this.orderConditions.getStockConditions(stockCode);
    if (!conditions) {
      throw new NotFoundException(`${stockCode} is not registered.`);
    }
    return conditions;
  }
}
