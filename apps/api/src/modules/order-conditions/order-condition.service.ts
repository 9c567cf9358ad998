import fs from "node:fs";

import { BadRequestException, ConflictException, Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import type { ConditionDirection, ConditionEntry, ConditionValue, OrderConditionBook, StockConditions } from "@steptrade/shared";
import {
  MAX_CONDITION_NUM,
  MIN_CONDITION_NUM,
  OrderConditionBookSchema,
  conditionKey,
  parseConditionNum,
  validConditionKeys
} from "@steptrade/shared";

import { ConfigService } from "../config/config.service";
import { readJsonFile, writeJsonFile } from "../storage/json-file";

function now(): string {
  return new Date().toISOString();
}

/**
 * Up to seven up/down price conditions per stock, held in memory and mirrored to a JSON file.
 * Every save first moves the previous file to `<file>.backup`.
 */
@Injectable()
export class OrderConditionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OrderConditionService.name);
  private book = new Map<string, StockConditions>();
  private initialized = false;

  constructor(@Inject(ConfigService) private readonly configService: ConfigService) {}

  private get filePath(): string {
    return this.configService.resolveDataFile(this.configService.load().orderConditionsFile);
  }

  onModuleInit(): void {
    this.initialize();
  }

  onModuleDestroy(): void {
    this.shutdown();
  }

  initialize(): void {
    const filePath = this.filePath;
    if (!fs.existsSync(filePath)) {
      this.logger.log(`${filePath} not found; starting with an empty condition book`);
      this.book = new Map();
      this.save();
    } else {
      try {
        this.book = new Map(Object.entries(readJsonFile(filePath, OrderConditionBookSchema, () => ({}))));
        this.logger.log(`Loaded conditions for ${this.book.size} stock(s) from ${filePath}`);
      } catch (err) {
        this.logger.error(`Could not read ${filePath}; starting with an empty condition book: ${String(err)}`);
        this.book = new Map();
      }
    }
    this.initialized = true;
  }

  shutdown(): void {
    if (!this.initialized) return;
    this.save();
    this.initialized = false;
    this.logger.log("Order conditions saved on shutdown");
  }

  private save(): void {
    const filePath = this.filePath;
    if (fs.existsSync(filePath)) {
      fs.renameSync(filePath, `${filePath}.backup`);
    }
    writeJsonFile(filePath, Object.fromEntries(this.book));
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error("Order condition manager is not initialized.");
    }
  }

  private ensureStock(stockCode: string): StockConditions {
    const existing = this.book.get(stockCode);
    if (existing) return existing;
    const created: StockConditions = { up: [], down: [] };
    this.book.set(stockCode, created);
    return created;
  }

  addStock(stockCode: string): boolean {
    this.ensureInitialized();
    if (this.book.has(stockCode)) {
      this.logger.log(`${stockCode} is already registered`);
      return false;
    }
    this.ensureStock(stockCode);
    this.save();
    this.logger.log(`Registered ${stockCode}`);
    return true;
  }

  addCondition(
    stockCode: string,
    direction: ConditionDirection,
    conditionNum: number,
    price: number,
    extras: Record<string, ConditionValue> = {}
  ): StockConditions {
    this.ensureInitialized();
    if (!Number.isInteger(conditionNum) || conditionNum < MIN_CONDITION_NUM || conditionNum > MAX_CONDITION_NUM) {
      throw new BadRequestException(`conditionNum must be between ${MIN_CONDITION_NUM} and ${MAX_CONDITION_NUM}.`);
    }
    if (price <= 0) {
      throw new BadRequestException("price must be greater than 0.");
    }

    const key = conditionKey(direction, conditionNum);
    const stock = this.ensureStock(stockCode);
    const entry: ConditionEntry = { ...extras, [key]: price, timestamp: now() };
    const index = stock[direction].findIndex((cond) => Object.hasOwn(cond, key));
    if (index >= 0) {
      this.logger.warn(`${stockCode} ${key} already exists; replacing it`);
      stock[direction][index] = entry;
    } else {
      stock[direction].push(entry);
    }
    this.save();
    this.logger.log(`${stockCode} ${key} = ${price}`);
    return stock;
  }

  addConditionEntry(stockCode: string, direction: ConditionDirection, condition: ConditionEntry): StockConditions {
    this.ensureInitialized();
    const valid = validConditionKeys(direction);
    const keys = Object.keys(condition).filter((k) => k.startsWith(direction));
    if (keys.length === 0) {
      throw new BadRequestException(`A condition needs at least one ${direction} key (${valid.join(", ")}).`);
    }
    const invalid = keys.filter((k) => !valid.includes(k));
    if (invalid.length > 0) {
      throw new BadRequestException(`Invalid condition keys: ${invalid.join(", ")}. Valid keys: ${valid.join(", ")}.`);
    }

    const stock = this.ensureStock(stockCode);
    const taken = keys.filter((k) => stock[direction].some((cond) => Object.hasOwn(cond, k)));
    if (taken.length > 0) {
      throw new ConflictException(`${stockCode} already has ${direction} conditions ${taken.join(", ")}.`);
    }
    stock[direction].push({ ...condition, timestamp: now() });
    this.save();
    this.logger.log(`${stockCode} ${direction} condition added: ${keys.join(", ")}`);
    return stock;
  }

  updateCondition(stockCode: string, direction: ConditionDirection, key: string, value: ConditionValue): boolean {
    this.ensureInitialized();
    const condition = this.book.get(stockCode)?.[direction].find((cond) => Object.hasOwn(cond, key));
    if (!condition) {
      this.logger.warn(`${stockCode} has no ${direction} condition with key ${key}`);
      return false;
    }
    const previous = condition[key];
    condition[key] = value;
    condition.updated = now();
    this.save();
    this.logger.log(`${stockCode} ${direction} ${key}: ${String(previous)} -> ${String(value)}`);
    return true;
  }

  getCondition(stockCode: string, direction: ConditionDirection, conditionNum: number): ConditionEntry | null {
    this.ensureInitialized();
    const key = conditionKey(direction, conditionNum);
    return this.book.get(stockCode)?.[direction].find((cond) => Object.hasOwn(cond, key)) ?? null;
  }

  deleteCondition(stockCode: string, direction: ConditionDirection, key: string): boolean {
    this.ensureInitialized();
    const conditions = this.book.get(stockCode)?.[direction];
    const index = conditions ? conditions.findIndex((cond) => Object.hasOwn(cond, key)) : -1;
    if (!conditions || index < 0) {
      this.logger.warn(`${stockCode} has no ${direction} condition with key ${key}`);
      return false;
    }
    conditions.splice(index, 1);
    this.save();
    this.logger.log(`${stockCode} ${direction} condition ${key} deleted`);
    return true;
  }

  deleteConditionByNum(stockCode: string, direction: ConditionDirection, conditionNum: number): boolean {
    return this.deleteCondition(stockCode, direction, conditionKey(direction, conditionNum));
  }

  getAvailableConditionNums(stockCode: string, direction: ConditionDirection): number[] {
    this.ensureInitialized();
    const used = new Set<number>();
    for (const cond of this.book.get(stockCode)?.[direction] ?? []) {
      for (const key of Object.keys(cond)) {
        const num = parseConditionNum(direction, key);
        if (num !== null) used.add(num);
      }
    }
    const available: number[] = [];
    for (let n = MIN_CONDITION_NUM; n <= MAX_CONDITION_NUM; n += 1) {
      if (!used.has(n)) available.push(n);
    }
    return available;
  }

  deleteStock(stockCode: string): boolean {
    this.ensureInitialized();
    if (!this.book.delete(stockCode)) {
      this.logger.warn(`${stockCode} is not registered`);
      return false;
    }
    this.save();
    this.logger.log(`Removed ${stockCode}`);
    return true;
  }

  getStockConditions(stockCode: string): StockConditions | null {
    this.ensureInitialized();
    return this.book.get(stockCode) ?? null;
  }

  getAll(): OrderConditionBook {
    this.ensureInitialized();
    return Object.fromEntries(this.book);
  }
}
