import { BadRequestException, ConflictException, Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import type { Baseline, BaselineCreate, BaselineSearch, BaselineStore, BaselineUpdate } from "@steptrade/shared";
import { BaselineStoreSchema, emptyBaselineStore, percentOf, round } from "@steptrade/shared";

import { ConfigService } from "../config/config.service";
import { readJsonFile, writeJsonFile } from "../storage/json-file";
import type { BaselineStockStats, BaselineSummary, PriceRangeAnalysis, PriceRangeStats } from "./baseline-analysis";
import {
  analyzePriceRange,
  buildPriceRangeStats,
  buildStockStats,
  matchesSearch,
  summarizeBaselines,
  validateDecisionPrice
} from "./baseline-analysis";

export const BASELINES_FILE = "baselines.json";
export const DEFAULT_MAX_DEVIATION = 0.1;

export type BulkCreateResult = {
  totalRequested: number;
  created: number;
  skipped: number;
  errors: number;
  successRate: number;
  errorDetails: string[] | null;
  message: string;
};

export type BulkUpdateResult = {
  totalRequested: number;
  updated: number;
  notFound: number;
  errors: number;
  successRate: number;
  errorDetails: string[] | null;
  message: string;
};

function byStep(a: Baseline, b: Baseline): number {
  return a.step - b.step;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

@Injectable()
export class BaselineService {
  private readonly logger = new Logger(BaselineService.name);

  constructor(@Inject(ConfigService) private readonly configService: ConfigService) {}

  private get filePath(): string {
    return this.configService.resolveDataFile(BASELINES_FILE);
  }

  private read(): BaselineStore {
    return readJsonFile(this.filePath, BaselineStoreSchema, emptyBaselineStore);
  }

  private write(store: BaselineStore): void {
    writeJsonFile(this.filePath, store);
  }

  private insert(store: BaselineStore, input: BaselineCreate, step: number): Baseline {
    const now = new Date().toISOString();
    const baseline: Baseline = {
      id: store.nextId,
      stockCode: input.stockCode,
      step,
      decisionPrice: input.decisionPrice,
      quantity: input.quantity,
      lowPrice: input.lowPrice ?? null,
      highPrice: input.highPrice ?? null,
      createdAt: now,
      updatedAt: now
    };
    store.baselines.push(baseline);
    store.nextId += 1;
    this.write(store);
    return baseline;
  }

  createNew(input: BaselineCreate): Baseline {
    const store = this.read();
    if (store.baselines.some((b) => b.stockCode === input.stockCode)) {
      throw new ConflictException(`Baseline already exists for ${input.stockCode}.`);
    }
    const baseline = this.insert(store, input, 0);
    this.logger.log(`Created baseline ${input.stockCode} step 0`);
    return baseline;
  }

  addStep(input: BaselineCreate): Baseline {
    const store = this.read();
    const steps = store.baselines.filter((b) => b.stockCode === input.stockCode).map((b) => b.step);
    const step = steps.length > 0 ? Math.max(...steps) + 1 : 0;
    const baseline = this.insert(store, input, step);
    this.logger.log(`Added baseline ${input.stockCode} step ${step}`);
    return baseline;
  }

  createWithValidation(input: BaselineCreate, maxDeviation = DEFAULT_MAX_DEVIATION): Baseline {
    const reason = validateDecisionPrice(input, maxDeviation);
    if (reason) {
      throw new BadRequestException(reason);
    }
    return this.createNew(input);
  }

  getAllByCode(stockCode: string): Baseline[] {
    return this.read()
      .baselines.filter((b) => b.stockCode === stockCode)
      .sort(byStep);
  }

  getLastStep(stockCode: string): { stockCode: string; lastStep: number | null } {
    const rows = this.getAllByCode(stockCode);
    return { stockCode, lastStep: rows.at(-1)?.step ?? null };
  }

  getLastBaseline(stockCode: string): Baseline {
    const last = this.getAllByCode(stockCode).at(-1);
    if (!last) {
      throw new NotFoundException(`No baseline for ${stockCode}.`);
    }
    return last;
  }

  findByStep(stockCode: string, step: number): Baseline | null {
    return this.read().baselines.find((b) => b.stockCode === stockCode && b.step === step) ?? null;
  }

  getByStep(stockCode: string, step: number): Baseline {
    const baseline = this.findByStep(stockCode, step);
    if (!baseline) {
      throw new NotFoundException(`No baseline for ${stockCode} step ${step}.`);
    }
    return baseline;
  }

  updateByStep(input: BaselineUpdate): Baseline {
    const store = this.read();
    const baseline = store.baselines.find((b) => b.stockCode === input.stockCode && b.step === input.step);
    if (!baseline) {
      throw new NotFoundException(`No baseline for ${input.stockCode} step ${input.step}.`);
    }
    baseline.decisionPrice = input.decisionPrice;
    baseline.quantity = input.quantity;
    baseline.lowPrice = input.lowPrice ?? null;
    baseline.highPrice = input.highPrice ?? null;
    baseline.updatedAt = new Date().toISOString();
    this.write(store);
    return baseline;
  }

  deleteByStep(stockCode: string, step: number): Baseline {
    const store = this.read();
    const index = store.baselines.findIndex((b) => b.stockCode === stockCode && b.step === step);
    if (index < 0) {
      throw new NotFoundException(`No baseline for ${stockCode} step ${step}.`);
    }
    const [removed] = store.baselines.splice(index, 1);
    this.write(store);
    return removed;
  }

  deleteLastStep(stockCode: string): Baseline {
    const last = this.getLastBaseline(stockCode);
    return this.deleteByStep(stockCode, last.step);
  }

  deleteByCode(stockCode: string): { stockCode: string; deleted: number } {
    const store = this.read();
    const kept = store.baselines.filter((b) => b.stockCode !== stockCode);
    const deleted = store.baselines.length - kept.length;
    if (deleted === 0) {
      throw new NotFoundException(`No baseline for ${stockCode}.`);
    }
    this.write({ ...store, baselines: kept });
    this.logger.log(`Deleted ${deleted} baseline(s) of ${stockCode}`);
    return { stockCode, deleted };
  }

  deleteAll(confirm: boolean): { deletedStocks: number; totalDeletedBaselines: number } {
    if (!confirm) {
      throw new BadRequestException("Pass confirm=true to delete every baseline.");
    }
    const store = this.read();
    const deletedStocks = new Set(store.baselines.map((b) => b.stockCode)).size;
    const totalDeletedBaselines = store.baselines.length;
    this.write({ ...store, baselines: [] });
    this.logger.warn(`Deleted all baselines (${totalDeletedBaselines} rows, ${deletedStocks} stocks)`);
    return { deletedStocks, totalDeletedBaselines };
  }

  getAll(): Baseline[] {
    return this.read().baselines;
  }

  getAllOrdered(): Baseline[] {
    return [...this.read().baselines].sort((a, b) => a.stockCode.localeCompare(b.stockCode) || byStep(a, b));
  }

  getStockCodes(): string[] {
    return [...new Set(this.read().baselines.map((b) => b.stockCode))].sort();
  }

  count(): number {
    return this.read().baselines.length;
  }

  summary(): BaselineSummary {
    return summarizeBaselines(this.read().baselines);
  }

  private requireRows(stockCode: string): Baseline[] {
    const rows = this.getAllByCode(stockCode);
    if (rows.length === 0) {
      throw new NotFoundException(`No baseline for ${stockCode}.`);
    }
    return rows;
  }

  stockStats(stockCode: string): BaselineStockStats {
    return buildStockStats(stockCode, this.requireRows(stockCode));
  }

  priceRangeAnalysis(stockCode: string): PriceRangeAnalysis {
    return analyzePriceRange(stockCode, this.requireRows(stockCode));
  }

  priceRangeStats(): PriceRangeStats {
    return buildPriceRangeStats(this.read().baselines);
  }

  search(filters: BaselineSearch): Baseline[] {
    return this.read().baselines.filter((b) => matchesSearch(b, filters));
  }

  bulkCreate(inputs: BaselineCreate[]): BulkCreateResult {
    let created = 0;
    let skipped = 0;
    const errorDetails: string[] = [];

    for (const input of inputs) {
      try {
        this.createNew(input);
        created += 1;
      } catch (err) {
        if (err instanceof ConflictException) {
          skipped += 1;
          this.logger.debug(`Skipped ${input.stockCode}: ${err.message}`);
          continue;
        }
        const detail = `${input.stockCode}: ${errorMessage(err)}`;
        errorDetails.push(detail);
        this.logger.error(detail);
      }
    }

    const errors = errorDetails.length;
    return {
      totalRequested: inputs.length,
      created,
      skipped,
      errors,
      successRate: round(percentOf(created, inputs.length), 2),
      errorDetails: errors > 0 ? errorDetails : null,
      message: `Bulk create finished: ${created} created, ${skipped} skipped, ${errors} failed`
    };
  }

  bulkUpdate(inputs: BaselineUpdate[]): BulkUpdateResult {
    let updated = 0;
    let notFound = 0;
    const errorDetails: string[] = [];

    for (const input of inputs) {
      try {
        this.updateByStep(input);
        updated += 1;
      } catch (err) {
        if (err instanceof NotFoundException) {
          notFound += 1;
          continue;
        }
        const detail = `${input.stockCode} step ${input.step}: ${errorMessage(err)}`;
        errorDetails.push(detail);
        this.logger.error(detail);
      }
    }

    const errors = errorDetails.length;
    return {
      totalRequested: inputs.length,
      updated,
      notFound,
      errors,
      successRate: round(percentOf(updated, inputs.length), 2),
      errorDetails: errors > 0 ? errorDetails : null,
      message: `Bulk update finished: ${updated} updated, ${notFound} not found, ${errors} failed`
    };
  }
}
