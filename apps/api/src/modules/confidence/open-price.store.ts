import { Inject, Injectable } from "@nestjs/common";
import type { OpenPriceEntry, OpenPriceRecord } from "@steptrade/shared";
import { OpenPriceStoreSchema } from "@steptrade/shared";

import { ConfigService } from "../config/config.service";
import { readJsonFile, writeJsonFile } from "../storage/json-file";

export const OPEN_PRICES_FILE = "open-prices.json";

const HOUR_MS = 60 * 60 * 1000;

function isExpired(entry: OpenPriceEntry, nowMs: number): boolean {
  return Date.parse(entry.expiresAt) <= nowMs;
}

/** Open-price records keyed by stock code; an entry past `expiresAt` reads as absent. */
@Injectable()
export class OpenPriceStore {
  constructor(@Inject(ConfigService) private readonly configService: ConfigService) {}

  private get filePath(): string {
    return this.configService.resolveDataFile(OPEN_PRICES_FILE);
  }

  private get ttlMs(): number {
    return this.configService.load().openPriceTtlHours * HOUR_MS;
  }

  /** Reads the store and writes it back without the expired entries, if there were any. */
  private readLive(): Map<string, OpenPriceEntry> {
    const store = readJsonFile(this.filePath, OpenPriceStoreSchema, () => ({}));
    const nowMs = Date.now();
    const live = new Map<string, OpenPriceEntry>();
    let purged = false;
    for (const [code, entry] of Object.entries(store)) {
      if (isExpired(entry, nowMs)) {
        purged = true;
      } else {
        live.set(code, entry);
      }
    }
    if (purged) {
      this.write(live);
    }
    return live;
  }

  private write(live: Map<string, OpenPriceEntry>): void {
    writeJsonFile(this.filePath, Object.fromEntries(live));
  }

  get(stockCode: string): OpenPriceRecord | null {
    return this.readLive().get(stockCode)?.record ?? null;
  }

  getAll(): OpenPriceRecord[] {
    return [...this.readLive().values()].map((entry) => entry.record);
  }

  set(record: OpenPriceRecord): void {
    const store = this.readLive();
    store.set(record.stockCode, {
      record,
      expiresAt: new Date(Date.now() + this.ttlMs).toISOString()
    });
    this.write(store);
  }

  delete(stockCode: string): boolean {
    const store = this.readLive();
    if (!store.delete(stockCode)) return false;
    this.write(store);
    return true;
  }
}
