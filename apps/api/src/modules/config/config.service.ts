import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { AppSettings } from "@steptrade/shared";
import { AppSettingsSchema } from "@steptrade/shared";

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv): AppSettings {
  const dataDir = blankToUndefined(env.DATA_DIR) ?? path.resolve(process.cwd(), "data");
  return AppSettingsSchema.parse({
    port: blankToUndefined(env.PORT),
    apiHost: blankToUndefined(env.API_HOST),
    dataDir,
    logDir: blankToUndefined(env.LOG_DIR) ?? path.join(dataDir, "logs"),
    logLevel: blankToUndefined(env.LOG_LEVEL),
    apiKey: blankToUndefined(env.API_KEY),
    openPriceTtlHours: blankToUndefined(env.OPEN_PRICE_TTL_HOURS),
    orderConditionsFile: blankToUndefined(env.ORDER_CONDITIONS_FILE)
  });
}

@Injectable()
export class ConfigService {
  private cachedSettings: AppSettings | null = null;

  load(): AppSettings {
    if (!this.cachedSettings) {
      this.cachedSettings = loadSettings(process.env);
    }
    return this.cachedSettings;
  }

  get dataDir(): string {
    return this.load().dataDir;
  }

  resolveDataFile(fileName: string): string {
    return path.join(this.dataDir, fileName);
  }
}
