import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const AppSettingsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8148),
  apiHost: z.string().min(1).default("0.0.0.0"),
  dataDir: z.string().min(1),
  logDir: z.string().min(1),
  logLevel: LogLevelSchema.default("info"),
  apiKey: z.string().min(8).optional(),
  openPriceTtlHours: z.coerce.number().positive().max(72).default(12),
  orderConditionsFile: z
    .string()
    .min(1)
    .regex(/^[\w.-]+\.json$/, "must be a plain .json file name")
    .default("stock-orders.json")
});
export type AppSettings = z.infer<typeof AppSettingsSchema>;

export type PublicSettings = Omit<AppSettings, "apiKey"> & { apiKeyConfigured: boolean };

export function toPublicSettings(settings: AppSettings): PublicSettings {
  const { apiKey, ...rest } = settings;
  return { ...rest, apiKeyConfigured: Boolean(apiKey) };
}
