import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadSettings } from "./config.service";

describe("loadSettings", () => {
  it("applies defaults relative to the data directory", () => {
    const settings = loadSettings({ DATA_DIR: "/srv/steptrade" });

    expect(settings).toEqual({
      port: 8148,
      apiHost: "0.0.0.0",
      dataDir: "/srv/steptrade",
      logDir: path.join("/srv/steptrade", "logs"),
      logLevel: "info",
      openPriceTtlHours: 12,
      orderConditionsFile: "stock-orders.json"
    });
  });

  it("treats blank values as unset and coerces numbers", () => {
    const settings = loadSettings({ DATA_DIR: "/srv/steptrade", PORT: "9000", API_KEY: "  ", OPEN_PRICE_TTL_HOURS: "6" });

    expect(settings.port).toBe(9000);
    expect(settings.apiKey).toBeUndefined();
    expect(settings.openPriceTtlHours).toBe(6);
  });

  it("rejects a condition file name with a directory part", () => {
    expect(() => loadSettings({ DATA_DIR: "/srv/steptrade", ORDER_CONDITIONS_FILE: "../orders.json" })).toThrow();
  });
});
