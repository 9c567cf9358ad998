import fs from "node:fs";
import path from "node:path";

import type { AppSettings } from "@steptrade/shared";
import pino from "pino";

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function createLogger(settings: Pick<AppSettings, "logDir" | "logLevel">): pino.Logger {
  ensureDir(settings.logDir);

  const destination = pino.destination({
    dest: path.join(settings.logDir, "api.log"),
    sync: false
  });

  // "silent" on the root logger already drops everything; streams only take real levels.
  const streamLevel: pino.Level = settings.logLevel === "silent" ? "fatal" : settings.logLevel;

  return pino(
    {
      level: settings.logLevel,
      base: undefined
    },
    pino.multistream([
      { level: streamLevel, stream: process.stdout },
      { level: streamLevel, stream: destination }
    ])
  );
}
