import fs from "node:fs";
import path from "node:path";

import type { z } from "zod";

export function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

/** A stored document that is not valid JSON or no longer matches its schema. */
export class CorruptDataFileError extends Error {
  constructor(
    readonly filePath: string,
    detail: string
  ) {
    super(`Data file ${filePath} is corrupt: ${detail}`);
    this.name = "CorruptDataFileError";
  }
}

/** Reads and validates a JSON document, or returns `fallback()` when the file does not exist yet. */
export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S, fallback: () => z.output<S>): z.output<S> {
  if (!fs.existsSync(filePath)) {
    return fallback();
  }
  const raw = fs.readFileSync(filePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CorruptDataFileError(filePath, err instanceof Error ? err.message : String(err));
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new CorruptDataFileError(filePath, issues.join("; "));
  }
  return parsed.data;
}

export function writeJsonFile(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  atomicWriteFile(filePath, JSON.stringify(value, null, 2));
}
