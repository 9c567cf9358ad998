import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";

import { CorruptDataFileError, readJsonFile, writeJsonFile } from "./json-file";

const CounterSchema = z.object({ count: z.number().int() });

describe("json-file", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "json-file-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns the fallback for a missing file", () => {
    expect(readJsonFile(path.join(dir, "missing.json"), CounterSchema, () => ({ count: 0 }))).toEqual({ count: 0 });
  });

  it("writes into missing directories and leaves no temp file", () => {
    const filePath = path.join(dir, "nested", "counter.json");
    writeJsonFile(filePath, { count: 3 });

    expect(readJsonFile(filePath, CounterSchema, () => ({ count: 0 }))).toEqual({ count: 3 });
    expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
  });

  it("rejects a document that does not match the schema", () => {
    const filePath = path.join(dir, "counter.json");
    fs.writeFileSync(filePath, JSON.stringify({ count: "three" }), "utf-8");

    const read = () => readJsonFile(filePath, CounterSchema, () => ({ count: 0 }));
    expect(read).toThrow(CorruptDataFileError);
    expect(read).toThrow(`Data file ${filePath} is corrupt: count: Expected number, received string`);
    expect(read).not.toThrow(z.ZodError);
  });

  it("reports unparsable JSON as a corrupt file", () => {
    const filePath = path.join(dir, "counter.json");
    fs.writeFileSync(filePath, "{count:", "utf-8");

    expect(() => readJsonFile(filePath, CounterSchema, () => ({ count: 0 }))).toThrow(CorruptDataFileError);
  });
});
