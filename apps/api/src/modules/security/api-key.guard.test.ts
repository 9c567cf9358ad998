import type { ExecutionContext } from "@nestjs/common";
import { UnauthorizedException } from "@nestjs/common";
import { describe, expect, it } from "vitest";

import type { ConfigService } from "../config/config.service";
import { ApiKeyGuard } from "./api-key.guard";

function contextFor(path: string, headers: Record<string, string> = {}): ExecutionContext {
  const req = { path, url: path, header: (name: string) => headers[name] };
  return { switchToHttp: () => ({ getRequest: () => req }) } as unknown as ExecutionContext;
}

function guardWith(apiKey: string | undefined): ApiKeyGuard {
  const configService = { load: () => ({ apiKey }) };
  return new ApiKeyGuard(configService as unknown as ConfigService);
}

describe("ApiKeyGuard", () => {
  it("lets every request through when no key is configured", () => {
    expect(guardWith(undefined).canActivate(contextFor("/baseline/all"))).toBe(true);
  });

  it("keeps /health open", () => {
    expect(guardWith("test-secret").canActivate(contextFor("/health"))).toBe(true);
  });

  it("requires the configured key elsewhere", () => {
    const guard = guardWith("test-secret");

    expect(() => guard.canActivate(contextFor("/baseline/all"))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(contextFor("/baseline/all", { "x-api-key": "wrong-secret" }))).toThrow("Invalid API key.");
    expect(guard.canActivate(contextFor("/baseline/all", { "x-api-key": "test-secret" }))).toBe(true);
  });
});
