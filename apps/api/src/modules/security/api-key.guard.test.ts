import { UnauthorizedException, type ExecutionContext } from "@nestjs/common";
import { describe, expect, it } from "vitest";

import { ConfigService } from "../config/config.service";
import { ApiKeyGuard } from "./api-key.guard";

function contextFor(path: string, headers: Record<string, string> = {}): ExecutionContext {
  const req = {
    path,
    url: path,
    header: (name: string) => headers[name.toLowerCase()]
  };
  return { switchToHttp: () => ({ getRequest: () => req }) } as unknown as ExecutionContext;
}

describe("ApiKeyGuard", () => {
  const guarded = new ApiKeyGuard(new ConfigService({ API_KEY: "test-secret" }));

  it("allows everything when no API key is configured", () => {
    expect(new ApiKeyGuard(new ConfigService({})).canActivate(contextFor("/bot/status"))).toBe(true);
  });

  it("always allows /health", () => {
    expect(guarded.canActivate(contextFor("/health"))).toBe(true);
  });

  it("accepts the configured key", () => {
    expect(guarded.canActivate(contextFor("/bot/status", { "x-api-key": "test-secret" }))).toBe(true);
  });

  it("rejects a missing or wrong key", () => {
    expect(() => guarded.canActivate(contextFor("/bot/status"))).toThrow("Missing x-api-key header.");
    expect(() => guarded.canActivate(contextFor("/bot/refit", { "x-api-key": "nope" }))).toThrow(UnauthorizedException);
  });
});
