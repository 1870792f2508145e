import path from "node:path";

import { ZodError } from "zod";
import { describe, expect, it } from "vitest";

import { ConfigService } from "./config.service";

describe("ConfigService", () => {
  it("parses the environment once and freezes the result", () => {
    const env: Record<string, string | undefined> = { SYMBOL: "ETHUSDT", WALK_FORWARD_MIN: "15" };
    const service = new ConfigService(env);
    env.SYMBOL = "SOLUSDT";

    const config = service.load();
    expect(config.symbol).toBe("ETHUSDT");
    expect(config.walkForwardMin).toBe(15);
    expect(Object.isFrozen(config)).toBe(true);
    expect(service.load()).toBe(config);
  });

  it("throws on an invalid environment", () => {
    expect(() => new ConfigService({ BUY_THRESHOLD: "0.4", SELL_THRESHOLD: "0.6" })).toThrow(ZodError);
  });

  it("derives data and log directories", () => {
    const service = new ConfigService({ DATA_DIR: "/tmp/wfbot-data" });
    expect(service.dataDir).toBe("/tmp/wfbot-data");
    expect(service.logDir).toBe(path.join("/tmp/wfbot-data", "logs"));
    expect(service.logLevel).toBe("info");

    const custom = new ConfigService({ DATA_DIR: "/tmp/wfbot-data", LOG_DIR: "/tmp/wfbot-logs", LOG_LEVEL: "debug" });
    expect(custom.logDir).toBe("/tmp/wfbot-logs");
    expect(custom.logLevel).toBe("debug");
  });
});
