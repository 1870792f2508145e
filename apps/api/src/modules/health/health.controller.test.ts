import { describe, expect, it } from "vitest";

import { HealthController } from "./health.controller";

describe("HealthController", () => {
  it("reports ok with a timestamp", () => {
    const health = new HealthController().getHealth();
    expect(health.ok).toBe(true);
    expect(Number.isNaN(Date.parse(health.ts))).toBe(false);
  });
});
