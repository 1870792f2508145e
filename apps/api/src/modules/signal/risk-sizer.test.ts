import { describe, expect, it } from "vitest";

import { candlesFromCloses } from "../../testing/candles";
import { RiskSizer, RollingStdVolatility, type VolatilityEstimator, volRiskFactor } from "./risk-sizer";

const fixed = (value: number): VolatilityEstimator => ({ relative: () => value });
const flat = (count: number) => candlesFromCloses(new Array<number>(count).fill(100));

describe("volRiskFactor", () => {
  it("maps relative volatility to bands", () => {
    expect(volRiskFactor(0.03)).toBe(0.6);
    expect(volRiskFactor(0.015)).toBe(0.8);
    expect(volRiskFactor(0.02)).toBe(0.8);
    expect(volRiskFactor(0.007)).toBe(1);
    expect(volRiskFactor(0.01)).toBe(1);
    expect(volRiskFactor(0.004)).toBe(1);
    expect(volRiskFactor(0.001)).toBe(1.2);
    expect(volRiskFactor(Number.NaN)).toBe(1);
  });
});

describe("RollingStdVolatility", () => {
  it("divides the 20-candle std by the last close", () => {
    // population std of 10 x 99 and 10 x 101 is 1
    const closes = [...new Array<number>(10).fill(99), ...new Array<number>(10).fill(101)];
    expect(new RollingStdVolatility().relative(candlesFromCloses(closes))).toBeCloseTo(1 / 101, 12);
  });

  it("is 0 for a short series", () => {
    expect(new RollingStdVolatility().relative(flat(5))).toBe(0);
  });
});

describe("RiskSizer", () => {
  it("returns the base risk when disabled", () => {
    const sizer = new RiskSizer({ enabled: false, baseRiskPct: 0.25 }, fixed(0.05));
    expect(sizer.assess(flat(100))).toEqual({ factor: 1, baseRiskPct: 0.25, riskPct: 0.25, relativeVolatility: null });
  });

  it("returns the base risk below 40 candles", () => {
    const sizer = new RiskSizer({ enabled: true, baseRiskPct: 0.25 }, fixed(0.05));
    expect(sizer.assess(flat(39)).factor).toBe(1);
  });

  it("scales the risk by the volatility band", () => {
    const sizer = new RiskSizer({ enabled: true, baseRiskPct: 0.5 }, fixed(0.03));
    const assessment = sizer.assess(flat(40));
    expect(assessment.factor).toBe(0.6);
    expect(assessment.riskPct).toBeCloseTo(0.3, 12);
    expect(assessment.relativeVolatility).toBe(0.03);
  });

  it("raises the risk for a calm flat series", () => {
    const sizer = new RiskSizer({ enabled: true, baseRiskPct: 0.25 });
    expect(sizer.assess(flat(60)).factor).toBe(1.2);
  });

  it("computes the quote notional from equity", () => {
    const sizer = new RiskSizer({ enabled: false, baseRiskPct: 0.25 });
    expect(sizer.quoteNotional(1000, sizer.assess(flat(10)))).toBeCloseTo(2.5, 12);
  });
});
