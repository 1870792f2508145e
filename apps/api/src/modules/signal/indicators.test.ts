import { describe, expect, it } from "vitest";

import { candlesFromCloses } from "../../testing/candles";
import { atr, ema, macd, obv, rollingStd, rsi, sma, zScore } from "./indicators";

describe("indicators", () => {
  it("computes a simple moving average with a NaN warmup", () => {
    const out = sma([1, 2, 3, 4], 2);
    expect(Number.isNaN(out[0])).toBe(true);
    expect(out.slice(1)).toEqual([1.5, 2.5, 3.5]);
  });

  it("seeds the exponential moving average with the first value", () => {
    expect(ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
    expect(ema([], 3)).toEqual([]);
  });

  it("reports 0 RSI before the window and for a window without losses", () => {
    const candles = candlesFromCloses(Array.from({ length: 30 }, (_, i) => 100 + i));
    const out = rsi(candles, 14);
    expect(out.slice(0, 14).every((v) => v === 0)).toBe(true);
    expect(out[14]).toBe(0);
    expect(out[29]).toBe(0);
  });

  it("reports 0 RSI on a flat window", () => {
    const candles = candlesFromCloses(new Array<number>(16).fill(50));
    expect(rsi(candles, 14)[15]).toBe(0);
  });

  it("recovers once a loss enters the window", () => {
    const closes = [...Array.from({ length: 15 }, (_, i) => 100 + i), 113];
    const out = rsi(candlesFromCloses(closes), 14);
    // avgGain = 13/14, avgLoss = 1/14
    expect(out[15]).toBeCloseTo(100 - 100 / 14, 10);
  });

  it("balances RSI on alternating equal moves", () => {
    const closes = Array.from({ length: 15 }, (_, i) => (i % 2 === 0 ? 10 : 11));
    const out = rsi(candlesFromCloses(closes), 14);
    // 7 gains of 1 and 7 losses of 1
    expect(out[14]).toBeCloseTo(50, 10);
  });

  it("computes the rolling z-score of close", () => {
    const candles = candlesFromCloses(Array.from({ length: 20 }, (_, i) => i + 1));
    const out = zScore(candles, 20);
    expect(out[18]).toBe(0);
    expect(out[19]).toBeCloseTo(1.647508942, 6);
  });

  it("keeps the z-score finite on a constant series", () => {
    const out = zScore(candlesFromCloses(new Array<number>(25).fill(42)), 20);
    expect(out[24]).toBe(0);
  });

  it("computes rolling population std", () => {
    const out = rollingStd([2, 4, 4, 4, 5, 5, 7, 9], 8);
    expect(out[6]).toBe(0);
    expect(out[7]).toBeCloseTo(2, 10);
  });

  it("computes ATR from true ranges", () => {
    // high - low is always 2 and closes never gap, so every true range is 2
    const candles = candlesFromCloses(new Array<number>(20).fill(100));
    const out = atr(candles, 14);
    expect(out[13]).toBe(0);
    expect(out[14]).toBe(2);
    expect(out[19]).toBe(2);
  });

  it("keeps MACD at zero on a constant series", () => {
    const series = macd(new Array<number>(40).fill(10));
    expect(series.histogram.every((v) => v === 0)).toBe(true);
  });

  it("accumulates on-balance volume by close direction", () => {
    const candles = candlesFromCloses([10, 11, 10, 10]).map((c, i) => ({ ...c, volume: [5, 3, 2, 7][i] }));
    expect(obv(candles)).toEqual([0, 3, 1, 1]);
  });
});
