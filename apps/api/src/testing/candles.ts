import type { Candle } from "@wfbot/shared";

export const MINUTE_MS = 60_000;

export function candlesFromCloses(closes: readonly number[], startTs = 1_700_000_000_000): Candle[] {
  return closes.map((close, i) => ({
    timestamp: startTs + i * MINUTE_MS,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 10
  }));
}

/** Deterministic wavy series that keeps every close strictly positive. */
export function wavyCloses(count: number, base = 100): number[] {
  return Array.from({ length: count }, (_, i) => base + 5 * Math.sin(i / 3) + 2 * Math.cos(i / 7) + i * 0.05);
}
