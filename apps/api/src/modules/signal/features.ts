import type { Candle } from "@wfbot/shared";

import { rsi, zScore } from "./indicators";

/** ret1, ret5, RSI14 / 100, ZScore20 */
export const FEATURE_COUNT = 4;

/** Smallest index with enough look-back for ret5, RSI14 and ZScore20. */
export const MIN_FEATURE_INDEX = 21;

export type FeatureVector = number[];

export function isFiniteVector(values: readonly number[]): boolean {
  return values.every((v) => Number.isFinite(v));
}

/**
 * Precomputes the indicator series once so a whole dataset can be built in a
 * single pass. Values at index i only depend on candles[0..i].
 */
export class FeatureExtractor {
  private readonly rsi14: number[];
  private readonly zscore20: number[];

  constructor(private readonly candles: readonly Candle[]) {
    this.rsi14 = rsi(candles, 14);
    this.zscore20 = zScore(candles, 20);
  }

  get length(): number {
    return this.candles.length;
  }

  /** Returns null outside [MIN_FEATURE_INDEX, length). Values may be non-finite on zero closes. */
  at(i: number): FeatureVector | null {
    if (!Number.isInteger(i) || i < MIN_FEATURE_INDEX || i >= this.candles.length) return null;
    const c = this.candles;
    const ret1 = (c[i].close - c[i - 1].close) / c[i - 1].close;
    const ret5 = (c[i].close - c[i - 5].close) / c[i - 5].close;
    return [ret1, ret5, this.rsi14[i] / 100, this.zscore20[i]];
  }
}

export function computeFeatures(candles: readonly Candle[], i: number): FeatureVector | null {
  if (!Number.isInteger(i) || i < MIN_FEATURE_INDEX || i >= candles.length) return null;
  return new FeatureExtractor(candles.slice(0, i + 1)).at(i);
}
