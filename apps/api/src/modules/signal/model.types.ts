import type { Candle, ModelMode, ModelSnapshot } from "@wfbot/shared";

export type TrainingSchedule = {
  learningRate: number;
  epochs: number;
};

export type ModelParameters = {
  weights: readonly number[];
  bias: number;
};

/**
 * A probability model trained on candles. Implementations own their weights
 * and mutate them in place; callers only ever see snapshot copies.
 */
export interface CandleModel {
  readonly mode: ModelMode;
  readonly featureCount: number;
  predict(features: readonly number[]): number;
  predictFromCandles(candles: readonly Candle[]): number;
  /** Returns false when the call was a no-op (not enough history). */
  fit(candles: readonly Candle[], learningRate: number, epochs: number): boolean;
  snapshot(): ModelSnapshot;
  /** Copies values from a persisted snapshot of the same mode and length. */
  restore(snapshot: ModelSnapshot): boolean;
}
