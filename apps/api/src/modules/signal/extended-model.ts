import type { Candle, ModelSnapshot } from "@wfbot/shared";

import { isFiniteVector } from "./features";
import { atr, closesOf, macd, obv, rollingStd, rsi, zScore } from "./indicators";
import type { CandleModel, ModelParameters } from "./model.types";
import { gaussian, type RandomSource } from "./random";
import { NEUTRAL_PROBABILITY, logisticProbability } from "./signal-model";

// [ret1, ret5, RSI14/100, ZScore20, ATR14/close, MACD hist, OBV / max|OBV|, Std20/close]
export const EXTENDED_FEATURE_COUNT = 8;
export const EXTENDED_MIN_CANDLES = 60;
export const EXTENDED_FIRST_INDEX = 26;
export const EXTENDED_MIN_ROWS = 100;
// Fixed schedule for warmup and walk-forward fits; LEARNING_RATE and EPOCHS tune the baseline only.
export const EXTENDED_LEARNING_RATE = 0.05;
export const EXTENDED_EPOCHS = 6;

const EPS = 1e-12;
const INIT_SCALE = 0.01;

export type ExtendedDataset = {
  features: number[][];
  labels: Array<0 | 1>;
};

/**
 * Builds extended feature rows. Training rows stop at n-2 so every row has a
 * next-candle label; inference rows include the last candle.
 */
export function buildExtendedFeatures(candles: readonly Candle[], train: boolean): ExtendedDataset {
  if (candles.length < EXTENDED_MIN_CANDLES) return { features: [], labels: [] };

  const close = closesOf(candles);
  const rsi14 = rsi(candles, 14);
  const z20 = zScore(candles, 20);
  const atr14 = atr(candles, 14);
  const { histogram } = macd(close, 12, 26, 9);
  const obvSeries = obv(candles);
  const obvScale = obvSeries.reduce((max, v) => Math.max(max, Math.abs(v)), 1);
  const std20 = rollingStd(close, 20);

  const features: number[][] = [];
  const labels: Array<0 | 1> = [];
  const end = train ? candles.length - 1 : candles.length;
  for (let i = EXTENDED_FIRST_INDEX; i < end; i += 1) {
    const row = [
      (close[i] - close[i - 1]) / (close[i - 1] + EPS),
      (close[i] - close[i - 5]) / (close[i - 5] + EPS),
      rsi14[i] / 100,
      z20[i],
      close[i] > 0 ? atr14[i] / close[i] : 0,
      histogram[i],
      obvSeries[i] / obvScale,
      std20[i] / (close[i] + EPS)
    ];
    if (!isFiniteVector(row)) continue;
    features.push(row);
    if (train) labels.push(close[i + 1] > close[i] ? 1 : 0);
  }
  return { features, labels };
}

export type ExtendedModelOptions = {
  batchSize?: number;
  l2?: number;
};

/**
 * Logistic head over the extended feature set, trained with L2-regularised
 * mini-batch gradient descent. Batches are taken in chronological order.
 */
export class ExtendedSignalModel implements CandleModel {
  readonly mode = "extended" as const;
  private readonly weights: number[];
  private bias: number;
  private readonly batchSize: number;
  private readonly l2: number;

  constructor(init: RandomSource | ModelParameters, options: ExtendedModelOptions = {}) {
    if ("next" in init) {
      this.weights = Array.from({ length: EXTENDED_FEATURE_COUNT }, () => gaussian(init) * INIT_SCALE);
      this.bias = 0;
    } else {
      this.weights = [...init.weights];
      this.bias = init.bias;
    }
    this.batchSize = Math.max(1, options.batchSize ?? 64);
    this.l2 = options.l2 ?? 1e-3;
  }

  get featureCount(): number {
    return this.weights.length;
  }

  predict(features: readonly number[]): number {
    return logisticProbability(this.weights, this.bias, features);
  }

  predictFromCandles(candles: readonly Candle[]): number {
    const { features } = buildExtendedFeatures(candles, false);
    const last = features[features.length - 1];
    return last ? this.predict(last) : NEUTRAL_PROBABILITY;
  }

  fit(candles: readonly Candle[], learningRate: number, epochs: number): boolean {
    const { features, labels } = buildExtendedFeatures(candles, true);
    if (features.length < EXTENDED_MIN_ROWS) return false;
    this.fitMiniBatch(features, labels, learningRate, epochs);
    return true;
  }

  fitMiniBatch(features: readonly number[][], labels: ReadonlyArray<0 | 1>, learningRate: number, epochs: number): void {
    const n = this.weights.length;
    for (let epoch = 0; epoch < epochs; epoch += 1) {
      for (let start = 0; start < features.length; start += this.batchSize) {
        const stop = Math.min(start + this.batchSize, features.length);
        const gradW = new Array<number>(n).fill(0);
        let gradB = 0;
        for (let i = start; i < stop; i += 1) {
          const error = this.predict(features[i]) - labels[i];
          for (let j = 0; j < n; j += 1) gradW[j] += error * features[i][j];
          gradB += error;
        }
        const size = stop - start;
        for (let j = 0; j < n; j += 1) {
          this.weights[j] -= learningRate * (gradW[j] / size + this.l2 * this.weights[j]);
        }
        this.bias -= learningRate * (gradB / size);
      }
    }
  }

  snapshot(): ModelSnapshot {
    return { mode: this.mode, weights: [...this.weights], bias: this.bias };
  }

  restore(snapshot: ModelSnapshot): boolean {
    if (snapshot.mode !== this.mode || snapshot.weights.length !== this.weights.length) return false;
    if (!isFiniteVector(snapshot.weights) || !Number.isFinite(snapshot.bias)) return false;
    for (let j = 0; j < this.weights.length; j += 1) {
      this.weights[j] = snapshot.weights[j];
    }
    this.bias = snapshot.bias;
    return true;
  }
}
