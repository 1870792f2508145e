import type { Candle, ModelSnapshot } from "@wfbot/shared";

import { FEATURE_COUNT, FeatureExtractor, MIN_FEATURE_INDEX, isFiniteVector, type FeatureVector } from "./features";
import type { CandleModel, ModelParameters } from "./model.types";
import { gaussian, type RandomSource } from "./random";

export const MIN_FIT_CANDLES = 40;
export const NEUTRAL_PROBABILITY = 0.5;
const LOGIT_CLAMP = 20;
const INIT_SCALE = 0.01;

/** Logistic function, saturated to exactly 0 / 1 beyond |z| > 20. */
export function sigmoid(z: number): number {
  if (z > LOGIT_CLAMP) return 1;
  if (z < -LOGIT_CLAMP) return 0;
  return 1 / (1 + Math.exp(-z));
}

export function logisticProbability(weights: readonly number[], bias: number, features: readonly number[]): number {
  if (features.length !== weights.length) return NEUTRAL_PROBABILITY;
  let z = bias;
  for (let i = 0; i < weights.length; i += 1) {
    z += weights[i] * features[i];
  }
  return sigmoid(z);
}

export type TrainingSample = {
  index: number;
  features: FeatureVector;
  label: 0 | 1;
};

/**
 * Builds (features, label) pairs for indices 21..n-2. The label is 1 when the
 * next candle closes higher. Rows with a non-finite feature are dropped.
 */
export function buildDataset(candles: readonly Candle[]): TrainingSample[] {
  const extractor = new FeatureExtractor(candles);
  const samples: TrainingSample[] = [];
  for (let i = MIN_FEATURE_INDEX; i < candles.length - 1; i += 1) {
    const features = extractor.at(i);
    if (!features || !isFiniteVector(features)) continue;
    samples.push({ index: i, features, label: candles[i + 1].close > candles[i].close ? 1 : 0 });
  }
  return samples;
}

function isRandomSource(init: RandomSource | ModelParameters): init is RandomSource {
  return "next" in init;
}

/**
 * Tiny logistic regression over ret1 / ret5 / RSI14 / ZScore20 trained online
 * with single-sample gradient descent.
 */
export class SignalModel implements CandleModel {
  readonly mode = "baseline" as const;
  private readonly weights: number[];
  private bias: number;

  constructor(init: RandomSource | ModelParameters) {
    if (isRandomSource(init)) {
      this.weights = Array.from({ length: FEATURE_COUNT }, () => gaussian(init) * INIT_SCALE);
      this.bias = 0;
    } else {
      this.weights = [...init.weights];
      this.bias = init.bias;
    }
  }

  get featureCount(): number {
    return this.weights.length;
  }

  predict(features: readonly number[]): number {
    return logisticProbability(this.weights, this.bias, features);
  }

  predictFromCandles(candles: readonly Candle[]): number {
    const features = new FeatureExtractor(candles).at(candles.length - 1);
    if (!features || !isFiniteVector(features)) return NEUTRAL_PROBABILITY;
    return this.predict(features);
  }

  fit(candles: readonly Candle[], learningRate: number, epochs: number): boolean {
    if (candles.length < MIN_FIT_CANDLES) return false;
    const samples = buildDataset(candles);
    if (samples.length === 0) return false;

    for (let epoch = 0; epoch < epochs; epoch += 1) {
      for (const sample of samples) {
        const gradient = this.predict(sample.features) - sample.label;
        for (let j = 0; j < this.weights.length; j += 1) {
          this.weights[j] -= learningRate * gradient * sample.features[j];
        }
        this.bias -= learningRate * gradient;
      }
    }
    return true;
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
