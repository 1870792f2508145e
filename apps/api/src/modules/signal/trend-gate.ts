import type { Candle } from "@wfbot/shared";

import { closesOf, ema } from "./indicators";

export type TrendPattern = "LOW_BOTTOM" | "HIGH_PEAK" | "PRICE_DOWN_GOING_UP" | "PRICE_UP_GOING_DOWN" | "NONE";

export type TrendConfirmation = {
  confirmsBuy: boolean;
  confirmsSell: boolean;
  pattern: TrendPattern;
};

export interface TrendGate {
  evaluate(candles: readonly Candle[]): TrendConfirmation;
}

/** fast - slow EMA spread at the last candle and two and three candles back. */
export type EmaSpreads = {
  current: number;
  twoBack: number;
  threeBack: number;
};

const NO_CONFIRMATION: TrendConfirmation = { confirmsBuy: false, confirmsSell: false, pattern: "NONE" };

/** First match wins: LOW_BOTTOM, HIGH_PEAK, PRICE_DOWN_GOING_UP, PRICE_UP_GOING_DOWN. */
export function classifyTrend(spreads: EmaSpreads): TrendPattern {
  const { current: d0, twoBack: d2, threeBack: d3 } = spreads;
  if (![d0, d2, d3].every((v) => Number.isFinite(v))) return "NONE";

  if (d3 < 0 && d2 > d3 && d0 < d2 && d0 < 0) return "LOW_BOTTOM";
  if (d3 > 0 && d2 < d3 && d0 > d2 && d0 > 0) return "HIGH_PEAK";
  if (d0 < 0 && d3 < 0 && d0 > d3) return "PRICE_DOWN_GOING_UP";
  if (d0 > 0 && d3 > 0 && d0 < d3) return "PRICE_UP_GOING_DOWN";
  return "NONE";
}

export function confirmationFor(pattern: TrendPattern): TrendConfirmation {
  switch (pattern) {
    case "LOW_BOTTOM":
    case "PRICE_DOWN_GOING_UP":
      return { confirmsBuy: true, confirmsSell: false, pattern };
    case "HIGH_PEAK":
    case "PRICE_UP_GOING_DOWN":
      return { confirmsBuy: false, confirmsSell: true, pattern };
    default:
      return NO_CONFIRMATION;
  }
}

/** Regime filter on the EMA(4) / EMA(8) spread of closes. */
export class EmaTurnTrendGate implements TrendGate {
  constructor(
    private readonly fastPeriod = 4,
    private readonly slowPeriod = 8
  ) {}

  evaluate(candles: readonly Candle[]): TrendConfirmation {
    if (candles.length < 4) return NO_CONFIRMATION;
    const closes = closesOf(candles);
    const fast = ema(closes, this.fastPeriod);
    const slow = ema(closes, this.slowPeriod);
    const i = closes.length - 1;
    const spread = (k: number): number => fast[k] - slow[k];
    return confirmationFor(classifyTrend({ current: spread(i), twoBack: spread(i - 2), threeBack: spread(i - 3) }));
  }
}
