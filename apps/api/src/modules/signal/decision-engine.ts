import type { TradeSignal } from "@wfbot/shared";

import type { TrendConfirmation, TrendPattern } from "./trend-gate";

export type DecisionThresholds = Readonly<{
  buyThreshold: number;
  sellThreshold: number;
  useMAFilter: boolean;
}>;

export const DEFAULT_THRESHOLDS: DecisionThresholds = Object.freeze({
  buyThreshold: 0.55,
  sellThreshold: 0.45,
  useMAFilter: true
});

export type TradeDecision = {
  signal: TradeSignal;
  /** Model probability of the next close being higher. */
  probability: number;
  confidence: number;
  reason: string;
  trend?: TrendPattern;
};

function fmt(value: number): string {
  return value.toFixed(4);
}

/**
 * Maps pUp to BUY / SELL / FLAT. The BUY branch is evaluated first. With the
 * MA filter on, a side also needs the trend gate to confirm it.
 */
export class ThresholdDecisionEngine {
  readonly thresholds: DecisionThresholds;

  constructor(thresholds: DecisionThresholds = DEFAULT_THRESHOLDS) {
    this.thresholds = Object.freeze({ ...thresholds });
  }

  decide(probability: number, trend?: TrendConfirmation): TradeDecision {
    const { buyThreshold, sellThreshold, useMAFilter } = this.thresholds;
    const pattern = trend?.pattern;
    const base = `pUp=${fmt(probability)}`;

    if (probability >= buyThreshold) {
      if (useMAFilter && !trend?.confirmsBuy) {
        return this.flat(probability, `${base} >= ${buyThreshold} but trend filter did not confirm BUY (${pattern ?? "no trend"})`, pattern);
      }
      return { signal: "BUY", probability, confidence: probability, reason: `${base} >= ${buyThreshold}`, trend: pattern };
    }

    if (probability <= sellThreshold) {
      if (useMAFilter && !trend?.confirmsSell) {
        return this.flat(probability, `${base} <= ${sellThreshold} but trend filter did not confirm SELL (${pattern ?? "no trend"})`, pattern);
      }
      return { signal: "SELL", probability, confidence: 1 - probability, reason: `${base} <= ${sellThreshold}`, trend: pattern };
    }

    return this.flat(probability, `${base} inside (${sellThreshold}, ${buyThreshold})`, pattern);
  }

  neutral(reason: string): TradeDecision {
    return this.flat(0.5, reason);
  }

  private flat(probability: number, reason: string, trend?: TrendPattern): TradeDecision {
    return { signal: "FLAT", probability, confidence: 0.5, reason, trend };
  }
}
