import type { Candle } from "@wfbot/shared";

import { closesOf, rollingStd } from "./indicators";

export const MIN_RISK_CANDLES = 40;

export interface VolatilityEstimator {
  /** Volatility of the last candle relative to its close. */
  relative(candles: readonly Candle[]): number;
}

export class RollingStdVolatility implements VolatilityEstimator {
  constructor(private readonly period = 20) {}

  relative(candles: readonly Candle[]): number {
    if (candles.length < this.period) return 0;
    const closes = closesOf(candles);
    const last = closes.length - 1;
    return rollingStd(closes, this.period)[last] / (closes[last] + 1e-12);
  }
}

export function volRiskFactor(relVol: number): number {
  if (!Number.isFinite(relVol)) return 1;
  if (relVol > 0.02) return 0.6;
  if (relVol > 0.01) return 0.8;
  if (relVol < 0.004) return 1.2;
  return 1;
}

export type RiskSizerOptions = {
  enabled: boolean;
  baseRiskPct: number;
};

export type RiskAssessment = {
  factor: number;
  baseRiskPct: number;
  riskPct: number;
  relativeVolatility: number | null;
};

export class RiskSizer {
  constructor(
    private readonly options: RiskSizerOptions,
    private readonly volatility: VolatilityEstimator = new RollingStdVolatility()
  ) {}

  assess(candles: readonly Candle[]): RiskAssessment {
    const { enabled, baseRiskPct } = this.options;
    if (!enabled || candles.length < MIN_RISK_CANDLES) {
      return { factor: 1, baseRiskPct, riskPct: baseRiskPct, relativeVolatility: null };
    }
    const relVol = this.volatility.relative(candles);
    const factor = volRiskFactor(relVol);
    return { factor, baseRiskPct, riskPct: baseRiskPct * factor, relativeVolatility: relVol };
  }

  /** Quote notional in USD for a given equity. */
  quoteNotional(usdEquity: number, assessment: RiskAssessment): number {
    return (usdEquity * assessment.riskPct) / 100;
  }
}
