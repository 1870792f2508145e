import { Injectable } from "@nestjs/common";
import type { ModelMode, OrderStatus, TradeSignal } from "@wfbot/shared";

import type { MetricsSink, MetricsSnapshot } from "./metrics.types";

/** In-process counters and gauges, read back through GET /bot/run-stats. */
@Injectable()
export class MetricsService implements MetricsSink {
  private readonly decisions: Record<TradeSignal, number> = { BUY: 0, SELL: 0, FLAT: 0 };
  private readonly orders: Record<OrderStatus, number> = { FILLED: 0, REJECTED: 0 };
  private walkForwardFits = 0;
  private riskFactor = 1;
  private modelMode: Record<ModelMode, 0 | 1> = { baseline: 0, extended: 0 };
  private lastDecisionAt: string | undefined;

  constructor(private readonly now: () => Date = () => new Date()) {}

  recordDecision(signal: TradeSignal): void {
    this.decisions[signal] += 1;
    this.lastDecisionAt = this.now().toISOString();
  }

  recordWalkForwardFit(): void {
    this.walkForwardFits += 1;
  }

  setRiskFactor(factor: number): void {
    if (Number.isFinite(factor)) this.riskFactor = factor;
  }

  setModelMode(mode: ModelMode): void {
    this.modelMode = { baseline: mode === "baseline" ? 1 : 0, extended: mode === "extended" ? 1 : 0 };
  }

  recordOrder(status: OrderStatus): void {
    this.orders[status] += 1;
  }

  snapshot(): MetricsSnapshot {
    return {
      decisions: { ...this.decisions },
      walkForwardFits: this.walkForwardFits,
      riskFactor: this.riskFactor,
      modelMode: { ...this.modelMode },
      orders: { ...this.orders },
      lastDecisionAt: this.lastDecisionAt
    };
  }
}
