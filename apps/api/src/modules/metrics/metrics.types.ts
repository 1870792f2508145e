import type { ModelMode, OrderStatus, TradeSignal } from "@wfbot/shared";

export const METRICS_SINK = Symbol("METRICS_SINK");

export type MetricsSnapshot = {
  decisions: Record<TradeSignal, number>;
  walkForwardFits: number;
  riskFactor: number;
  modelMode: Record<ModelMode, 0 | 1>;
  orders: Record<OrderStatus, number>;
  lastDecisionAt?: string;
};

export interface MetricsSink {
  recordDecision(signal: TradeSignal): void;
  recordWalkForwardFit(): void;
  setRiskFactor(factor: number): void;
  setModelMode(mode: ModelMode): void;
  recordOrder(status: OrderStatus): void;
  snapshot(): MetricsSnapshot;
}
