import crypto from "node:crypto";

import { Injectable } from "@nestjs/common";
import type { OrderSide, PaperOrder } from "@wfbot/shared";

export const ORDER_EXECUTOR = Symbol("ORDER_EXECUTOR");

export type OrderRequest = {
  symbol: string;
  side: OrderSide;
  /** Quote notional in USD. */
  quoteQty: number;
  price: number;
  probability: number;
  riskFactor: number;
  reason?: string;
  /** Base held for a long-only SELL; the sell is capped at it. Unset for BUYs and when shorting is allowed. */
  maxBaseQty?: number;
};

export interface OrderExecutor {
  execute(request: OrderRequest): Promise<PaperOrder>;
}

/** Fills market orders locally at the given price; nothing is sent to an exchange. */
@Injectable()
export class PaperExecutionService implements OrderExecutor {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async execute(request: OrderRequest): Promise<PaperOrder> {
    const base = {
      id: crypto.randomUUID(),
      ts: this.now().toISOString(),
      symbol: request.symbol,
      side: request.side,
      probability: request.probability,
      riskFactor: request.riskFactor
    };

    const rejection = this.validate(request);
    if (rejection) {
      return { ...base, status: "REJECTED", price: 0, quoteQty: 0, qty: 0, reason: rejection };
    }

    const wanted = request.quoteQty / request.price;
    const qty = Math.min(wanted, request.maxBaseQty ?? Number.POSITIVE_INFINITY);
    const capped = qty < wanted;
    return {
      ...base,
      status: "FILLED",
      price: request.price,
      quoteQty: capped ? qty * request.price : request.quoteQty,
      qty,
      reason: request.reason
    };
  }

  private validate(request: OrderRequest): string | null {
    if (!Number.isFinite(request.price) || request.price <= 0) return `Invalid price ${request.price}`;
    if (!Number.isFinite(request.quoteQty) || request.quoteQty <= 0) return `Invalid quote notional ${request.quoteQty}`;
    if (request.side === "SELL" && request.maxBaseQty !== undefined && !(request.maxBaseQty > 0)) {
      return "Long-only: no base position to sell";
    }
    return null;
  }
}
