import type { PaperOrder } from "@wfbot/shared";
import { describe, expect, it } from "vitest";

import { FLAT_POSITION, addDailyPnl, applyFill, dailyLossReached, utcDay } from "./position";

function order(side: PaperOrder["side"], price: number, qty: number, status: PaperOrder["status"] = "FILLED"): PaperOrder {
  return {
    id: `${side}-${price}`,
    ts: "2026-03-01T12:00:00.000Z",
    symbol: "BTCUSDT",
    side,
    status,
    price,
    quoteQty: price * qty,
    qty,
    probability: 0.6,
    riskFactor: 1
  };
}

describe("applyFill", () => {
  it("adds bought base and its cost", () => {
    const first = applyFill(FLAT_POSITION, order("BUY", 100, 2));
    const second = applyFill(first.position, order("BUY", 200, 1));
    expect(second).toEqual({ position: { baseQty: 3, costQuote: 400 }, realizedPnl: 0 });
  });

  it("realizes PnL against the average cost on a partial sell", () => {
    // average cost 400 / 4 = 100
    const result = applyFill({ baseQty: 4, costQuote: 400 }, order("SELL", 150, 1));
    expect(result).toEqual({ position: { baseQty: 3, costQuote: 300 }, realizedPnl: 50 });
  });

  it("never sells more than is held", () => {
    const result = applyFill({ baseQty: 1, costQuote: 120 }, order("SELL", 100, 3));
    expect(result).toEqual({ position: { baseQty: 0, costQuote: 0 }, realizedPnl: -20 });
  });

  it("ignores rejected orders and sells from flat", () => {
    const held = { baseQty: 1, costQuote: 100 };
    expect(applyFill(held, order("BUY", 100, 1, "REJECTED"))).toEqual({ position: held, realizedPnl: 0 });
    expect(applyFill(FLAT_POSITION, order("SELL", 100, 1))).toEqual({ position: FLAT_POSITION, realizedPnl: 0 });
  });
});

describe("daily PnL", () => {
  it("keys days by UTC date", () => {
    expect(utcDay("2026-03-01T23:59:59.000Z")).toBe("2026-03-01");
    expect(utcDay(new Date("2026-03-02T00:00:00.000Z"))).toBe("2026-03-02");
  });

  it("accumulates within a day and restarts on the next", () => {
    const first = addDailyPnl(undefined, "2026-03-01", -4);
    expect(addDailyPnl(first, "2026-03-01", -6)).toEqual({ day: "2026-03-01", realizedPnl: -10 });
    expect(addDailyPnl(first, "2026-03-02", 3)).toEqual({ day: "2026-03-02", realizedPnl: 3 });
  });

  it("trips once the loss reaches the limit", () => {
    const daily = { day: "2026-03-01", realizedPnl: -10 };
    // 1% of 1000 USD
    expect(dailyLossReached(daily, "2026-03-01", 1000, 1)).toBe(true);
    expect(dailyLossReached({ ...daily, realizedPnl: -9.99 }, "2026-03-01", 1000, 1)).toBe(false);
    expect(dailyLossReached(daily, "2026-03-02", 1000, 1)).toBe(false);
    expect(dailyLossReached(daily, "2026-03-01", 1000, 0)).toBe(false);
    expect(dailyLossReached(undefined, "2026-03-01", 1000, 1)).toBe(false);
  });
});
