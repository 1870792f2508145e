import type { DailyPnl, PaperOrder, Position } from "@wfbot/shared";

// Below this the base quantity is float dust left by a full exit.
const DUST_QTY = 1e-12;

export const FLAT_POSITION: Position = Object.freeze({ baseQty: 0, costQuote: 0 });

export type FillResult = {
  position: Position;
  /** Realized quote PnL of the fill against the average cost; 0 for buys. */
  realizedPnl: number;
};

/** Applies a filled paper order to the spot position at average cost. */
export function applyFill(position: Position, order: PaperOrder): FillResult {
  if (order.status !== "FILLED") return { position, realizedPnl: 0 };

  if (order.side === "BUY") {
    return {
      position: { baseQty: position.baseQty + order.qty, costQuote: position.costQuote + order.quoteQty },
      realizedPnl: 0
    };
  }

  const sold = Math.min(order.qty, position.baseQty);
  if (sold <= 0) return { position, realizedPnl: 0 };

  const avgCost = position.costQuote / position.baseQty;
  const baseQty = position.baseQty - sold;
  const realizedPnl = sold * (order.price - avgCost);
  if (baseQty <= DUST_QTY) return { position: { ...FLAT_POSITION }, realizedPnl };
  return { position: { baseQty, costQuote: Math.max(0, position.costQuote - sold * avgCost) }, realizedPnl };
}

export function utcDay(ts: Date | string): string {
  return new Date(ts).toISOString().slice(0, 10);
}

/** Adds realized PnL to the running total of its UTC day, starting over on a new day. */
export function addDailyPnl(daily: DailyPnl | undefined, day: string, pnl: number): DailyPnl {
  const base = daily?.day === day ? daily.realizedPnl : 0;
  return { day, realizedPnl: base + pnl };
}

/**
 * True once today's realized loss reaches maxLossPct of equity.
 * A limit of 0 disables the check.
 */
export function dailyLossReached(daily: DailyPnl | undefined, day: string, usdEquity: number, maxLossPct: number): boolean {
  if (maxLossPct <= 0 || !daily || daily.day !== day) return false;
  return daily.realizedPnl <= -(usdEquity * maxLossPct) / 100;
}
