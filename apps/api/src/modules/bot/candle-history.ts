import type { Candle } from "@wfbot/shared";

/**
 * Append-only candle buffer ordered by timestamp. A candle with the same
 * timestamp as the last one replaces it (the still-open candle); older
 * candles are ignored. The oldest candles are dropped past `capacity`.
 */
export class CandleHistory {
  private candles: Candle[] = [];

  constructor(private readonly capacity: number) {}

  get length(): number {
    return this.candles.length;
  }

  last(): Candle | undefined {
    return this.candles[this.candles.length - 1];
  }

  /** Returns the number of candles appended (replacements excluded). */
  merge(incoming: readonly Candle[]): number {
    let appended = 0;
    const sorted = [...incoming].sort((a, b) => a.timestamp - b.timestamp);
    for (const candle of sorted) {
      const last = this.last();
      if (!last || candle.timestamp > last.timestamp) {
        this.candles.push({ ...candle });
        appended += 1;
      } else if (candle.timestamp === last.timestamp) {
        this.candles[this.candles.length - 1] = { ...candle };
      }
    }
    if (this.candles.length > this.capacity) {
      this.candles = this.candles.slice(-this.capacity);
    }
    return appended;
  }

  all(): Candle[] {
    return this.candles.map((c) => ({ ...c }));
  }
}
