import { describe, expect, it } from "vitest";

import { candlesFromCloses, MINUTE_MS } from "../../testing/candles";
import { CandleHistory } from "./candle-history";

describe("CandleHistory", () => {
  it("appends newer candles in timestamp order", () => {
    const history = new CandleHistory(100);
    const candles = candlesFromCloses([1, 2, 3]);
    expect(history.merge([candles[2], candles[0], candles[1]])).toBe(3);
    expect(history.all().map((c) => c.close)).toEqual([1, 2, 3]);
  });

  it("replaces the open candle and ignores older ones", () => {
    const history = new CandleHistory(100);
    const candles = candlesFromCloses([1, 2, 3]);
    history.merge(candles);

    const update = { ...candles[2], close: 3.5 };
    expect(history.merge([candles[0], update])).toBe(0);
    expect(history.length).toBe(3);
    expect(history.last()?.close).toBe(3.5);
  });

  it("merges overlapping fetches", () => {
    const history = new CandleHistory(100);
    const candles = candlesFromCloses([1, 2, 3, 4, 5]);
    history.merge(candles.slice(0, 3));
    expect(history.merge(candles.slice(1))).toBe(2);
    expect(history.all().map((c) => c.timestamp)).toEqual(candles.map((c) => c.timestamp));
  });

  it("drops the oldest candles past capacity", () => {
    const history = new CandleHistory(3);
    history.merge(candlesFromCloses([1, 2, 3, 4, 5]));
    expect(history.all().map((c) => c.close)).toEqual([3, 4, 5]);
    expect(history.last()?.timestamp).toBe(1_700_000_000_000 + 4 * MINUTE_MS);
  });

  it("hands out copies", () => {
    const history = new CandleHistory(10);
    history.merge(candlesFromCloses([1]));
    history.all()[0].close = 99;
    expect(history.last()?.close).toBe(1);
  });
});
