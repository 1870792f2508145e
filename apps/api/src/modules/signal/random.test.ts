import { describe, expect, it } from "vitest";

import { createSeededRandom, gaussian, resolveSeed } from "./random";

describe("createSeededRandom", () => {
  it("repeats the sequence for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).toEqual(seqB);
    expect(seqA.every((v) => v >= 0 && v < 1)).toBe(true);
  });

  it("differs across seeds", () => {
    expect(createSeededRandom(1).next()).not.toBe(createSeededRandom(2).next());
  });
});

describe("gaussian", () => {
  it("maps fixed uniforms through Box-Muller", () => {
    const values = [0.5, 0];
    const source = { next: () => values.shift() ?? 0 };
    // sqrt(-2 ln 0.5) * cos(0)
    expect(gaussian(source)).toBeCloseTo(Math.sqrt(2 * Math.LN2), 12);
  });

  it("stays finite when the first uniform is 0", () => {
    expect(Number.isFinite(gaussian({ next: () => 0 }))).toBe(true);
  });
});

describe("resolveSeed", () => {
  it("prefers the configured seed", () => {
    expect(resolveSeed(7, () => 99)).toBe(7);
    expect(resolveSeed(undefined, () => 99)).toBe(99);
  });
});
