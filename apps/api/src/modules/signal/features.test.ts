import { describe, expect, it } from "vitest";

import { candlesFromCloses, wavyCloses } from "../../testing/candles";
import { FeatureExtractor, computeFeatures, isFiniteVector } from "./features";

const ramp = candlesFromCloses(Array.from({ length: 30 }, (_, i) => i + 1));

describe("FeatureExtractor", () => {
  it("computes ret1, ret5, rsi/100 and the z-score", () => {
    const features = new FeatureExtractor(ramp).at(21);
    expect(features).not.toBeNull();
    const [ret1, ret5, rsiScaled, z] = features ?? [];
    expect(ret1).toBeCloseTo(1 / 21, 12);
    expect(ret5).toBeCloseTo(5 / 17, 12);
    expect(rsiScaled).toBe(0);
    expect(z).toBeCloseTo(1.647508942, 8);
  });

  it("returns null outside the valid range", () => {
    const extractor = new FeatureExtractor(ramp);
    expect(extractor.at(20)).toBeNull();
    expect(extractor.at(30)).toBeNull();
    expect(extractor.at(21.5)).toBeNull();
  });

  it("only looks back", () => {
    const candles = candlesFromCloses(wavyCloses(50));
    expect(new FeatureExtractor(candles).at(30)).toEqual(computeFeatures(candles, 30));
  });
});

describe("isFiniteVector", () => {
  it("rejects NaN and infinities", () => {
    expect(isFiniteVector([1, 2])).toBe(true);
    expect(isFiniteVector([1, Number.NaN])).toBe(false);
    expect(isFiniteVector([Number.POSITIVE_INFINITY])).toBe(false);
  });
});
