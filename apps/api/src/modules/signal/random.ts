import crypto from "node:crypto";

export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
}

export type SeedProvider = () => number;

export const cryptoSeedProvider: SeedProvider = () => crypto.randomInt(0, 2 ** 31 - 1);

export function resolveSeed(configured: number | undefined, provider: SeedProvider = cryptoSeedProvider): number {
  return configured ?? provider();
}

/** mulberry32: small, fast and fully determined by the 32-bit seed. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

/** Standard normal sample (Box-Muller). */
export function gaussian(random: RandomSource): number {
  const u1 = Math.max(random.next(), Number.MIN_VALUE);
  const u2 = random.next();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
