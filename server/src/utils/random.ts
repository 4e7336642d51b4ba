export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Small seedable PRNG (mulberry32), returns values in [0, 1)
 */
export function seededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}
