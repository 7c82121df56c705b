/**
 * Random sources for template selection.
 * A RandomSource returns a float in [0, 1), like Math.random.
 */

export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Seedable random number generator (Mulberry32).
 * The same seed always yields the same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return function () {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Picks one item of a non-empty list
 */
export function pickOne<T>(items: readonly [T, ...T[]], random: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index] ?? items[0];
}
