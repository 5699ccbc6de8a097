/**
 * Randomness sources for shuffling a box.
 * A source returns floats in [0, 1), like Math.random.
 */

export type RandomSource = () => number;

/**
 * Deterministic source (mulberry32) so a shuffle can be replayed from a seed
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random integer in [0, bound). Guards against sources that return 1.
 */
export function randomIndex(random: RandomSource, bound: number): number {
  return Math.min(bound - 1, Math.floor(random() * bound));
}
