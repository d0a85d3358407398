/**
 * Injectable random source
 *
 * Every random decision (supporter subsampling, item sampling) takes a
 * RandomSource so that runs are reproducible under a fixed seed.
 */

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Linear congruential generator; same seed, same sequence
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.abs(Math.trunc(seed)) & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

/**
 * Uniform sample of `count` elements without replacement (partial
 * Fisher-Yates).
 * Returns elements in draw order; the input array is not modified.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = defaultRandom
): T[] {
  const pool = [...items];
  const size = Math.max(0, Math.min(count, pool.length));

  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, size);
}
