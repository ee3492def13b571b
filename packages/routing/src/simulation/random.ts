/**
 * Seeded pseudo-random numbers for repeatable simulation runs.
 *
 * A 31-bit linear congruential generator. The multiply goes through
 * Math.imul so the state stays an exact integer however long the run.
 */

const MULTIPLIER = 1103515245;
const INCREMENT = 12345;
const MODULUS = 2 ** 31;

/** Returns a generator of numbers in [0, 1); equal seeds give equal sequences */
export function createRandom(seed: number): () => number {
  let state = seed & 0x7fffffff;
  return () => {
    state = (Math.imul(state, MULTIPLIER) + INCREMENT) & 0x7fffffff;
    return state / MODULUS;
  };
}
