/**
 * Helpers shared by every number generator that returns values in [0, 1).
 */

/**
 * Anything that yields uniformly distributed numbers in [0, 1).
 * `SeededRandom` satisfies it, and so does `{ next: Math.random }`.
 */
export interface RandomSource {
  next(): number;
}
