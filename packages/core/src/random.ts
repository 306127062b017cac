/** Source of uniform floats in [0, 1), shaped like `Math.random`. */
export type Random = () => number;

export const defaultRandom: Random = () => Math.random();

/**
 * Uniform integer in [0, maxExclusive).
 *
 * Takes no draw from `random` when `maxExclusive <= 1`; the answer is always 0
 * and callers with a single choice leave the sequence untouched.
 */
export function randomInt(random: Random, maxExclusive: number): number {
  if (maxExclusive <= 1) return 0;
  const value = Math.floor(random() * maxExclusive);
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(maxExclusive - 1, value);
}
