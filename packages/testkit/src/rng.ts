export type Rng = () => number;

/** Deterministic LCG in [0, 1) for reproducible randomized tests. */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

/**
 * Replays `values` in order, then throws. Lets tests pin every random draw
 * a piece of code makes.
 */
export function createScriptedRng(values: readonly number[]): Rng & Readonly<{ used: () => number }> {
  let index = 0;
  const next = (): number => {
    const value = values[index];
    if (value === undefined) {
      throw new Error(`scripted rng exhausted after ${String(values.length)} draws`);
    }
    index++;
    return value;
  };
  return Object.assign(next, { used: () => index });
}
