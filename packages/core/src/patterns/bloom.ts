/**
 * packages/core/src/patterns/bloom.ts — Radial hue bloom.
 *
 * Each cell's hue depends on its distance from the grid centre. The counter
 * is a sawtooth in [0, 255) that shifts every hue on each frame.
 */

import { hueByDistance, radialField } from "../color/hue.js";
import type { Pattern, PatternContext } from "./types.js";

export type BloomOptions = Readonly<{
  /** Bloom inward (true) or outward (false). Default: true. */
  direction?: boolean;
  /** Default counter advance per frame. Default: 8. */
  stepAmount?: number;
}>;

const BLOOM_CYCLE = 255;
const DEFAULT_BLOOM_STEP = 8;

export function createBloomPattern(ctx: PatternContext, opts: BloomOptions = {}): Pattern {
  const { surface } = ctx;
  const direction = opts.direction ?? true;
  const defaultAmount = opts.stepAmount ?? DEFAULT_BLOOM_STEP;
  const field = radialField(surface.width, surface.height);
  let counter = 0;

  return Object.freeze({
    id: "bloom",
    counter: () => counter,
    step: (amount = defaultAmount) => {
      const intensity = direction ? BLOOM_CYCLE - counter : counter;
      for (let y = 0; y < surface.height; y++) {
        const row = field[y];
        if (row === undefined) continue;
        for (let x = 0; x < surface.width; x++) {
          surface.set(x, y, hueByDistance(row[x] ?? 0, surface.height, intensity));
        }
      }
      counter += amount;
      if (counter >= BLOOM_CYCLE) counter = 0;
    },
  });
}
