/**
 * packages/core/src/patterns/types.ts — Pattern contract shared by all animations.
 */

import type { Palette } from "../color/rgb.js";
import type { Random } from "../random.js";
import type { PixelSurface } from "../surface/types.js";

/** Identifiers of the built-in patterns, in registry order. */
export const PATTERN_IDS = Object.freeze(["rainbow", "light", "bloom", "strip", "rain"] as const);

export type PatternId = (typeof PATTERN_IDS)[number];

/** Everything a pattern may read while computing frames. */
export type PatternContext = Readonly<{
  surface: PixelSurface;
  /** Current palette. Read on every frame so palette swaps show up immediately. */
  palette: () => Palette;
  random: Random;
}>;

/**
 * One running animation.
 *
 * `step` computes a single frame into the surface and advances internal
 * state; it never flushes. Omitting `amount` uses the pattern's default.
 */
export type Pattern = Readonly<{
  id: PatternId;
  counter: () => number;
  step: (amount?: number) => void;
}>;

export type PatternFactory = (ctx: PatternContext) => Pattern;
