import { paletteAt } from "../color/rgb.js";
import type { Pattern, PatternContext } from "./types.js";

/** Palette colors alternating down the strip, shifted by the counter each frame. */
export function createStripPattern(ctx: PatternContext): Pattern {
  const { surface } = ctx;
  let counter = 0;

  return Object.freeze({
    id: "strip",
    counter: () => counter,
    step: (amount = 1) => {
      const palette = ctx.palette();
      for (let y = 0; y < surface.height; y++) {
        for (let x = 0; x < surface.width; x++) {
          surface.set(x, y, paletteAt(palette, y * surface.width + x + counter));
        }
      }
      counter += amount;
    },
  });
}
