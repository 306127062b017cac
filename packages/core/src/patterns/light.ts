import { paletteAt } from "../color/rgb.js";
import type { Pattern, PatternContext } from "./types.js";

/**
 * Static light. One palette color fills the grid; several alternate cell by
 * cell in strip order.
 */
export function createLightPattern(ctx: PatternContext): Pattern {
  const { surface } = ctx;
  let counter = 0;

  return Object.freeze({
    id: "light",
    counter: () => counter,
    step: (amount = 1) => {
      const palette = ctx.palette();
      for (let y = 0; y < surface.height; y++) {
        for (let x = 0; x < surface.width; x++) {
          surface.set(x, y, paletteAt(palette, y * surface.width + x));
        }
      }
      counter += amount;
    },
  });
}
