import { WHEEL_STEPS, wheelColor } from "../color/hue.js";
import type { Pattern, PatternContext } from "./types.js";

/** Hue wheel scrolling along x. Ignores the palette. */
export function createRainbowPattern(ctx: PatternContext): Pattern {
  const { surface } = ctx;
  let counter = 0;

  return Object.freeze({
    id: "rainbow",
    counter: () => counter,
    step: (amount = 1) => {
      for (let y = 0; y < surface.height; y++) {
        for (let x = 0; x < surface.width; x++) {
          surface.set(x, y, wheelColor((counter + x) % WHEEL_STEPS));
        }
      }
      counter += amount;
    },
  });
}
