/**
 * packages/core/src/patterns/matrixRain.ts — Falling drops with fading tails.
 *
 * Every row is a lane. Drops enter a random lane at x = 0, travel one cell
 * per frame along x and are dropped once their last tail cell has left the
 * grid. Progress lives in the lanes; the counter is reset every frame.
 */

import { type Rgb, paletteAt, scaleRgb } from "../color/rgb.js";
import { randomInt } from "../random.js";
import type { Pattern, PatternContext } from "./types.js";

export type MatrixRainOptions = Readonly<{
  /** Tail length in cells, head included. Default: 4. */
  tail?: number;
  /** Drops spawned per frame. Default: 4. */
  growthRate?: number;
}>;

export type RainDrop = Readonly<{
  position: number;
  color: Rgb;
}>;

export type MatrixRainPattern = Pattern &
  Readonly<{
    /** Current drops per lane, indexed by row. */
    lanes: () => readonly (readonly RainDrop[])[];
  }>;

const DEFAULT_TAIL = 4;
const DEFAULT_GROWTH_RATE = 4;

function normalizeCount(value: number | undefined, fallback: number, min: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(min, Math.floor(value));
}

export function createMatrixRainPattern(
  ctx: PatternContext,
  opts: MatrixRainOptions = {},
): MatrixRainPattern {
  const { surface, random } = ctx;
  const tail = normalizeCount(opts.tail, DEFAULT_TAIL, 1);
  const growthRate = normalizeCount(opts.growthRate, DEFAULT_GROWTH_RATE, 0);
  const levelStep = Math.floor(255 / tail);
  let lanes: RainDrop[][] = Array.from({ length: surface.height }, () => []);
  let counter = 0;

  const drawDrop = (lane: number, drop: RainDrop): void => {
    for (let i = 0; i < tail; i++) {
      const x = drop.position - i;
      if (x < 0 || x >= surface.width) continue;
      surface.set(x, lane, scaleRgb(drop.color, 255 - levelStep * i));
    }
  };

  return Object.freeze({
    id: "rain",
    counter: () => counter,
    lanes: () => lanes,
    step: () => {
      surface.clear();

      const palette = ctx.palette();
      for (let i = 0; i < growthRate; i++) {
        const lane = randomInt(random, surface.height);
        const color = paletteAt(palette, randomInt(random, palette.length));
        lanes[lane]?.push({ position: 0, color });
      }

      lanes = lanes.map((drops, lane) => {
        const next: RainDrop[] = [];
        for (const drop of drops) {
          drawDrop(lane, drop);
          const position = drop.position + 1;
          if (position - (tail - 1) >= surface.width) continue;
          next.push({ position, color: drop.color });
        }
        return next;
      });

      counter = 0;
    },
  });
}
