/**
 * packages/core/src/color/hue.ts — Hue wheels and radial distance fields.
 *
 * Pure helpers used by the hue-driven patterns. Output colors only need to
 * be stable for a given input; they do not target a calibrated color space.
 */

import { type Rgb, rgb } from "./rgb.js";

/** Number of steps in one turn of the color wheel used by `wheelColor`. */
export const WHEEL_STEPS = 384;

const WHEEL_SEGMENT = WHEEL_STEPS / 3;

function wrap(value: number, modulus: number): number {
  const n = Number.isFinite(value) ? Math.trunc(value) : 0;
  return ((n % modulus) + modulus) % modulus;
}

/**
 * Color at `position` on a three-segment red → green → blue wheel.
 * Any integer wraps onto the wheel, negatives included.
 */
export function wheelColor(position: number): Rgb {
  const p = wrap(position, WHEEL_STEPS);
  const segment = Math.floor(p / WHEEL_SEGMENT);
  const up = (p % WHEEL_SEGMENT) * 2;
  const down = 255 - up;
  switch (segment) {
    case 0:
      return rgb(down, up, 0);
    case 1:
      return rgb(0, down, up);
    default:
      return rgb(up, 0, down);
  }
}

/** Fully saturated, full value color for `hue` in 0..255 (wraps). */
export function hueToRgb(hue: number): Rgb {
  const h = wrap(hue, 256);
  const region = Math.floor(h / 43);
  const rise = (h - region * 43) * 6;
  const fall = 255 - rise;
  switch (region) {
    case 0:
      return rgb(255, rise, 0);
    case 1:
      return rgb(fall, 255, 0);
    case 2:
      return rgb(0, 255, rise);
    case 3:
      return rgb(0, fall, 255);
    case 4:
      return rgb(rise, 0, 255);
    default:
      return rgb(255, 0, fall);
  }
}

/**
 * Map a distance `value` within `length` onto the hue circle, shifted by `offset`.
 */
export function hueByDistance(value: number, length: number, offset: number): Rgb {
  const span = length > 0 ? length : 1;
  const base = Math.floor((value * 255) / span);
  return hueToRgb(wrap(base + Math.trunc(offset), 255));
}

/**
 * Integer distance of every cell from the grid centre, indexed `[y][x]`.
 */
export function radialField(width: number, height: number): readonly (readonly number[])[] {
  const cx = (width - 1) / 2;
  const cy = (height - 1) / 2;
  const rows: (readonly number[])[] = [];
  for (let y = 0; y < height; y++) {
    const row: number[] = [];
    for (let x = 0; x < width; x++) {
      const dx = x - cx;
      const dy = y - cy;
      row.push(Math.floor(Math.sqrt(dx * dx + dy * dy)));
    }
    rows.push(Object.freeze(row));
  }
  return Object.freeze(rows);
}
