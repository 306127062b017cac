/**
 * packages/core/src/surface/pixelGrid.ts — In-memory pixel surface.
 */

import { BLACK, type Rgb } from "../color/rgb.js";
import { BeamError } from "../errors.js";
import type { PixelDriver, PixelFrame, PixelSurface } from "./types.js";

export type PixelGridOptions = Readonly<{
  width: number;
  height: number;
  /** Initial master brightness 0..255 (default: 255). */
  brightness?: number;
  driver: PixelDriver;
}>;

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new BeamError(
      "BEAM_INVALID_SURFACE",
      `Pixel grid ${name} must be a positive integer (received ${String(value)})`,
    );
  }
}

function clampBrightness(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(255, Math.trunc(value)));
}

export function createPixelGrid(opts: PixelGridOptions): PixelSurface {
  const { width, height, driver } = opts;
  assertDimension("width", width);
  assertDimension("height", height);

  const cells: Rgb[] = new Array<Rgb>(width * height).fill(BLACK);
  let brightness = clampBrightness(opts.brightness ?? 255);

  const inBounds = (x: number, y: number): boolean =>
    Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < width && y < height;

  return Object.freeze({
    width,
    height,
    brightness: () => brightness,
    setBrightness: (value: number) => {
      brightness = clampBrightness(value);
    },
    set: (x: number, y: number, color: Rgb) => {
      if (!inBounds(x, y)) return;
      cells[y * width + x] = color;
    },
    get: (x: number, y: number): Rgb => {
      if (!inBounds(x, y)) return BLACK;
      return cells[y * width + x] ?? BLACK;
    },
    clear: () => {
      cells.fill(BLACK);
    },
    flush: async () => {
      const frame: PixelFrame = Object.freeze({
        width,
        height,
        brightness,
        pixels: Object.freeze(cells.slice()),
      });
      await driver.present(frame);
    },
  });
}
