import type { Rgb } from "../color/rgb.js";

/** Immutable copy of a surface handed to a driver on flush. */
export type PixelFrame = Readonly<{
  width: number;
  height: number;
  /** Master brightness 0..255. Pixels are unscaled; drivers apply this. */
  brightness: number;
  /** Row-major colors, `pixels[y * width + x]`. */
  pixels: readonly Rgb[];
}>;

/**
 * Hardware or simulator sink for frames.
 *
 * Physical concerns (strip addressing, channel order, transport) live here.
 */
export type PixelDriver = Readonly<{
  present: (frame: PixelFrame) => void | Promise<void>;
}>;

/**
 * Addressable grid of lights owned by the animation scheduler.
 *
 * Coordinates are cell units; writes outside `[0,width) × [0,height)` are ignored.
 */
export type PixelSurface = Readonly<{
  width: number;
  height: number;
  brightness: () => number;
  setBrightness: (value: number) => void;
  set: (x: number, y: number, color: Rgb) => void;
  get: (x: number, y: number) => Rgb;
  /** Set every cell to black. */
  clear: () => void;
  /** Push the current cells to the driver. */
  flush: () => Promise<void>;
}>;
