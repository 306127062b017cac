/**
 * packages/node/src/drivers/encode.ts — Strip addressing and byte encoding.
 *
 * Physical strips are wired end to end. With serpentine wiring every odd row
 * runs right to left, so grid (x, y) lands at a different strip offset.
 */

import { type PixelFrame, type Rgb, scaleRgb } from "@beam/core";

export const CHANNEL_ORDERS = Object.freeze(["RGB", "RBG", "GRB", "GBR", "BRG", "BGR"] as const);

export type ChannelOrder = (typeof CHANNEL_ORDERS)[number];

export type EncodeOptions = Readonly<{
  channelOrder: ChannelOrder;
  serpentine: boolean;
}>;

export function isChannelOrder(value: string): value is ChannelOrder {
  return CHANNEL_ORDERS.some((order) => order === value);
}

/** Offset along the physical strip of grid cell (x, y). */
export function stripIndex(x: number, y: number, width: number, serpentine: boolean): number {
  const column = serpentine && y % 2 === 1 ? width - 1 - x : x;
  return y * width + column;
}

/** Color after master brightness; full brightness leaves colors untouched. */
export function applyBrightness(color: Rgb, brightness: number): Rgb {
  if (brightness >= 255) return color;
  return scaleRgb(color, brightness);
}

function channel(color: Rgb, name: string): number {
  switch (name) {
    case "R":
      return color.r;
    case "G":
      return color.g;
    default:
      return color.b;
  }
}

/** Three bytes per pixel in strip order, channels in `channelOrder`. */
export function encodeFrame(frame: PixelFrame, opts: EncodeOptions): Uint8Array {
  const out = new Uint8Array(frame.width * frame.height * 3);
  const order = opts.channelOrder;
  const c0 = order.charAt(0);
  const c1 = order.charAt(1);
  const c2 = order.charAt(2);
  for (let y = 0; y < frame.height; y++) {
    for (let x = 0; x < frame.width; x++) {
      const source = frame.pixels[y * frame.width + x];
      if (source === undefined) continue;
      const color = applyBrightness(source, frame.brightness);
      const off = stripIndex(x, y, frame.width, opts.serpentine) * 3;
      out[off] = channel(color, c0);
      out[off + 1] = channel(color, c1);
      out[off + 2] = channel(color, c2);
    }
  }
  return out;
}
