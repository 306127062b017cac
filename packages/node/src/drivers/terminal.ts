/**
 * packages/node/src/drivers/terminal.ts — Truecolor terminal simulator.
 *
 * Draws each frame as a block of colored cells, redrawing in place.
 */

import type { Writable } from "node:stream";
import type { PixelDriver, PixelFrame } from "@beam/core";
import { applyBrightness } from "./encode.js";

const ESC = "\u001b";
const CELL = "██";

export type TerminalDriverOptions = Readonly<{
  stream: Writable;
}>;

/** Text for one frame, ending with a color reset after every row. */
export function renderFrameText(frame: PixelFrame): string {
  let out = "";
  for (let y = 0; y < frame.height; y++) {
    for (let x = 0; x < frame.width; x++) {
      const source = frame.pixels[y * frame.width + x];
      if (source === undefined) continue;
      const { r, g, b } = applyBrightness(source, frame.brightness);
      out += `${ESC}[38;2;${String(r)};${String(g)};${String(b)}m${CELL}`;
    }
    out += `${ESC}[0m\n`;
  }
  return out;
}

export function createTerminalDriver(opts: TerminalDriverOptions): PixelDriver {
  const { stream } = opts;
  let drawnRows = 0;

  return Object.freeze({
    present: (frame: PixelFrame) => {
      const rewind = drawnRows > 0 ? `${ESC}[${String(drawnRows)}A` : "";
      stream.write(rewind + renderFrameText(frame));
      drawnRows = frame.height;
    },
  });
}
