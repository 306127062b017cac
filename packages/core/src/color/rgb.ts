/**
 * packages/core/src/color/rgb.ts — RGB triples, hex parsing and scaling.
 */

/** 8-bit RGB color. Channels are integers in 0..255. */
export type Rgb = Readonly<{ r: number; g: number; b: number }>;

export const BLACK: Rgb = Object.freeze({ r: 0, g: 0, b: 0 });
export const WHITE: Rgb = Object.freeze({ r: 255, g: 255, b: 255 });

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a frozen RGB color, clamping each channel to the byte range. */
export function rgb(r: number, g: number, b: number): Rgb {
  return Object.freeze({ r: clampChannel(r), g: clampChannel(g), b: clampChannel(b) });
}

/**
 * Parse `#rrggbb` or `#rgb` (the leading `#` is optional).
 * Returns null for anything else, including non-string input.
 */
export function parseHexColor(input: unknown): Rgb | null {
  if (typeof input !== "string") return null;
  const raw = input.startsWith("#") ? input.slice(1) : input;
  if (/^[0-9a-fA-F]{6}$/.test(raw)) {
    const packed = Number.parseInt(raw, 16);
    return rgb((packed >>> 16) & 0xff, (packed >>> 8) & 0xff, packed & 0xff);
  }
  if (/^[0-9a-fA-F]{3}$/.test(raw)) {
    const r = Number.parseInt(raw[0] ?? "0", 16);
    const g = Number.parseInt(raw[1] ?? "0", 16);
    const b = Number.parseInt(raw[2] ?? "0", 16);
    return rgb((r << 4) | r, (g << 4) | g, (b << 4) | b);
  }
  return null;
}

export function formatHexColor(color: Rgb): string {
  const hex = (v: number) => clampChannel(v).toString(16).padStart(2, "0");
  return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`;
}

/**
 * Scale every channel by `level / 256` using integer arithmetic.
 * `level` is clamped to 0..255, so full level maps 255 to 254.
 */
export function scaleRgb(color: Rgb, level: number): Rgb {
  const l = clampChannel(level);
  return rgb((color.r * l) >> 8, (color.g * l) >> 8, (color.b * l) >> 8);
}

export function rgbEquals(a: Rgb, b: Rgb): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/** Ordered, never-empty color list consumed by palette-driven patterns. */
export type Palette = readonly [Rgb, ...Rgb[]];

export const DEFAULT_PALETTE: Palette = Object.freeze([WHITE] as const);

/** Palette entry at `index`, wrapping modulo the palette length. */
export function paletteAt(palette: Palette, index: number): Rgb {
  const n = palette.length;
  const i = ((Math.trunc(index) % n) + n) % n;
  return palette[i] ?? palette[0];
}
