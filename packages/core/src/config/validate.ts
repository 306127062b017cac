/**
 * packages/core/src/config/validate.ts — Field validators for live configuration.
 *
 * Validators never throw; each returns a result with either the accepted
 * value or a human-readable rejection reason.
 */

import { type Palette, type Rgb, parseHexColor } from "../color/rgb.js";
import { isPatternId } from "../patterns/registry.js";
import type { PatternId } from "../patterns/types.js";

export type FieldResult<T> = Readonly<{ ok: true; value: T }> | Readonly<{ ok: false; reason: string }>;

export const DELAY_MIN_SECONDS = 0.0001;
export const DELAY_MAX_SECONDS = 10;
export const BRIGHTNESS_MIN = 0;
export const BRIGHTNESS_MAX = 255;

function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    value === null ||
    value === undefined
  ) {
    return String(value);
  }
  if (Array.isArray(value)) return "[array]";
  return "[object]";
}

function reject(reason: string): Readonly<{ ok: false; reason: string }> {
  return Object.freeze({ ok: false, reason });
}

function accept<T>(value: T): Readonly<{ ok: true; value: T }> {
  return Object.freeze({ ok: true, value });
}

export function validateDelay(value: unknown): FieldResult<number> {
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    value < DELAY_MIN_SECONDS ||
    value > DELAY_MAX_SECONDS
  ) {
    return reject(
      `delay must be a number in ${String(DELAY_MIN_SECONDS)}..${String(DELAY_MAX_SECONDS)} (received ${formatValue(value)})`,
    );
  }
  return accept(value);
}

export function validateBrightness(value: unknown): FieldResult<number> {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < BRIGHTNESS_MIN ||
    value > BRIGHTNESS_MAX
  ) {
    return reject(
      `brightness must be an integer ${String(BRIGHTNESS_MIN)}..${String(BRIGHTNESS_MAX)} (received ${formatValue(value)})`,
    );
  }
  return accept(value);
}

export function validateAnimation(value: unknown): FieldResult<PatternId> {
  if (!isPatternId(value)) return reject(`unknown animation: ${formatValue(value)}`);
  return accept(value);
}

/**
 * A palette is accepted only as a whole: every entry must be a hex color and
 * the list must not be empty.
 */
export function validatePalette(value: unknown): FieldResult<Palette> {
  if (!Array.isArray(value)) return reject(`colors must be an array (received ${formatValue(value)})`);
  const colors: Rgb[] = [];
  for (let i = 0; i < value.length; i++) {
    const entry: unknown = value[i];
    const parsed = parseHexColor(entry);
    if (parsed === null) {
      return reject(`invalid color passed at colors[${String(i)}]: ${formatValue(entry)}`);
    }
    colors.push(parsed);
  }
  const [first, ...rest] = colors;
  if (first === undefined) return reject("colors must not be empty");
  return accept(Object.freeze([first, ...rest] as const));
}
