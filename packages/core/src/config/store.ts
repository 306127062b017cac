/**
 * packages/core/src/config/store.ts — Live animation configuration.
 *
 * Shared by the control endpoint (writer) and the animation scheduler
 * (reader). Each field is stored and replaced on its own: an update that
 * carries several fields applies every valid one and drops the rest, and a
 * reader may observe fields from different updates within one frame. The
 * palette is replaced by reference, so readers never see a partial list.
 */

import { DEFAULT_PALETTE, type Palette, type Rgb } from "../color/rgb.js";
import { BeamError } from "../errors.js";
import { type BeamLogSink, makeLogSink } from "../log.js";
import type { PatternId } from "../patterns/types.js";
import {
  type FieldResult,
  validateAnimation,
  validateBrightness,
  validateDelay,
  validatePalette,
} from "./validate.js";

export const DEFAULT_DELAY_SECONDS = 0.05;
export const DEFAULT_BRIGHTNESS = 255;
export const DEFAULT_PATTERN: PatternId = "rainbow";

export type ConfigField = "delay" | "brightness" | "animation" | "colors";

export type ConfigUpdateReport = Readonly<{
  applied: readonly ConfigField[];
  rejected: readonly Readonly<{ field: ConfigField; reason: string }>[];
}>;

export type ConfigSnapshot = Readonly<{
  brightness: number;
  delay: number;
  /** Null when no pattern is pinned and the scheduler picks at random. */
  animation: PatternId | null;
  colors: readonly Rgb[];
}>;

export type ConfigStoreInitial = Readonly<{
  delay?: number;
  brightness?: number;
  activePattern?: PatternId | null;
  palette?: Palette;
}>;

export type ConfigStoreOptions = Readonly<{
  initial?: ConfigStoreInitial;
  log?: BeamLogSink;
}>;

export type ConfigStore = Readonly<{
  /** Frame delay in seconds. */
  delay: () => number;
  brightness: () => number;
  activePattern: () => PatternId | null;
  palette: () => Palette;
  /** Apply an untrusted `{ delay, brightness, animation, colors }` record field by field. */
  applyUpdate: (update: unknown) => ConfigUpdateReport;
  snapshot: () => ConfigSnapshot;
}>;

const EMPTY_REPORT: ConfigUpdateReport = Object.freeze({
  applied: Object.freeze([]),
  rejected: Object.freeze([]),
});

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireInitial<T>(field: string, result: FieldResult<T>): T {
  if (!result.ok) {
    throw new BeamError("BEAM_INVALID_CONFIG", `Invalid initial ${field}: ${result.reason}`);
  }
  return result.value;
}

export function createConfigStore(opts: ConfigStoreOptions = {}): ConfigStore {
  const initial = opts.initial ?? {};
  const log = makeLogSink(opts.log);

  let delay = requireInitial("delay", validateDelay(initial.delay ?? DEFAULT_DELAY_SECONDS));
  let brightness = requireInitial(
    "brightness",
    validateBrightness(initial.brightness ?? DEFAULT_BRIGHTNESS),
  );
  let activePattern: PatternId | null =
    initial.activePattern === undefined ? DEFAULT_PATTERN : initial.activePattern;
  let palette: Palette = initial.palette ?? DEFAULT_PALETTE;

  const applyUpdate = (update: unknown): ConfigUpdateReport => {
    if (!isRecord(update)) {
      log({ level: "warn", message: "ignoring configuration update that is not an object" });
      return EMPTY_REPORT;
    }

    const applied: ConfigField[] = [];
    const rejected: { field: ConfigField; reason: string }[] = [];

    const apply = <T>(field: ConfigField, result: FieldResult<T>, commit: (value: T) => void) => {
      if (result.ok) {
        commit(result.value);
        applied.push(field);
        return;
      }
      rejected.push({ field, reason: result.reason });
      log({ level: "info", message: result.reason });
    };

    if (update["delay"] !== undefined) {
      apply("delay", validateDelay(update["delay"]), (value) => {
        delay = value;
      });
    }
    if (update["brightness"] !== undefined) {
      apply("brightness", validateBrightness(update["brightness"]), (value) => {
        brightness = value;
      });
    }
    if (update["animation"] !== undefined) {
      apply("animation", validateAnimation(update["animation"]), (value) => {
        activePattern = value;
      });
    }
    if (update["colors"] !== undefined) {
      apply("colors", validatePalette(update["colors"]), (value) => {
        palette = value;
      });
    }

    return Object.freeze({
      applied: Object.freeze(applied),
      rejected: Object.freeze(rejected.map((entry) => Object.freeze(entry))),
    });
  };

  return Object.freeze({
    delay: () => delay,
    brightness: () => brightness,
    activePattern: () => activePattern,
    palette: () => palette,
    applyUpdate,
    snapshot: (): ConfigSnapshot =>
      Object.freeze({
        brightness,
        delay,
        animation: activePattern,
        colors: palette,
      }),
  });
}
