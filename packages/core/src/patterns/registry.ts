import { BeamError } from "../errors.js";
import { type Random, randomInt } from "../random.js";
import { createBloomPattern } from "./bloom.js";
import { createLightPattern } from "./light.js";
import { createMatrixRainPattern } from "./matrixRain.js";
import { createRainbowPattern } from "./rainbow.js";
import { createStripPattern } from "./strip.js";
import { PATTERN_IDS, type PatternFactory, type PatternId } from "./types.js";

const PATTERN_FACTORIES: Readonly<Record<PatternId, PatternFactory>> = Object.freeze({
  rainbow: createRainbowPattern,
  light: createLightPattern,
  bloom: (ctx) => createBloomPattern(ctx),
  strip: createStripPattern,
  rain: (ctx) => createMatrixRainPattern(ctx),
});

export function isPatternId(value: unknown): value is PatternId {
  return typeof value === "string" && PATTERN_IDS.some((id) => id === value);
}

/**
 * Look up the factory for a pattern identifier.
 * Throws `BEAM_UNKNOWN_PATTERN` for names outside the built-in set.
 */
export function resolvePattern(identifier: string): PatternFactory {
  if (!isPatternId(identifier)) {
    throw new BeamError("BEAM_UNKNOWN_PATTERN", `Unknown pattern: ${JSON.stringify(identifier)}`);
  }
  return PATTERN_FACTORIES[identifier];
}

/** Uniform choice among the built-in patterns. */
export function pickRandomPattern(random: Random): PatternId {
  return PATTERN_IDS[randomInt(random, PATTERN_IDS.length)] ?? "rainbow";
}
