/**
 * @beam/core
 *
 * Runtime-agnostic animation engine for addressable light grids.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors & logging
// =============================================================================

export { BeamError, type BeamErrorCode, describeError } from "./errors.js";
export {
  BEAM_LOG_LEVELS,
  type BeamLogEvent,
  type BeamLogLevel,
  type BeamLogSink,
  isBeamLogLevel,
  makeLogSink,
} from "./log.js";
export { type Random, defaultRandom, randomInt } from "./random.js";

// =============================================================================
// Colors
// =============================================================================

export {
  BLACK,
  DEFAULT_PALETTE,
  type Palette,
  type Rgb,
  WHITE,
  formatHexColor,
  paletteAt,
  parseHexColor,
  rgb,
  rgbEquals,
  scaleRgb,
} from "./color/rgb.js";
export { WHEEL_STEPS, hueByDistance, hueToRgb, radialField, wheelColor } from "./color/hue.js";

// =============================================================================
// Pixel surface
// =============================================================================

export type { PixelDriver, PixelFrame, PixelSurface } from "./surface/types.js";
export { type PixelGridOptions, createPixelGrid } from "./surface/pixelGrid.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  BRIGHTNESS_MAX,
  BRIGHTNESS_MIN,
  DELAY_MAX_SECONDS,
  DELAY_MIN_SECONDS,
  type FieldResult,
  validateAnimation,
  validateBrightness,
  validateDelay,
  validatePalette,
} from "./config/validate.js";
export {
  type ConfigField,
  type ConfigSnapshot,
  type ConfigStore,
  type ConfigStoreInitial,
  type ConfigStoreOptions,
  type ConfigUpdateReport,
  DEFAULT_BRIGHTNESS,
  DEFAULT_DELAY_SECONDS,
  DEFAULT_PATTERN,
  createConfigStore,
} from "./config/store.js";

// =============================================================================
// Patterns
// =============================================================================

export {
  PATTERN_IDS,
  type Pattern,
  type PatternContext,
  type PatternFactory,
  type PatternId,
} from "./patterns/types.js";
export { isPatternId, pickRandomPattern, resolvePattern } from "./patterns/registry.js";
export { createRainbowPattern } from "./patterns/rainbow.js";
export { createLightPattern } from "./patterns/light.js";
export { createStripPattern } from "./patterns/strip.js";
export { type BloomOptions, createBloomPattern } from "./patterns/bloom.js";
export {
  type MatrixRainOptions,
  type MatrixRainPattern,
  type RainDrop,
  createMatrixRainPattern,
} from "./patterns/matrixRain.js";

// =============================================================================
// Scheduler
// =============================================================================

export {
  type AnimationScheduler,
  type AnimationSchedulerOptions,
  type FrameOutcome,
  type SchedulerStats,
  type Sleep,
  advanceFrame,
  createAnimationScheduler,
  defaultSleep,
} from "./scheduler/scheduler.js";
