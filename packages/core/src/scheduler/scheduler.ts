/**
 * packages/core/src/scheduler/scheduler.ts — Animation scheduler.
 *
 * Runs one pattern at a time against the pixel surface:
 *
 *   SELECT → RUN → { CANCELLED | FAULTED } → SELECT → …
 *
 * Cancellation is polled at the top of every frame by comparing the store's
 * active pattern with the running instance's id. The only suspension point
 * is the per-frame delay, which is where control updates take effect.
 */

import type { ConfigStore } from "../config/store.js";
import { describeError } from "../errors.js";
import { type BeamLogSink, makeLogSink } from "../log.js";
import { pickRandomPattern, resolvePattern } from "../patterns/registry.js";
import type { Pattern, PatternFactory, PatternId } from "../patterns/types.js";
import { type Random, defaultRandom } from "../random.js";
import type { PixelSurface } from "../surface/types.js";

/** Result of one pass through the RUN state. */
export type FrameOutcome =
  | Readonly<{ kind: "continue"; delayMs: number }>
  | Readonly<{ kind: "cancelled"; next: PatternId }>
  | Readonly<{ kind: "faulted"; error: unknown }>;

/** Suspend for `ms`; must resolve early once `signal` aborts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type SchedulerStats = Readonly<{
  framesRendered: number;
  selections: number;
  cancellations: number;
  faults: number;
  current: PatternId | null;
}>;

export type AnimationSchedulerOptions = Readonly<{
  store: ConfigStore;
  surface: PixelSurface;
  random?: Random;
  sleep?: Sleep;
  /** Pattern lookup. Defaults to the built-in registry. */
  resolve?: (id: PatternId) => PatternFactory;
  log?: BeamLogSink;
}>;

export type AnimationScheduler = Readonly<{
  /** Select and run patterns until `stop()` is called. */
  run: () => Promise<void>;
  /** End the loop at the next suspension point. */
  stop: () => void;
  isRunning: () => boolean;
  stats: () => SchedulerStats;
}>;

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Run a single frame of `pattern`: sync brightness and delay from the store,
 * check for cancellation, then compute and flush.
 */
export async function advanceFrame(
  pattern: Pattern,
  store: ConfigStore,
  surface: PixelSurface,
): Promise<FrameOutcome> {
  surface.setBrightness(store.brightness());
  const delayMs = store.delay() * 1000;

  const wanted = store.activePattern();
  if (wanted !== null && wanted !== pattern.id) {
    return Object.freeze({ kind: "cancelled", next: wanted });
  }

  try {
    pattern.step();
    await surface.flush();
  } catch (error: unknown) {
    return Object.freeze({ kind: "faulted", error });
  }
  return Object.freeze({ kind: "continue", delayMs });
}

export function createAnimationScheduler(opts: AnimationSchedulerOptions): AnimationScheduler {
  const { store, surface } = opts;
  const random = opts.random ?? defaultRandom;
  const sleep = opts.sleep ?? defaultSleep;
  const resolve = opts.resolve ?? resolvePattern;
  const log = makeLogSink(opts.log);

  let abort: AbortController | null = null;
  let current: PatternId | null = null;
  let framesRendered = 0;
  let selections = 0;
  let cancellations = 0;
  let faults = 0;

  const select = (): Pattern | null => {
    const id = store.activePattern() ?? pickRandomPattern(random);
    selections++;
    try {
      const pattern = resolve(id)({ surface, palette: store.palette, random });
      log({ level: "info", message: `starting ${pattern.id} sequence` });
      return pattern;
    } catch (error: unknown) {
      faults++;
      log({ level: "error", message: `failed to start ${id}: ${describeError(error)}`, error });
      return null;
    }
  };

  const runPattern = async (pattern: Pattern, signal: AbortSignal): Promise<void> => {
    current = pattern.id;
    try {
      while (!signal.aborted) {
        const outcome = await advanceFrame(pattern, store, surface);
        switch (outcome.kind) {
          case "continue":
            framesRendered++;
            await sleep(outcome.delayMs, signal);
            break;
          case "cancelled":
            cancellations++;
            log({ level: "info", message: `changing from ${pattern.id} to ${outcome.next}` });
            return;
          case "faulted":
            faults++;
            log({
              level: "error",
              message: `${pattern.id} faulted: ${describeError(outcome.error)}`,
              error: outcome.error,
            });
            await sleep(store.delay() * 1000, signal);
            return;
        }
      }
    } finally {
      current = null;
    }
  };

  const run = async (): Promise<void> => {
    if (abort !== null) return;
    const controller = new AbortController();
    abort = controller;
    try {
      while (!controller.signal.aborted) {
        const pattern = select();
        if (pattern === null) {
          await sleep(store.delay() * 1000, controller.signal);
          continue;
        }
        await runPattern(pattern, controller.signal);
      }
    } finally {
      abort = null;
    }
  };

  return Object.freeze({
    run,
    stop: () => {
      abort?.abort();
    },
    isRunning: () => abort !== null,
    stats: (): SchedulerStats =>
      Object.freeze({ framesRendered, selections, cancellations, faults, current }),
  });
}
