import { assert, createScriptedRng, describe, test } from "@beam/testkit";
import { wheelColor } from "../../color/hue.js";
import { WHITE } from "../../color/rgb.js";
import { type ConfigStore, createConfigStore } from "../../config/store.js";
import type { BeamLogEvent } from "../../log.js";
import { resolvePattern } from "../../patterns/registry.js";
import type { Pattern, PatternId } from "../../patterns/types.js";
import type { Random } from "../../random.js";
import { createPixelGrid } from "../../surface/pixelGrid.js";
import { type RecordingDriver, createRecordingDriver, framePixel } from "../../testing/index.js";
import {
  type AnimationScheduler,
  type AnimationSchedulerOptions,
  type Sleep,
  advanceFrame,
  createAnimationScheduler,
  defaultSleep,
} from "../scheduler.js";

type Harness = Readonly<{
  scheduler: AnimationScheduler;
  store: ConfigStore;
  driver: RecordingDriver;
  logs: readonly BeamLogEvent[];
  sleeps: readonly number[];
}>;

type HarnessOptions = Readonly<{
  store?: ConfigStore;
  resolve?: AnimationSchedulerOptions["resolve"];
  random?: Random;
}>;

/**
 * Each sleep runs the next step of `script`; the sleep after the last step
 * stops the scheduler.
 */
function createHarness(
  script: readonly ((scheduler: AnimationScheduler) => void)[],
  opts: HarnessOptions = {},
): Harness {
  const store = opts.store ?? createConfigStore();
  const driver = createRecordingDriver();
  const surface = createPixelGrid({ width: 4, height: 2, driver });
  const logs: BeamLogEvent[] = [];
  const sleeps: number[] = [];

  const sleep: Sleep = async (ms) => {
    sleeps.push(ms);
    const next = script[sleeps.length - 1];
    if (next === undefined) {
      scheduler.stop();
      return;
    }
    next(scheduler);
  };

  const scheduler = createAnimationScheduler({
    store,
    surface,
    sleep,
    log: (event) => logs.push(event),
    ...(opts.resolve !== undefined ? { resolve: opts.resolve } : {}),
    ...(opts.random !== undefined ? { random: opts.random } : {}),
  });

  return { scheduler, store, driver, logs, sleeps };
}

function faultingPattern(id: PatternId): Pattern {
  return Object.freeze({
    id,
    counter: () => 0,
    step: () => {
      throw new Error("boom");
    },
  });
}

describe("scheduler", () => {
  test("switching to light replaces rainbow within one frame", async () => {
    const store = createConfigStore();
    const { scheduler, driver, logs, sleeps } = createHarness(
      [() => store.applyUpdate({ animation: "light" })],
      { store },
    );

    await scheduler.run();

    const [rainbowFrame, lightFrame] = driver.frames();
    assert.equal(driver.frames().length, 2);
    assert.ok(rainbowFrame);
    assert.ok(lightFrame);
    for (let x = 0; x < 4; x++) {
      assert.deepEqual(framePixel(rainbowFrame, x, 0), wheelColor(x));
    }
    assert.equal(
      lightFrame.pixels.every((pixel) => pixel === WHITE),
      true,
    );
    assert.deepEqual(
      logs.map((event) => event.message),
      ["starting rainbow sequence", "changing from rainbow to light", "starting light sequence"],
    );
    assert.deepEqual(
      sleeps.map((ms) => Math.round(ms)),
      [50, 50],
    );
    assert.deepEqual(scheduler.stats(), {
      framesRendered: 2,
      selections: 2,
      cancellations: 1,
      faults: 0,
      current: null,
    });
  });

  test("brightness and delay are re-read every frame", async () => {
    const store = createConfigStore();
    const { scheduler, driver, sleeps } = createHarness(
      [() => store.applyUpdate({ brightness: 10, delay: 2 })],
      { store },
    );

    await scheduler.run();

    assert.deepEqual(
      driver.frames().map((frame) => frame.brightness),
      [255, 10],
    );
    assert.deepEqual(
      sleeps.map((ms) => Math.round(ms)),
      [50, 2000],
    );
  });

  test("a faulting pattern is discarded and the loop reselects", async () => {
    const store = createConfigStore();
    const { scheduler, driver, logs } = createHarness(
      [() => store.applyUpdate({ animation: "light" })],
      {
        store,
        resolve: (id) => (id === "rainbow" ? () => faultingPattern("rainbow") : resolvePattern(id)),
      },
    );

    await scheduler.run();

    assert.equal(driver.frames().length, 1);
    const fault = logs.find((event) => event.level === "error");
    assert.ok(fault);
    assert.equal(fault.message, "rainbow faulted: Error: boom");
    assert.ok(fault.error instanceof Error);
    assert.equal(scheduler.stats().faults, 1);
    assert.equal(scheduler.stats().framesRendered, 1);
  });

  test("a factory that throws counts as a fault", async () => {
    const store = createConfigStore();
    const { scheduler, logs, driver } = createHarness(
      [() => store.applyUpdate({ animation: "strip" })],
      {
        store,
        resolve: (id) =>
          id === "rainbow"
            ? () => {
                throw new Error("no surface");
              }
            : resolvePattern(id),
      },
    );

    await scheduler.run();

    assert.equal(logs[0]?.message, "failed to start rainbow: Error: no surface");
    assert.equal(logs[1]?.message, "starting strip sequence");
    assert.equal(driver.frames().length, 1);
    assert.equal(scheduler.stats().faults, 1);
  });

  test("an unpinned store picks a random pattern and never cancels it", async () => {
    const store = createConfigStore({ initial: { activePattern: null } });
    const { scheduler, logs } = createHarness([() => {}, () => {}], {
      store,
      random: createScriptedRng([0.5]),
    });

    await scheduler.run();

    assert.deepEqual(
      logs.map((event) => event.message),
      ["starting bloom sequence"],
    );
    assert.equal(scheduler.stats().framesRendered, 3);
    assert.equal(scheduler.stats().cancellations, 0);
  });

  test("run is single-flight and reports running state", async () => {
    let observed: boolean | null = null;
    const { scheduler } = createHarness([
      (running) => {
        observed = running.isRunning();
      },
    ]);

    const first = scheduler.run();
    await scheduler.run();
    await first;

    assert.equal(observed, true);
    assert.equal(scheduler.isRunning(), false);
    assert.equal(scheduler.stats().selections, 1);
  });
});

describe("scheduler/advanceFrame", () => {
  test("cancels without computing when the store names another pattern", async () => {
    const store = createConfigStore({ initial: { activePattern: "strip" } });
    const driver = createRecordingDriver();
    const surface = createPixelGrid({ width: 2, height: 1, driver });
    let stepped = 0;
    const pattern: Pattern = {
      id: "rainbow",
      counter: () => stepped,
      step: () => {
        stepped++;
      },
    };

    const outcome = await advanceFrame(pattern, store, surface);

    assert.deepEqual(outcome, { kind: "cancelled", next: "strip" });
    assert.equal(stepped, 0);
    assert.equal(driver.frames().length, 0);
  });

  test("reports driver failures as faults", async () => {
    const store = createConfigStore();
    const surface = createPixelGrid({
      width: 1,
      height: 1,
      driver: {
        present: () => {
          throw new Error("port closed");
        },
      },
    });

    const pattern = resolvePattern("rainbow")({ surface, palette: store.palette, random: () => 0 });

    const outcome = await advanceFrame(pattern, store, surface);

    assert.equal(outcome.kind, "faulted");
  });
});

describe("scheduler/defaultSleep", () => {
  test("resolves early when aborted", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = defaultSleep(60_000, controller.signal);
    controller.abort();
    await pending;
    assert.equal(Date.now() - started < 5_000, true);
  });

  test("resolves immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await defaultSleep(60_000, controller.signal);
  });
});
