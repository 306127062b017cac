/**
 * packages/node/src/runtime.ts — Wires store, surface, driver, scheduler and
 * control endpoint into one process runtime.
 */

import type { Writable } from "node:stream";
import {
  type AnimationScheduler,
  type BeamLogSink,
  type ConfigStore,
  type PixelDriver,
  type PixelSurface,
  createAnimationScheduler,
  createConfigStore,
  createPixelGrid,
} from "@beam/core";
import type { BeamNodeConfig } from "./config.js";
import { type ControlServer, createControlServer } from "./control/server.js";
import { openSerialDriver } from "./drivers/serial.js";
import { createTerminalDriver } from "./drivers/terminal.js";

export type BeamRuntimeOptions = Readonly<{
  config: BeamNodeConfig;
  log: BeamLogSink;
  /** Driver override; defaults to the one named by `config.driver`. */
  driver?: PixelDriver;
  /** Output for the terminal simulator (default: process.stdout). */
  simulatorStream?: Writable;
}>;

export type BeamRuntime = Readonly<{
  store: ConfigStore;
  surface: PixelSurface;
  scheduler: AnimationScheduler;
  control: ControlServer;
  /** Start the control endpoint and run animations until `stop()`. */
  start: () => Promise<void>;
  stop: () => Promise<void>;
}>;

type RuntimeDriver = PixelDriver & Readonly<{ close?: () => Promise<void> }>;

function createDriver(opts: BeamRuntimeOptions): RuntimeDriver {
  if (opts.driver) return opts.driver;
  const { config } = opts;
  if (config.driver === "serial") {
    return openSerialDriver(config.serialPath, {
      channelOrder: config.channelOrder,
      serpentine: config.serpentine,
    });
  }
  return createTerminalDriver({ stream: opts.simulatorStream ?? process.stdout });
}

export function createBeamRuntime(opts: BeamRuntimeOptions): BeamRuntime {
  const { config, log } = opts;
  const store = createConfigStore({ log });
  const driver = createDriver(opts);
  const surface = createPixelGrid({
    width: config.width,
    height: config.height,
    brightness: store.brightness(),
    driver,
  });
  const scheduler = createAnimationScheduler({ store, surface, log });
  const control = createControlServer({ store, log });

  let running: Promise<void> | null = null;

  return Object.freeze({
    store,
    surface,
    scheduler,
    control,
    start: async () => {
      if (running !== null) return running;
      await control.listen(config.port, config.host);
      running = scheduler.run();
      return running;
    },
    stop: async () => {
      scheduler.stop();
      await running;
      running = null;
      await control.close();
      await driver.close?.();
      log({ level: "info", message: "stopped" });
    },
  });
}
