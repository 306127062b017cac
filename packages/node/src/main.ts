/**
 * Process entry: `node --import tsx packages/node/src/main.ts`.
 */

import { describeError } from "@beam/core";
import { loadBeamConfig } from "./config.js";
import { createConsoleLogSink } from "./log.js";
import { createBeamRuntime } from "./runtime.js";

async function main(): Promise<void> {
  const config = loadBeamConfig();
  const log = createConsoleLogSink({ minLevel: config.logLevel });
  const runtime = createBeamRuntime({ config, log });

  const shutdown = (signal: string): void => {
    log({ level: "info", message: `received ${signal}, shutting down` });
    runtime.stop().catch((error: unknown) => {
      log({ level: "error", message: `shutdown failed: ${describeError(error)}`, error });
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await runtime.start();
}

main().catch((error: unknown) => {
  process.stderr.write(`beam failed to start: ${describeError(error)}\n`);
  process.exitCode = 1;
});
