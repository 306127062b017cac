import type { Writable } from "node:stream";
import { BEAM_LOG_LEVELS, type BeamLogLevel, type BeamLogSink, describeError } from "@beam/core";

export type ConsoleLogSinkOptions = Readonly<{
  minLevel?: BeamLogLevel;
  stream?: Writable;
  /** Clock for line timestamps. */
  now?: () => Date;
}>;

function rank(level: BeamLogLevel): number {
  return BEAM_LOG_LEVELS.indexOf(level);
}

/**
 * One line per event: `<ISO time> [beam][<level>] <message>`, with the
 * error's stack (or description) on the following lines.
 */
export function createConsoleLogSink(opts: ConsoleLogSinkOptions = {}): BeamLogSink {
  const minRank = rank(opts.minLevel ?? "info");
  const stream = opts.stream ?? process.stderr;
  const now = opts.now ?? (() => new Date());

  return (event) => {
    if (rank(event.level) < minRank) return;
    let line = `${now().toISOString()} [beam][${event.level}] ${event.message}\n`;
    if (event.error !== undefined) {
      const detail =
        event.error instanceof Error && typeof event.error.stack === "string"
          ? event.error.stack
          : describeError(event.error);
      line += `${detail}\n`;
    }
    stream.write(line);
  };
}
