export type BeamLogLevel = "debug" | "info" | "warn" | "error";

export type BeamLogEvent = Readonly<{
  level: BeamLogLevel;
  message: string;
  error?: unknown;
}>;

export type BeamLogSink = (event: BeamLogEvent) => void;

export const BEAM_LOG_LEVELS: readonly BeamLogLevel[] = Object.freeze([
  "debug",
  "info",
  "warn",
  "error",
]);

export function isBeamLogLevel(value: unknown): value is BeamLogLevel {
  return typeof value === "string" && BEAM_LOG_LEVELS.some((level) => level === value);
}

export function makeLogSink(log: BeamLogSink | undefined): BeamLogSink {
  if (typeof log === "function") return log;
  return () => {};
}
