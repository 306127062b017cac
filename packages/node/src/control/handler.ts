/**
 * packages/node/src/control/handler.ts — Control endpoint routing.
 *
 * Transport-free: takes the method, path and raw body text and returns the
 * response to send. The store is the only state it touches.
 */

import {
  type BeamLogSink,
  type ConfigSnapshot,
  type ConfigStore,
  type PatternId,
  makeLogSink,
} from "@beam/core";

export type ControlRequest = Readonly<{
  method: string;
  path: string;
  body: string;
}>;

export type ControlResponse = Readonly<{
  status: number;
  headers: Readonly<Record<string, string>>;
  body: string;
}>;

/** Snapshot as sent over the wire; colors are `[r, g, b]` triples. */
export type WireSnapshot = Readonly<{
  brightness: number;
  delay: number;
  animation: PatternId | null;
  colors: readonly (readonly [number, number, number])[];
}>;

export const CONTROL_PATH = "/";

const CORS_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "Access-Control-Allow-Origin": "*",
});

const ALLOWED_METHODS = "GET, POST, OPTIONS";

export function toWireSnapshot(snapshot: ConfigSnapshot): WireSnapshot {
  return Object.freeze({
    brightness: snapshot.brightness,
    delay: snapshot.delay,
    animation: snapshot.animation,
    colors: Object.freeze(snapshot.colors.map((c) => Object.freeze([c.r, c.g, c.b] as const))),
  });
}

function json(status: number, value: unknown): ControlResponse {
  return Object.freeze({
    status,
    headers: Object.freeze({ ...CORS_HEADERS, "Content-Type": "application/json" }),
    body: JSON.stringify(value),
  });
}

function empty(status: number, headers: Readonly<Record<string, string>> = {}): ControlResponse {
  return Object.freeze({
    status,
    headers: Object.freeze({ ...CORS_HEADERS, ...headers }),
    body: "",
  });
}

function parseJson(text: string): Readonly<{ ok: true; value: unknown }> | Readonly<{ ok: false }> {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function handleControlRequest(
  store: ConfigStore,
  req: ControlRequest,
  log?: BeamLogSink,
): ControlResponse {
  const emit = makeLogSink(log);

  if (req.path !== CONTROL_PATH) {
    return json(404, { error: "not found" });
  }

  switch (req.method) {
    case "OPTIONS":
      return empty(204, {
        "Access-Control-Allow-Methods": ALLOWED_METHODS,
        "Access-Control-Allow-Headers": "Content-Type",
      });
    case "GET":
      return json(200, toWireSnapshot(store.snapshot()));
    case "POST": {
      if (req.body.trim().length === 0) {
        return empty(302, { Location: CONTROL_PATH });
      }
      const parsed = parseJson(req.body);
      if (!parsed.ok) {
        emit({ level: "warn", message: "rejected control request: body is not valid JSON" });
        return json(400, { error: "request body is not valid JSON" });
      }
      if (!isRecord(parsed.value)) {
        emit({ level: "warn", message: "rejected control request: body is not a JSON object" });
        return json(400, { error: "request body must be a JSON object" });
      }
      const report = store.applyUpdate(parsed.value);
      if (report.applied.length > 0) {
        emit({ level: "debug", message: `applied ${report.applied.join(", ")}` });
      }
      return json(200, toWireSnapshot(store.snapshot()));
    }
    default:
      return empty(405, { Allow: ALLOWED_METHODS });
  }
}
