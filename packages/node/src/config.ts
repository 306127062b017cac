/**
 * packages/node/src/config.ts — Process configuration from the environment.
 *
 *   BEAM_PORT           control endpoint port (default 5555)
 *   BEAM_HOST           control endpoint bind address (default 127.0.0.1)
 *   BEAM_WIDTH          pixels per strip (default 36)
 *   BEAM_HEIGHT         number of strips (default 2)
 *   BEAM_DRIVER         "sim" | "serial" (default "sim")
 *   BEAM_SERIAL_PATH    device written by the serial driver (default /dev/ttyACM0)
 *   BEAM_CHANNEL_ORDER  byte order per pixel for the serial driver (default GRB)
 *   BEAM_SERPENTINE     alternate strip direction per row (default on)
 *   BEAM_LOG_LEVEL      debug | info | warn | error (default info)
 */

import { BeamError, type BeamLogLevel, isBeamLogLevel } from "@beam/core";
import { type ChannelOrder, isChannelOrder } from "./drivers/encode.js";

type EnvMap = Readonly<Record<string, string | undefined>>;

export type DriverKind = "sim" | "serial";

export type BeamNodeConfig = Readonly<{
  port: number;
  host: string;
  width: number;
  height: number;
  driver: DriverKind;
  serialPath: string;
  channelOrder: ChannelOrder;
  serpentine: boolean;
  logLevel: BeamLogLevel;
}>;

export const DEFAULT_NODE_CONFIG: BeamNodeConfig = Object.freeze({
  port: 5555,
  host: "127.0.0.1",
  width: 36,
  height: 2,
  driver: "sim",
  serialPath: "/dev/ttyACM0",
  channelOrder: "GRB",
  serpentine: true,
  logLevel: "info",
});

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envPositiveInt(env: EnvMap, key: string, fallback: number): number {
  const raw = envText(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function envFlag(env: EnvMap, key: string, fallback: boolean): boolean {
  const raw = envText(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return fallback;
}

function envChoice<T extends string>(
  env: EnvMap,
  key: string,
  fallback: T,
  accept: (value: string) => value is T,
): T {
  const raw = envText(env, key);
  if (raw === undefined) return fallback;
  if (!accept(raw)) {
    throw new BeamError("BEAM_INVALID_CONFIG", `${key} has unsupported value ${JSON.stringify(raw)}`);
  }
  return raw;
}

function isDriverKind(value: string): value is DriverKind {
  return value === "sim" || value === "serial";
}

export function loadBeamConfig(env: EnvMap = process.env): BeamNodeConfig {
  const d = DEFAULT_NODE_CONFIG;
  return Object.freeze({
    port: envPositiveInt(env, "BEAM_PORT", d.port),
    host: envText(env, "BEAM_HOST") ?? d.host,
    width: envPositiveInt(env, "BEAM_WIDTH", d.width),
    height: envPositiveInt(env, "BEAM_HEIGHT", d.height),
    driver: envChoice(env, "BEAM_DRIVER", d.driver, isDriverKind),
    serialPath: envText(env, "BEAM_SERIAL_PATH") ?? d.serialPath,
    channelOrder: envChoice(env, "BEAM_CHANNEL_ORDER", d.channelOrder, isChannelOrder),
    serpentine: envFlag(env, "BEAM_SERPENTINE", d.serpentine),
    logLevel: envChoice(env, "BEAM_LOG_LEVEL", d.logLevel, isBeamLogLevel),
  });
}
