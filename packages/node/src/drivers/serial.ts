/**
 * packages/node/src/drivers/serial.ts — Raw byte-stream driver for LED strips.
 *
 * Writes one encoded frame per flush to a writable, typically a serial
 * device opened as a file. Waits for `drain` when the stream is saturated.
 */

import { once } from "node:events";
import { createWriteStream } from "node:fs";
import type { Writable } from "node:stream";
import { BeamError, type PixelFrame, describeError } from "@beam/core";
import { type EncodeOptions, encodeFrame } from "./encode.js";

export type SerialDriverOptions = EncodeOptions &
  Readonly<{
    stream: Writable;
  }>;

export type SerialDriver = Readonly<{
  present: (frame: PixelFrame) => Promise<void>;
  close: () => Promise<void>;
}>;

/** Resolves on `drain`; rejects if the stream errors or closes first. */
async function waitForDrain(stream: Writable): Promise<void> {
  const abort = new AbortController();
  try {
    const drained = await Promise.race([
      once(stream, "drain", { signal: abort.signal }).then(() => true),
      once(stream, "close", { signal: abort.signal }).then(() => false),
    ]);
    if (!drained) {
      throw new BeamError("BEAM_DRIVER_ERROR", "serial stream closed before draining");
    }
  } catch (error: unknown) {
    if (error instanceof BeamError) throw error;
    throw new BeamError("BEAM_DRIVER_ERROR", `serial stream failed: ${describeError(error)}`);
  } finally {
    abort.abort();
  }
}

export function createSerialDriver(opts: SerialDriverOptions): SerialDriver {
  const { stream } = opts;
  const encode = { channelOrder: opts.channelOrder, serpentine: opts.serpentine };
  let failure: Error | null = null;
  stream.on("error", (error: Error) => {
    failure = error;
  });

  return Object.freeze({
    present: async (frame: PixelFrame) => {
      if (failure !== null) {
        throw new BeamError("BEAM_DRIVER_ERROR", `serial stream failed: ${failure.message}`);
      }
      if (stream.destroyed || stream.writableEnded) {
        throw new BeamError("BEAM_DRIVER_ERROR", "serial stream is closed");
      }
      if (!stream.write(encodeFrame(frame, encode))) {
        await waitForDrain(stream);
      }
    },
    close: async () => {
      if (stream.writableEnded || stream.destroyed) return;
      stream.end();
      await once(stream, "finish");
    },
  });
}

/** Serial driver writing to a device path such as `/dev/ttyACM0`. */
export function openSerialDriver(path: string, encode: EncodeOptions): SerialDriver {
  return createSerialDriver({ ...encode, stream: createWriteStream(path, { flags: "w" }) });
}
