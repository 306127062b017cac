/**
 * packages/node/src/control/server.ts — HTTP transport for the control endpoint.
 */

import { type IncomingMessage, type Server, type ServerResponse, createServer } from "node:http";
import type { AddressInfo } from "node:net";
import type { Readable } from "node:stream";
import { type BeamLogSink, type ConfigStore, describeError, makeLogSink } from "@beam/core";
import { type ControlResponse, handleControlRequest } from "./handler.js";

/** Largest accepted request body in bytes. */
export const MAX_BODY_BYTES = 64 * 1024;

export type ReadBodyResult =
  | Readonly<{ ok: true; text: string }>
  | Readonly<{ ok: false; reason: "too-large" }>;

export type ControlServerOptions = Readonly<{
  store: ConfigStore;
  log?: BeamLogSink;
  maxBodyBytes?: number;
}>;

export type ControlServer = Readonly<{
  server: Server;
  listen: (port: number, host: string) => Promise<AddressInfo>;
  close: () => Promise<void>;
}>;

/**
 * Collect a request body as UTF-8. Past `maxBytes` the rest is read and
 * discarded so the stream still ends.
 */
export async function readBody(stream: Readable, maxBytes: number): Promise<ReadBodyResult> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of stream) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    total += buf.byteLength;
    if (total <= maxBytes) {
      chunks.push(buf);
    }
  }
  if (total > maxBytes) {
    return { ok: false, reason: "too-large" };
  }
  return { ok: true, text: Buffer.concat(chunks).toString("utf8") };
}

function requestPath(url: string | undefined): string {
  return new URL(url ?? "/", "http://localhost").pathname;
}

function send(res: ServerResponse, response: ControlResponse): void {
  res.writeHead(response.status, response.headers);
  res.end(response.body);
}

export function createControlServer(opts: ControlServerOptions): ControlServer {
  const { store } = opts;
  const log = makeLogSink(opts.log);
  const maxBodyBytes = opts.maxBodyBytes ?? MAX_BODY_BYTES;

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const body = await readBody(req, maxBodyBytes);
    if (!body.ok) {
      send(res, {
        status: 413,
        headers: {
          "Access-Control-Allow-Origin": "*",
          "Content-Type": "application/json",
          Connection: "close",
        },
        body: JSON.stringify({ error: "request body too large" }),
      });
      return;
    }
    send(
      res,
      handleControlRequest(
        store,
        { method: req.method ?? "GET", path: requestPath(req.url), body: body.text },
        log,
      ),
    );
  };

  const server = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      log({ level: "error", message: `control request failed: ${describeError(error)}`, error });
      if (!res.headersSent) {
        res.writeHead(500);
      }
      res.end();
    });
  });

  return Object.freeze({
    server,
    listen: (port: number, host: string) =>
      new Promise<AddressInfo>((resolve, reject) => {
        const onError = (error: Error): void => {
          reject(error);
        };
        server.once("error", onError);
        server.listen(port, host, () => {
          server.off("error", onError);
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error(`unexpected server address: ${String(address)}`));
            return;
          }
          log({ level: "info", message: `control endpoint listening on ${host}:${String(address.port)}` });
          resolve(address);
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!server.listening) {
          resolve();
          return;
        }
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeAllConnections();
      }),
  });
}
