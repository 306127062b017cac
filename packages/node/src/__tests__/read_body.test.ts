import assert from "node:assert/strict";
import { Readable } from "node:stream";
import test from "node:test";
import { createConfigStore } from "@beam/core";
import { MAX_BODY_BYTES, createControlServer, readBody } from "../control/server.js";

test("readBody: joins chunks as UTF-8 text", async () => {
  const result = await readBody(Readable.from(['{"delay":', " 0.5}"]), MAX_BODY_BYTES);
  assert.deepEqual(result, { ok: true, text: '{"delay": 0.5}' });
});

test("readBody: multi-byte characters split across chunks survive", async () => {
  const bytes = Buffer.from("é", "utf8");
  const result = await readBody(
    Readable.from([bytes.subarray(0, 1), bytes.subarray(1)]),
    MAX_BODY_BYTES,
  );
  assert.deepEqual(result, { ok: true, text: "é" });
});

test("readBody: empty stream is an empty body", async () => {
  const result = await readBody(Readable.from([]), MAX_BODY_BYTES);
  assert.deepEqual(result, { ok: true, text: "" });
});

test("readBody: body over the limit is refused after reading to the end", async () => {
  const stream = Readable.from([Buffer.alloc(4), Buffer.alloc(4), Buffer.alloc(4)]);
  const result = await readBody(stream, 5);
  assert.deepEqual(result, { ok: false, reason: "too-large" });
  assert.equal(stream.readableEnded, true);
});

test("control server: close before listen resolves", async () => {
  const control = createControlServer({ store: createConfigStore() });
  assert.equal(control.server.listening, false);
  await control.close();
});
