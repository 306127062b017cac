import assert from "node:assert/strict";
import test from "node:test";
import { type BeamLogEvent, createConfigStore } from "@beam/core";
import { handleControlRequest } from "../control/handler.js";

function post(body: string) {
  const store = createConfigStore();
  const logs: BeamLogEvent[] = [];
  const response = handleControlRequest(store, { method: "POST", path: "/", body }, (event) =>
    logs.push(event),
  );
  return { store, logs, response };
}

test("control: POST applies the update and returns the new snapshot", () => {
  const { response } = post(JSON.stringify({ animation: "light" }));
  assert.equal(response.status, 200);
  assert.equal(response.headers["Content-Type"], "application/json");
  assert.equal(response.headers["Access-Control-Allow-Origin"], "*");
  assert.deepEqual(JSON.parse(response.body), {
    brightness: 255,
    delay: 0.05,
    animation: "light",
    colors: [[255, 255, 255]],
  });
});

test("control: invalid fields are dropped while valid ones apply", () => {
  const { store, logs, response } = post(
    JSON.stringify({
      delay: 99,
      brightness: 10,
      animation: "bogus",
      colors: ["#ff0000", "#00ff00"],
    }),
  );
  assert.equal(response.status, 200);
  assert.deepEqual(JSON.parse(response.body), {
    brightness: 10,
    delay: 0.05,
    animation: "rainbow",
    colors: [
      [255, 0, 0],
      [0, 255, 0],
    ],
  });
  assert.equal(store.brightness(), 10);
  assert.deepEqual(logs, [{ level: "debug", message: "applied brightness, colors" }]);
});

test("control: POST without a body redirects to the root", () => {
  const { store, response } = post("");
  assert.equal(response.status, 302);
  assert.equal(response.headers["Location"], "/");
  assert.equal(response.body, "");
  assert.equal(store.activePattern(), "rainbow");
});

test("control: malformed JSON is a 400 and changes nothing", () => {
  const { store, logs, response } = post("{");
  assert.equal(response.status, 400);
  assert.deepEqual(JSON.parse(response.body), { error: "request body is not valid JSON" });
  assert.deepEqual(logs, [
    { level: "warn", message: "rejected control request: body is not valid JSON" },
  ]);
  assert.equal(store.delay(), 0.05);
});

test("control: non-object JSON is a 400", () => {
  const { response } = post("[1, 2]");
  assert.equal(response.status, 400);
  assert.deepEqual(JSON.parse(response.body), { error: "request body must be a JSON object" });
});

test("control: GET returns the snapshot without changing it", () => {
  const store = createConfigStore();
  store.applyUpdate({ brightness: 7 });
  const response = handleControlRequest(store, { method: "GET", path: "/", body: "" });
  assert.equal(response.status, 200);
  assert.equal(JSON.parse(response.body).brightness, 7);
});

test("control: OPTIONS answers the CORS preflight", () => {
  const response = handleControlRequest(createConfigStore(), {
    method: "OPTIONS",
    path: "/",
    body: "",
  });
  assert.equal(response.status, 204);
  assert.equal(response.headers["Access-Control-Allow-Methods"], "GET, POST, OPTIONS");
  assert.equal(response.headers["Access-Control-Allow-Headers"], "Content-Type");
});

test("control: other methods and paths are refused", () => {
  const store = createConfigStore();
  const put = handleControlRequest(store, { method: "PUT", path: "/", body: "{}" });
  assert.equal(put.status, 405);
  assert.equal(put.headers["Allow"], "GET, POST, OPTIONS");

  const missing = handleControlRequest(store, { method: "POST", path: "/other", body: "{}" });
  assert.equal(missing.status, 404);
});
