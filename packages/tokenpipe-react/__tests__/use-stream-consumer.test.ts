import assert from "node:assert";

import { type StreamHandle, type StreamOutcome, StreamPool, beginStream, dataOutcome, decoderFromIterable } from "@tokenpipe/core";
import { JSDOM } from "jsdom";
import React from "react";
import { createRoot } from "react-dom/client";

import { type StreamReducer, useStreamConsumer } from "../src";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function setupDom() {
  const dom = new JSDOM('<!doctype html><html><body><div id="root"></div></body></html>', {
    pretendToBeVisual: true,
  });
  const { window } = dom;
  Object.assign(globalThis, {
    window,
    document: window.document,
    HTMLElement: window.HTMLElement,
    Node: window.Node,
  });
  return window;
}

function teardownDom(window: { close(): void }) {
  window.close();
  for (const key of ["window", "document", "HTMLElement", "Node"]) {
    Reflect.deleteProperty(globalThis, key);
  }
}

const appendText: StreamReducer<string, string> = (state, event) => state + event.payload;

function Transcript({ handle }: { handle: StreamHandle<string> | null }) {
  const snapshot = useStreamConsumer(handle, appendText, "", { batch: "timeout", timeoutMs: 0 });
  return React.createElement("p", { id: "out", "data-done": String(snapshot.done) }, snapshot.state);
}

async function* words(): AsyncGenerator<StreamOutcome<string>> {
  yield dataOutcome("Hel");
  yield dataOutcome("lo");
  yield dataOutcome("!", true);
}

async function* endless(): AsyncGenerator<StreamOutcome<string>> {
  for (;;) {
    yield dataOutcome(".");
    await sleep(2);
  }
}

async function testRendersStreamedState(window: ReturnType<typeof setupDom>) {
  const handle = beginStream(null, { createDecoder: () => decoderFromIterable(words()), pool: new StreamPool(1) });
  const container = window.document.getElementById("root");
  assert.ok(container, "missing test root container");
  const root = createRoot(container);
  root.render(React.createElement(Transcript, { handle }));

  await handle.join();
  await sleep(50);

  const out = container.querySelector("#out");
  assert.ok(out, "expected transcript element");
  assert.strictEqual(out.textContent, "Hello!");
  assert.strictEqual(out.getAttribute("data-done"), "true");

  root.unmount();
  await sleep(10);
  assert.strictEqual(handle.status, "closed", "unmount disposes the handle");
}

async function testUnmountStopsLiveStream(window: ReturnType<typeof setupDom>) {
  const handle = beginStream(null, { createDecoder: () => decoderFromIterable(endless()), pool: new StreamPool(1) });
  const container = window.document.getElementById("root");
  assert.ok(container, "missing test root container");
  const root = createRoot(container);
  root.render(React.createElement(Transcript, { handle }));
  await sleep(40);

  const text = container.querySelector("#out")?.textContent ?? "";
  assert.ok(text.length > 0 && /^\.+$/.test(text), `expected streamed dots, got "${text}"`);
  assert.strictEqual(handle.status, "active");

  root.unmount();
  const termination = await handle.join();
  assert.ok(termination.reason === "cancelled" || termination.reason === "channel-closed", termination.reason);
  assert.strictEqual(handle.status, "closed");
}

function LiveTranscript({ handle }: { handle: StreamHandle<string>; tick: number }) {
  // Fresh option callbacks on every render.
  const snapshot = useStreamConsumer(handle, appendText, "", {
    batch: "timeout",
    timeoutMs: 0,
    now: () => performance.now(),
    onTurn: () => {},
  });
  return React.createElement("p", { id: "out" }, snapshot.state);
}

async function testRerenderKeepsStreamAlive(window: ReturnType<typeof setupDom>) {
  const handle = beginStream(null, { createDecoder: () => decoderFromIterable(endless()), pool: new StreamPool(1) });
  const container = window.document.getElementById("root");
  assert.ok(container, "missing test root container");
  const root = createRoot(container);
  root.render(React.createElement(LiveTranscript, { handle, tick: 0 }));
  await sleep(20);
  root.render(React.createElement(LiveTranscript, { handle, tick: 1 }));
  await sleep(20);

  assert.strictEqual(handle.status, "active", "a parent re-render leaves the stream running");
  const before = container.querySelector("#out")?.textContent ?? "";
  await sleep(30);
  const after = container.querySelector("#out")?.textContent ?? "";
  assert.ok(after.length > before.length, `expected more dots after re-render, got "${before}" then "${after}"`);

  root.unmount();
  await handle.join();
  assert.strictEqual(handle.status, "closed");
}

async function testStrictModeKeepsStreamAlive(window: ReturnType<typeof setupDom>) {
  const handle = beginStream(null, { createDecoder: () => decoderFromIterable(endless()), pool: new StreamPool(1) });
  const container = window.document.getElementById("root");
  assert.ok(container, "missing test root container");
  const root = createRoot(container);
  root.render(React.createElement(React.StrictMode, null, React.createElement(Transcript, { handle })));
  await sleep(40);

  assert.strictEqual(handle.status, "active", "the StrictMode remount keeps the stream");
  const text = container.querySelector("#out")?.textContent ?? "";
  assert.ok(/^\.+$/.test(text), `expected streamed dots, got "${text}"`);

  root.unmount();
  const termination = await handle.join();
  assert.ok(termination.reason === "cancelled" || termination.reason === "channel-closed", termination.reason);
}

async function testNullHandleRendersInitialState(window: ReturnType<typeof setupDom>) {
  const container = window.document.getElementById("root");
  assert.ok(container, "missing test root container");
  const root = createRoot(container);
  root.render(React.createElement(Transcript, { handle: null }));
  await sleep(20);
  assert.strictEqual(container.querySelector("#out")?.textContent, "");
  assert.strictEqual(container.querySelector("#out")?.getAttribute("data-done"), "false");
  root.unmount();
}

async function main() {
  const window = setupDom();
  try {
    await testRendersStreamedState(window);
    await testUnmountStopsLiveStream(window);
    await testRerenderKeepsStreamAlive(window);
    await testStrictModeKeepsStreamAlive(window);
    await testNullHandleRendersInitialState(window);
  } finally {
    teardownDom(window);
  }
  console.log("useStreamConsumer tests passed");
}

await main();
