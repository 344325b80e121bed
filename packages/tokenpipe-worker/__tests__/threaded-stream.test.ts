import assert from "node:assert";
import { type IncomingMessage, createServer } from "node:http";
import type { AddressInfo } from "node:net";

import { type Batch, type StreamHandle, StreamPool } from "@tokenpipe/core";
import { type NdjsonHttpTransport, beginThreadedStream, getNdjsonHttpDecoderUrl, getPollerThreadEntryUrl } from "../src";
import type { CountingTransport } from "./fixtures/counting-decoder";

const decoderModule = new URL("./fixtures/counting-decoder.ts", import.meta.url);
const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function payloadsOf(batches: Batch<number>[]): number[] {
  return batches.flatMap((batch) => batch.outcomes.flatMap((outcome) => (outcome.ok ? [outcome.event.payload] : [])));
}

async function consume(handle: StreamHandle<number>, pauseMs = 0): Promise<Batch<number>[]> {
  const batches: Batch<number>[] = [];
  const deadline = Date.now() + 10_000;
  while (!handle.closed && Date.now() < deadline) {
    batches.push(...handle.pollBatches());
    await sleep(pauseMs);
  }
  batches.push(...handle.pollBatches());
  return batches;
}

async function testDeliversInOrder() {
  const pool = new StreamPool(2);
  const transport: CountingTransport = { count: 50, done: true };
  const handle = beginThreadedStream<number>(transport, {
    decoderModule,
    thresholds: { maxBatchSize: 8, maxBatchDelayMs: 2 },
    pool,
  });
  const batches = await consume(handle);
  const termination = await handle.join();

  assert.strictEqual(termination.reason, "terminal");
  assert.strictEqual(termination.eventsDecoded, 50);
  assert.deepStrictEqual(
    payloadsOf(batches),
    Array.from({ length: 50 }, (_, index) => index),
  );
  assert.strictEqual(batches[0].outcomes.length, 1, "first event crosses the thread alone");
  assert.ok(batches.every((batch) => batch.outcomes.length <= 8));
  assert.strictEqual(batches[batches.length - 1].reason, "terminal");
  assert.strictEqual(pool.active, 0);
}

async function testBoundedChannelAcrossThreads() {
  const transport: CountingTransport = { count: 40 };
  const handle = beginThreadedStream<number>(transport, {
    decoderModule,
    thresholds: { maxBatchSize: 1 },
    channel: { capacity: 1 },
    pool: new StreamPool(1),
  });
  const batches = await consume(handle, 1);
  assert.deepStrictEqual(
    payloadsOf(batches),
    Array.from({ length: 40 }, (_, index) => index),
    "a full channel blocks the thread without dropping events",
  );
  assert.strictEqual((await handle.join()).reason, "exhausted");
}

async function testCancelStopsThread() {
  const transport: CountingTransport = { count: 1_000_000, delayMs: 1 };
  const handle = beginThreadedStream<number>(transport, { decoderModule, pool: new StreamPool(1) });
  while (handle.stats().batchesReceived === 0) {
    handle.pollBatches();
    await sleep(1);
  }
  handle.cancel();
  const batches = await consume(handle);
  const termination = await handle.join();

  assert.strictEqual(termination.reason, "cancelled");
  assert.ok(termination.eventsDecoded < 1_000_000);
  assert.ok(batches.every((batch) => batch.outcomes.every((outcome) => outcome.ok)), "cancellation adds no error batch");
}

async function testMissingExportIsDelivered() {
  const handle = beginThreadedStream<number>({ count: 1 }, { decoderModule, decoderExport: "nope", pool: new StreamPool(1) });
  const originalError = console.error;
  console.error = () => {};
  const [batches, termination] = await Promise.all([consume(handle), handle.join()]).finally(() => {
    console.error = originalError;
  });

  assert.strictEqual(termination.reason, "crashed");
  assert.strictEqual(batches.length, 1);
  const [outcome] = batches[0].outcomes;
  assert.ok(!outcome.ok);
  assert.strictEqual(outcome.error.kind, "internal");
  assert.ok(outcome.error.message.includes('has no export named "nope"'), outcome.error.message);
}

function testSourcesStartThroughLoader() {
  const entry = getPollerThreadEntryUrl();
  assert.ok(entry.href.endsWith("/src/poller-thread-loader.mjs"), entry.href);
  assert.ok(getNdjsonHttpDecoderUrl().href.endsWith("/src/ndjson-http-decoder.ts"));
}

function readBody(request: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    request.setEncoding("utf8");
    request.on("data", (chunk: string) => {
      body += chunk;
    });
    request.on("end", () => resolve(body));
    request.on("error", reject);
  });
}

async function testNdjsonOverHttp() {
  const received: { method: string | undefined; url: string | undefined; body: string }[] = [];
  const server = createServer((request, response) => {
    readBody(request).then(
      (body) => {
        received.push({ method: request.method, url: request.url, body });
        response.writeHead(200, { "content-type": "application/x-ndjson" });
        response.write('{"response":"Hel","done":false}\n');
        response.write("1f\n");
        response.end('{"response":"lo","done":true}\n');
      },
      (error: unknown) => {
        response.destroy(error instanceof Error ? error : undefined);
      },
    );
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address: AddressInfo | string | null = server.address();
  assert.ok(address !== null && typeof address === "object");

  try {
    const transport: NdjsonHttpTransport = { url: `http://127.0.0.1:${address.port}/api/generate`, body: '{"prompt":"hi"}' };
    const handle = beginThreadedStream<unknown>(transport, {
      decoderModule: getNdjsonHttpDecoderUrl(),
      pool: new StreamPool(1),
    });
    const batches: Batch<unknown>[] = [];
    const deadline = Date.now() + 10_000;
    while (!handle.closed && Date.now() < deadline) {
      batches.push(...handle.pollBatches());
      await sleep(1);
    }
    batches.push(...handle.pollBatches());
    const termination = await handle.join();

    assert.strictEqual(termination.reason, "terminal");
    assert.strictEqual(termination.eventsDecoded, 2);
    assert.deepStrictEqual(
      batches.flatMap((batch) => batch.outcomes),
      [
        { ok: true, event: { payload: { response: "Hel", done: false }, done: false } },
        { ok: true, event: { payload: { response: "lo", done: true }, done: true } },
      ],
    );
    assert.deepStrictEqual(received, [{ method: "POST", url: "/api/generate", body: '{"prompt":"hi"}' }]);
  } finally {
    server.closeAllConnections();
    server.close();
  }
}

async function main() {
  testSourcesStartThroughLoader();
  await testDeliversInOrder();
  await testBoundedChannelAcrossThreads();
  await testCancelStopsThread();
  await testMissingExportIsDelivered();
  await testNdjsonOverHttp();
  console.log("Threaded stream tests passed");
}

await main();
