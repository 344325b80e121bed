import assert from "node:assert";

import { Batcher, normalizeThresholds } from "../src/batcher";
import { dataOutcome } from "../src/decoders/iterable";
import { DecodeError, errorOutcome } from "../src/errors";
import type { Batch, Thresholds } from "../src/types";
import { ManualClock } from "./helpers/manual-clock";
import { errorsOf, payloadsOf } from "./helpers/outcomes";

function createBatcher(thresholds: Partial<Thresholds>) {
  const clock = new ManualClock();
  const batches: Batch<number>[] = [];
  const batcher = new Batcher<number>({
    thresholds,
    now: clock.now,
    timers: clock,
    sink: async (batch) => {
      batches.push(batch);
    },
  });
  return { clock, batches, batcher };
}

async function testSteadyProducerFasterThanDelay() {
  const { clock, batches, batcher } = createBatcher({ maxBatchSize: 100, maxBatchDelayMs: 4 });
  const decodedAt = new Map<number, number>();

  for (let i = 1; i <= 250; i++) {
    clock.advance(3);
    decodedAt.set(i, clock.now());
    await batcher.push(dataOutcome(i, i === 250));
  }

  assert.deepStrictEqual(
    payloadsOf(batches),
    Array.from({ length: 250 }, (_, index) => index + 1),
    "delivered payloads should reproduce decode order",
  );
  assert.strictEqual(batches.length, 126, "first singleton + 124 pairs + terminal");
  assert.deepStrictEqual(payloadsOf([batches[0]]), [1], "first event should go out alone");
  assert.strictEqual(batches[0].reason, "first");

  const last = batches[batches.length - 1];
  assert.strictEqual(last.reason, "terminal");
  assert.strictEqual(last.outcomes.length, 1, "done event should be flushed alone");

  for (const batch of batches.slice(1, -1)) {
    assert.strictEqual(batch.reason, "delay");
    assert.strictEqual(batch.outcomes.length, 2);
    const [firstOutcome] = batch.outcomes;
    assert.ok(firstOutcome.ok);
    const age = batch.flushedAt - (decodedAt.get(firstOutcome.event.payload) ?? Number.NaN);
    assert.ok(age <= 4, `batch ${batch.seq} flushed ${age}ms after its first member`);
  }

  assert.deepStrictEqual(
    batches.map((batch) => batch.seq),
    Array.from({ length: 126 }, (_, index) => index + 1),
    "sequence numbers should be contiguous",
  );
}

async function testBatchingDisabled() {
  const { batches, batcher } = createBatcher({ maxBatchSize: 1, maxBatchDelayMs: 50 });
  for (let i = 1; i <= 5; i++) {
    await batcher.push(dataOutcome(i));
  }
  await batcher.push(dataOutcome(6, true));

  assert.deepStrictEqual(
    batches.map((batch) => payloadsOf([batch])),
    [[1], [2], [3], [4], [5], [6]],
  );
  assert.deepStrictEqual(
    batches.map((batch) => batch.reason),
    ["first", "size", "size", "size", "size", "terminal"],
  );
}

async function testSizeOnlyBatching() {
  const { clock, batches, batcher } = createBatcher({ maxBatchSize: 3, maxBatchDelayMs: 0 });
  for (let i = 1; i <= 5; i++) {
    await batcher.push(dataOutcome(i));
  }
  assert.strictEqual(clock.pendingTimers, 0, "a zero delay should never arm a timer");
  await batcher.close();

  assert.deepStrictEqual(
    batches.map((batch) => payloadsOf([batch])),
    [[1], [2, 3, 4], [5]],
  );
  assert.deepStrictEqual(
    batches.map((batch) => batch.reason),
    ["first", "size", "drain"],
  );
}

async function testSizeWinsAndTimerResets() {
  const { clock, batches, batcher } = createBatcher({ maxBatchSize: 3, maxBatchDelayMs: 10 });
  await batcher.push(dataOutcome(1));
  await batcher.push(dataOutcome(2));
  await batcher.push(dataOutcome(3));
  assert.strictEqual(clock.pendingTimers, 1, "the first pending outcome arms the delay timer");
  await batcher.push(dataOutcome(4));
  assert.strictEqual(clock.pendingTimers, 0, "a size flush disarms the delay timer");
  assert.strictEqual(batches.length, 2);

  await batcher.push(dataOutcome(5));
  clock.advance(9);
  assert.strictEqual(batches.length, 2, "nothing should flush before the delay elapses");
  assert.strictEqual(batcher.pendingCount, 1);
  await batcher.flush();
  assert.strictEqual(batcher.pendingCount, 0, "explicit flush empties the pending batch");
  assert.deepStrictEqual(payloadsOf([batches[2]]), [5]);
  assert.strictEqual(batches[2].reason, "drain");

  await batcher.push(dataOutcome(6));
  clock.advance(10);
  await batcher.flush();
  assert.deepStrictEqual(payloadsOf([batches[3]]), [6]);
  assert.strictEqual(batches[3].reason, "delay");

  clock.advance(100);
  await batcher.flush();
  assert.strictEqual(batches.length, 4, "an idle stream should not produce empty batches");
}

async function testErrorAfterEvents() {
  const { batches, batcher } = createBatcher({ maxBatchSize: 100, maxBatchDelayMs: 4 });
  for (let i = 1; i <= 5; i++) {
    await batcher.push(dataOutcome(i));
  }
  await batcher.push(errorOutcome<number>(new DecodeError("bad record")));

  assert.strictEqual(batches.length, 3);
  assert.deepStrictEqual(payloadsOf([batches[0]]), [1]);
  assert.deepStrictEqual(payloadsOf([batches[1]]), [2, 3, 4, 5], "pending events flush before the error");
  assert.strictEqual(batches[2].outcomes.length, 1, "the error should be delivered alone");
  assert.deepStrictEqual(
    errorsOf(batches).map((error) => [error.kind, error.message]),
    [["decode", "bad record"]],
  );
  assert.ok(batcher.isClosed);
  await assert.rejects(batcher.push(dataOutcome(7)), /push after batcher closed/);
}

async function testSinkFailurePropagates() {
  const batches: Batch<number>[] = [];
  const batcher = new Batcher<number>({
    thresholds: { maxBatchSize: 2, maxBatchDelayMs: 0 },
    sink: async (batch) => {
      if (batch.seq === 2) {
        throw new Error("sink down");
      }
      batches.push(batch);
    },
  });
  await batcher.push(dataOutcome(1));
  await batcher.push(dataOutcome(2));
  await assert.rejects(batcher.push(dataOutcome(3)), /sink down/);
  await assert.rejects(batcher.push(dataOutcome(4)), /sink down/, "later pushes keep reporting the failure");
  assert.strictEqual(batches.length, 1);
}

function testNormalizeThresholds() {
  assert.deepStrictEqual(normalizeThresholds({ maxBatchSize: 0, maxBatchDelayMs: -5 }), { maxBatchSize: 1, maxBatchDelayMs: 0 });
  assert.deepStrictEqual(normalizeThresholds({ maxBatchSize: 2.7 }), { maxBatchSize: 2, maxBatchDelayMs: 4 });
  assert.deepStrictEqual(normalizeThresholds({ maxBatchSize: Number.NaN, maxBatchDelayMs: Number.NaN }), { maxBatchSize: 100, maxBatchDelayMs: 4 });
}

async function main() {
  await testSteadyProducerFasterThanDelay();
  await testBatchingDisabled();
  await testSizeOnlyBatching();
  await testSizeWinsAndTimerResets();
  await testErrorAfterEvents();
  await testSinkFailurePropagates();
  testNormalizeThresholds();
  console.log("Batcher tests passed");
}

await main();
