import { Batcher, isTerminalOutcome } from "./batcher";
import type { CancellationToken } from "./cancellation";
import type { BatchSender } from "./channel";
import { debugLog } from "./debug";
import { ChannelClosedError, StreamStalledError, errorOutcome, toErrorPayload } from "./errors";
import { getDefaultNow, yieldToHost } from "./timers";
import type { NowFn, RecordDecoder, StreamOutcome, StreamTermination, TerminationReason, Thresholds, TimerApi } from "./types";

/** Longest stretch the loop runs on microtasks before giving the event loop a turn. */
const DEFAULT_YIELD_INTERVAL_MS = 8;

export interface PollerOptions<T> {
  streamId: string;
  openDecoder: () => RecordDecoder<T> | Promise<RecordDecoder<T>>;
  sender: BatchSender<T>;
  token: CancellationToken;
  thresholds?: Partial<Thresholds>;
  /** Only used to label the stalled error; the gate enforces the timeout. */
  stallTimeoutMs?: number;
  now?: NowFn;
  timers?: TimerApi;
  yieldIntervalMs?: number;
}

function freezeOutcome<T>(outcome: StreamOutcome<T>): StreamOutcome<T> {
  if (outcome.ok) {
    Object.freeze(outcome.event);
  } else {
    Object.freeze(outcome.error);
  }
  return Object.freeze(outcome);
}

/**
 * Drives a record decoder to completion and hands every outcome to a batcher
 * whose sink is the delivery channel.
 *
 * Cancellation is checked before each decoder wait and while parked on
 * channel capacity. An outcome that was already decoded when cancellation is
 * observed is still delivered. Errors never escape: they are delivered as the
 * final batch, or, when the consumer is gone, reported in the termination.
 */
export async function runPoller<T>(options: PollerOptions<T>): Promise<StreamTermination> {
  const { sender, token, streamId } = options;
  const now = options.now ?? getDefaultNow();

  let eventsDecoded = 0;
  let stalled = false;
  let reason: TerminationReason | null = null;
  let decoder: RecordDecoder<T> | null = null;

  const batcher = new Batcher<T>({
    thresholds: options.thresholds,
    now,
    timers: options.timers,
    sink: async (batch) => {
      const result = await sender.send(batch);
      if (result === "stalled") {
        stalled = true;
      }
    },
  });

  // Yield at least once per batch delay so the delay timer gets a chance to run.
  const { maxBatchDelayMs } = batcher.thresholds;
  const requestedYield = Math.max(0, options.yieldIntervalMs ?? DEFAULT_YIELD_INTERVAL_MS);
  const yieldIntervalMs = maxBatchDelayMs > 0 && requestedYield > 0 ? Math.min(requestedYield, maxBatchDelayMs) : requestedYield;

  const termination = (): StreamTermination => ({
    reason: reason ?? "exhausted",
    eventsDecoded,
    batchesSent: batcher.emittedCount,
  });

  try {
    try {
      decoder = await options.openDecoder();
    } catch (error) {
      debugLog("poller", "decoder failed to open", { streamId, error: String(error) });
      await batcher.push(errorOutcome<T>(error, "transport"));
      reason = "terminal";
      return termination();
    }

    let lastYield = now();
    while (reason === null) {
      if (token.poll()) {
        reason = "cancelled";
        break;
      }

      let outcome: StreamOutcome<T> | undefined;
      try {
        outcome = await decoder.next();
      } catch (error) {
        outcome = errorOutcome<T>(error, "transport");
      }

      if (outcome === undefined) {
        reason = "exhausted";
        break;
      }

      eventsDecoded += 1;
      await batcher.push(freezeOutcome(outcome));

      if (isTerminalOutcome(outcome)) {
        reason = "terminal";
      } else if (stalled) {
        reason = "stalled";
      } else if (yieldIntervalMs > 0 && now() - lastYield >= yieldIntervalMs) {
        await yieldToHost();
        lastYield = now();
      }
    }

    if (reason === "stalled") {
      await batcher.push(errorOutcome<T>(new StreamStalledError(options.stallTimeoutMs ?? 0), "stalled"));
    } else {
      await batcher.close();
    }
    debugLog("poller", "stopped", { streamId, reason, eventsDecoded, batchesSent: batcher.emittedCount });
    return termination();
  } catch (error) {
    if (error instanceof ChannelClosedError) {
      reason = "channel-closed";
      debugLog("poller", "consumer closed the channel", { streamId });
      return termination();
    }
    reason = "crashed";
    console.error(`[tokenpipe:poller] stream ${streamId} crashed:`, error);
    return { ...termination(), error: toErrorPayload(error) };
  } finally {
    batcher.dispose();
    sender.close();
    if (decoder?.close) {
      try {
        await decoder.close();
      } catch (error) {
        console.warn(`[tokenpipe:poller] failed to close decoder for stream ${streamId}:`, error);
      }
    }
  }
}
