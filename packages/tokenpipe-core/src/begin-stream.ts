import { CancellationToken, linkAbortSignal } from "./cancellation";
import { createBatchChannel } from "./channel";
import { debugLog } from "./debug";
import { toErrorPayload } from "./errors";
import { type StreamPool, defaultStreamPool } from "./pool";
import { runPoller } from "./poller";
import { StreamHandle } from "./stream-handle";
import { getDefaultNow, yieldToHost } from "./timers";
import type { DecoderFactory, NowFn, StreamTermination, Thresholds, TimerApi } from "./types";

export interface CancellationPolicy {
  /** Share a token with other streams or code; one is created otherwise. */
  token?: CancellationToken;
  signal?: AbortSignal;
  /**
   * Give up on a consumer that leaves a bounded channel full for this long.
   * The stream then ends with a `stalled` error. Unset means wait forever.
   */
  stallTimeoutMs?: number;
}

export interface ChannelPolicy {
  /** Undrained batches allowed before the poller blocks. Defaults to unbounded. */
  capacity?: number;
}

export interface BeginStreamOptions<TTransport, T> {
  createDecoder: DecoderFactory<TTransport, T>;
  thresholds?: Partial<Thresholds>;
  channel?: ChannelPolicy;
  cancellation?: CancellationPolicy;
  pool?: StreamPool;
  now?: NowFn;
  timers?: TimerApi;
}

export function createStreamId(): string {
  return crypto.randomUUID();
}

/**
 * Starts a poller on its own async loop in this process and returns the
 * consumer's handle. The loop is driven by decoder readiness alone; nothing
 * in it waits on the host's frame scheduling.
 *
 * Throws ResourceExhaustedError synchronously when the pool is full.
 */
export function beginStream<TTransport, T>(transport: TTransport, options: BeginStreamOptions<TTransport, T>): StreamHandle<T> {
  const pool = options.pool ?? defaultStreamPool;
  const release = pool.acquire();
  const id = createStreamId();
  const now = options.now ?? getDefaultNow();
  const token = options.cancellation?.token ?? new CancellationToken();
  const signal = options.cancellation?.signal;
  const unlinkSignal = signal ? linkAbortSignal(token, signal) : () => {};
  const stallTimeoutMs = options.cancellation?.stallTimeoutMs;

  const { sender, receiver } = createBatchChannel<T>({
    capacity: options.channel?.capacity,
    token,
    stallTimeoutMs,
    timers: options.timers,
    now,
  });

  debugLog("poller", "starting in-process stream", { id, capacity: options.channel?.capacity ?? "unbounded" });

  const termination: Promise<StreamTermination> = yieldToHost()
    .then(() =>
      runPoller<T>({
        streamId: id,
        openDecoder: () => options.createDecoder(transport, { streamId: id }),
        sender,
        token,
        thresholds: options.thresholds,
        stallTimeoutMs,
        now,
        timers: options.timers,
      }),
    )
    .catch((error: unknown): StreamTermination => {
      console.error(`[tokenpipe:poller] stream ${id} failed to run:`, error);
      sender.close();
      return { reason: "crashed", eventsDecoded: 0, batchesSent: 0, error: toErrorPayload(error) };
    })
    .finally(() => {
      release();
      unlinkSignal();
    });

  return new StreamHandle<T>({ id, token, receiver, termination, now });
}
