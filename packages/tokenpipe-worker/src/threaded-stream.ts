import type { Worker } from "node:worker_threads";
import {
  type CancellationPolicy,
  CancellationToken,
  type ChannelPolicy,
  type NowFn,
  ResourceExhaustedError,
  StreamHandle,
  StreamPool,
  type StreamTermination,
  type Thresholds,
  createStreamId,
  debugLog,
  linkAbortSignal,
  normalizeCapacity,
  normalizeThresholds,
} from "@tokenpipe/core";
import { PortBatchReceiver } from "./port-channel";
import type { PollerThreadBootstrap } from "./protocol";
import { type CreatePollerThreadOptions, createPollerThread, resolveDecoderModule } from "./thread";

export const DEFAULT_MAX_POLLER_THREADS = 4;

/** Shared by every threaded stream that does not bring its own pool. */
export const defaultPollerThreadPool = new StreamPool(DEFAULT_MAX_POLLER_THREADS);

export interface BeginThreadedStreamOptions {
  /**
   * Module loaded inside the thread. Must export a decoder factory
   * `(transport, { streamId }) => RecordDecoder`.
   */
  decoderModule: string | URL;
  /** Export name of the factory. Defaults to `createDecoder`. */
  decoderExport?: string;
  thresholds?: Partial<Thresholds>;
  channel?: ChannelPolicy;
  cancellation?: CancellationPolicy;
  pool?: StreamPool;
  now?: NowFn;
  thread?: CreatePollerThreadOptions;
}

/**
 * Starts a poller on a dedicated worker thread. The transport descriptor is
 * structured-cloned into the thread, so it must be plain data; the decoder
 * itself is built there from `decoderModule`.
 *
 * Throws ResourceExhaustedError synchronously when the pool is full or the
 * thread cannot be created.
 */
export function beginThreadedStream<T = unknown, TTransport = unknown>(transport: TTransport, options: BeginThreadedStreamOptions): StreamHandle<T> {
  const pool = options.pool ?? defaultPollerThreadPool;
  const release = pool.acquire();
  const id = createStreamId();
  const token = options.cancellation?.token ?? new CancellationToken();

  const bootstrap: PollerThreadBootstrap = {
    streamId: id,
    decoderModule: resolveDecoderModule(options.decoderModule),
    decoderExport: options.decoderExport ?? "createDecoder",
    transport,
    thresholds: normalizeThresholds(options.thresholds),
    capacity: normalizeCapacity(options.channel?.capacity),
    stallTimeoutMs: options.cancellation?.stallTimeoutMs,
    cancelBuffer: token.buffer,
  };

  let worker: Worker;
  try {
    worker = createPollerThread(bootstrap, options.thread);
  } catch (error) {
    release();
    throw new ResourceExhaustedError("could not start a poller thread", { cause: error });
  }

  const signal = options.cancellation?.signal;
  const unlinkSignal = signal ? linkAbortSignal(token, signal) : () => {};
  const receiver = new PortBatchReceiver<T>(worker, id);
  const stopNudging = token.onCancel(() => receiver.nudgeCancel());

  debugLog("thread", "started poller thread", { id, module: bootstrap.decoderModule, capacity: bootstrap.capacity });

  const termination: Promise<StreamTermination> = receiver.termination.finally(() => {
    release();
    unlinkSignal();
    stopNudging();
  });

  return new StreamHandle<T>({ id, token, receiver, termination, now: options.now });
}
