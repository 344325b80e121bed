import type { CancellationToken } from "./cancellation";
import type { BatchReceiver } from "./channel";
import { getDefaultNow } from "./timers";
import type { Batch, NowFn, StreamStats, StreamStatus, StreamTermination } from "./types";

/** What a consumer loop needs from a stream. */
export interface BatchSource<T> {
  pollBatches(): Batch<T>[];
  onReadable(listener: () => void): () => void;
  readonly closed: boolean;
}

// A handle that becomes unreachable without dispose() still stops its poller.
const abandonedHandles = new FinalizationRegistry<CancellationToken>((token) => {
  token.cancel();
});

export interface StreamHandleParams<T> {
  id: string;
  token: CancellationToken;
  receiver: BatchReceiver<T>;
  termination: Promise<StreamTermination>;
  now?: NowFn;
  onDispose?: () => void;
}

export class StreamHandle<T> implements BatchSource<T> {
  readonly id: string;
  private readonly token: CancellationToken;
  private readonly receiver: BatchReceiver<T>;
  private readonly termination: Promise<StreamTermination>;
  private readonly now: NowFn;
  private readonly onDispose?: () => void;
  private disposed = false;
  private counters: StreamStats;

  constructor(params: StreamHandleParams<T>) {
    this.id = params.id;
    this.token = params.token;
    this.receiver = params.receiver;
    this.termination = params.termination;
    this.now = params.now ?? getDefaultNow();
    this.onDispose = params.onDispose;
    this.counters = {
      startedAt: this.now(),
      firstBatchAt: null,
      timeToFirstBatchMs: null,
      batchesReceived: 0,
      outcomesReceived: 0,
      largestBatch: 0,
      closedAt: null,
    };
    abandonedHandles.register(this, this.token, this);
  }

  /** Every batch buffered right now, oldest first. Never waits. */
  pollBatches(): Batch<T>[] {
    const batches = this.receiver.drain();
    if (batches.length > 0) {
      const drainedAt = this.now();
      if (this.counters.firstBatchAt === null) {
        this.counters.firstBatchAt = drainedAt;
        this.counters.timeToFirstBatchMs = drainedAt - this.counters.startedAt;
      }
      for (const batch of batches) {
        this.counters.batchesReceived += 1;
        this.counters.outcomesReceived += batch.outcomes.length;
        this.counters.largestBatch = Math.max(this.counters.largestBatch, batch.outcomes.length);
      }
    }
    if (this.counters.closedAt === null && this.receiver.closed) {
      this.counters.closedAt = this.now();
    }
    return batches;
  }

  onReadable(listener: () => void): () => void {
    return this.receiver.onReadable(listener);
  }

  /** Idempotent. Batches already buffered stay available to `pollBatches`. */
  cancel(): boolean {
    return this.token.cancel();
  }

  /** Cancels and drops the consuming end. Buffered batches are discarded. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    abandonedHandles.unregister(this);
    this.token.cancel();
    this.receiver.close();
    this.onDispose?.();
  }

  /** Resolves once the poller has stopped and released its execution context. */
  join(): Promise<StreamTermination> {
    return this.termination;
  }

  get closed(): boolean {
    return this.receiver.closed;
  }

  get cancelled(): boolean {
    return this.token.isCancelled;
  }

  get status(): StreamStatus {
    if (this.disposed || this.receiver.closed) {
      return "closed";
    }
    return this.token.isCancelled ? "cancelling" : "active";
  }

  stats(): StreamStats {
    return { ...this.counters };
  }
}
